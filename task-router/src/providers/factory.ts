import type { ZodType, ZodTypeDef } from 'zod';
import type { ProviderDescriptor } from '../config/schema.js';
import { ConfigError, ErrorCode } from '../utils/errors.js';
import { AnthropicProvider, AnthropicProviderConfigSchema } from './anthropic-provider.js';
import { CliProvider, CliProviderConfigSchema, CLI_PRESETS } from './cli-provider.js';
import { OllamaProvider, OllamaProviderConfigSchema } from './ollama-provider.js';
import type { ProviderAdapter } from './types.js';

export interface ProviderFactoryOptions {
  /** Base directory for per-task working directories of CLI providers */
  workDir: string;
}

function parseAdapterConfig<T>(
  descriptor: ProviderDescriptor,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  const result = schema.safeParse(descriptor.config);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`);
    throw new ConfigError(
      ErrorCode.CONFIG_VALIDATION_FAILED,
      `Invalid config for provider "${descriptor.name}": ${details.join('; ')}`,
      { field: `providers.${descriptor.name}.config`, value: descriptor.config }
    );
  }
  return result.data;
}

/**
 * Factory for creating provider adapters from descriptors
 */
export class ProviderFactory {
  private options: ProviderFactoryOptions;

  constructor(options: ProviderFactoryOptions) {
    this.options = options;
  }

  /**
   * Create an adapter for the descriptor's adapter kind
   */
  create(descriptor: ProviderDescriptor): ProviderAdapter {
    switch (descriptor.adapter) {
      case 'cli':
      case 'claude_cli':
      case 'goose': {
        const config = parseAdapterConfig(descriptor, CliProviderConfigSchema);
        if (!config.executable && !CLI_PRESETS[descriptor.adapter]) {
          throw new ConfigError(
            ErrorCode.CONFIG_VALIDATION_FAILED,
            `Provider "${descriptor.name}" uses the generic cli adapter and must set config.executable`,
            { field: `providers.${descriptor.name}.config.executable` }
          );
        }
        return new CliProvider(descriptor, config, this.options.workDir);
      }

      case 'ollama':
        return new OllamaProvider(descriptor, parseAdapterConfig(descriptor, OllamaProviderConfigSchema));

      case 'anthropic':
        return new AnthropicProvider(descriptor, parseAdapterConfig(descriptor, AnthropicProviderConfigSchema));

      default:
        throw new ConfigError(
          ErrorCode.CONFIG_UNKNOWN_ADAPTER,
          `Unsupported adapter "${descriptor.adapter}" for provider "${descriptor.name}". ` +
            `Supported adapters: ${ProviderFactory.getSupportedAdapters().join(', ')}`,
          { field: `providers.${descriptor.name}.adapter`, value: descriptor.adapter }
        );
    }
  }

  /**
   * Create adapters for every descriptor, keyed by provider name
   */
  createAll(descriptors: readonly ProviderDescriptor[]): Map<string, ProviderAdapter> {
    return new Map(descriptors.map((d): [string, ProviderAdapter] => [d.name, this.create(d)]));
  }

  static getSupportedAdapters(): string[] {
    return ['cli', 'claude_cli', 'goose', 'ollama', 'anthropic'];
  }
}

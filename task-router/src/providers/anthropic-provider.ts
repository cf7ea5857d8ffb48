import Anthropic from '@anthropic-ai/sdk';
import type { ContentBlock, TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { z } from 'zod';
import type { ProviderDescriptor, RateLimitStrategy } from '../config/schema.js';
import type { TaskPacket } from '../tasks/packet.js';
import { buildPrompt } from './prompt.js';
import { detectRateLimit } from './rate-limit.js';
import {
  providerError,
  type GenerateOptions,
  type GenerateResult,
  type ProviderAdapter,
  type ProviderError,
} from './types.js';

export const AnthropicProviderConfigSchema = z.object({
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
  maxTokens: z.number().int().min(1).default(8192),
  /** Environment variable holding the API key */
  apiKeyEnv: z.string().min(1).default('ANTHROPIC_API_KEY'),
  timeoutSeconds: z.number().int().min(1).optional(),
});

export type AnthropicProviderConfig = z.infer<typeof AnthropicProviderConfigSchema>;

const SYSTEM_PROMPT =
  'You are a senior software developer. Complete the task and reply with the full solution, ' +
  'a short explanation of your approach and any assumptions you made.';

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map an SDK exception to a failure value
 */
export function toProviderError(error: unknown): ProviderError {
  const cause = error instanceof Error ? error : new Error(String(error));

  if (error instanceof Anthropic.APIUserAbortError) {
    return providerError('Request aborted', { code: 'ABORTED', cause });
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return providerError(cause.message, { code: 'ETIMEDOUT', timedOut: true, cause });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return providerError(cause.message, { code: 'ECONNREFUSED', cause });
  }

  const statusCode = statusOf(error);
  return providerError(cause.message, { statusCode, cause });
}

/**
 * Runs tasks through the Anthropic Messages API.
 */
export class AnthropicProvider implements ProviderAdapter {
  readonly name: string;
  readonly rateLimitStrategy: RateLimitStrategy;
  private config: AnthropicProviderConfig;
  private client: Anthropic | null = null;

  constructor(descriptor: ProviderDescriptor, config: AnthropicProviderConfig) {
    this.name = descriptor.name;
    this.rateLimitStrategy = descriptor.rateLimitStrategy;
    this.config = config;
  }

  private getApiKey(): string | undefined {
    return process.env[this.config.apiKeyEnv] || undefined;
  }

  private getClient(apiKey: string): Anthropic {
    if (!this.client) {
      // Retries are disabled so failover to another provider happens immediately
      this.client = new Anthropic({ apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(task: TaskPacket, options: GenerateOptions = {}): Promise<GenerateResult> {
    const startTime = Date.now();
    const apiKey = this.getApiKey();
    if (!apiKey) {
      return {
        ok: false,
        error: providerError(`${this.config.apiKeyEnv} is not set`, { code: 'NO_API_KEY' }),
        durationMs: 0,
      };
    }

    try {
      const response = await this.getClient(apiKey).messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildPrompt(task) }],
        },
        {
          signal: options.signal,
          timeout: (this.config.timeoutSeconds ?? task.execution.timeoutSeconds) * 1000,
        }
      );

      const output = response.content
        .filter((block: ContentBlock): block is TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');

      if (!output) {
        return {
          ok: false,
          error: providerError('No text response from model', { code: 'EMPTY_RESPONSE' }),
          durationMs: Date.now() - startTime,
        };
      }

      return {
        ok: true,
        bundle: {
          taskId: task.identity.taskId,
          provider: this.name,
          output,
          filesModified: [],
          logs: `stop_reason=${response.stop_reason ?? 'unknown'} output_tokens=${response.usage.output_tokens}`,
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      return { ok: false, error: toProviderError(error), durationMs: Date.now() - startTime };
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.getApiKey() !== undefined;
  }

  detectRateLimit(error: ProviderError): boolean {
    return detectRateLimit(this.rateLimitStrategy, error);
  }
}

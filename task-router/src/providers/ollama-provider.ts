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

export const OllamaProviderConfigSchema = z.object({
  host: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('qwen2.5-coder:14b'),
  timeoutSeconds: z.number().int().min(1).optional(),
  probeTimeoutMs: z.number().int().min(100).default(5000),
});

export type OllamaProviderConfig = z.infer<typeof OllamaProviderConfigSchema>;

const GenerateResponseSchema = z.object({
  response: z.string().default(''),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const SYSTEM_PREAMBLE = 'You are a senior software developer. Complete the following task.';

/**
 * Runs tasks against a local Ollama server over its HTTP API.
 */
export class OllamaProvider implements ProviderAdapter {
  readonly name: string;
  readonly rateLimitStrategy: RateLimitStrategy;
  private config: OllamaProviderConfig;
  private baseUrl: string;

  constructor(descriptor: ProviderDescriptor, config: OllamaProviderConfig) {
    this.name = descriptor.name;
    this.rateLimitStrategy = descriptor.rateLimitStrategy;
    this.config = config;
    this.baseUrl = config.host.replace(/\/+$/, '');
  }

  async generate(task: TaskPacket, options: GenerateOptions = {}): Promise<GenerateResult> {
    const startTime = Date.now();
    const timeoutMs = (this.config.timeoutSeconds ?? task.execution.timeoutSeconds) * 1000;
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          system: SYSTEM_PREAMBLE,
          prompt: buildPrompt(task),
          stream: false,
        }),
        signal,
      });

      const text = await response.text();
      if (!response.ok) {
        return {
          ok: false,
          error: providerError(`Ollama returned ${response.status}`, { statusCode: response.status, output: text }),
          durationMs: Date.now() - startTime,
        };
      }

      const parsed = GenerateResponseSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        return {
          ok: false,
          error: providerError('Unexpected response from Ollama', { output: text }),
          durationMs: Date.now() - startTime,
        };
      }

      return {
        ok: true,
        bundle: {
          taskId: task.identity.taskId,
          provider: this.name,
          output: parsed.data.response,
          filesModified: [],
          durationMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const timedOut = timeoutSignal.aborted && !options.signal?.aborted;
      return {
        ok: false,
        error: providerError(timedOut ? `Ollama request timed out after ${timeoutMs}ms` : cause.message, {
          timedOut,
          cause,
        }),
        durationMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Available when the server answers and the configured model (matched on
   * its family name) is pulled.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.config.probeTimeoutMs),
      });
      if (!response.ok) return false;

      const parsed = TagsResponseSchema.safeParse(await response.json());
      if (!parsed.success) return false;

      const family = this.config.model.split(':')[0] ?? this.config.model;
      return parsed.data.models.some((m) => m.name.startsWith(family));
    } catch {
      return false;
    }
  }

  detectRateLimit(error: ProviderError): boolean {
    return detectRateLimit(this.rateLimitStrategy, error);
  }
}

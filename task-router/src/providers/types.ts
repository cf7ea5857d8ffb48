import type { RateLimitStrategy } from '../config/schema.js';
import type { TaskPacket } from '../tasks/packet.js';

/**
 * Output of a successful provider run
 */
export interface ArtifactBundle {
  taskId: string;
  provider: string;
  output: string;
  filesModified: string[];
  diffSummary?: string;
  artifactsPath?: string;
  logs?: string;
  durationMs: number;
}

/**
 * A failed provider run, carried as a value. Adapters never throw for
 * backend failures; classification happens in detectRateLimit.
 */
export interface ProviderError {
  message: string;
  statusCode?: number;
  code?: string;
  output?: string;
  timedOut: boolean;
  cause?: Error;
}

export type GenerateResult =
  | { ok: true; bundle: ArtifactBundle }
  | { ok: false; error: ProviderError; durationMs: number };

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Contract every execution backend implements
 */
export interface ProviderAdapter {
  readonly name: string;
  readonly rateLimitStrategy: RateLimitStrategy;

  /**
   * Run the task. Resolves with a failure value instead of rejecting when
   * the backend errors, times out or is aborted.
   */
  generate(task: TaskPacket, options?: GenerateOptions): Promise<GenerateResult>;

  /**
   * Lightweight probe. Must not count as an attempt.
   */
  isAvailable(): Promise<boolean>;

  /**
   * True when the failure is attributable to the provider (rate limit,
   * outage, timeout) rather than to the task.
   */
  detectRateLimit(error: ProviderError): boolean;
}

export function providerError(
  message: string,
  fields: Partial<Omit<ProviderError, 'message'>> = {}
): ProviderError {
  return { message, timedOut: false, ...fields };
}

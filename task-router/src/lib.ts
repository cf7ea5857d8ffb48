export { loadConfig, loadProviders, parseProviders, getConfigHelp, type Config, type ProviderDescriptor } from './config/index.js';
export { ConfigSchema, ProviderDescriptorSchema, ProvidersFileSchema, type RateLimitStrategy, type ProviderType } from './config/schema.js';

export { parseTaskPacket, withRetryGuidance, type TaskPacket, type PendingTask, type RetrySeed, type TaskSource } from './tasks/packet.js';

export type { ProviderAdapter, ProviderError, ArtifactBundle, GenerateResult, GenerateOptions } from './providers/types.js';
export { detectRateLimit, DEFAULT_RATE_LIMIT_PATTERNS } from './providers/rate-limit.js';
export { buildPrompt } from './providers/prompt.js';
export { CliProvider } from './providers/cli-provider.js';
export { OllamaProvider } from './providers/ollama-provider.js';
export { AnthropicProvider } from './providers/anthropic-provider.js';
export { ProviderFactory } from './providers/factory.js';

export { ProviderRegistry } from './registry/provider-registry.js';
export type { ProviderEntry, ProviderOutcome, ProviderStats, PriorityAdjustment, ReloadSummary } from './registry/types.js';

export { RetryContextTracker, type RetryContext } from './retry/retry-context.js';

export {
  TelemetryAggregator,
  TELEMETRY_SOURCE,
  type LoadMode,
  type TelemetrySnapshot,
  type TelemetrySource,
  type RoutingHints,
} from './telemetry/telemetry-aggregator.js';

export { decide, ProviderSelector, type SchedulingDecision, type SelectionInput } from './selection/selector.js';

export {
  Orchestrator,
  type ArtifactSink,
  type DispatchOutcome,
  type FailureRecord,
  type StateChange,
  type TaskState,
} from './orchestration/orchestrator.js';

export { TaskPool, type PoolResult } from './executor/pool.js';

export { QueueClient } from './clients/queue-client.js';
export { StaticTaskSource, loadTaskFiles } from './clients/static-task-source.js';
export { LogArtifactSink } from './clients/log-sink.js';

export { Daemon, createDaemon, createRegistry, describeProviders, type DaemonOptions, type CycleResult } from './daemon.js';

export * from './utils/errors.js';
export { logger, Logger, type LogLevel, type LogFormat } from './utils/logger.js';

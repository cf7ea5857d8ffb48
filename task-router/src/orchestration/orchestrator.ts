import { EventEmitter } from 'events';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import type { RetryContext, RetryContextTracker } from '../retry/retry-context.js';
import type { ExhaustionReason, ProviderSelector } from '../selection/selector.js';
import type { LoadMode } from '../telemetry/telemetry-aggregator.js';
import { withRetryGuidance, type PendingTask, type RetrySeed, type TaskPacket } from '../tasks/packet.js';
import {
  providerError,
  type ArtifactBundle,
  type GenerateResult,
  type ProviderAdapter,
} from '../providers/types.js';
import { TaskCancelledError, wrapError } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';

export type TaskState =
  | 'PENDING'
  | 'SELECTING'
  | 'DISPATCHED'
  | 'SUCCEEDED'
  | 'PROVIDER_FAILED'
  | 'EXECUTION_FAILED'
  | 'EXHAUSTED'
  | 'CANCELLED';

export interface StateChange {
  taskId: string;
  state: TaskState;
  provider?: string;
  attempt: number;
  triedProviders: string[];
}

export type FailureKind =
  | 'provider_failure'
  | 'execution_failure'
  | 'attempts_exhausted'
  | 'providers_exhausted'
  | 'cancelled';

export interface FailureRecord {
  taskId: string;
  kind: FailureKind;
  /** No further dispatch will be attempted for this task */
  terminal: boolean;
  detail: string;
  triedProviders: string[];
  attempt: number;
  provider?: string;
  /** Run identifier returned by runStarted, when the failure ended a run */
  runId?: string;
  output?: string;
  durationMs?: number;
}

/**
 * Downstream consumer of run lifecycle events and results
 */
export interface ArtifactSink {
  /** Returns a run identifier when the sink tracks runs */
  runStarted(taskId: string, provider: string, confidenceWeight: number): Promise<string | undefined>;
  deliver(taskId: string, bundle: ArtifactBundle, runId?: string): Promise<void>;
  reportFailure(record: FailureRecord): Promise<void>;
}

export type DispatchOutcome =
  | { status: 'succeeded'; taskId: string; provider: string; bundle: ArtifactBundle; attempt: number; triedProviders: string[] }
  | {
      status: 'execution_failed';
      taskId: string;
      provider: string;
      terminal: boolean;
      attempt: number;
      triedProviders: string[];
      detail: string;
    }
  | { status: 'exhausted'; taskId: string; reason: ExhaustionReason | 'attempts_exhausted'; attempt: number; triedProviders: string[] };

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface OrchestratorOptions {
  registry: ProviderRegistry;
  tracker: RetryContextTracker;
  selector: ProviderSelector;
  sink: ArtifactSink;
  /** Current load mode, read before every selection */
  loadMode?: () => LoadMode;
  /** Attempt budget for packets without execution.maxAttempts */
  defaultMaxAttempts: number;
}

/**
 * Drives one task through select, dispatch and classify. Provider failures
 * are retried on another provider inside the same call; execution failures
 * consume attempt budget and are handed back to the caller.
 */
export class Orchestrator extends EventEmitter {
  private registry: ProviderRegistry;
  private tracker: RetryContextTracker;
  private selector: ProviderSelector;
  private sink: ArtifactSink;
  private loadMode: () => LoadMode;
  private defaultMaxAttempts: number;
  private log = logger.child('Orchestrator');

  constructor(options: OrchestratorOptions) {
    super();
    this.registry = options.registry;
    this.tracker = options.tracker;
    this.selector = options.selector;
    this.sink = options.sink;
    this.loadMode = options.loadMode ?? ((): LoadMode => 'normal');
    this.defaultMaxAttempts = options.defaultMaxAttempts;
  }

  private emitState(context: RetryContext, state: TaskState, provider?: string): void {
    const change: StateChange = {
      taskId: context.taskId,
      state,
      provider,
      attempt: context.attempt,
      triedProviders: [...context.triedProviders],
    };
    this.emit('stateChange', change);
  }

  /**
   * Call the sink without letting its failures abort the task cycle
   */
  private async notifySink<T>(operation: string, taskLog: Logger, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      taskLog.structuredError(wrapError(error, undefined, { operation, component: 'Orchestrator' }));
      return undefined;
    }
  }

  /**
   * Adapters report failures as values; one that rejects anyway gets its
   * error turned into a ProviderError so the run is still classified.
   */
  private async runAdapter(
    adapter: ProviderAdapter,
    task: TaskPacket,
    signal: AbortSignal | undefined,
    taskLog: Logger
  ): Promise<GenerateResult> {
    const startTime = Date.now();
    try {
      return await adapter.generate(task, { signal });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      taskLog.warn(`Provider ${adapter.name} threw from generate`, { error: cause.message });
      return { ok: false, error: providerError(cause.message, { cause }), durationMs: Date.now() - startTime };
    }
  }

  private async cancel(context: RetryContext, taskLog: Logger, provider?: string, runId?: string): Promise<never> {
    await this.notifySink('reportFailure', taskLog, () =>
      this.sink.reportFailure({
        taskId: context.taskId,
        kind: 'cancelled',
        terminal: false,
        detail: 'Task cycle cancelled',
        triedProviders: [...context.triedProviders],
        attempt: context.attempt,
        provider,
        runId,
      })
    );
    this.emitState(context, 'CANCELLED', provider);
    taskLog.warn('Task cancelled');
    throw new TaskCancelledError(context.taskId, { context: { provider } });
  }

  /**
   * Run one dispatch cycle for a task. Resolves with the outcome; rejects with
   * TaskCancelledError when the signal aborts, or TASK_ALREADY_IN_FLIGHT when
   * another cycle holds the task.
   */
  async dispatch(pending: PendingTask, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const { signal } = options;
    const packet = pending.packet;
    const taskId = packet.identity.taskId;
    const taskLog = this.log.withTask(taskId);
    const maxAttempts = packet.execution.maxAttempts ?? this.defaultMaxAttempts;

    this.tracker.claim(taskId);
    try {
      let context = this.tracker.getOrCreate(taskId, pending.retry);
      this.emitState(context, 'PENDING');
      const task = withRetryGuidance(packet, context.guidance);

      if (context.attempt >= maxAttempts) {
        return await this.finishAttemptsExhausted(context, taskLog, maxAttempts, 'Attempt budget already spent');
      }

      for (;;) {
        if (signal?.aborted) {
          return await this.cancel(context, taskLog);
        }

        this.emitState(context, 'SELECTING');
        const decision = await this.selector.select(task, context, this.loadMode());
        if (signal?.aborted) {
          return await this.cancel(context, taskLog);
        }

        if (decision.kind === 'exhausted') {
          const detail = `No eligible provider (${decision.reason})`;
          taskLog.error(detail, { triedProviders: context.triedProviders, considered: decision.considered });
          await this.notifySink('reportFailure', taskLog, () =>
            this.sink.reportFailure({
              taskId,
              kind: 'providers_exhausted',
              terminal: true,
              detail,
              triedProviders: [...context.triedProviders],
              attempt: context.attempt,
            })
          );
          this.tracker.clear(taskId);
          this.emitState(context, 'EXHAUSTED');
          return {
            status: 'exhausted',
            taskId,
            reason: decision.reason,
            attempt: context.attempt,
            triedProviders: [...context.triedProviders],
          };
        }

        const { descriptor, adapter } = decision.provider;
        const providerName = descriptor.name;
        const runId = await this.notifySink('runStarted', taskLog, () =>
          this.sink.runStarted(taskId, providerName, descriptor.confidenceWeight)
        );
        this.emitState(context, 'DISPATCHED', providerName);
        taskLog.info(`Dispatching to ${providerName}`, { attempt: context.attempt, runId });

        const result = await this.runAdapter(adapter, task, signal, taskLog);
        if (signal?.aborted) {
          return await this.cancel(context, taskLog, providerName, runId);
        }

        if (result.ok) {
          this.registry.recordOutcome(providerName, {
            kind: 'success',
            taskType: task.taskType,
            durationMs: result.bundle.durationMs,
          });
          this.tracker.clear(taskId);
          await this.notifySink('deliver', taskLog, () => this.sink.deliver(taskId, result.bundle, runId));
          this.emitState(context, 'SUCCEEDED', providerName);
          taskLog.info(`Succeeded on ${providerName}`, { durationMs: result.bundle.durationMs });
          return {
            status: 'succeeded',
            taskId,
            provider: providerName,
            bundle: result.bundle,
            attempt: context.attempt,
            triedProviders: [...context.triedProviders],
          };
        }

        const failure = result.error;
        if (adapter.detectRateLimit(failure)) {
          this.registry.recordOutcome(providerName, {
            kind: 'provider_failure',
            taskType: task.taskType,
            rateLimited: true,
            durationMs: result.durationMs,
          });
          context = this.tracker.recordProviderFailure(taskId, providerName);
          await this.notifySink('reportFailure', taskLog, () =>
            this.sink.reportFailure({
              taskId,
              kind: 'provider_failure',
              terminal: false,
              detail: failure.message,
              triedProviders: [...context.triedProviders],
              attempt: context.attempt,
              provider: providerName,
              runId,
              output: failure.output,
              durationMs: result.durationMs,
            })
          );
          this.emitState(context, 'PROVIDER_FAILED', providerName);
          taskLog.warn(`Provider failure on ${providerName}, failing over`, {
            error: failure.message,
            statusCode: failure.statusCode,
          });
          continue;
        }

        this.registry.recordOutcome(providerName, {
          kind: 'execution_failure',
          taskType: task.taskType,
          durationMs: result.durationMs,
        });
        context = this.tracker.recordExecutionFailure(taskId);
        this.emitState(context, 'EXECUTION_FAILED', providerName);
        taskLog.warn(`Execution failure on ${providerName}`, { attempt: context.attempt, maxAttempts });

        if (context.attempt >= maxAttempts) {
          return await this.finishAttemptsExhausted(context, taskLog, maxAttempts, failure.message, {
            provider: providerName,
            runId,
            output: failure.output,
            durationMs: result.durationMs,
          });
        }

        await this.notifySink('reportFailure', taskLog, () =>
          this.sink.reportFailure({
            taskId,
            kind: 'execution_failure',
            terminal: false,
            detail: failure.message,
            triedProviders: [...context.triedProviders],
            attempt: context.attempt,
            provider: providerName,
            runId,
            output: failure.output,
            durationMs: result.durationMs,
          })
        );
        return {
          status: 'execution_failed',
          taskId,
          provider: providerName,
          terminal: false,
          attempt: context.attempt,
          triedProviders: [...context.triedProviders],
          detail: failure.message,
        };
      }
    } finally {
      this.tracker.release(taskId);
    }
  }

  private async finishAttemptsExhausted(
    context: RetryContext,
    taskLog: Logger,
    maxAttempts: number,
    detail: string,
    run: Pick<FailureRecord, 'provider' | 'runId' | 'output' | 'durationMs'> = {}
  ): Promise<DispatchOutcome> {
    taskLog.error(`Attempt budget exhausted (${context.attempt}/${maxAttempts})`, { detail });
    await this.notifySink('reportFailure', taskLog, () =>
      this.sink.reportFailure({
        taskId: context.taskId,
        kind: 'attempts_exhausted',
        terminal: true,
        detail,
        triedProviders: [...context.triedProviders],
        attempt: context.attempt,
        ...run,
      })
    );
    this.tracker.clear(context.taskId);

    if (run.provider) {
      return {
        status: 'execution_failed',
        taskId: context.taskId,
        provider: run.provider,
        terminal: true,
        attempt: context.attempt,
        triedProviders: [...context.triedProviders],
        detail,
      };
    }
    this.emitState(context, 'EXHAUSTED');
    return {
      status: 'exhausted',
      taskId: context.taskId,
      reason: 'attempts_exhausted',
      attempt: context.attempt,
      triedProviders: [...context.triedProviders],
    };
  }

  /**
   * Consume attempt budget for a task whose delivered artifact was rejected
   * downstream, carrying the rejection guidance into its next dispatch.
   */
  recordJudgedRejection(taskId: string, guidance: string, seed?: RetrySeed): RetryContext {
    this.tracker.getOrCreate(taskId, seed);
    return this.tracker.recordExecutionFailure(taskId, guidance);
  }
}

import { loadConfig, loadProviders, type Config, type ProviderDescriptor } from './config/index.js';
import { QueueClient } from './clients/queue-client.js';
import { LogArtifactSink } from './clients/log-sink.js';
import { StaticTaskSource } from './clients/static-task-source.js';
import { TaskPool, type PoolResult } from './executor/pool.js';
import { Orchestrator, type ArtifactSink, type StateChange } from './orchestration/orchestrator.js';
import { ProviderFactory } from './providers/factory.js';
import type { ProviderAdapter } from './providers/types.js';
import { ProviderRegistry } from './registry/provider-registry.js';
import type { ProviderEntry } from './registry/types.js';
import { RetryContextTracker } from './retry/retry-context.js';
import { ProviderSelector } from './selection/selector.js';
import type { PendingTask, TaskSource } from './tasks/packet.js';
import { TelemetryAggregator, type TelemetrySource } from './telemetry/telemetry-aggregator.js';
import { ConfigError, ErrorCode, StructuredError, wrapError } from './utils/errors.js';
import {
  logger,
  generateCorrelationId,
  setCorrelationContext,
  clearCorrelationId,
  type LogFormat,
} from './utils/logger.js';

export interface DaemonOptions {
  configPath?: string;
  /** Use this config instead of loading one */
  config?: Config;
  /** Serve tasks from these packet files instead of the queue */
  taskFiles?: string[];
  /** Drain the current backlog, then stop */
  runOnce?: boolean;
  verbose?: boolean;
  logFormat?: LogFormat;
  /** Register SIGINT/SIGTERM/SIGHUP handlers (default: true) */
  handleSignals?: boolean;
  /** Replace the collaborators built from config */
  deps?: Partial<DaemonDependencies>;
}

export interface DaemonDependencies {
  loadProviders: (providersFile: string) => ProviderDescriptor[];
  createAdapters: (descriptors: readonly ProviderDescriptor[]) => Map<string, ProviderAdapter>;
  taskSource: TaskSource;
  telemetrySource: TelemetrySource;
  sink: ArtifactSink;
}

export interface CycleResult {
  cycle: number;
  tasksPulled: number;
  succeeded: number;
  executionFailed: number;
  exhausted: number;
  errored: number;
  duration: number;
  errors: string[];
}

function emptyCycle(cycle: number, startTime: number, errors: string[] = []): CycleResult {
  return {
    cycle,
    tasksPulled: 0,
    succeeded: 0,
    executionFailed: 0,
    exhausted: 0,
    errored: 0,
    duration: Date.now() - startTime,
    errors,
  };
}

function summarize(cycle: number, startTime: number, tasksPulled: number, results: PoolResult[]): CycleResult {
  const summary = emptyCycle(cycle, startTime);
  summary.tasksPulled = tasksPulled;
  for (const result of results) {
    if ('error' in result) {
      summary.errored++;
      summary.errors.push(`${result.taskId}: ${result.error.message}`);
      continue;
    }
    switch (result.outcome.status) {
      case 'succeeded':
        summary.succeeded++;
        break;
      case 'execution_failed':
        summary.executionFailed++;
        break;
      case 'exhausted':
        summary.exhausted++;
        break;
    }
  }
  summary.duration = Date.now() - startTime;
  return summary;
}

/**
 * Build a registry from config: load descriptors, create adapters, apply
 * routing options.
 */
export function createRegistry(config: Config, deps: Partial<DaemonDependencies> = {}): ProviderRegistry {
  const descriptors = (deps.loadProviders ?? loadProviders)(config.providersFile);
  const factory = new ProviderFactory({ workDir: config.daemon.workDir });
  const adapters = deps.createAdapters ? deps.createAdapters(descriptors) : factory.createAll(descriptors);
  return new ProviderRegistry(descriptors, adapters, {
    statsWindow: config.routing.statsWindow,
    rateLimitCooldownMs: config.routing.rateLimitCooldownMs,
  });
}

/**
 * Probe every provider once and return the registry view with fresh
 * availability
 */
export async function describeProviders(registry: ProviderRegistry): Promise<ProviderEntry[]> {
  const selector = new ProviderSelector(registry);
  await selector.probe(registry.snapshot(), { triedProviders: [] });
  return registry.snapshot();
}

export class Daemon {
  private config: Config;
  private options: DaemonOptions;
  private deps: Partial<DaemonDependencies>;
  private log = logger.child('Daemon');

  private registry: ProviderRegistry | null = null;
  private aggregator: TelemetryAggregator | null = null;
  private orchestrator: Orchestrator | null = null;
  private pool: TaskPool | null = null;
  private taskSource: TaskSource | null = null;

  private isRunning = false;
  private cycleCount = 0;
  private isShuttingDown = false;
  private signalHandlers: Array<[NodeJS.Signals, () => void]> = [];
  private wake: (() => void) | null = null;

  constructor(options: DaemonOptions = {}) {
    this.options = options;
    this.deps = options.deps ?? {};
    this.config = options.config ?? loadConfig(options.configPath);

    logger.setFormat(this.config.logging.format);
    logger.setLevel(this.config.logging.level);

    if (options.verbose) {
      logger.setLevel('debug');
    }
    if (options.logFormat) {
      logger.setFormat(options.logFormat);
    }
  }

  getRegistry(): ProviderRegistry | null {
    return this.registry;
  }

  private initialize(): void {
    const registry = createRegistry(this.config, this.deps);
    this.registry = registry;

    const queue = this.config.telemetry.queueUrl
      ? new QueueClient({ baseUrl: this.config.telemetry.queueUrl, timeoutMs: this.config.telemetry.requestTimeoutMs })
      : null;

    const taskSource =
      this.deps.taskSource ??
      (this.options.taskFiles?.length ? StaticTaskSource.fromFiles(this.options.taskFiles) : queue);
    if (!taskSource) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, 'No task source configured', {
        field: 'telemetry.queueUrl',
        value: this.config.telemetry.queueUrl,
        recoveryActions: [
          { description: 'Set telemetry.queueUrl (or QUEUE_API_URL) to pull tasks from the queue', automatic: false },
          { description: 'Pass task packet files with --task <file...>', automatic: false },
        ],
      });
    }
    this.taskSource = taskSource;

    const telemetrySource = this.deps.telemetrySource ?? queue;
    if (telemetrySource) {
      const { routing } = this.config;
      this.aggregator = new TelemetryAggregator(telemetrySource, registry, {
        highLoadThreshold: routing.highLoadThreshold,
        successRateFloor: routing.successRateFloor,
        minObservedRuns: routing.minObservedRuns,
        demoteDelta: routing.demoteDelta,
        promoteDelta: routing.promoteDelta,
        nudgeTtlMs: routing.nudgeTtlMs,
      });
    } else {
      this.log.warn('No telemetry source configured, routing assumes normal load');
    }

    const aggregator = this.aggregator;
    this.orchestrator = new Orchestrator({
      registry,
      tracker: new RetryContextTracker({
        ttlMs: this.config.routing.retryContextTtlMs,
        maxContexts: this.config.routing.maxRetryContexts,
      }),
      selector: new ProviderSelector(registry),
      sink: this.deps.sink ?? queue ?? new LogArtifactSink(),
      loadMode: () => aggregator?.getLoadMode() ?? 'normal',
      defaultMaxAttempts: this.config.routing.defaultMaxAttempts,
    });
    this.orchestrator.on('stateChange', (change: StateChange) => {
      this.log.debug(`${change.taskId} -> ${change.state}`, {
        provider: change.provider,
        attempt: change.attempt,
        triedProviders: change.triedProviders,
      });
    });

    this.pool = new TaskPool(this.orchestrator, { maxConcurrentTasks: this.config.daemon.maxConcurrentTasks });

    this.log.info(`Initialized with ${registry.size} providers`, {
      providers: registry.names(),
      maxConcurrentTasks: this.config.daemon.maxConcurrentTasks,
    });
  }

  /**
   * Run cycles until stopped. In run-once mode, stop when the source has no
   * more tasks.
   */
  async start(): Promise<CycleResult[]> {
    logger.header('Task Router');
    const history: CycleResult[] = [];

    if (this.options.handleSignals !== false) {
      this.registerSignalHandlers();
    }

    try {
      this.initialize();
      this.isRunning = true;

      if (this.aggregator && !this.options.runOnce) {
        this.aggregator.start(this.config.telemetry.pollIntervalMs);
      }

      while (this.isRunning) {
        const result = await this.runCycle();
        history.push(result);
        this.logCycleResult(result);

        if (this.options.runOnce) {
          // Stop on an empty pull, or when no pulled task could be dispatched at all
          if (result.tasksPulled === 0 || result.errored === result.tasksPulled) {
            this.log.info('Backlog drained - exiting');
            break;
          }
          continue;
        }

        if (!this.isRunning) break;
        this.log.info(`Waiting ${this.config.daemon.loopIntervalMs / 1000}s before next cycle...`);
        await this.sleep(this.config.daemon.loopIntervalMs);
      }
    } catch (error) {
      const structured = wrapError(error, ErrorCode.INTERNAL_ERROR, { operation: 'start', component: 'Daemon' });
      this.log.structuredError(structured, { includeStack: true, includeRecovery: true });
      throw structured;
    } finally {
      this.shutdown();
    }

    return history;
  }

  /**
   * One cycle: refresh telemetry, pull tasks and dispatch them through the pool
   */
  async runCycle(): Promise<CycleResult> {
    const { taskSource, pool } = this;
    if (!taskSource || !pool) {
      throw new StructuredError(ErrorCode.INTERNAL_ERROR, 'Daemon is not initialized');
    }

    // A stop from an earlier run stays in force until the daemon runs again
    if (this.isRunning) {
      pool.reset();
    }

    this.cycleCount++;
    const startTime = Date.now();
    setCorrelationContext({
      correlationId: generateCorrelationId(),
      cycleNumber: this.cycleCount,
      component: 'Daemon',
      startTime,
    });

    try {
      this.log.info(`Starting cycle #${this.cycleCount}`);

      if (this.aggregator) {
        const hints = await this.aggregator.refresh();
        this.log.debug('Routing hints', { loadMode: hints.loadMode, queued: hints.snapshot?.queued });
      }

      let tasks: PendingTask[];
      try {
        tasks = await taskSource.pull();
      } catch (error) {
        const structured = wrapError(error, ErrorCode.QUEUE_REQUEST_FAILED, { operation: 'pull', component: 'Daemon' });
        this.log.structuredError(structured);
        return emptyCycle(this.cycleCount, startTime, [structured.message]);
      }

      if (tasks.length === 0) {
        this.log.info('No tasks to dispatch');
        return emptyCycle(this.cycleCount, startTime);
      }

      if (!this.isRunning || pool.isStopped()) {
        this.log.warn(`Stop requested during the pull, ${tasks.length} tasks left undispatched`);
        const skipped = emptyCycle(this.cycleCount, startTime);
        skipped.tasksPulled = tasks.length;
        return skipped;
      }

      const results = await pool.executeTasks(tasks);
      return summarize(this.cycleCount, startTime, tasks.length, results);
    } finally {
      clearCorrelationId();
    }
  }

  /**
   * Re-read the providers file and apply it to the live registry. Stats of
   * providers that survive the reload are kept. A failed reload leaves the
   * registry unchanged.
   */
  reloadProviders(): void {
    const registry = this.registry;
    if (!registry) return;

    try {
      const descriptors = (this.deps.loadProviders ?? loadProviders)(this.config.providersFile);
      const adapters = this.deps.createAdapters
        ? this.deps.createAdapters(descriptors)
        : new ProviderFactory({ workDir: this.config.daemon.workDir }).createAll(descriptors);
      const summary = registry.reload(descriptors, adapters);
      this.log.success(
        `Providers reloaded (added: ${summary.added.length}, removed: ${summary.removed.length}, updated: ${summary.updated.length})`
      );
      this.log.debug('Reload summary', summary);
    } catch (error) {
      this.log.structuredError(wrapError(error, ErrorCode.CONFIG_INVALID, { operation: 'reloadProviders' }), {
        includeRecovery: true,
      });
    }
  }

  /**
   * Stop after the current cycle, cancelling in-flight task cycles
   */
  stop(): void {
    this.log.info('Stop requested...');
    this.isRunning = false;
    this.pool?.stop();
    this.aggregator?.stop();
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
  }

  private registerSignalHandlers(): void {
    if (this.signalHandlers.length > 0) return;

    const onShutdownSignal = (signal: NodeJS.Signals) => () => {
      if (this.isShuttingDown) {
        this.log.warn(`Received ${signal} during shutdown, forcing exit...`);
        process.exit(1);
      }
      this.log.info(`Received ${signal}, initiating graceful shutdown...`);
      this.isShuttingDown = true;
      this.stop();
    };

    const onReload = () => {
      this.log.info('Received SIGHUP, reloading providers...');
      this.reloadProviders();
    };

    this.signalHandlers = [
      ['SIGINT', onShutdownSignal('SIGINT')],
      ['SIGTERM', onShutdownSignal('SIGTERM')],
      ['SIGHUP', onReload],
    ];
    for (const [signal, handler] of this.signalHandlers) {
      process.on(signal, handler);
    }
    this.log.debug('Signal handlers registered');
  }

  private shutdown(): void {
    this.isRunning = false;
    this.aggregator?.stop();
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers = [];
    this.log.info('Daemon stopped', { cycles: this.cycleCount });
  }

  private logCycleResult(result: CycleResult): void {
    const seconds = (result.duration / 1000).toFixed(1);
    const line =
      `Cycle #${result.cycle}: ${result.tasksPulled} pulled, ${result.succeeded} succeeded, ` +
      `${result.executionFailed} failed, ${result.exhausted} exhausted (${seconds}s)`;
    if (result.errors.length > 0) {
      this.log.warn(line, { errors: result.errors });
    } else {
      this.log.info(line);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timeout);
        resolve();
      };
    });
  }
}

export function createDaemon(options: DaemonOptions = {}): Daemon {
  return new Daemon(options);
}

import { EventEmitter } from 'events';
import type { DispatchOutcome, Orchestrator } from '../orchestration/orchestrator.js';
import type { PendingTask } from '../tasks/packet.js';
import { ErrorCode, StructuredError, wrapError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface TaskPoolOptions {
  maxConcurrentTasks: number;
}

export type PoolResult =
  | { taskId: string; outcome: DispatchOutcome; durationMs: number }
  | { taskId: string; error: StructuredError; durationMs: number };

export interface TaskPoolStatus {
  active: number;
  queued: number;
  completed: number;
  isRunning: boolean;
}

interface CompletionEvent {
  taskId: string;
  result: PoolResult;
}

/**
 * Runs task cycles concurrently up to a fixed limit.
 */
export class TaskPool extends EventEmitter {
  private options: TaskPoolOptions;
  private orchestrator: Orchestrator;
  private active = new Map<string, Promise<void>>();
  private queue: PendingTask[] = [];
  private results: PoolResult[] = [];
  private isRunning = false;
  private abortController = new AbortController();
  // Event-based completion tracking instead of Promise.race over active cycles
  private completionQueue: CompletionEvent[] = [];
  private completionResolver: ((event: CompletionEvent) => void) | null = null;

  constructor(orchestrator: Orchestrator, options: TaskPoolOptions) {
    super();
    this.orchestrator = orchestrator;
    this.options = options;
  }

  private signalCompletion(event: CompletionEvent): void {
    this.emit('taskComplete', event.result);

    if (this.completionResolver) {
      const resolver = this.completionResolver;
      this.completionResolver = null;
      resolver(event);
    } else {
      this.completionQueue.push(event);
    }
  }

  private waitForCompletion(): Promise<CompletionEvent> {
    const queued = this.completionQueue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise<CompletionEvent>((resolve) => {
      this.completionResolver = resolve;
    });
  }

  private startNext(): void {
    const pending = this.queue.shift();
    if (!pending) return;

    const taskId = pending.packet.identity.taskId;
    const startTime = Date.now();

    const run = this.orchestrator
      .dispatch(pending, { signal: this.abortController.signal })
      .then(
        (outcome): PoolResult => ({ taskId, outcome, durationMs: Date.now() - startTime }),
        (error: unknown): PoolResult => ({
          taskId,
          error: wrapError(error, ErrorCode.INTERNAL_ERROR, { taskId }),
          durationMs: Date.now() - startTime,
        })
      )
      .then((result) => {
        this.results.push(result);
        this.signalCompletion({ taskId, result });
      });

    this.active.set(taskId, run);
  }

  /**
   * Dispatch every task and resolve once all cycles have finished or the pool
   * was stopped. Tasks still queued at stop are not started.
   */
  async executeTasks(tasks: readonly PendingTask[]): Promise<PoolResult[]> {
    if (this.isRunning) {
      throw new StructuredError(ErrorCode.INTERNAL_ERROR, 'Task pool is already executing a batch');
    }

    this.results = [];
    this.completionQueue = [];
    this.completionResolver = null;
    if (this.abortController.signal.aborted) {
      logger.warn(`Task pool is stopped, ${tasks.length} tasks not dispatched`);
      return this.results;
    }
    this.isRunning = true;

    // One cycle per task id per batch
    const seen = new Set<string>();
    this.queue = tasks.filter((task) => {
      const taskId = task.packet.identity.taskId;
      if (seen.has(taskId)) return false;
      seen.add(taskId);
      return true;
    });

    logger.info(`Executing ${this.queue.length} tasks with up to ${this.options.maxConcurrentTasks} concurrent cycles`);

    while (this.active.size < this.options.maxConcurrentTasks && this.queue.length > 0) {
      this.startNext();
    }

    while (this.active.size > 0) {
      const event = await this.waitForCompletion();
      this.active.delete(event.taskId);

      if (this.queue.length > 0 && this.isRunning) {
        this.startNext();
      }
    }

    this.isRunning = false;
    this.queue = [];

    const succeeded = this.results.filter((r) => 'outcome' in r && r.outcome.status === 'succeeded').length;
    logger.info(`All tasks completed: ${succeeded}/${this.results.length} succeeded`);

    return this.results;
  }

  /**
   * Re-arm a stopped pool for the next batch. Only the owner of the run
   * calls this; a stop is never cleared by executeTasks itself.
   */
  reset(): void {
    if (this.isRunning) {
      throw new StructuredError(ErrorCode.INTERNAL_ERROR, 'Cannot reset a task pool while a batch is running');
    }
    if (this.abortController.signal.aborted) {
      this.abortController = new AbortController();
    }
  }

  isStopped(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Stop starting new cycles and cancel the running ones
   */
  stop(): void {
    this.isRunning = false;
    this.abortController.abort();
    logger.warn('Task pool stop requested', { active: this.active.size, queued: this.queue.length });
  }

  getStatus(): TaskPoolStatus {
    return {
      active: this.active.size,
      queued: this.queue.length,
      completed: this.results.length,
      isRunning: this.isRunning,
    };
  }
}

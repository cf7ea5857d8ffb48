import { ErrorCode, StructuredError } from '../utils/errors.js';
import type { RetrySeed } from '../tasks/packet.js';

export interface RetryContext {
  taskId: string;
  /** Incremented only by execution failures */
  attempt: number;
  /** Providers that failed to run this task in the current cycle, in order */
  triedProviders: string[];
  guidance: string[];
  createdAt: number;
  updatedAt: number;
}

export interface RetryContextTrackerOptions {
  now?: () => number;
  /** Idle contexts older than this are dropped (default: 24h) */
  ttlMs?: number;
  /** Upper bound on stored contexts; the least recently updated go first */
  maxContexts?: number;
}

const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;
const DEFAULT_MAX_CONTEXTS = 10000;

function copy(context: RetryContext): RetryContext {
  return { ...context, triedProviders: [...context.triedProviders], guidance: [...context.guidance] };
}

/**
 * Per-task retry state for tasks that have not reached a terminal outcome.
 * Reads return copies. Tasks the queue stops handing out are forgotten once
 * their context expires or the store is full; in-flight tasks are never
 * evicted.
 */
export class RetryContextTracker {
  private contexts = new Map<string, RetryContext>();
  private inFlight = new Set<string>();
  private now: () => number;
  private ttlMs: number;
  private maxContexts: number;

  constructor(options: RetryContextTrackerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxContexts = options.maxContexts ?? DEFAULT_MAX_CONTEXTS;
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [taskId, context] of this.contexts) {
      if (context.updatedAt < cutoff && !this.inFlight.has(taskId)) {
        this.contexts.delete(taskId);
      }
    }
  }

  private makeRoom(): void {
    const excess = this.contexts.size - this.maxContexts + 1;
    if (excess <= 0) return;

    const idle = [...this.contexts.values()]
      .filter((context) => !this.inFlight.has(context.taskId))
      .sort((a, b) => a.updatedAt - b.updatedAt);
    for (const context of idle.slice(0, excess)) {
      this.contexts.delete(context.taskId);
    }
  }

  private require(taskId: string): RetryContext {
    const context = this.contexts.get(taskId);
    if (!context) {
      throw new StructuredError(ErrorCode.INTERNAL_ERROR, `No retry context for task ${taskId}`, {
        context: { taskId },
      });
    }
    return context;
  }

  private touch(context: RetryContext): RetryContext {
    context.updatedAt = this.now();
    return copy(context);
  }

  /**
   * Return the task's context, creating it on first dispatch. A seed from a
   * requeued task supplies the starting attempt count and guidance.
   */
  getOrCreate(taskId: string, seed?: RetrySeed): RetryContext {
    this.evictExpired();
    const existing = this.contexts.get(taskId);
    if (existing) {
      return this.touch(existing);
    }

    this.makeRoom();

    const now = this.now();
    const context: RetryContext = {
      taskId,
      attempt: seed?.attempt ?? 0,
      triedProviders: [],
      guidance: [...new Set(seed?.guidance ?? [])],
      createdAt: now,
      updatedAt: now,
    };
    this.contexts.set(taskId, context);
    return copy(context);
  }

  get(taskId: string): RetryContext | undefined {
    const context = this.contexts.get(taskId);
    return context ? copy(context) : undefined;
  }

  /**
   * Exclude a provider for the rest of this cycle. Attempt is unchanged.
   */
  recordProviderFailure(taskId: string, provider: string): RetryContext {
    const context = this.require(taskId);
    if (!context.triedProviders.includes(provider)) {
      context.triedProviders.push(provider);
    }
    return this.touch(context);
  }

  /**
   * Consume one attempt. The tried set is left as is: the provider ran.
   */
  recordExecutionFailure(taskId: string, guidance?: string): RetryContext {
    const context = this.require(taskId);
    context.attempt++;
    if (guidance && !context.guidance.includes(guidance)) {
      context.guidance.push(guidance);
    }
    return this.touch(context);
  }

  addGuidance(taskId: string, text: string): RetryContext {
    const context = this.require(taskId);
    if (!context.guidance.includes(text)) {
      context.guidance.push(text);
    }
    return this.touch(context);
  }

  clear(taskId: string): void {
    this.contexts.delete(taskId);
  }

  /**
   * Mark a task as being dispatched. Only one cycle may run per task.
   */
  claim(taskId: string): void {
    if (this.inFlight.has(taskId)) {
      throw new StructuredError(ErrorCode.TASK_ALREADY_IN_FLIGHT, `Task ${taskId} is already being dispatched`, {
        context: { taskId },
        isRetryable: false,
      });
    }
    this.inFlight.add(taskId);
  }

  release(taskId: string): void {
    this.inFlight.delete(taskId);
  }

  isInFlight(taskId: string): boolean {
    return this.inFlight.has(taskId);
  }

  size(): number {
    this.evictExpired();
    return this.contexts.size;
  }
}

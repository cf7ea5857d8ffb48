import { z, type ZodType, type ZodTypeDef } from 'zod';
import type { ArtifactSink, FailureRecord } from '../orchestration/orchestrator.js';
import type { ArtifactBundle } from '../providers/types.js';
import { parseTaskPacket, type PendingTask, type TaskSource } from '../tasks/packet.js';
import type { ProviderTelemetry, TelemetrySnapshot, TelemetrySource } from '../telemetry/telemetry-aggregator.js';
import { ErrorCode, QueueClientError, StructuredError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const QueueStatsSchema = z.object({
  pending: z.number().default(0),
  queued: z.number().default(0),
  running: z.number().default(0),
  total_active: z.number().default(0),
});

const ProviderStatsSchema = z.record(
  z.object({
    total_runs: z.number().default(0),
    successes: z.number().default(0),
    failures: z.number().default(0),
    provider_failures: z.number().default(0),
    success_rate: z.number().default(0),
    avg_duration_ms: z.number().nullable().default(null),
  })
);

const RetryQueueSchema = z.array(
  z.object({
    task_id: z.string(),
    title: z.string().nullable().default(null),
    attempt: z.number().int().min(0).default(0),
    max_attempts: z.number().int().default(3),
    last_provider: z.string().nullable().default(null),
    last_failure_reason: z.string().nullable().default(null),
    providers_tried: z.array(z.string()).default([]),
  })
);

export type RetryQueueEntry = z.infer<typeof RetryQueueSchema>[number];

const DispatchableSchema = z.array(z.unknown());

const StartRunSchema = z.object({
  run_id: z.union([z.string(), z.number()]).transform(String).optional(),
});

const AckSchema = z.unknown();

export interface QueueClientOptions {
  baseUrl: string;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
}

type ExecutionStatus = 'success' | 'failure' | 'provider_failure' | 'cancelled';

function executionStatusFor(record: FailureRecord): ExecutionStatus {
  switch (record.kind) {
    case 'provider_failure':
      return 'provider_failure';
    case 'cancelled':
      return 'cancelled';
    default:
      return 'failure';
  }
}

/**
 * HTTP client for the queue service. Acts as the telemetry source, the task
 * source and the artifact sink of the daemon.
 */
export class QueueClient implements TelemetrySource, TaskSource, ArtifactSink {
  private baseUrl: string;
  private timeoutMs: number;
  private log = logger.child('QueueClient');

  constructor(options: QueueClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const endpoint = `${method} ${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const message = controller.signal.aborted
        ? `Request timed out after ${this.timeoutMs}ms`
        : `Request failed: ${cause.message}`;
      throw new QueueClientError(`${endpoint}: ${message}`, { endpoint, code: ErrorCode.NETWORK_ERROR, cause });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new QueueClientError(`${endpoint} returned ${response.status} ${response.statusText}`, {
        statusCode: response.status,
        endpoint,
      });
    }

    const text = await response.text();
    let payload: unknown = null;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch (error) {
        throw new QueueClientError(`${endpoint} returned invalid JSON`, {
          statusCode: response.status,
          endpoint,
          cause: error instanceof Error ? error : undefined,
        });
      }
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const details = parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`).join('; ');
      throw new QueueClientError(`${endpoint} returned an unexpected payload: ${details}`, {
        statusCode: response.status,
        endpoint,
      });
    }
    return parsed.data;
  }

  async getRetryQueue(): Promise<RetryQueueEntry[]> {
    return this.request('GET', '/tasks/retry-queue', RetryQueueSchema);
  }

  async fetchSnapshot(): Promise<TelemetrySnapshot> {
    const [stats, providerStats, retryQueue] = await Promise.all([
      this.request('GET', '/queue/stats', QueueStatsSchema),
      this.request('GET', '/queue/provider-stats', ProviderStatsSchema),
      this.getRetryQueue(),
    ]);

    const providers: Record<string, ProviderTelemetry> = {};
    for (const [name, entry] of Object.entries(providerStats)) {
      providers[name] = {
        successRate: entry.success_rate,
        failureCount: entry.failures + entry.provider_failures,
        totalRuns: entry.total_runs,
      };
    }

    const retryFailedProviders = new Set<string>();
    for (const task of retryQueue) {
      for (const name of task.providers_tried) {
        retryFailedProviders.add(name);
      }
      if (task.last_provider) {
        retryFailedProviders.add(task.last_provider);
      }
    }

    return Object.freeze({
      capturedAt: Date.now(),
      queued: stats.queued,
      running: stats.running,
      providers: Object.freeze(providers),
      retryFailedProviders,
    });
  }

  /**
   * Tasks ready for dispatch. Requeued tasks are seeded with the attempt count
   * and failure reason recorded by the queue. Invalid packets are skipped.
   */
  async pull(): Promise<PendingTask[]> {
    const [items, retryQueue] = await Promise.all([
      this.request('GET', '/tasks/dispatchable', DispatchableSchema),
      this.getRetryQueue(),
    ]);
    const retries = new Map(retryQueue.map((entry): [string, RetryQueueEntry] => [entry.task_id, entry]));

    const pending: PendingTask[] = [];
    for (const item of items) {
      try {
        const packet = parseTaskPacket(item);
        const retry = retries.get(packet.identity.taskId);
        pending.push({
          packet,
          retry: retry
            ? { attempt: retry.attempt, guidance: retry.last_failure_reason ? [retry.last_failure_reason] : [] }
            : undefined,
        });
      } catch (error) {
        if (!(error instanceof StructuredError)) throw error;
        this.log.warn(`Skipping invalid task packet: ${error.message}`);
      }
    }
    return pending;
  }

  async runStarted(taskId: string, provider: string, confidenceWeight: number): Promise<string | undefined> {
    const result = await this.request('POST', `/tasks/${encodeURIComponent(taskId)}/start-run`, StartRunSchema, {
      provider_name: provider,
      confidence_weight: confidenceWeight,
    });
    return result.run_id;
  }

  async deliver(taskId: string, bundle: ArtifactBundle, runId?: string): Promise<void> {
    await this.request('POST', `/tasks/${encodeURIComponent(taskId)}/complete-run`, AckSchema, {
      run_id: runId ?? null,
      provider_name: bundle.provider,
      execution_status: 'success',
      output: bundle.output,
      files_modified: bundle.filesModified,
      diff_summary: bundle.diffSummary ?? null,
      logs: bundle.logs ?? null,
      duration_ms: bundle.durationMs,
      artifacts_path: bundle.artifactsPath ?? null,
    });
  }

  /**
   * Close the run the failure ended, then report task-level failures to the
   * retry-guidance stage.
   */
  async reportFailure(record: FailureRecord): Promise<void> {
    const path = `/tasks/${encodeURIComponent(record.taskId)}`;

    if (record.runId !== undefined) {
      await this.request('POST', `${path}/complete-run`, AckSchema, {
        run_id: record.runId,
        provider_name: record.provider ?? null,
        execution_status: executionStatusFor(record),
        files_modified: [],
        logs: record.output ?? null,
        duration_ms: record.durationMs ?? null,
        error: record.detail,
      });
    }

    if (record.kind === 'provider_failure') return;

    await this.request('POST', `${path}/failure`, AckSchema, {
      kind: record.kind,
      terminal: record.terminal,
      detail: record.detail,
      tried_providers: record.triedProviders,
      attempt: record.attempt,
      provider: record.provider ?? null,
    });
  }
}

/**
 * Shared fakes for unit tests: scripted provider adapters, a recording
 * artifact sink and builders for descriptors and task packets.
 */
import { ProviderDescriptorSchema, type ProviderDescriptorInput, type ProviderDescriptor } from '../config/schema.js';
import type { ArtifactSink, FailureRecord } from '../orchestration/orchestrator.js';
import { detectRateLimit } from '../providers/rate-limit.js';
import type {
  ArtifactBundle,
  GenerateOptions,
  GenerateResult,
  ProviderAdapter,
  ProviderError,
} from '../providers/types.js';
import type { RateLimitStrategy } from '../config/schema.js';
import { parseTaskPacket, type TaskPacket, type TaskPacketWire } from '../tasks/packet.js';

export function descriptor(input: ProviderDescriptorInput): ProviderDescriptor {
  return ProviderDescriptorSchema.parse(input);
}

export function packet(overrides: Partial<TaskPacketWire> & { taskId?: string } = {}): TaskPacket {
  const { taskId = 'task-1', ...rest } = overrides;
  return parseTaskPacket({
    identity: { task_id: taskId },
    goal: { title: 'Add input validation', description: 'Validate the signup form' },
    ...rest,
  });
}

export function bundle(taskId: string, provider: string, output = 'done'): ArtifactBundle {
  return { taskId, provider, output, filesModified: ['src/form.ts'], durationMs: 5 };
}

export type ScriptStep =
  | { type: 'success'; output?: string }
  | { type: 'failure'; error: Partial<ProviderError> & { message: string } }
  /** Resolve with an abort failure once the dispatch signal aborts */
  | { type: 'hang' }
  /** Succeed once the gate resolves */
  | { type: 'gate'; gate: Promise<void> }
  /** Reject instead of resolving with a failure value */
  | { type: 'throw'; error: Error };

/**
 * Adapter whose generate() replays a script, one step per call. The last
 * step repeats once the script is used up.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly name: string;
  readonly rateLimitStrategy: RateLimitStrategy;
  available = true;
  probeError?: Error;
  generateCalls: TaskPacket[] = [];
  probeCalls = 0;
  private script: ScriptStep[];

  constructor(name: string, script: ScriptStep[] = [{ type: 'success' }], strategy: RateLimitStrategy = 'text_pattern') {
    this.name = name;
    this.script = script;
    this.rateLimitStrategy = strategy;
  }

  async generate(task: TaskPacket, options: GenerateOptions = {}): Promise<GenerateResult> {
    this.generateCalls.push(task);
    const index = Math.min(this.generateCalls.length - 1, this.script.length - 1);
    const step: ScriptStep = this.script[index] ?? { type: 'success' };

    if (step.type === 'hang') {
      await untilAborted(options.signal);
      return { ok: false, error: { message: 'aborted', code: 'ABORTED', timedOut: false }, durationMs: 1 };
    }
    if (step.type === 'gate') {
      await step.gate;
      return { ok: true, bundle: bundle(task.identity.taskId, this.name) };
    }
    if (step.type === 'throw') {
      throw step.error;
    }
    if (step.type === 'failure') {
      return { ok: false, error: { timedOut: false, ...step.error }, durationMs: 3 };
    }
    return { ok: true, bundle: bundle(task.identity.taskId, this.name, step.output) };
  }

  async isAvailable(): Promise<boolean> {
    this.probeCalls++;
    if (this.probeError) throw this.probeError;
    return this.available;
  }

  detectRateLimit(error: ProviderError): boolean {
    return detectRateLimit(this.rateLimitStrategy, error);
  }
}

function untilAborted(signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * A promise plus the function that resolves it
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function adapterMap(...adapters: ProviderAdapter[]): Map<string, ProviderAdapter> {
  return new Map(adapters.map((adapter): [string, ProviderAdapter] => [adapter.name, adapter]));
}

export interface RecordedRun {
  taskId: string;
  provider: string;
  confidenceWeight: number;
  runId: string;
}

/**
 * Sink that records every call. Run ids are `run-1`, `run-2`, ...
 */
export class RecordingSink implements ArtifactSink {
  runs: RecordedRun[] = [];
  delivered: Array<{ taskId: string; bundle: ArtifactBundle; runId?: string }> = [];
  failures: FailureRecord[] = [];
  failOn?: 'runStarted' | 'deliver' | 'reportFailure';

  async runStarted(taskId: string, provider: string, confidenceWeight: number): Promise<string> {
    if (this.failOn === 'runStarted') throw new Error('sink unavailable');
    const runId = `run-${this.runs.length + 1}`;
    this.runs.push({ taskId, provider, confidenceWeight, runId });
    return runId;
  }

  async deliver(taskId: string, delivered: ArtifactBundle, runId?: string): Promise<void> {
    if (this.failOn === 'deliver') throw new Error('sink unavailable');
    this.delivered.push({ taskId, bundle: delivered, runId });
  }

  async reportFailure(record: FailureRecord): Promise<void> {
    if (this.failOn === 'reportFailure') throw new Error('sink unavailable');
    this.failures.push(record);
  }
}

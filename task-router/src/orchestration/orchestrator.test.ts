import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Orchestrator, type StateChange } from './orchestrator.js';
import { ProviderRegistry } from '../registry/provider-registry.js';
import { RetryContextTracker } from '../retry/retry-context.js';
import { ProviderSelector } from '../selection/selector.js';
import type { LoadMode } from '../telemetry/telemetry-aggregator.js';
import { ErrorCode, StructuredError, TaskCancelledError } from '../utils/errors.js';
import {
  FakeAdapter,
  RecordingSink,
  adapterMap,
  bundle,
  deferred,
  descriptor,
  packet,
  type ScriptStep,
} from '../test-utils/fakes.js';

const RATE_LIMITED: ScriptStep = { type: 'failure', error: { message: 'rate limit exceeded' } };
const TESTS_FAILED: ScriptStep = { type: 'failure', error: { message: 'tests failed' } };

interface Harness {
  orchestrator: Orchestrator;
  registry: ProviderRegistry;
  tracker: RetryContextTracker;
  sink: RecordingSink;
  states: StateChange[];
}

function createHarness(adapters: FakeAdapter[], loadMode?: () => LoadMode): Harness {
  const registry = new ProviderRegistry(
    adapters.map((adapter, index) =>
      descriptor({ name: adapter.name, priority: index + 1, rateLimitStrategy: adapter.rateLimitStrategy })
    ),
    adapterMap(...adapters)
  );
  const tracker = new RetryContextTracker();
  const sink = new RecordingSink();
  const orchestrator = new Orchestrator({
    registry,
    tracker,
    selector: new ProviderSelector(registry),
    sink,
    loadMode,
    defaultMaxAttempts: 3,
  });
  const states: StateChange[] = [];
  orchestrator.on('stateChange', (change: StateChange) => states.push(change));
  return { orchestrator, registry, tracker, sink, states };
}

describe('Orchestrator', () => {
  let p1: FakeAdapter;
  let p2: FakeAdapter;
  let p3: FakeAdapter;

  beforeEach(() => {
    p1 = new FakeAdapter('p1');
    p2 = new FakeAdapter('p2');
    p3 = new FakeAdapter('p3');
  });

  describe('provider failures', () => {
    it('should fail over to the next provider without consuming an attempt', async () => {
      p1 = new FakeAdapter('p1', [RATE_LIMITED]);
      const { orchestrator, registry, tracker } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.deepStrictEqual(outcome, {
        status: 'succeeded',
        taskId: 'task-1',
        provider: 'p2',
        bundle: bundle('task-1', 'p2'),
        attempt: 0,
        triedProviders: ['p1'],
      });
      assert.strictEqual(p3.generateCalls.length, 0);
      assert.strictEqual(registry.get('p1')?.stats.consecutiveFailures, 1);
      assert.strictEqual(registry.get('p1')?.coolingDown, true);
      assert.strictEqual(registry.get('p2')?.stats.successRate, 1);
      assert.strictEqual(tracker.get('task-1'), undefined);
      assert.strictEqual(tracker.isInFlight('task-1'), false);
    });

    it('should close the failed run and deliver against the new one', async () => {
      p1 = new FakeAdapter('p1', [RATE_LIMITED]);
      const { orchestrator, sink } = createHarness([p1, p2, p3]);

      await orchestrator.dispatch({ packet: packet() });

      assert.deepStrictEqual(
        sink.runs.map((run) => [run.provider, run.runId]),
        [
          ['p1', 'run-1'],
          ['p2', 'run-2'],
        ]
      );
      assert.strictEqual(sink.failures.length, 1);
      const [failure] = sink.failures;
      assert.strictEqual(failure?.kind, 'provider_failure');
      assert.strictEqual(failure?.terminal, false);
      assert.strictEqual(failure?.provider, 'p1');
      assert.strictEqual(failure?.runId, 'run-1');
      assert.strictEqual(failure?.detail, 'rate limit exceeded');
      assert.strictEqual(failure?.durationMs, 3);
      assert.deepStrictEqual(failure?.triedProviders, ['p1']);
      assert.deepStrictEqual(sink.delivered, [{ taskId: 'task-1', bundle: bundle('task-1', 'p2'), runId: 'run-2' }]);
    });

    it('should report exhaustion once every provider has failed the task', async () => {
      p1 = new FakeAdapter('p1', [RATE_LIMITED]);
      p2 = new FakeAdapter('p2', [RATE_LIMITED]);
      p3 = new FakeAdapter('p3', [RATE_LIMITED]);
      const { orchestrator, tracker, sink } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.deepStrictEqual(outcome, {
        status: 'exhausted',
        taskId: 'task-1',
        reason: 'all_excluded',
        attempt: 0,
        triedProviders: ['p1', 'p2', 'p3'],
      });
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.terminal]),
        [
          ['provider_failure', false],
          ['provider_failure', false],
          ['provider_failure', false],
          ['providers_exhausted', true],
        ]
      );
      assert.strictEqual(sink.failures[3]?.detail, 'No eligible provider (all_excluded)');
      assert.strictEqual(tracker.get('task-1'), undefined);
    });

    it('should exhaust with all_unavailable when no provider answers its probe', async () => {
      p1.available = false;
      p2.available = false;
      p3.available = false;
      const { orchestrator } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status === 'exhausted' && outcome.reason, 'all_unavailable');
      assert.strictEqual(p1.generateCalls.length, 0);
    });
  });

  describe('execution failures', () => {
    it('should consume an attempt and hand the failure back', async () => {
      p1 = new FakeAdapter('p1', [TESTS_FAILED]);
      const { orchestrator, tracker, sink } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.deepStrictEqual(outcome, {
        status: 'execution_failed',
        taskId: 'task-1',
        provider: 'p1',
        terminal: false,
        attempt: 1,
        triedProviders: [],
        detail: 'tests failed',
      });
      assert.strictEqual(p2.generateCalls.length, 0);
      assert.strictEqual(tracker.get('task-1')?.attempt, 1);
      assert.deepStrictEqual(tracker.get('task-1')?.triedProviders, []);
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.terminal, f.attempt, f.runId]),
        [['execution_failure', false, 1, 'run-1']]
      );
    });

    it('should keep the provider eligible for the next attempt', async () => {
      p1 = new FakeAdapter('p1', [TESTS_FAILED, { type: 'success' }]);
      const { orchestrator } = createHarness([p1, p2, p3]);

      await orchestrator.dispatch({ packet: packet() });
      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status, 'succeeded');
      assert.strictEqual(outcome.status === 'succeeded' && outcome.provider, 'p1');
      assert.strictEqual(outcome.attempt, 1);
    });

    it('should stop with a terminal failure when the attempt budget runs out', async () => {
      p1 = new FakeAdapter('p1', [TESTS_FAILED]);
      const { orchestrator, tracker, sink } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet({ execution: { max_attempts: 1 } }) });

      assert.deepStrictEqual(outcome, {
        status: 'execution_failed',
        taskId: 'task-1',
        provider: 'p1',
        terminal: true,
        attempt: 1,
        triedProviders: [],
        detail: 'tests failed',
      });
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.terminal, f.provider]),
        [['attempts_exhausted', true, 'p1']]
      );
      assert.strictEqual(tracker.get('task-1'), undefined);
    });

    it('should not dispatch a requeued task whose budget is already spent', async () => {
      const { orchestrator, sink } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet(), retry: { attempt: 3, guidance: [] } });

      assert.deepStrictEqual(outcome, {
        status: 'exhausted',
        taskId: 'task-1',
        reason: 'attempts_exhausted',
        attempt: 3,
        triedProviders: [],
      });
      assert.strictEqual(p1.probeCalls, 0);
      assert.strictEqual(sink.runs.length, 0);
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.detail]),
        [['attempts_exhausted', 'Attempt budget already spent']]
      );
    });
  });

  describe('adapters that throw', () => {
    it('should classify a thrown rate limit as a provider failure and fail over', async () => {
      p1 = new FakeAdapter('p1', [{ type: 'throw', error: new Error('rate limit exceeded') }]);
      const { orchestrator, registry, sink } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status === 'succeeded' && outcome.provider, 'p2');
      assert.strictEqual(outcome.attempt, 0);
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.provider, f.runId, f.detail]),
        [['provider_failure', 'p1', 'run-1', 'rate limit exceeded']]
      );
      assert.strictEqual(registry.successRate('p1'), 0);
    });

    it('should close the run of any other thrown error as an execution failure', async () => {
      p1 = new FakeAdapter('p1', [{ type: 'throw', error: new Error('socket hang up') }]);
      const { orchestrator, registry, sink } = createHarness([p1, p2, p3]);

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status, 'execution_failed');
      assert.strictEqual(outcome.status === 'execution_failed' && outcome.detail, 'socket hang up');
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.provider, f.runId, f.attempt]),
        [['execution_failure', 'p1', 'run-1', 1]]
      );
      assert.strictEqual(registry.successRate('p1'), 0);
    });
  });

  describe('retry guidance', () => {
    it('should pass seeded guidance to the provider', async () => {
      const { orchestrator } = createHarness([p1]);

      await orchestrator.dispatch({
        packet: packet({ inputs: { retry_guidance: ['Keep the public API'] } }),
        retry: { attempt: 1, guidance: ['Handle empty emails'] },
      });

      assert.deepStrictEqual(p1.generateCalls[0]?.inputs.retryGuidance, ['Keep the public API', 'Handle empty emails']);
    });

    it('should carry a judged rejection into the next dispatch', async () => {
      const { orchestrator } = createHarness([p1]);

      const context = orchestrator.recordJudgedRejection('task-1', 'Add a test for the empty case');
      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(context.attempt, 1);
      assert.deepStrictEqual(context.guidance, ['Add a test for the empty case']);
      assert.strictEqual(outcome.attempt, 1);
      assert.deepStrictEqual(p1.generateCalls[0]?.inputs.retryGuidance, ['Add a test for the empty case']);
    });
  });

  describe('cancellation', () => {
    it('should not select when the signal is already aborted', async () => {
      const { orchestrator, sink } = createHarness([p1]);
      const controller = new AbortController();
      controller.abort();

      await assert.rejects(
        orchestrator.dispatch({ packet: packet() }, { signal: controller.signal }),
        (error: unknown) => error instanceof TaskCancelledError && error.taskId === 'task-1'
      );
      assert.strictEqual(p1.probeCalls, 0);
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.terminal]),
        [['cancelled', false]]
      );
    });

    it('should discard the result of a dispatch cancelled mid-run', async () => {
      p1 = new FakeAdapter('p1', [{ type: 'hang' }]);
      const { orchestrator, registry, tracker, sink, states } = createHarness([p1]);
      const controller = new AbortController();
      orchestrator.on('stateChange', (change: StateChange) => {
        if (change.state === 'DISPATCHED') controller.abort();
      });

      await assert.rejects(
        orchestrator.dispatch({ packet: packet() }, { signal: controller.signal }),
        TaskCancelledError
      );

      assert.strictEqual(states[states.length - 1]?.state, 'CANCELLED');
      assert.strictEqual(registry.get('p1')?.stats.totalRuns, 0);
      assert.strictEqual(tracker.isInFlight('task-1'), false);
      assert.strictEqual(sink.failures[0]?.kind, 'cancelled');
      assert.strictEqual(sink.failures[0]?.provider, 'p1');
      assert.strictEqual(sink.failures[0]?.runId, 'run-1');
    });
  });

  describe('sink errors', () => {
    it('should finish the task when the sink rejects a delivery', async () => {
      const { orchestrator, sink } = createHarness([p1]);
      sink.failOn = 'deliver';

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status, 'succeeded');
      assert.strictEqual(sink.delivered.length, 0);
    });

    it('should dispatch without a run id when the sink cannot start a run', async () => {
      const { orchestrator, sink } = createHarness([p1]);
      sink.failOn = 'runStarted';

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status, 'succeeded');
      assert.strictEqual(sink.delivered[0]?.runId, undefined);
    });
  });

  describe('concurrency', () => {
    it('should refuse a second cycle for a task already in flight', async () => {
      const gate = deferred();
      p1 = new FakeAdapter('p1', [{ type: 'gate', gate: gate.promise }]);
      const { orchestrator } = createHarness([p1]);

      const first = orchestrator.dispatch({ packet: packet() });
      await assert.rejects(
        orchestrator.dispatch({ packet: packet() }),
        (error: unknown) => error instanceof StructuredError && error.code === ErrorCode.TASK_ALREADY_IN_FLIGHT
      );
      gate.resolve();

      const outcome = await first;
      assert.strictEqual(outcome.status, 'succeeded');
    });

    it('should run distinct tasks independently', async () => {
      const { orchestrator } = createHarness([p1, p2]);

      const outcomes = await Promise.all([
        orchestrator.dispatch({ packet: packet({ taskId: 'a' }) }),
        orchestrator.dispatch({ packet: packet({ taskId: 'b' }) }),
      ]);

      assert.deepStrictEqual(
        outcomes.map((o) => [o.taskId, o.status]),
        [
          ['a', 'succeeded'],
          ['b', 'succeeded'],
        ]
      );
    });
  });

  describe('load mode', () => {
    it('should read the load mode before selecting', async () => {
      p3 = new FakeAdapter('p3', [{ type: 'success' }], 'none');
      const { orchestrator } = createHarness([p1, p2, p3], () => 'high');

      const outcome = await orchestrator.dispatch({ packet: packet() });

      assert.strictEqual(outcome.status === 'succeeded' && outcome.provider, 'p3');
    });
  });

  describe('stateChange', () => {
    it('should emit every transition of a failover cycle', async () => {
      p1 = new FakeAdapter('p1', [RATE_LIMITED]);
      const { orchestrator, states } = createHarness([p1, p2, p3]);

      await orchestrator.dispatch({ packet: packet() });

      assert.deepStrictEqual(
        states.map((s) => [s.state, s.provider ?? null]),
        [
          ['PENDING', null],
          ['SELECTING', null],
          ['DISPATCHED', 'p1'],
          ['PROVIDER_FAILED', 'p1'],
          ['SELECTING', null],
          ['DISPATCHED', 'p2'],
          ['SUCCEEDED', 'p2'],
        ]
      );
    });
  });
});

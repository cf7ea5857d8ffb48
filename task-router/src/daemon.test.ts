import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { setTimeout as delay } from 'timers/promises';
import { Daemon, createRegistry, describeProviders, type DaemonDependencies } from './daemon.js';
import { ConfigSchema, type Config, type ProviderDescriptor } from './config/schema.js';
import type { PendingTask, TaskSource } from './tasks/packet.js';
import type { TelemetrySnapshot, TelemetrySource } from './telemetry/telemetry-aggregator.js';
import { ErrorCode, StructuredError } from './utils/errors.js';
import { FakeAdapter, RecordingSink, adapterMap, descriptor, packet } from './test-utils/fakes.js';

class ScriptedSource implements TaskSource {
  pulls = 0;

  constructor(private batches: PendingTask[][]) {}

  async pull(): Promise<PendingTask[]> {
    this.pulls++;
    return this.batches.shift() ?? [];
  }
}

class FixedTelemetry implements TelemetrySource {
  calls = 0;

  async fetchSnapshot(): Promise<TelemetrySnapshot> {
    this.calls++;
    return { capturedAt: Date.now(), queued: 0, running: 0, providers: {}, retryFailedProviders: new Set<string>() };
  }
}

function quietConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({ logging: { level: 'error' }, ...overrides });
}

describe('Daemon', () => {
  let adapters: Map<string, FakeAdapter>;
  let descriptors: ProviderDescriptor[];
  let deps: Partial<DaemonDependencies>;
  let reloadError: Error | undefined;

  beforeEach(() => {
    adapters = new Map([
      ['p1', new FakeAdapter('p1', [{ type: 'failure', error: { message: 'rate limit exceeded' } }])],
      ['p2', new FakeAdapter('p2')],
    ]);
    descriptors = [descriptor({ name: 'p1', priority: 1 }), descriptor({ name: 'p2', priority: 2 })];
    reloadError = undefined;
    deps = {
      loadProviders: () => {
        if (reloadError) throw reloadError;
        return descriptors;
      },
      createAdapters: (list) => adapterMap(...list.map((d) => adapters.get(d.name) ?? new FakeAdapter(d.name))),
    };
  });

  describe('run once', () => {
    it('should drain the source and stop on an empty pull', async () => {
      const source = new ScriptedSource([[{ packet: packet({ taskId: 't-1' }) }, { packet: packet({ taskId: 't-2' }) }]]);
      const telemetry = new FixedTelemetry();
      const sink = new RecordingSink();
      const daemon = new Daemon({
        config: quietConfig(),
        runOnce: true,
        handleSignals: false,
        deps: { ...deps, taskSource: source, telemetrySource: telemetry, sink },
      });

      const history = await daemon.start();

      assert.deepStrictEqual(
        history.map((c) => [c.cycle, c.tasksPulled, c.succeeded, c.executionFailed, c.exhausted, c.errored]),
        [
          [1, 2, 2, 0, 0, 0],
          [2, 0, 0, 0, 0, 0],
        ]
      );
      assert.strictEqual(source.pulls, 2);
      assert.strictEqual(telemetry.calls, 2);
      assert.deepStrictEqual(sink.delivered.map((d) => [d.taskId, d.bundle.provider]).sort(), [
        ['t-1', 'p2'],
        ['t-2', 'p2'],
      ]);
    });

    it('should count tasks no provider could take', async () => {
      for (const adapter of adapters.values()) {
        adapter.available = false;
      }
      const sink = new RecordingSink();
      const daemon = new Daemon({
        config: quietConfig(),
        runOnce: true,
        handleSignals: false,
        deps: { ...deps, taskSource: new ScriptedSource([[{ packet: packet() }]]), sink },
      });

      const [first] = await daemon.start();

      assert.strictEqual(first?.exhausted, 1);
      assert.deepStrictEqual(
        sink.failures.map((f) => [f.kind, f.terminal]),
        [['providers_exhausted', true]]
      );
    });

    it('should record a failed pull and stop', async () => {
      const source: TaskSource = {
        pull: async () => {
          throw new Error('queue down');
        },
      };
      const daemon = new Daemon({
        config: quietConfig(),
        runOnce: true,
        handleSignals: false,
        deps: { ...deps, taskSource: source },
      });

      const history = await daemon.start();

      assert.strictEqual(history.length, 1);
      assert.deepStrictEqual(history[0]?.errors, ['queue down']);
    });

    it('should route packets from task files', async () => {
      const dir = join(tmpdir(), `task-router-daemon-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      mkdirSync(dir, { recursive: true });
      const file = join(dir, 'task.json');
      writeFileSync(file, JSON.stringify({ identity: { task_id: 'from-file' }, goal: { title: 'Rename helper' } }));

      try {
        const daemon = new Daemon({ config: quietConfig(), runOnce: true, handleSignals: false, taskFiles: [file], deps });

        const history = await daemon.start();

        assert.strictEqual(history[0]?.succeeded, 1);
        assert.strictEqual(adapters.get('p2')?.generateCalls[0]?.identity.taskId, 'from-file');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should refuse to start without a task source', async () => {
      const daemon = new Daemon({ config: quietConfig(), runOnce: true, handleSignals: false, deps });

      await assert.rejects(
        daemon.start(),
        (error: unknown) =>
          error instanceof StructuredError &&
          error.code === ErrorCode.CONFIG_INVALID &&
          error.message === 'No task source configured'
      );
    });
  });

  describe('continuous mode', () => {
    it('should stop while waiting for the next cycle', async () => {
      const source = new ScriptedSource([]);
      const daemon = new Daemon({
        config: quietConfig({ daemon: { loopIntervalMs: 60000 } }),
        handleSignals: false,
        deps: { ...deps, taskSource: source, telemetrySource: new FixedTelemetry() },
      });

      const run = daemon.start();
      await delay(20);
      daemon.stop();
      const history = await run;

      assert.strictEqual(history.length, 1);
      assert.strictEqual(source.pulls, 1);
    });

    it('should not dispatch tasks pulled after a stop', async () => {
      let daemon: Daemon | undefined;
      const source: TaskSource = {
        pull: async () => {
          daemon?.stop();
          return [{ packet: packet({ taskId: 'late' }) }];
        },
      };
      daemon = new Daemon({
        config: quietConfig(),
        handleSignals: false,
        deps: { ...deps, taskSource: source, telemetrySource: new FixedTelemetry() },
      });

      const history = await daemon.start();

      assert.deepStrictEqual(
        history.map((c) => [c.tasksPulled, c.succeeded, c.executionFailed, c.exhausted, c.errored]),
        [[1, 0, 0, 0, 0]]
      );
      assert.strictEqual(adapters.get('p1')?.generateCalls.length, 0);
      assert.strictEqual(adapters.get('p2')?.generateCalls.length, 0);
    });
  });

  describe('reloadProviders', () => {
    let daemon: Daemon;

    beforeEach(async () => {
      daemon = new Daemon({
        config: quietConfig(),
        runOnce: true,
        handleSignals: false,
        deps: { ...deps, taskSource: new ScriptedSource([]) },
      });
      await daemon.start();
    });

    afterEach(() => {
      daemon.stop();
    });

    it('should apply the new provider list', () => {
      descriptors = [descriptor({ name: 'p1', priority: 1 }), descriptor({ name: 'p3', priority: 3 })];

      daemon.reloadProviders();

      assert.deepStrictEqual(daemon.getRegistry()?.names().sort(), ['p1', 'p3']);
    });

    it('should keep the registry when the reload fails', () => {
      reloadError = new Error('providers.json is locked');

      daemon.reloadProviders();

      assert.deepStrictEqual(daemon.getRegistry()?.names().sort(), ['p1', 'p2']);
    });
  });
});

describe('describeProviders', () => {
  it('should probe enabled providers and report availability', async () => {
    const down = new FakeAdapter('down');
    down.available = false;
    const registry = createRegistry(quietConfig(), {
      loadProviders: () => [
        descriptor({ name: 'up', priority: 1 }),
        descriptor({ name: 'down', priority: 2 }),
        descriptor({ name: 'off', priority: 3, enabled: false }),
      ],
      createAdapters: () => adapterMap(new FakeAdapter('up'), down, new FakeAdapter('off')),
    });

    const entries = await describeProviders(registry);

    assert.deepStrictEqual(
      entries.map((e) => [e.descriptor.name, e.stats.available]),
      [
        ['up', true],
        ['down', false],
        ['off', undefined],
      ]
    );
  });
});

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'timers/promises';
import { TelemetryAggregator, TELEMETRY_SOURCE, type TelemetrySnapshot, type TelemetrySource } from './telemetry-aggregator.js';
import { ProviderRegistry } from '../registry/provider-registry.js';
import { ProviderSelector } from '../selection/selector.js';
import { FakeAdapter, adapterMap, descriptor, packet } from '../test-utils/fakes.js';

class FakeTelemetrySource implements TelemetrySource {
  calls = 0;
  failWith?: Error;
  snapshot: TelemetrySnapshot = {
    capturedAt: 0,
    queued: 0,
    running: 0,
    providers: {},
    retryFailedProviders: new Set(),
  };

  async fetchSnapshot(): Promise<TelemetrySnapshot> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    return this.snapshot;
  }
}

const OPTIONS = {
  highLoadThreshold: 50,
  successRateFloor: 0.5,
  minObservedRuns: 3,
  demoteDelta: 5,
  promoteDelta: 1,
  nudgeTtlMs: 60_000,
};

describe('TelemetryAggregator', () => {
  let source: FakeTelemetrySource;
  let registry: ProviderRegistry;
  let aggregator: TelemetryAggregator;

  beforeEach(() => {
    source = new FakeTelemetrySource();
    registry = new ProviderRegistry(
      [descriptor({ name: 'P1', priority: 1 }), descriptor({ name: 'P2', priority: 1 }), descriptor({ name: 'P3', priority: 1 })],
      adapterMap(new FakeAdapter('P1'), new FakeAdapter('P2'), new FakeAdapter('P3'))
    );
    aggregator = new TelemetryAggregator(source, registry, OPTIONS);
  });

  describe('load mode', () => {
    it('should switch to high when queued exceeds the threshold', async () => {
      source.snapshot = { ...source.snapshot, queued: 51 };
      assert.strictEqual((await aggregator.refresh()).loadMode, 'high');

      source.snapshot = { ...source.snapshot, queued: 50 };
      assert.strictEqual((await aggregator.refresh()).loadMode, 'normal');
    });

    it('should fall back to normal when the pull fails', async () => {
      source.snapshot = { ...source.snapshot, queued: 80 };
      await aggregator.refresh();
      assert.strictEqual(aggregator.getLoadMode(), 'high');

      source.failWith = new Error('connect ECONNREFUSED');
      const hints = await aggregator.refresh();

      assert.strictEqual(hints.loadMode, 'normal');
      assert.strictEqual(hints.snapshot?.queued, 80);
    });
  });

  describe('priority nudges', () => {
    it('should demote a struggling provider and promote its peers', async () => {
      source.snapshot = {
        ...source.snapshot,
        providers: {
          P1: { successRate: 0.2, failureCount: 8, totalRuns: 10 },
          P2: { successRate: 0.9, failureCount: 1, totalRuns: 10 },
        },
      };

      await aggregator.refresh();

      assert.strictEqual(registry.effectivePriority('P1'), 6);
      assert.strictEqual(registry.effectivePriority('P2'), 0);
      assert.strictEqual(registry.effectivePriority('P3'), 0);
      assert.deepStrictEqual(registry.get('P1')?.adjustments.map((a) => [a.source, a.delta]), [[TELEMETRY_SOURCE, -5]]);
      assert.deepStrictEqual(registry.get('P2')?.adjustments.map((a) => [a.source, a.delta]), [['telemetry:P1', 1]]);
    });

    it('should not stack nudges across refreshes', async () => {
      source.snapshot = {
        ...source.snapshot,
        providers: { P1: { successRate: 0.2, failureCount: 8, totalRuns: 10 } },
      };

      await aggregator.refresh();
      await aggregator.refresh();

      assert.strictEqual(registry.effectivePriority('P1'), 6);
      assert.strictEqual(registry.effectivePriority('P2'), 0);
    });

    it('should ignore providers with too few runs', async () => {
      source.snapshot = {
        ...source.snapshot,
        providers: { P1: { successRate: 0, failureCount: 2, totalRuns: 2 } },
      };

      await aggregator.refresh();

      assert.strictEqual(registry.effectivePriority('P1'), 1);
    });

    it('should ignore providers the registry does not know', async () => {
      source.snapshot = {
        ...source.snapshot,
        providers: { retired: { successRate: 0, failureCount: 9, totalRuns: 9 } },
      };

      await aggregator.refresh();

      assert.deepStrictEqual(registry.snapshot().map((e) => e.effectivePriority), [1, 1, 1]);
    });

    it('should steer selection away from the demoted provider', async () => {
      const selector = new ProviderSelector(registry);
      const before = await selector.select(packet(), { triedProviders: [] });
      assert.strictEqual(before.kind === 'selected' && before.provider.descriptor.name, 'P1');

      source.snapshot = {
        ...source.snapshot,
        providers: { P1: { successRate: 0.1, failureCount: 9, totalRuns: 10 } },
      };
      await aggregator.refresh();

      const after = await selector.select(packet({ taskId: 'fresh' }), { triedProviders: [] });
      assert.strictEqual(after.kind === 'selected' && after.provider.descriptor.name, 'P2');
    });
  });

  describe('start and stop', () => {
    it('should poll until stopped', async () => {
      aggregator.start(5);
      await delay(40);
      aggregator.stop();
      const calls = source.calls;

      assert.ok(calls >= 1);
      await delay(20);
      assert.strictEqual(source.calls, calls);
    });
  });
});

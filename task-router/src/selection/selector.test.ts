import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { decide, ProviderSelector } from './selector.js';
import { ProviderRegistry } from '../registry/provider-registry.js';
import type { ProviderDescriptorInput } from '../config/schema.js';
import { FakeAdapter, adapterMap, descriptor, packet } from '../test-utils/fakes.js';

function buildRegistry(inputs: ProviderDescriptorInput[], adapters: FakeAdapter[] = []): ProviderRegistry {
  const byName = new Map(adapters.map((a): [string, FakeAdapter] => [a.name, a]));
  const all = inputs.map((input) => byName.get(input.name) ?? new FakeAdapter(input.name));
  return new ProviderRegistry(inputs.map(descriptor), adapterMap(...all));
}

function allAvailable(registry: ProviderRegistry): Map<string, boolean> {
  return new Map(registry.names().map((name): [string, boolean] => [name, true]));
}

describe('decide', () => {
  const task = packet({ task_type: 'bugfix' });

  it('should report no_providers for an empty registry', () => {
    const decision = decide({
      task,
      providers: [],
      context: { triedProviders: [] },
      loadMode: 'normal',
      availability: new Map(),
    });

    assert.deepStrictEqual(decision, { kind: 'exhausted', reason: 'no_providers', considered: [] });
  });

  it('should exhaust without probing when every provider is disabled', () => {
    const registry = buildRegistry([
      { name: 'p1', enabled: false },
      { name: 'p2', enabled: false },
    ]);

    const decision = decide({
      task,
      providers: registry.snapshot(),
      context: { triedProviders: [] },
      loadMode: 'normal',
      availability: allAvailable(registry),
    });

    assert.deepStrictEqual(decision, {
      kind: 'exhausted',
      reason: 'all_excluded',
      considered: [
        { name: 'p1', reason: 'disabled' },
        { name: 'p2', reason: 'disabled' },
      ],
    });
  });

  it('should never pick a provider already tried for the task', () => {
    const registry = buildRegistry([
      { name: 'p1', priority: 1 },
      { name: 'p2', priority: 2 },
    ]);

    const decision = decide({
      task,
      providers: registry.snapshot(),
      context: { triedProviders: ['p1'] },
      loadMode: 'normal',
      availability: allAvailable(registry),
    });

    assert.strictEqual(decision.kind === 'selected' && decision.provider.descriptor.name, 'p2');
  });

  it('should report all_unavailable when candidates fail their probe or cool down', () => {
    const registry = buildRegistry([
      { name: 'p1', priority: 1 },
      { name: 'p2', priority: 2 },
    ]);
    registry.recordOutcome('p1', { kind: 'provider_failure', taskType: 'bugfix', rateLimited: true });

    const decision = decide({
      task,
      providers: registry.snapshot(),
      context: { triedProviders: [] },
      loadMode: 'normal',
      availability: new Map([
        ['p1', true],
        ['p2', false],
      ]),
    });

    assert.deepStrictEqual(decision, {
      kind: 'exhausted',
      reason: 'all_unavailable',
      considered: [
        { name: 'p1', reason: 'cooling_down' },
        { name: 'p2', reason: 'unavailable' },
      ],
    });
  });

  it('should prefer a higher success rate for the task type over priority', () => {
    const registry = buildRegistry([
      { name: 'p1', priority: 1 },
      { name: 'p2', priority: 2 },
    ]);
    registry.recordOutcome('p1', { kind: 'execution_failure', taskType: 'bugfix' });
    registry.recordOutcome('p2', { kind: 'success', taskType: 'bugfix' });

    const decision = decide({
      task,
      providers: registry.snapshot(),
      context: { triedProviders: [] },
      loadMode: 'normal',
      availability: allAvailable(registry),
    });

    assert.strictEqual(decision.kind === 'selected' && decision.provider.descriptor.name, 'p2');
  });

  it('should fall back to the overall rate, then a neutral rate', () => {
    const registry = buildRegistry([
      { name: 'p1', priority: 1 },
      { name: 'p2', priority: 2 },
    ]);
    // p1 has only a poor record on another task type: 0 overall beats nothing, neutral 0.5 wins
    registry.recordOutcome('p1', { kind: 'execution_failure', taskType: 'docs' });

    const decision = decide({
      task,
      providers: registry.snapshot(),
      context: { triedProviders: [] },
      loadMode: 'normal',
      availability: allAvailable(registry),
    });

    assert.ok(decision.kind === 'selected');
    assert.deepStrictEqual(
      decision.rankings.map((r) => [r.name, r.successRate]),
      [
        ['p2', 0.5],
        ['p1', 0],
      ]
    );
  });

  it('should break ties by confidence weight, then name', () => {
    const registry = buildRegistry([
      { name: 'b', priority: 1, confidenceWeight: 0.5 },
      { name: 'c', priority: 1, confidenceWeight: 0.9 },
      { name: 'a', priority: 1, confidenceWeight: 0.5 },
    ]);

    const decision = decide({
      task,
      providers: registry.snapshot(),
      context: { triedProviders: [] },
      loadMode: 'normal',
      availability: allAvailable(registry),
    });

    assert.ok(decision.kind === 'selected');
    assert.deepStrictEqual(decision.rankings.map((r) => r.name), ['c', 'a', 'b']);
  });

  it('should prefer providers without rate limits under high load', () => {
    const registry = buildRegistry([
      { name: 'api', priority: 1, rateLimitStrategy: 'status_code' },
      { name: 'local', priority: 5, rateLimitStrategy: 'none' },
    ]);
    const input = {
      task,
      providers: registry.snapshot(),
      context: { triedProviders: [] },
      availability: allAvailable(registry),
    };

    const normal = decide({ ...input, loadMode: 'normal' });
    const high = decide({ ...input, loadMode: 'high' });

    assert.strictEqual(normal.kind === 'selected' && normal.provider.descriptor.name, 'api');
    assert.strictEqual(high.kind === 'selected' && high.provider.descriptor.name, 'local');
  });
});

describe('ProviderSelector', () => {
  let p1: FakeAdapter;
  let p2: FakeAdapter;
  let p3: FakeAdapter;
  let registry: ProviderRegistry;
  let selector: ProviderSelector;

  beforeEach(() => {
    p1 = new FakeAdapter('p1');
    p2 = new FakeAdapter('p2');
    p3 = new FakeAdapter('p3');
    registry = buildRegistry(
      [
        { name: 'p1', priority: 1 },
        { name: 'p2', priority: 2 },
        { name: 'p3', priority: 3, enabled: false },
      ],
      [p1, p2, p3]
    );
    selector = new ProviderSelector(registry);
  });

  it('should probe only enabled, untried providers', async () => {
    await selector.select(packet(), { triedProviders: ['p1'] });

    assert.deepStrictEqual([p1.probeCalls, p2.probeCalls, p3.probeCalls], [0, 1, 0]);
  });

  it('should treat a throwing probe as unavailable', async () => {
    p1.probeError = new Error('probe crashed');

    const decision = await selector.select(packet(), { triedProviders: [] });

    assert.strictEqual(decision.kind === 'selected' && decision.provider.descriptor.name, 'p2');
    assert.strictEqual(registry.get('p1')?.stats.available, false);
  });

  it('should give the same decision on repeated calls without side effects', async () => {
    const first = await selector.select(packet(), { triedProviders: [] });
    const second = await selector.select(packet(), { triedProviders: [] });

    assert.strictEqual(first.kind === 'selected' && first.provider.descriptor.name, 'p1');
    assert.strictEqual(second.kind === 'selected' && second.provider.descriptor.name, 'p1');
    assert.strictEqual(p1.generateCalls.length, 0);
    assert.strictEqual(registry.get('p1')?.stats.totalRuns, 0);
  });

  it('should re-probe on every call', async () => {
    await selector.select(packet(), { triedProviders: [] });
    p1.available = false;

    const decision = await selector.select(packet(), { triedProviders: [] });

    assert.strictEqual(decision.kind === 'selected' && decision.provider.descriptor.name, 'p2');
    assert.strictEqual(p1.probeCalls, 2);
  });
});

import type { ProviderDescriptor } from '../config/schema.js';
import type { ProviderAdapter } from '../providers/types.js';
import { ConfigError, ErrorCode, StructuredError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  PriorityAdjustment,
  ProviderEntry,
  ProviderOutcome,
  ProviderRegistryOptions,
  ProviderStats,
  ReloadSummary,
  WindowStats,
} from './types.js';

const DEFAULT_STATS_WINDOW = 20;
const DEFAULT_RATE_LIMIT_COOLDOWN_MS = 300000;

/**
 * Fixed-size window of recent boolean outcomes
 */
class RollingWindow {
  private outcomes: boolean[] = [];

  constructor(private readonly capacity: number) {}

  push(success: boolean): void {
    this.outcomes.push(success);
    if (this.outcomes.length > this.capacity) {
      this.outcomes.shift();
    }
  }

  stats(): WindowStats {
    const observedRuns = this.outcomes.length;
    if (observedRuns === 0) {
      return { successRate: null, observedRuns };
    }
    const successes = this.outcomes.filter(Boolean).length;
    return { successRate: successes / observedRuns, observedRuns };
  }
}

interface ProviderState {
  descriptor: ProviderDescriptor;
  adapter: ProviderAdapter;
  overall: RollingWindow;
  byTaskType: Map<string, RollingWindow>;
  totalRuns: number;
  totalDurationMs: number;
  timedRuns: number;
  consecutiveFailures: number;
  available?: boolean;
  lastAvailabilityCheckAt?: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
  cooldownUntil?: number;
  adjustments: Map<string, PriorityAdjustment>;
}

function compareEntries(a: ProviderEntry, b: ProviderEntry): number {
  return a.effectivePriority - b.effectivePriority || a.descriptor.name.localeCompare(b.descriptor.name);
}

/**
 * Owns provider descriptors, their adapters and runtime statistics.
 *
 * Every mutation is a synchronous method call, so updates to one provider are
 * serialized by the event loop and never interleave.
 */
export class ProviderRegistry {
  private providers = new Map<string, ProviderState>();
  private statsWindow: number;
  private rateLimitCooldownMs: number;
  private now: () => number;

  constructor(
    descriptors: readonly ProviderDescriptor[],
    adapters: ReadonlyMap<string, ProviderAdapter>,
    options: ProviderRegistryOptions = {}
  ) {
    this.statsWindow = options.statsWindow ?? DEFAULT_STATS_WINDOW;
    this.rateLimitCooldownMs = options.rateLimitCooldownMs ?? DEFAULT_RATE_LIMIT_COOLDOWN_MS;
    this.now = options.now ?? Date.now;

    const seen = new Set<string>();
    for (const descriptor of descriptors) {
      if (seen.has(descriptor.name)) {
        throw new ConfigError(ErrorCode.CONFIG_VALIDATION_FAILED, `Duplicate provider name "${descriptor.name}"`, {
          field: 'providers',
          value: descriptor.name,
        });
      }
      seen.add(descriptor.name);
      this.providers.set(descriptor.name, this.createState(descriptor, adapters));
    }
  }

  private createState(descriptor: ProviderDescriptor, adapters: ReadonlyMap<string, ProviderAdapter>): ProviderState {
    return {
      descriptor: { ...descriptor },
      adapter: this.requireAdapter(descriptor.name, adapters),
      overall: new RollingWindow(this.statsWindow),
      byTaskType: new Map(),
      totalRuns: 0,
      totalDurationMs: 0,
      timedRuns: 0,
      consecutiveFailures: 0,
      adjustments: new Map(),
    };
  }

  private requireAdapter(name: string, adapters: ReadonlyMap<string, ProviderAdapter>): ProviderAdapter {
    const adapter = adapters.get(name);
    if (!adapter) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, `No adapter was built for provider "${name}"`, {
        field: 'providers',
        value: name,
      });
    }
    return adapter;
  }

  private getState(name: string): ProviderState {
    const state = this.providers.get(name);
    if (!state) {
      throw new StructuredError(ErrorCode.PROVIDER_NOT_FOUND, `Unknown provider "${name}"`, {
        context: { provider: name, knownProviders: this.names() },
      });
    }
    return state;
  }

  private activeAdjustments(state: ProviderState): PriorityAdjustment[] {
    const now = this.now();
    for (const [source, adjustment] of state.adjustments) {
      if (adjustment.expiresAt <= now) {
        state.adjustments.delete(source);
      }
    }
    return [...state.adjustments.values()];
  }

  private toEntry(state: ProviderState): ProviderEntry {
    const adjustments = this.activeAdjustments(state);
    const byTaskType: Record<string, WindowStats> = {};
    for (const [taskType, window] of state.byTaskType) {
      byTaskType[taskType] = window.stats();
    }

    const stats: ProviderStats = {
      ...state.overall.stats(),
      byTaskType,
      totalRuns: state.totalRuns,
      consecutiveFailures: state.consecutiveFailures,
      available: state.available,
      lastAvailabilityCheckAt: state.lastAvailabilityCheckAt,
      lastSuccessAt: state.lastSuccessAt,
      lastFailureAt: state.lastFailureAt,
      cooldownUntil: state.cooldownUntil,
      avgDurationMs: state.timedRuns > 0 ? Math.round(state.totalDurationMs / state.timedRuns) : undefined,
    };

    return {
      descriptor: { ...state.descriptor, config: { ...state.descriptor.config } },
      adapter: state.adapter,
      stats,
      adjustments: adjustments.map((a) => ({ ...a })),
      effectivePriority: state.descriptor.priority - adjustments.reduce((sum, a) => sum + a.delta, 0),
      coolingDown: state.cooldownUntil !== undefined && state.cooldownUntil > this.now(),
    };
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  get size(): number {
    return this.providers.size;
  }

  get(name: string): ProviderEntry | undefined {
    const state = this.providers.get(name);
    return state ? this.toEntry(state) : undefined;
  }

  getAdapter(name: string): ProviderAdapter {
    return this.getState(name).adapter;
  }

  /**
   * All providers, enabled or not, ordered by effective priority then name
   */
  snapshot(): ProviderEntry[] {
    return [...this.providers.values()].map((state) => this.toEntry(state)).sort(compareEntries);
  }

  enabledProviders(): ProviderEntry[] {
    return this.snapshot().filter((entry) => entry.descriptor.enabled);
  }

  recordOutcome(name: string, outcome: ProviderOutcome): void {
    const state = this.getState(name);
    const now = this.now();
    const success = outcome.kind === 'success';

    state.overall.push(success);
    let window = state.byTaskType.get(outcome.taskType);
    if (!window) {
      window = new RollingWindow(this.statsWindow);
      state.byTaskType.set(outcome.taskType, window);
    }
    window.push(success);

    state.totalRuns++;
    if (outcome.durationMs !== undefined) {
      state.totalDurationMs += outcome.durationMs;
      state.timedRuns++;
    }

    if (success) {
      state.consecutiveFailures = 0;
      state.lastSuccessAt = now;
      state.cooldownUntil = undefined;
      return;
    }

    state.consecutiveFailures++;
    state.lastFailureAt = now;

    if (outcome.kind === 'provider_failure' && outcome.rateLimited && this.rateLimitCooldownMs > 0) {
      state.cooldownUntil = now + this.rateLimitCooldownMs;
      logger.warn(`Provider ${name} rate limited, cooling down for ${Math.round(this.rateLimitCooldownMs / 1000)}s`, {
        consecutiveFailures: state.consecutiveFailures,
      });
    }
  }

  /**
   * Layer a signed priority offset on a provider. One adjustment is kept per
   * (provider, source); applying again replaces it.
   */
  applyPriorityAdjustment(name: string, delta: number, ttlMs: number, source = 'manual'): void {
    const state = this.getState(name);
    state.adjustments.set(source, { source, delta, expiresAt: this.now() + ttlMs });
  }

  clearAdjustments(name?: string, source?: string): void {
    const targets = name === undefined ? [...this.providers.values()] : [this.getState(name)];
    for (const state of targets) {
      if (source === undefined) {
        state.adjustments.clear();
      } else {
        state.adjustments.delete(source);
      }
    }
  }

  /**
   * Static priority minus the sum of active adjustment deltas. Lower is preferred.
   */
  effectivePriority(name: string): number {
    const state = this.getState(name);
    return state.descriptor.priority - this.activeAdjustments(state).reduce((sum, a) => sum + a.delta, 0);
  }

  successRate(name: string, taskType?: string): number | null {
    const state = this.getState(name);
    if (taskType === undefined) {
      return state.overall.stats().successRate;
    }
    return state.byTaskType.get(taskType)?.stats().successRate ?? null;
  }

  setEnabled(name: string, enabled: boolean): void {
    this.getState(name).descriptor.enabled = enabled;
  }

  markAvailability(name: string, available: boolean): void {
    const state = this.getState(name);
    state.available = available;
    state.lastAvailabilityCheckAt = this.now();
  }

  /**
   * Apply a new descriptor set. Providers whose names survive keep their
   * statistics and adjustments.
   */
  reload(descriptors: readonly ProviderDescriptor[], adapters: ReadonlyMap<string, ProviderAdapter>): ReloadSummary {
    const summary: ReloadSummary = { added: [], removed: [], updated: [] };
    const incoming = new Map<string, ProviderDescriptor>();
    for (const descriptor of descriptors) {
      if (incoming.has(descriptor.name)) {
        throw new ConfigError(ErrorCode.CONFIG_VALIDATION_FAILED, `Duplicate provider name "${descriptor.name}"`, {
          field: 'providers',
          value: descriptor.name,
        });
      }
      incoming.set(descriptor.name, descriptor);
    }

    // Resolve every adapter before mutating so a bad reload leaves the registry untouched
    const resolved = new Map<string, ProviderAdapter>();
    for (const name of incoming.keys()) {
      resolved.set(name, this.requireAdapter(name, adapters));
    }

    for (const name of this.names()) {
      if (!incoming.has(name)) {
        this.providers.delete(name);
        summary.removed.push(name);
      }
    }

    for (const [name, descriptor] of incoming) {
      const existing = this.providers.get(name);
      if (!existing) {
        this.providers.set(name, this.createState(descriptor, resolved));
        summary.added.push(name);
        continue;
      }
      if (JSON.stringify(existing.descriptor) !== JSON.stringify(descriptor)) {
        summary.updated.push(name);
      }
      existing.descriptor = { ...descriptor };
      existing.adapter = this.requireAdapter(name, resolved);
    }

    return summary;
  }
}

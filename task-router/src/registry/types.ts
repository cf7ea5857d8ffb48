import type { ProviderDescriptor } from '../config/schema.js';
import type { ProviderAdapter } from '../providers/types.js';

export type OutcomeKind = 'success' | 'provider_failure' | 'execution_failure';

export interface ProviderOutcome {
  kind: OutcomeKind;
  taskType: string;
  /** Set for provider failures classified as rate limits; starts a cooldown */
  rateLimited?: boolean;
  durationMs?: number;
}

export interface PriorityAdjustment {
  source: string;
  delta: number;
  expiresAt: number;
}

export interface WindowStats {
  successRate: number | null;
  observedRuns: number;
}

export interface ProviderStats extends WindowStats {
  byTaskType: Record<string, WindowStats>;
  totalRuns: number;
  consecutiveFailures: number;
  available?: boolean;
  lastAvailabilityCheckAt?: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
  cooldownUntil?: number;
  avgDurationMs?: number;
}

/**
 * Copied view of one registry entry. Mutating it has no effect on the registry.
 */
export interface ProviderEntry {
  descriptor: ProviderDescriptor;
  adapter: ProviderAdapter;
  stats: ProviderStats;
  adjustments: PriorityAdjustment[];
  effectivePriority: number;
  coolingDown: boolean;
}

export interface ReloadSummary {
  added: string[];
  removed: string[];
  updated: string[];
}

export interface ProviderRegistryOptions {
  /** Outcomes kept per rolling window (default: 20) */
  statsWindow?: number;
  /** Cooldown after a rate-limited provider failure (default: 300000) */
  rateLimitCooldownMs?: number;
  now?: () => number;
}

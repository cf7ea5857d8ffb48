import type { ProviderRegistry } from '../registry/provider-registry.js';
import type { ProviderEntry } from '../registry/types.js';
import type { RetryContext } from '../retry/retry-context.js';
import type { LoadMode } from '../telemetry/telemetry-aggregator.js';
import type { TaskPacket } from '../tasks/packet.js';
import { logger } from '../utils/logger.js';

export type RejectionReason = 'disabled' | 'already_tried' | 'unavailable' | 'cooling_down';

export type ExhaustionReason = 'no_providers' | 'all_excluded' | 'all_unavailable';

export interface ProviderRanking {
  name: string;
  successRate: number;
  effectivePriority: number;
  confidenceWeight: number;
  preferredUnderLoad: boolean;
}

export type SchedulingDecision =
  | { kind: 'selected'; provider: ProviderEntry; rankings: ProviderRanking[] }
  | {
      kind: 'exhausted';
      reason: ExhaustionReason;
      considered: Array<{ name: string; reason: RejectionReason }>;
    };

export interface SelectionInput {
  task: TaskPacket;
  providers: readonly ProviderEntry[];
  context: Pick<RetryContext, 'triedProviders'>;
  loadMode: LoadMode;
  /** Probe results by provider name; missing means unavailable */
  availability: ReadonlyMap<string, boolean>;
}

const NEUTRAL_SUCCESS_RATE = 0.5;

function observedSuccessRate(entry: ProviderEntry, taskType: string): number {
  return entry.stats.byTaskType[taskType]?.successRate ?? entry.stats.successRate ?? NEUTRAL_SUCCESS_RATE;
}

function rank(entry: ProviderEntry, taskType: string, loadMode: LoadMode): ProviderRanking {
  return {
    name: entry.descriptor.name,
    successRate: observedSuccessRate(entry, taskType),
    effectivePriority: entry.effectivePriority,
    confidenceWeight: entry.descriptor.confidenceWeight,
    preferredUnderLoad: loadMode === 'high' && entry.descriptor.rateLimitStrategy === 'none',
  };
}

function compareRankings(a: ProviderRanking, b: ProviderRanking): number {
  return (
    Number(b.preferredUnderLoad) - Number(a.preferredUnderLoad) ||
    b.successRate - a.successRate ||
    a.effectivePriority - b.effectivePriority ||
    b.confidenceWeight - a.confidenceWeight ||
    a.name.localeCompare(b.name)
  );
}

/**
 * Filter providers that cannot take the task
 */
function partition(input: SelectionInput): {
  candidates: ProviderEntry[];
  considered: Array<{ name: string; reason: RejectionReason }>;
} {
  const tried = new Set(input.context.triedProviders);
  const candidates: ProviderEntry[] = [];
  const considered: Array<{ name: string; reason: RejectionReason }> = [];

  for (const entry of input.providers) {
    const name = entry.descriptor.name;
    if (!entry.descriptor.enabled) {
      considered.push({ name, reason: 'disabled' });
    } else if (tried.has(name)) {
      considered.push({ name, reason: 'already_tried' });
    } else {
      candidates.push(entry);
    }
  }
  return { candidates, considered };
}

/**
 * Choose a provider for one dispatch. Pure: every input is passed in.
 */
export function decide(input: SelectionInput): SchedulingDecision {
  if (input.providers.length === 0) {
    return { kind: 'exhausted', reason: 'no_providers', considered: [] };
  }

  const { candidates, considered } = partition(input);
  if (candidates.length === 0) {
    return { kind: 'exhausted', reason: 'all_excluded', considered };
  }

  const available: ProviderEntry[] = [];
  for (const entry of candidates) {
    const name = entry.descriptor.name;
    if (entry.coolingDown) {
      considered.push({ name, reason: 'cooling_down' });
    } else if (input.availability.get(name) !== true) {
      considered.push({ name, reason: 'unavailable' });
    } else {
      available.push(entry);
    }
  }

  const rankings = available
    .map((entry) => rank(entry, input.task.taskType, input.loadMode))
    .sort(compareRankings);

  const best = rankings[0];
  const provider = best && available.find((entry) => entry.descriptor.name === best.name);
  if (!provider) {
    return { kind: 'exhausted', reason: 'all_unavailable', considered };
  }

  return { kind: 'selected', provider, rankings };
}

/**
 * Probes live availability and applies `decide` to the current registry state.
 * Nothing is cached between calls.
 */
export class ProviderSelector {
  constructor(private readonly registry: ProviderRegistry) {}

  /**
   * Probe every provider that is enabled, not yet tried and not cooling down,
   * in parallel. A probe that throws counts as unavailable.
   */
  async probe(entries: readonly ProviderEntry[], context: Pick<RetryContext, 'triedProviders'>): Promise<Map<string, boolean>> {
    const tried = new Set(context.triedProviders);
    const targets = entries.filter(
      (entry) => entry.descriptor.enabled && !tried.has(entry.descriptor.name) && !entry.coolingDown
    );

    const results = await Promise.all(
      targets.map(async (entry): Promise<[string, boolean]> => {
        const name = entry.descriptor.name;
        try {
          return [name, await entry.adapter.isAvailable()];
        } catch (error) {
          logger.debug(`Availability probe for ${name} failed`, { error: String(error) });
          return [name, false];
        }
      })
    );

    for (const [name, available] of results) {
      if (this.registry.has(name)) {
        this.registry.markAvailability(name, available);
      }
    }
    return new Map(results);
  }

  async select(
    task: TaskPacket,
    context: Pick<RetryContext, 'triedProviders'>,
    loadMode: LoadMode = 'normal'
  ): Promise<SchedulingDecision> {
    const providers = this.registry.snapshot();
    const availability = await this.probe(providers, context);
    return decide({ task, providers, context, loadMode, availability });
  }
}

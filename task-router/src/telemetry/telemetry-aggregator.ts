import type { ProviderRegistry } from '../registry/provider-registry.js';
import { logger } from '../utils/logger.js';
import { ErrorCode, wrapError } from '../utils/errors.js';

export type LoadMode = 'normal' | 'high';

export interface ProviderTelemetry {
  successRate: number;
  failureCount: number;
  totalRuns: number;
}

export interface TelemetrySnapshot {
  readonly capturedAt: number;
  readonly queued: number;
  readonly running: number;
  readonly providers: Readonly<Record<string, ProviderTelemetry>>;
  readonly retryFailedProviders: ReadonlySet<string>;
}

export interface TelemetrySource {
  fetchSnapshot(): Promise<TelemetrySnapshot>;
}

export interface RoutingHints {
  loadMode: LoadMode;
  snapshot?: TelemetrySnapshot;
}

export interface TelemetryAggregatorOptions {
  highLoadThreshold: number;
  successRateFloor: number;
  minObservedRuns: number;
  demoteDelta: number;
  promoteDelta: number;
  nudgeTtlMs: number;
}

export const TELEMETRY_SOURCE = 'telemetry';

const log = logger.child('Telemetry');

/**
 * Pulls queue telemetry, derives the load mode and nudges provider priorities
 * away from providers whose observed success rate has dropped.
 */
export class TelemetryAggregator {
  private loadMode: LoadMode = 'normal';
  private snapshot?: TelemetrySnapshot;
  private degraded = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly source: TelemetrySource,
    private readonly registry: ProviderRegistry,
    private readonly options: TelemetryAggregatorOptions
  ) {}

  async refresh(): Promise<RoutingHints> {
    let snapshot: TelemetrySnapshot;
    try {
      snapshot = await this.source.fetchSnapshot();
    } catch (error) {
      const structured = wrapError(error, ErrorCode.TELEMETRY_UNAVAILABLE, { component: 'TelemetryAggregator' });
      log.degraded('telemetry', `Telemetry pull failed, assuming normal load: ${structured.message}`);
      this.degraded = true;
      this.loadMode = 'normal';
      return this.getHints();
    }

    if (this.degraded) {
      log.recovered('telemetry', 'Telemetry pull succeeded');
      this.degraded = false;
    }

    this.snapshot = snapshot;
    const previous = this.loadMode;
    this.loadMode = snapshot.queued > this.options.highLoadThreshold ? 'high' : 'normal';
    if (previous !== this.loadMode) {
      log.info(`Load mode changed: ${previous} -> ${this.loadMode}`, { queued: snapshot.queued });
    }

    this.applyNudges(snapshot);
    return this.getHints();
  }

  private applyNudges(snapshot: TelemetrySnapshot): void {
    const { successRateFloor, minObservedRuns, demoteDelta, promoteDelta, nudgeTtlMs } = this.options;
    const names = this.registry.names();

    const strugglers = names.filter((name) => {
      const stats = snapshot.providers[name];
      return stats !== undefined && stats.totalRuns >= minObservedRuns && stats.successRate < successRateFloor;
    });

    for (const struggler of strugglers) {
      this.registry.applyPriorityAdjustment(struggler, -demoteDelta, nudgeTtlMs, TELEMETRY_SOURCE);
      for (const peer of names) {
        if (peer !== struggler) {
          this.registry.applyPriorityAdjustment(peer, promoteDelta, nudgeTtlMs, `${TELEMETRY_SOURCE}:${struggler}`);
        }
      }
      log.info(`Demoted ${struggler}: observed success rate below ${successRateFloor}`, {
        successRate: snapshot.providers[struggler]?.successRate,
      });
    }
  }

  getHints(): RoutingHints {
    return { loadMode: this.loadMode, snapshot: this.snapshot };
  }

  getLoadMode(): LoadMode {
    return this.loadMode;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.refresh().catch((error) => {
        log.error('Unexpected telemetry refresh failure', { error: String(error) });
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

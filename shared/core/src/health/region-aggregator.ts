/**
 * Region Health Aggregator
 *
 * Folds per-service samples into one composite score per region and tracks
 * the consecutive-failure counter.
 *
 * composite = Σ weight(s) · score(s) − anomalyPenaltyWeight · max anomaly in cycle
 *
 * Samples arrive through update() during a cycle; closeCycle() ends it. A
 * service with no sample in the closed cycle contributes 0. Between the two,
 * update() returns a provisional composite that reuses the previous cycle's
 * score for services not yet seen. The counter only moves on closeCycle().
 */

import { ValidationError } from '@regionguard/types';
import type { HealthSample, RegionHealth, RegionId, ServiceComponent, ServiceId } from '@regionguard/types';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import { clamp01, scoreSample } from './scoring';

export interface RegionAggregatorConfig {
  /** Criticality weight per monitored service; sums to 1 */
  weights: Readonly<Record<ServiceId, number>>;
  healthThreshold: number;
  responseTimeThresholdMs: number;
  anomalyPenaltyWeight: number;
  logger?: ILogger;
}

interface CycleReading {
  score: number;
  anomalyScore: number;
  timestamp: number;
}

interface RegionState {
  cycle: Map<ServiceId, CycleReading>;
  maxAnomaly: number;
  previous: Readonly<Record<ServiceId, ServiceComponent>>;
  consecutiveFailures: number;
  lastUpdated: number;
}

export class RegionHealthAggregator {
  private readonly states = new Map<RegionId, RegionState>();
  private readonly latest = new Map<RegionId, RegionHealth>();
  private readonly logger: ILogger;

  constructor(private readonly config: RegionAggregatorConfig) {
    this.logger = config.logger ?? createLogger('region-aggregator');
  }

  /**
   * Fold one sample into its region's open cycle.
   *
   * @throws ValidationError for a service without a configured weight
   */
  update(sample: HealthSample, anomalyScore = 0): RegionHealth {
    if (this.config.weights[sample.service] === undefined) {
      throw new ValidationError(`No weight configured for service "${sample.service}"`, { field: 'service' });
    }

    const state = this.stateFor(sample.region);
    const anomaly = clamp01(anomalyScore);
    state.cycle.set(sample.service, {
      score: scoreSample(sample, this.config.responseTimeThresholdMs),
      anomalyScore: anomaly,
      timestamp: sample.timestamp,
    });
    state.maxAnomaly = Math.max(state.maxAnomaly, anomaly);
    state.lastUpdated = Math.max(state.lastUpdated, sample.timestamp);

    return this.build(sample.region, state, true);
  }

  /**
   * End the region's cycle: unsampled services count as 0 and the
   * consecutive-failure counter advances or resets.
   */
  closeCycle(region: RegionId, timestamp: number): RegionHealth {
    const state = this.stateFor(region);
    state.lastUpdated = Math.max(state.lastUpdated, timestamp);

    const provisional = this.build(region, state, false);
    state.consecutiveFailures = provisional.compositeScore < this.config.healthThreshold
      ? state.consecutiveFailures + 1
      : 0;

    const closed = freezeHealth({ ...provisional, consecutiveFailures: state.consecutiveFailures });
    this.latest.set(region, closed);

    const missing = Object.values(closed.components).filter(c => !c.sampled).map(c => c.service);
    if (missing.length > 0) {
      this.logger.warn('Services missing from cycle, scored as 0', { region, services: missing });
    }
    this.logger.debug('Region cycle closed', {
      region,
      compositeScore: closed.compositeScore,
      consecutiveFailures: closed.consecutiveFailures,
      maxAnomalyScore: closed.maxAnomalyScore,
    });

    state.previous = closed.components;
    state.cycle = new Map();
    state.maxAnomaly = 0;
    return closed;
  }

  /**
   * Latest closed snapshot for a region.
   */
  snapshot(region: RegionId): RegionHealth | undefined {
    return this.latest.get(region);
  }

  snapshots(): RegionHealth[] {
    return [...this.latest.values()];
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private stateFor(region: RegionId): RegionState {
    let state = this.states.get(region);
    if (!state) {
      state = { cycle: new Map(), maxAnomaly: 0, previous: {}, consecutiveFailures: 0, lastUpdated: 0 };
      this.states.set(region, state);
    }
    return state;
  }

  private build(region: RegionId, state: RegionState, usePrevious: boolean): RegionHealth {
    const components: Record<ServiceId, ServiceComponent> = {};
    let weighted = 0;

    for (const [service, weight] of Object.entries(this.config.weights)) {
      const reading = state.cycle.get(service);
      const fallback = usePrevious ? state.previous[service] : undefined;
      const score = reading?.score ?? fallback?.score ?? 0;

      components[service] = Object.freeze({
        service,
        score,
        weight,
        anomalyScore: reading?.anomalyScore ?? 0,
        sampled: reading !== undefined,
        timestamp: reading?.timestamp ?? state.lastUpdated,
      });
      weighted += weight * score;
    }

    return freezeHealth({
      region,
      compositeScore: clamp01(weighted - this.config.anomalyPenaltyWeight * state.maxAnomaly),
      components,
      maxAnomalyScore: state.maxAnomaly,
      consecutiveFailures: state.consecutiveFailures,
      lastUpdated: state.lastUpdated,
    });
  }
}

function freezeHealth(health: RegionHealth): RegionHealth {
  Object.freeze(health.components);
  return Object.freeze(health);
}

/**
 * Anomaly Scorer
 *
 * Keeps one outlier model per (service, region) signal, feeds it the samples
 * that arrived since the last fit, and scores the newest sample.
 *
 * Features:
 * - Neutral score (0) until a signal has minSamples samples
 * - Model failures are caught and degrade to 0; the first one per signal is
 *   logged as a warning, repeats stay quiet until a fit succeeds again
 * - Latest score per signal retained for queries
 */

import type { AnomalyScore, RegionId, ServiceId } from '@regionguard/types';
import { createLogger, getErrorMessage, sampleKey } from '@regionguard/core';
import type { ILogger, SampleWindowSource } from '@regionguard/core';
import { sampleFeatures } from './feature-math';
import { IsolationForest } from './isolation-forest';
import type { IsolationForestConfig, OutlierScorer } from './scorer-types';

export interface AnomalyScorerConfig {
  /** Samples required before a signal is scored (default: 5) */
  minSamples?: number;
  /** Model factory, one call per signal (default: IsolationForest) */
  createModel?: () => OutlierScorer;
  /** Used by the default factory */
  forest?: IsolationForestConfig;
}

interface SignalState {
  model: OutlierScorer;
  lastFitTimestamp: number;
  warned: boolean;
  latest?: AnomalyScore;
}

export class AnomalyScorer {
  private readonly signals = new Map<string, SignalState>();
  private readonly minSamples: number;
  private readonly createModel: () => OutlierScorer;
  private readonly logger: ILogger;

  constructor(
    private readonly source: SampleWindowSource,
    config: AnomalyScorerConfig = {},
    logger?: ILogger
  ) {
    this.minSamples = config.minSamples ?? 5;
    const forest = config.forest;
    this.createModel = config.createModel ?? (() => new IsolationForest(forest));
    this.logger = logger ?? createLogger('anomaly-scorer');
  }

  /**
   * Score the newest sample of a signal. Never throws.
   */
  score(service: ServiceId, region: RegionId, timestamp: number): AnomalyScore {
    const key = sampleKey(service, region);
    const state = this.stateFor(key);
    const result = (score: number): AnomalyScore => {
      const anomaly: AnomalyScore = Object.freeze({ service, region, timestamp, score });
      state.latest = anomaly;
      return anomaly;
    };

    const window = [...this.source.window(service, region)];
    const newest = window[window.length - 1];
    if (!newest || window.length < this.minSamples) {
      return result(0);
    }

    try {
      const fresh = window.filter(sample => sample.timestamp > state.lastFitTimestamp);
      if (fresh.length > 0) {
        state.lastFitTimestamp = fresh[fresh.length - 1].timestamp;
        state.model.partialFit(fresh.map(sampleFeatures));
      }
      const score = state.model.score(sampleFeatures(newest));
      state.warned = false;
      return result(score);
    } catch (error) {
      if (!state.warned) {
        state.warned = true;
        this.logger.warn('Anomaly model failed, using neutral score', {
          service,
          region,
          error: getErrorMessage(error),
        });
      }
      return result(0);
    }
  }

  latest(service: ServiceId, region: RegionId): AnomalyScore | undefined {
    return this.signals.get(sampleKey(service, region))?.latest;
  }

  private stateFor(key: string): SignalState {
    let state = this.signals.get(key);
    if (!state) {
      state = { model: this.createModel(), lastFitTimestamp: Number.NEGATIVE_INFINITY, warned: false };
      this.signals.set(key, state);
    }
    return state;
  }
}

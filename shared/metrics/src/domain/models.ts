/**
 * Domain Models for Metrics Collection
 *
 * Value objects for published observations and the catalog of metrics the
 * decision engine emits.
 *
 * @module metrics/domain
 */

import type { MetricDimensions } from '@regionguard/types';

export type MetricType = 'gauge' | 'counter';

/**
 * Value Object: Metric Value
 *
 * Immutable representation of a single metric observation.
 */
export class MetricValue {
  private constructor(
    public readonly name: string,
    public readonly type: MetricType,
    public readonly value: number,
    public readonly labels: Readonly<MetricDimensions>,
    public readonly timestamp: number
  ) {
    Object.freeze(this);
  }

  static gauge(name: string, value: number, labels: MetricDimensions = {}, timestamp: number = Date.now()): MetricValue {
    return new MetricValue(name, 'gauge', value, Object.freeze({ ...labels }), timestamp);
  }

  static counter(name: string, value: number, labels: MetricDimensions = {}, timestamp: number = Date.now()): MetricValue {
    return new MetricValue(name, 'counter', value, Object.freeze({ ...labels }), timestamp);
  }

  /**
   * Series identity: name plus labels sorted by key.
   */
  getSeriesKey(): string {
    const labelStr = Object.keys(this.labels)
      .sort()
      .map(k => `${k}=${this.labels[k]}`)
      .join(',');
    return `${this.name}|${labelStr}`;
  }

  toString(): string {
    const labelStr = Object.entries(this.labels)
      .map(([k, v]) => `${k}="${v}"`)
      .join(',');
    const qualified = labelStr ? `${this.name}{${labelStr}}` : this.name;
    return `${qualified} = ${this.value} @ ${this.timestamp}`;
  }
}

export interface MetricDefinition {
  type: MetricType;
  help: string;
}

/**
 * Metrics published by the decision engine each cycle.
 */
export const ENGINE_METRICS = {
  region_composite_score: { type: 'gauge', help: 'Weighted composite health score of a region (0-1)' },
  region_consecutive_failures: { type: 'gauge', help: 'Consecutive cycles the region scored below the health threshold' },
  region_cascade_risk: { type: 'gauge', help: 'Worst cascade risk among services of a region (0-1)' },
  service_health_score: { type: 'gauge', help: 'Normalized per-service health score (0-1)' },
  service_anomaly_score: { type: 'gauge', help: 'Outlier score of the newest sample (0-1)' },
  service_success_ratio: { type: 'gauge', help: 'Success ratio reported by the probe' },
  service_latency_ms: { type: 'gauge', help: 'Probe response time in milliseconds' },
  failover_state: { type: 'gauge', help: 'Failover state of a traffic group (1 for the current state)' },
} satisfies Record<string, MetricDefinition>;

export type EngineMetricName = keyof typeof ENGINE_METRICS;

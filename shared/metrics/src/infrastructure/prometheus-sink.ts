/**
 * PrometheusMetricsSink - Infrastructure Layer
 *
 * MetricsSink that keeps the latest value of every series in memory and
 * renders them in the Prometheus text exposition format for /metrics.
 *
 * @see https://prometheus.io/docs/instrumenting/exposition_formats/
 *
 * @module metrics/infrastructure
 */

import type { MetricDimensions, MetricsSink } from '@regionguard/types';
import { MetricValue } from '../domain/models';
import type { MetricDefinition } from '../domain/models';

export interface PrometheusSinkConfig {
  /** Prepended to every metric name (default: 'regionguard_') */
  metricPrefix?: string;
  /** Labels added to every series */
  defaultLabels?: MetricDimensions;
  /** Append the observation timestamp to each sample line */
  includeTimestamps?: boolean;
  /** HELP/TYPE metadata per unprefixed metric name */
  definitions?: Record<string, MetricDefinition>;
}

export function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

export function formatMetricName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_');
}

export class PrometheusMetricsSink implements MetricsSink {
  private readonly series = new Map<string, MetricValue>();
  private readonly metricPrefix: string;
  private readonly defaultLabels: MetricDimensions;
  private readonly includeTimestamps: boolean;
  private readonly definitions: Record<string, MetricDefinition>;

  constructor(config: PrometheusSinkConfig = {}) {
    this.metricPrefix = config.metricPrefix ?? 'regionguard_';
    this.defaultLabels = config.defaultLabels ?? {};
    this.includeTimestamps = config.includeTimestamps ?? false;
    this.definitions = config.definitions ?? {};
  }

  async publish(metricName: string, value: number, dimensions: MetricDimensions, timestamp: number): Promise<void> {
    const metric = MetricValue.gauge(metricName, value, dimensions, timestamp);
    this.series.set(metric.getSeriesKey(), metric);
  }

  /**
   * Current value of one series, if published.
   */
  get(metricName: string, dimensions: MetricDimensions = {}): number | undefined {
    return this.series.get(MetricValue.gauge(metricName, 0, dimensions, 0).getSeriesKey())?.value;
  }

  /**
   * Render every series, grouped by metric name:
   *
   * # HELP metric_name Description of metric
   * # TYPE metric_name gauge
   * metric_name{label="value"} 0.93
   */
  render(): string {
    const grouped = new Map<string, MetricValue[]>();
    for (const metric of this.series.values()) {
      const list = grouped.get(metric.name) ?? [];
      list.push(metric);
      grouped.set(metric.name, list);
    }

    const lines: string[] = [];
    for (const rawName of [...grouped.keys()].sort()) {
      const name = formatMetricName(this.metricPrefix + rawName);
      const definition = this.definitions[rawName];
      lines.push(`# HELP ${name} ${definition?.help ?? `${rawName} metric`}`);
      lines.push(`# TYPE ${name} ${definition?.type ?? 'gauge'}`);

      const metrics = grouped.get(rawName) ?? [];
      for (const metric of metrics.sort((a, b) => a.getSeriesKey().localeCompare(b.getSeriesKey()))) {
        const timestamp = this.includeTimestamps ? ` ${metric.timestamp}` : '';
        lines.push(`${name}${this.formatLabels(metric.labels)} ${metric.value}${timestamp}`);
      }
      lines.push('');
    }
    return lines.join('\n');
  }

  clear(): void {
    this.series.clear();
  }

  private formatLabels(labels: Readonly<MetricDimensions>): string {
    const entries = Object.entries({ ...this.defaultLabels, ...labels });
    if (entries.length === 0) {
      return '';
    }
    return `{${entries.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`).join(',')}}`;
  }
}

import type { MetricDimensions, MetricsSink } from '@regionguard/types';
import type { ILogger } from '@regionguard/core';

/**
 * MetricsSink that writes each observation to the log at debug level.
 */
export class LoggingMetricsSink implements MetricsSink {
  constructor(private readonly logger: ILogger) {}

  async publish(metricName: string, value: number, dimensions: MetricDimensions, timestamp: number): Promise<void> {
    this.logger.debug('metric', { metric: metricName, value, ...dimensions, timestamp });
  }
}

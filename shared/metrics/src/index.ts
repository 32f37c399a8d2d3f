/**
 * @regionguard/metrics - Metrics Publishing
 *
 * MetricsSink implementations and the catalog of engine metrics.
 */

// Domain Layer
export * from './domain';

// Infrastructure Layer
export * from './infrastructure';

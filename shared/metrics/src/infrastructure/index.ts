/**
 * Metrics Infrastructure Layer
 *
 * @module metrics/infrastructure
 */

export * from './prometheus-sink';
export * from './logging-sink';

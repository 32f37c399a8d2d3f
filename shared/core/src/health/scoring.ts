import type { HealthSample } from '@regionguard/types';

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Normalized score of one sample.
 *
 * Unreachable -> 0. Otherwise the success ratio, scaled down by
 * `threshold / latency` once latency exceeds the response-time threshold.
 */
export function scoreSample(sample: HealthSample, responseTimeThresholdMs: number): number {
  if (!sample.reachable) return 0;
  const latencyFactor = sample.latencyMs <= responseTimeThresholdMs ? 1 : responseTimeThresholdMs / sample.latencyMs;
  return clamp01(sample.successRatio * latencyFactor);
}

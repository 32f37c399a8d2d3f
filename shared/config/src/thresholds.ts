/**
 * Decision Thresholds and Engine Defaults
 *
 * Defaults applied when the topology file and environment leave a value unset.
 */

// =============================================================================
// HEALTH THRESHOLDS
// =============================================================================
export const HEALTH_THRESHOLDS = {
  health: 0.7,
  warning: 0.85,
  responseTimeMs: 5000,
  consecutiveFailures: 3,
  /** Anomaly score above which a stable group turns degraded */
  anomalyDegrade: 0.8,
  /** Cascade risk above which a group fails regardless of counters */
  cascadeFail: 0.9,
} as const;

// =============================================================================
// ENGINE DEFAULTS
// =============================================================================
export const ENGINE_DEFAULTS = {
  pollingIntervalMs: 30000,
  cooldownCycles: 5,
  anomalyPenaltyWeight: 0.2,
  autoFailback: false,
  sampleWindowSize: 20,
} as const;

export const ANOMALY_DEFAULTS = {
  minSamples: 5,
  trees: 64,
  subsampleSize: 16,
  maxBufferedRows: 256,
  seed: 42,
} as const;

export const CASCADE_DEFAULTS = {
  maxDepth: 3,
  /** Aggregate risk that raises a warning alert */
  alertThreshold: 0.7,
} as const;

export const PROBE_DEFAULTS = {
  concurrency: 8,
} as const;

export const CONTROL_PLANE_DEFAULTS = {
  /** Per-request abort deadline for the control-plane gateway */
  timeoutMs: 10000,
} as const;

export const REMEDIATION_DEFAULTS = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryPartialEachCycle: true,
} as const;

export const ALERT_DEFAULTS = {
  cooldownMs: 300000, // 5 minutes
} as const;

export const API_DEFAULTS = {
  port: 3400,
} as const;

/** Tolerance when checking that service weights sum to 1 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

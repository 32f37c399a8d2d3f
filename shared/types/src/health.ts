/**
 * Health Signal Types
 *
 * Samples, derived scores and region-level health snapshots that flow from
 * the probes through aggregation and cascade analysis.
 */

/** Identifier of a monitored service, e.g. "api" or "database". */
export type ServiceId = string;

/** Identifier of a deployment region, e.g. "us-east-1". */
export type RegionId = string;

/**
 * Normalized reading returned by a probe adapter for one (service, region) pair.
 */
export interface ProbeReading {
  /** Fraction of successful checks in [0, 1] */
  successRatio: number;
  /** Observed response time in milliseconds */
  latencyMs: number;
  /** Whether the endpoint answered at all */
  reachable: boolean;
}

/**
 * A single health observation. Frozen once recorded in the sample store.
 */
export interface HealthSample extends Readonly<ProbeReading> {
  readonly service: ServiceId;
  readonly region: RegionId;
  readonly timestamp: number;
  /** Set on synthetic zero-score samples produced when a probe fails or times out */
  readonly failureReason?: string;
}

/**
 * Outlier score for the newest sample of one signal. 0 means "no anomaly signal".
 */
export interface AnomalyScore {
  readonly service: ServiceId;
  readonly region: RegionId;
  readonly timestamp: number;
  readonly score: number;
}

/**
 * Contribution of one service to its region's composite score.
 */
export interface ServiceComponent {
  readonly service: ServiceId;
  /** Per-service normalized score in [0, 1] */
  readonly score: number;
  /** Configured criticality weight */
  readonly weight: number;
  /** Anomaly score fed with the sample (0 when none) */
  readonly anomalyScore: number;
  /** False when no sample arrived for the service in the closed cycle */
  readonly sampled: boolean;
  readonly timestamp: number;
}

/**
 * Region-level health. Callers always receive frozen snapshots.
 */
export interface RegionHealth {
  readonly region: RegionId;
  /** Weighted composite in [0, 1] */
  readonly compositeScore: number;
  readonly components: Readonly<Record<ServiceId, ServiceComponent>>;
  /** Maximum anomaly score observed in the current cycle */
  readonly maxAnomalyScore: number;
  readonly consecutiveFailures: number;
  readonly lastUpdated: number;
}

/**
 * Static dependency between services: a failure of `upstream` threatens `downstream`.
 */
export interface DependencyEdge {
  readonly upstream: ServiceId;
  readonly downstream: ServiceId;
  /** Criticality of the dependency in (0, 1] */
  readonly weight: number;
}

/**
 * Estimated risk that a service degrades because of failing upstream services.
 */
export interface CascadeRisk {
  readonly region: RegionId;
  /** Upstream service with the strongest contribution */
  readonly originatingService: ServiceId;
  readonly affectedService: ServiceId;
  /** Risk in [0, 1] */
  readonly riskScore: number;
  /** Every failing upstream service that reaches the affected service */
  readonly contributors: readonly ServiceId[];
}

/**
 * @regionguard/core - Core Library
 *
 * The decision pipeline (sample store, aggregation, cascade analysis, the
 * failover state machine and remediation) plus the shared infrastructure
 * every service uses: logging, error handling, retry and lifecycle helpers.
 *
 * @module @regionguard/core
 */

// =============================================================================
// Logging
// =============================================================================

export { createLogger, getLogger, resetLoggerCache, RecordingLogger, NullLogger } from './logging';
export type { ILogger, LogLevel, LogMeta, LoggerConfig, LogEntry } from './logging';

// =============================================================================
// Resilience & Async
// =============================================================================

export * from './resilience';
export * from './async';
export { clearIntervalSafe, clearTimeoutSafe } from './lifecycle-utils';

export { setupServiceShutdown, runServiceMain, closeServer } from './service-lifecycle/service-bootstrap';
export type {
  ServiceShutdownConfig,
  ServiceShutdownCleanup,
  RunServiceMainConfig,
} from './service-lifecycle/service-bootstrap';

// =============================================================================
// Health
// =============================================================================

export { HealthSampleStore, sampleKey } from './health/sample-store';
export type { SampleWindowSource } from './health/sample-store';
export { clamp01, scoreSample } from './health/scoring';
export { RegionHealthAggregator } from './health/region-aggregator';
export type { RegionAggregatorConfig } from './health/region-aggregator';

// =============================================================================
// Cascade
// =============================================================================

export { CascadeRiskAnalyzer, aggregateRisk } from './cascade/cascade-analyzer';
export type { CascadeAnalyzerConfig } from './cascade/cascade-analyzer';

// =============================================================================
// Failover
// =============================================================================

export { FailoverStateMachine } from './failover/state-machine';
export type {
  FailoverStateMachineConfig,
  StateMachineThresholds,
  CycleView,
  GroupAlert,
  GroupEvaluation,
  GroupStatus,
} from './failover/state-machine';

// =============================================================================
// Remediation
// =============================================================================

export { planActions, createDecision, decisionKey, renderTemplate, actionId } from './remediation/action-planner';
export type { DecisionInput } from './remediation/action-planner';
export { InMemoryActionOutcomeLog, hasSucceeded, attemptCount } from './remediation/outcome-log';
export type { ActionOutcomeLog } from './remediation/outcome-log';
export { RedisActionOutcomeLog, createOutcomeStreamClient } from './remediation/redis-outcome-log';
export type { OutcomeStreamClient, RedisOutcomeLogOptions } from './remediation/redis-outcome-log';
export { RemediationExecutor } from './remediation/executor';
export type { ControlPlanes, ExecutorRetryPolicy, RemediationExecutorConfig } from './remediation/executor';

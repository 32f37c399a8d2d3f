/**
 * Decision Engine Types
 *
 * Event payloads, cycle reports and status views shared by the engine, the
 * HTTP API and the live stream.
 */

import type {
  AlertSeverity,
  FailoverDecision,
  RegionHealth,
  RegionId,
  RemediationReport,
  StandingAlert,
  StateTransition,
} from '@regionguard/types';
import type { GroupStatus } from '@regionguard/core';

// =============================================================================
// Cycle
// =============================================================================

export interface CycleReport {
  timestamp: number;
  /** True when a newer cycle committed first and this one was discarded */
  superseded: boolean;
  samples: number;
  probeFailures: number;
  regions: RegionHealth[];
  /** Aggregate cascade risk per region */
  cascadeRisk: Record<RegionId, number>;
  transitions: StateTransition[];
  decisions: FailoverDecision[];
  remediation: RemediationReport[];
  durationMs: number;
}

// =============================================================================
// Events
// =============================================================================

export type EngineEvent =
  | { type: 'transition'; transition: StateTransition }
  | { type: 'decision'; decision: FailoverDecision }
  | { type: 'remediation'; report: RemediationReport }
  | { type: 'cycle'; report: CycleReport };

export type EngineEventType = EngineEvent['type'];

export type EngineListener = (event: EngineEvent) => void;

// =============================================================================
// Alerts & Status
// =============================================================================

/**
 * An alert as delivered to the configured sink, kept for the API.
 */
export interface AlertRecord {
  id: number;
  severity: AlertSeverity;
  message: string;
  context: Record<string, unknown>;
  timestamp: number;
}

export interface EngineStatus {
  running: boolean;
  cyclesCompleted: number;
  lastCycleAt?: number;
  regions: RegionHealth[];
  groups: GroupStatus[];
  standingAlerts: StandingAlert[];
}

// =============================================================================
// HTTP
// =============================================================================

/** The subset of fetch the adapters use; tests pass a fake. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);

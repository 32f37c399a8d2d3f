/**
 * API Types for the Decision Engine Service
 *
 * Defines what route handlers may read from and ask of the engine, so routes
 * can be tested against a stand-in provider.
 */

import type {
  FailoverDecision,
  RegionHealth,
  RegionId,
  RemediationReport,
  StandingAlert,
} from '@regionguard/types';
import type { GroupStatus } from '@regionguard/core';
import type { AlertRecord, EngineListener, EngineStatus } from '../types';

// =============================================================================
// State Provider Interface
// =============================================================================

/**
 * Implemented by DecisionEngine.
 */
export interface EngineStateProvider {
  isRunning(): boolean;

  getStatus(): EngineStatus;

  listRegionHealth(): RegionHealth[];

  getRegionHealth(region: RegionId): RegionHealth | undefined;

  listGroupStatuses(): GroupStatus[];

  hasGroup(groupId: string): boolean;

  /** @throws ValidationError (NOT_FOUND) for an unknown group */
  getGroupStatus(groupId: string): GroupStatus;

  /**
   * Manual failover through the executor's idempotent path.
   *
   * @throws ValidationError when the group or regions don't fit
   */
  triggerFailover(groupId: string, fromRegion: RegionId, toRegion: RegionId, reason: string): Promise<FailoverDecision>;

  getRemediationReport(decisionKey: string): RemediationReport | undefined;

  getStandingAlerts(): StandingAlert[];

  /** @returns false when no standing alert exists for the key */
  acknowledgeAlert(decisionKey: string): boolean;

  getAlertHistory(limit?: number): AlertRecord[];

  /** @returns unsubscribe function */
  subscribe(listener: EngineListener): () => void;
}

/**
 * Renders the metrics exposition served on /metrics.
 */
export interface MetricsRenderer {
  render(): string;
}

// ===========================================================================
// Logger
// ===========================================================================

/**
 * Minimal logger interface for route handlers and middleware.
 *
 * The debug method is optional because HTTP routes typically only need
 * info/warn/error for user-facing operations.
 */
export interface MinimalLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  debug?: (message: string, meta?: Record<string, unknown>) => void;
}

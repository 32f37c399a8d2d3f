/**
 * Failover Types
 *
 * Traffic groups, state machine states, decisions and the append-only
 * remediation outcome records.
 */

import type { RegionId } from './health';

// =============================================================================
// Traffic Groups
// =============================================================================

/**
 * DNS record repointed on failover. `targetTemplate` may contain `{region}`.
 */
export interface DnsRouting {
  readonly zone: string;
  readonly recordName: string;
  readonly targetTemplate: string;
}

/**
 * CDN distribution whose origin is switched on failover.
 */
export interface CdnRouting {
  readonly distributionId: string;
  readonly originTemplate: string;
}

/**
 * Capacity added to the target region on failover.
 */
export interface ScalingPolicy {
  readonly targetTemplate: string;
  readonly delta: number;
}

/**
 * A named routing unit with one primary region and ordered candidate secondaries.
 */
export interface TrafficGroup {
  readonly id: string;
  readonly primaryRegion: RegionId;
  /** Candidate targets in declared priority order */
  readonly secondaryRegions: readonly RegionId[];
  readonly dns?: DnsRouting;
  readonly cdn?: CdnRouting;
  readonly scaling?: ScalingPolicy;
}

// =============================================================================
// State Machine
// =============================================================================

export type FailoverState = 'stable' | 'degraded' | 'failing' | 'failed_over' | 'recovering';

/**
 * Scores that triggered (or were observed during) a transition.
 */
export interface TransitionScores {
  readonly region: RegionId;
  readonly compositeScore: number;
  readonly consecutiveFailures: number;
  readonly anomalyScore: number;
  readonly cascadeRisk: number;
}

export interface StateTransition {
  readonly trafficGroup: string;
  readonly from: FailoverState;
  readonly to: FailoverState;
  readonly reason: string;
  readonly timestamp: number;
  /** Region serving the group after the transition */
  readonly activeRegion: RegionId;
  readonly scores?: TransitionScores;
}

// =============================================================================
// Decisions & Remediation
// =============================================================================

export type RemediationAction =
  | { readonly kind: 'dns'; readonly zone: string; readonly name: string; readonly newTarget: string }
  | { readonly kind: 'cdn'; readonly distributionId: string; readonly newOrigin: string }
  | { readonly kind: 'scaling'; readonly target: string; readonly delta: number };

export type ActionKind = RemediationAction['kind'];

/** Fixed execution order of action kinds within a decision. */
export const ACTION_ORDER: readonly ActionKind[] = ['dns', 'cdn', 'scaling'];

export type DecisionKind = 'failover' | 'failback' | 'manual';

/**
 * Immutable instruction to move a traffic group between regions.
 */
export interface FailoverDecision {
  /** `${trafficGroup}:${timestamp}` */
  readonly idempotencyKey: string;
  readonly trafficGroup: string;
  readonly fromRegion: RegionId;
  readonly toRegion: RegionId;
  readonly reason: string;
  readonly timestamp: number;
  readonly kind: DecisionKind;
  readonly actions: readonly RemediationAction[];
}

/**
 * One attempt at one action. Records are only ever appended.
 */
export interface ActionOutcome {
  readonly decisionKey: string;
  /** `${index}:${kind}` within the decision's action list */
  readonly actionId: string;
  readonly kind: ActionKind;
  readonly success: boolean;
  /** Number of earlier attempts of the same action (0 on the first try) */
  readonly retryCount: number;
  readonly error?: string;
  readonly timestamp: number;
}

export type RemediationStatus = 'applied' | 'partially_applied';

export interface RemediationReport {
  readonly decisionKey: string;
  readonly status: RemediationStatus;
  /** External calls made during this run */
  readonly attempts: number;
  /** Actions skipped because the log already holds a success */
  readonly skipped: number;
  readonly failedActions: readonly string[];
}

/**
 * Critical alert raised for a partially applied decision. Cleared on
 * acknowledgement or when a later retry succeeds.
 */
export interface StandingAlert {
  readonly decisionKey: string;
  readonly trafficGroup: string;
  readonly message: string;
  readonly failedActions: readonly string[];
  readonly raisedAt: number;
}

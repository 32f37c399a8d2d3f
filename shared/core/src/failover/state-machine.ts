/**
 * Failover Decision State Machine
 *
 * One machine per traffic group, driven once per polling cycle with the
 * closed region snapshots and cascade risks of that cycle.
 *
 *   stable ──warning──▶ degraded ──failing──▶ failing ──target──▶ failed_over
 *     │                    │                                        │
 *     └──────failing───────┴──▶ failing          cool-down complete ▼
 *                                                               recovering
 *   recovering ──regression──▶ failed_over
 *   recovering ──healthy + autoFailback──▶ stable (reversing decision)
 *
 * A group "fails" when its primary has crossed the consecutive-failure
 * threshold while below the health threshold, or when cascade risk in the
 * primary exceeds cascadeFail. Decisions are only emitted on the
 * failing → failed_over and recovering → stable transitions, plus manual
 * commands.
 */

import { ErrorCode, ValidationError } from '@regionguard/types';
import type {
  FailoverDecision,
  FailoverState,
  RegionHealth,
  RegionId,
  StateTransition,
  TrafficGroup,
  TransitionScores,
} from '@regionguard/types';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import { createDecision } from '../remediation/action-planner';

// =============================================================================
// Types
// =============================================================================

export interface StateMachineThresholds {
  health: number;
  warning: number;
  consecutiveFailures: number;
  anomalyDegrade: number;
  cascadeFail: number;
}

export interface FailoverStateMachineConfig {
  groups: readonly TrafficGroup[];
  thresholds: StateMachineThresholds;
  /** Consecutive healthy primary cycles before leaving failed_over */
  cooldownCycles: number;
  autoFailback: boolean;
  /** Transitions retained per group (default: 10) */
  historyLimit?: number;
  logger?: ILogger;
}

/**
 * Closed state of one cycle, as seen by every group.
 */
export interface CycleView {
  timestamp: number;
  health: ReadonlyMap<RegionId, RegionHealth>;
  /** Aggregate cascade risk per region */
  cascadeRisk: ReadonlyMap<RegionId, number>;
}

export interface GroupAlert {
  severity: 'warning' | 'critical';
  message: string;
  context: Record<string, unknown>;
}

export interface GroupEvaluation {
  trafficGroup: string;
  transitions: StateTransition[];
  decision?: FailoverDecision;
  alerts: GroupAlert[];
}

export interface GroupStatus {
  trafficGroup: string;
  state: FailoverState;
  primaryRegion: RegionId;
  activeRegion: RegionId;
  /** Consecutive healthy primary cycles counted while failed over */
  healthyStreak: number;
  lastDecision?: FailoverDecision;
  history: readonly StateTransition[];
}

interface GroupRuntime {
  group: TrafficGroup;
  state: FailoverState;
  activeRegion: RegionId;
  healthyStreak: number;
  noTargetAlerted: boolean;
  lastEvaluatedAt?: number;
  lastDecision?: FailoverDecision;
  history: StateTransition[];
}

// =============================================================================
// State Machine
// =============================================================================

export class FailoverStateMachine {
  private readonly groups = new Map<string, GroupRuntime>();
  private readonly historyLimit: number;
  private readonly logger: ILogger;

  constructor(private readonly config: FailoverStateMachineConfig) {
    this.historyLimit = config.historyLimit ?? 10;
    this.logger = config.logger ?? createLogger('failover-state-machine');

    for (const group of config.groups) {
      this.groups.set(group.id, {
        group,
        state: 'stable',
        activeRegion: group.primaryRegion,
        healthyStreak: 0,
        noTargetAlerted: false,
        history: [],
      });
    }
  }

  /**
   * Advance one group by one cycle. Cycles at or before the last evaluated
   * timestamp are ignored.
   */
  evaluate(groupId: string, view: CycleView): GroupEvaluation {
    const runtime = this.runtime(groupId);
    const result: GroupEvaluation = { trafficGroup: groupId, transitions: [], alerts: [] };

    if (runtime.lastEvaluatedAt !== undefined && view.timestamp <= runtime.lastEvaluatedAt) {
      this.logger.debug('Ignoring stale cycle', {
        trafficGroup: groupId,
        timestamp: view.timestamp,
        lastEvaluatedAt: runtime.lastEvaluatedAt,
      });
      return result;
    }

    const primaryRegion = runtime.group.primaryRegion;
    const primary = view.health.get(primaryRegion);
    if (!primary) {
      this.logger.debug('No health for primary region, skipping group', { trafficGroup: groupId, primaryRegion });
      return result;
    }
    runtime.lastEvaluatedAt = view.timestamp;

    const scores: TransitionScores = {
      region: primaryRegion,
      compositeScore: primary.compositeScore,
      consecutiveFailures: primary.consecutiveFailures,
      anomalyScore: primary.maxAnomalyScore,
      cascadeRisk: view.cascadeRisk.get(primaryRegion) ?? 0,
    };
    const { warning, anomalyDegrade } = this.config.thresholds;

    switch (runtime.state) {
      case 'stable':
      case 'degraded': {
        const failing = this.failingReason(scores);
        if (failing) {
          this.transition(runtime, 'failing', failing, view.timestamp, scores, result);
          this.attemptFailover(runtime, view, scores, result);
        } else if (runtime.state === 'stable' && (scores.compositeScore < warning || scores.anomalyScore > anomalyDegrade)) {
          const reason = scores.compositeScore < warning
            ? `Composite score ${formatScore(scores.compositeScore)} below warning threshold ${warning}`
            : `Anomaly score ${formatScore(scores.anomalyScore)} above ${anomalyDegrade}`;
          this.transition(runtime, 'degraded', reason, view.timestamp, scores, result);
        } else if (runtime.state === 'degraded' && scores.compositeScore >= warning) {
          this.transition(runtime, 'stable', 'Composite score back above warning threshold', view.timestamp, scores, result);
        }
        break;
      }

      case 'failing': {
        if (this.failingReason(scores)) {
          this.attemptFailover(runtime, view, scores, result);
          break;
        }
        // Primary stopped failing before a target was found; never fail over a recovered region
        runtime.noTargetAlerted = false;
        if (scores.compositeScore < warning || scores.anomalyScore > anomalyDegrade) {
          this.transition(runtime, 'degraded', 'Primary no longer failing but still below warning', view.timestamp, scores, result);
        } else {
          this.transition(runtime, 'stable', 'Primary recovered before a failover target was available', view.timestamp, scores, result);
        }
        break;
      }

      case 'failed_over': {
        runtime.healthyStreak = scores.compositeScore >= warning ? runtime.healthyStreak + 1 : 0;
        if (runtime.healthyStreak >= this.config.cooldownCycles) {
          this.transition(
            runtime,
            'recovering',
            `Primary healthy for ${runtime.healthyStreak} consecutive cycles`,
            view.timestamp,
            scores,
            result
          );
        }
        break;
      }

      case 'recovering': {
        if (scores.compositeScore < warning) {
          runtime.healthyStreak = 0;
          this.transition(runtime, 'failed_over', 'Primary regressed during recovery', view.timestamp, scores, result);
        } else if (this.config.autoFailback) {
          const decision = createDecision({
            group: runtime.group,
            fromRegion: runtime.activeRegion,
            toRegion: primaryRegion,
            reason: 'Automatic fail-back after cool-down',
            timestamp: view.timestamp,
            kind: 'failback',
          });
          runtime.activeRegion = primaryRegion;
          runtime.healthyStreak = 0;
          runtime.lastDecision = decision;
          result.decision = decision;
          this.transition(runtime, 'stable', decision.reason, view.timestamp, scores, result);
        } else {
          this.logger.debug('Recovery complete, awaiting manual fail-back', {
            trafficGroup: groupId,
            activeRegion: runtime.activeRegion,
          });
        }
        break;
      }
    }

    return result;
  }

  /**
   * Move a group by operator command, bypassing thresholds.
   *
   * @throws ValidationError when the group is unknown or the regions don't fit it
   */
  applyManualDecision(
    groupId: string,
    fromRegion: RegionId,
    toRegion: RegionId,
    reason: string,
    timestamp: number
  ): { decision: FailoverDecision; transition: StateTransition } {
    const runtime = this.runtime(groupId);
    const { group } = runtime;

    if (fromRegion !== runtime.activeRegion) {
      throw new ValidationError(
        `Group "${groupId}" is served from ${runtime.activeRegion}, not ${fromRegion}`,
        { field: 'fromRegion', code: ErrorCode.INVALID_STATE }
      );
    }
    if (toRegion !== group.primaryRegion && !group.secondaryRegions.includes(toRegion)) {
      throw new ValidationError(`Region ${toRegion} is not part of group "${groupId}"`, { field: 'toRegion' });
    }
    if (toRegion === fromRegion) {
      throw new ValidationError('Source and target region are the same', { field: 'toRegion' });
    }

    const decision = createDecision({ group, fromRegion, toRegion, reason, timestamp, kind: 'manual' });
    runtime.activeRegion = toRegion;
    runtime.healthyStreak = 0;
    runtime.noTargetAlerted = false;
    runtime.lastDecision = decision;

    const sink: GroupEvaluation = { trafficGroup: groupId, transitions: [], alerts: [] };
    const next: FailoverState = toRegion === group.primaryRegion ? 'stable' : 'failed_over';
    this.transition(runtime, next, `Manual: ${reason}`, timestamp, undefined, sink);
    return { decision, transition: sink.transitions[0] };
  }

  getStatus(groupId: string): GroupStatus {
    const runtime = this.runtime(groupId);
    return {
      trafficGroup: groupId,
      state: runtime.state,
      primaryRegion: runtime.group.primaryRegion,
      activeRegion: runtime.activeRegion,
      healthyStreak: runtime.healthyStreak,
      lastDecision: runtime.lastDecision,
      history: [...runtime.history],
    };
  }

  hasGroup(groupId: string): boolean {
    return this.groups.has(groupId);
  }

  groupIds(): string[] {
    return [...this.groups.keys()];
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private runtime(groupId: string): GroupRuntime {
    const runtime = this.groups.get(groupId);
    if (!runtime) {
      throw new ValidationError(`Unknown traffic group "${groupId}"`, {
        field: 'trafficGroup',
        code: ErrorCode.NOT_FOUND,
      });
    }
    return runtime;
  }

  private failingReason(scores: TransitionScores): string | undefined {
    const { health, consecutiveFailures, cascadeFail } = this.config.thresholds;
    if (scores.consecutiveFailures >= consecutiveFailures && scores.compositeScore < health) {
      return `${scores.consecutiveFailures} consecutive cycles below health threshold ${health}`;
    }
    if (scores.cascadeRisk > cascadeFail) {
      return `Cascade risk ${formatScore(scores.cascadeRisk)} above ${cascadeFail}`;
    }
    return undefined;
  }

  /**
   * Healthiest secondary at or above the health threshold; declared order
   * breaks ties.
   */
  private selectTarget(group: TrafficGroup, view: CycleView): RegionHealth | undefined {
    let best: RegionHealth | undefined;
    for (const region of group.secondaryRegions) {
      const health = view.health.get(region);
      if (!health || health.compositeScore < this.config.thresholds.health) continue;
      if (!best || health.compositeScore > best.compositeScore) {
        best = health;
      }
    }
    return best;
  }

  private attemptFailover(
    runtime: GroupRuntime,
    view: CycleView,
    scores: TransitionScores,
    result: GroupEvaluation
  ): void {
    const target = this.selectTarget(runtime.group, view);
    if (!target) {
      if (!runtime.noTargetAlerted) {
        runtime.noTargetAlerted = true;
        result.alerts.push({
          severity: 'critical',
          message: `Traffic group ${runtime.group.id} is failing and no healthy secondary region is available`,
          context: { trafficGroup: runtime.group.id, primaryRegion: runtime.group.primaryRegion },
        });
      }
      this.logger.warn('No healthy failover target, will retry next cycle', {
        trafficGroup: runtime.group.id,
        candidates: runtime.group.secondaryRegions,
      });
      return;
    }

    const reason = `Failing over to ${target.region} (composite ${formatScore(target.compositeScore)})`;
    const decision = createDecision({
      group: runtime.group,
      fromRegion: runtime.activeRegion,
      toRegion: target.region,
      reason,
      timestamp: view.timestamp,
      kind: 'failover',
    });
    runtime.activeRegion = target.region;
    runtime.healthyStreak = 0;
    runtime.noTargetAlerted = false;
    runtime.lastDecision = decision;
    result.decision = decision;
    this.transition(runtime, 'failed_over', reason, view.timestamp, scores, result);
  }

  private transition(
    runtime: GroupRuntime,
    to: FailoverState,
    reason: string,
    timestamp: number,
    scores: TransitionScores | undefined,
    result: GroupEvaluation
  ): void {
    const transition: StateTransition = Object.freeze({
      trafficGroup: runtime.group.id,
      from: runtime.state,
      to,
      reason,
      timestamp,
      activeRegion: runtime.activeRegion,
      scores: scores ? Object.freeze({ ...scores }) : undefined,
    });

    runtime.state = to;
    runtime.history.push(transition);
    if (runtime.history.length > this.historyLimit) {
      runtime.history.shift();
    }
    result.transitions.push(transition);

    this.logger.info('State transition', {
      trafficGroup: transition.trafficGroup,
      from: transition.from,
      to: transition.to,
      reason,
      activeRegion: transition.activeRegion,
      scores,
    });
  }
}

function formatScore(value: number): string {
  return value.toFixed(3);
}

/**
 * Remediation Executor
 *
 * Applies a decision's actions against the control planes, serially and in
 * order, using the outcome log as the source of truth for what already ran.
 *
 * Features:
 * - Skips actions the log already records as succeeded (replays are safe)
 * - Retries failed actions with exponential backoff up to maxAttempts
 * - Records every attempt, successful or not
 * - Marks a decision partially_applied when an action stays failed and
 *   raises one standing critical alert until acknowledged or resolved
 * - Concurrent apply() calls for the same decision share a single run
 * - Outcomes the log refuses are held in memory, counted on replay and
 *   written again at the start of the decision's next run
 */

import { ActionFailure, ErrorCode } from '@regionguard/types';
import type {
  ActionOutcome,
  AlertSink,
  CdnControlPlane,
  ControlPlaneResult,
  DnsControlPlane,
  FailoverDecision,
  RemediationAction,
  RemediationReport,
  ScalingControlPlane,
  StandingAlert,
} from '@regionguard/types';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import { getErrorMessage } from '../resilience/error-handling';
import { RetryMechanism } from '../resilience/retry-mechanism';
import { actionId } from './action-planner';
import type { ActionOutcomeLog } from './outcome-log';
import { attemptCount, hasSucceeded } from './outcome-log';

// =============================================================================
// Types
// =============================================================================

export interface ControlPlanes {
  dns?: DnsControlPlane;
  cdn?: CdnControlPlane;
  scaling?: ScalingControlPlane;
}

export interface ExecutorRetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface RemediationExecutorConfig {
  controlPlanes: ControlPlanes;
  outcomeLog: ActionOutcomeLog;
  alertSink: AlertSink;
  retry?: Partial<ExecutorRetryPolicy>;
  /** Injected for tests (default: setTimeout-based sleep) */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: ILogger;
}

// =============================================================================
// Executor
// =============================================================================

export class RemediationExecutor {
  private readonly inFlight = new Map<string, Promise<RemediationReport>>();
  private readonly decisions = new Map<string, FailoverDecision>();
  private readonly partial = new Set<string>();
  private readonly standingAlerts = new Map<string, StandingAlert>();
  private readonly acknowledged = new Set<string>();
  private readonly unrecorded = new Map<string, ActionOutcome[]>();
  private readonly retryPolicy: ExecutorRetryPolicy;
  private readonly now: () => number;
  private readonly logger: ILogger;

  constructor(private readonly config: RemediationExecutorConfig) {
    this.retryPolicy = {
      maxAttempts: config.retry?.maxAttempts ?? 3,
      initialDelayMs: config.retry?.initialDelayMs ?? 1000,
      maxDelayMs: config.retry?.maxDelayMs ?? 30000,
      backoffMultiplier: config.retry?.backoffMultiplier ?? 2,
    };
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger('remediation-executor');
  }

  /**
   * Apply a decision. Safe to call any number of times for the same decision.
   */
  apply(decision: FailoverDecision): Promise<RemediationReport> {
    const key = decision.idempotencyKey;
    const running = this.inFlight.get(key);
    if (running) {
      return running;
    }

    const run = this.run(decision).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  /**
   * Re-apply every decision still marked partially_applied.
   */
  async retryPartiallyApplied(): Promise<RemediationReport[]> {
    const pending: FailoverDecision[] = [];
    for (const key of this.partial) {
      const decision = this.decisions.get(key);
      if (decision) pending.push(decision);
    }
    return Promise.all(pending.map(decision => this.apply(decision)));
  }

  /**
   * Clear a standing alert. The decision keeps being retried.
   */
  acknowledge(decisionKey: string): boolean {
    const alert = this.standingAlerts.get(decisionKey);
    if (!alert) {
      return false;
    }
    this.standingAlerts.delete(decisionKey);
    this.acknowledged.add(decisionKey);
    this.logger.info('Standing alert acknowledged', { decisionKey });
    return true;
  }

  getStandingAlerts(): StandingAlert[] {
    return [...this.standingAlerts.values()];
  }

  partiallyApplied(): string[] {
    return [...this.partial];
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async run(decision: FailoverDecision): Promise<RemediationReport> {
    const key = decision.idempotencyKey;
    this.decisions.set(key, decision);
    // Stays in the partial set until every action has a recorded or held success
    const wasPartial = this.partial.has(key);
    this.partial.add(key);

    await this.flushUnrecorded(key);

    let outcomes: ActionOutcome[];
    try {
      outcomes = [...(await this.config.outcomeLog.list(key)), ...(this.unrecorded.get(key) ?? [])];
    } catch (error) {
      this.logger.error('Outcome log unavailable, decision not applied', {
        decisionKey: key,
        error: getErrorMessage(error),
      });
      const pending = this.unrecorded.get(key) ?? [];
      const failedActions = decision.actions
        .map((action, index) => actionId(index, action))
        .filter(id => !hasSucceeded(pending, id));
      const skipped = decision.actions.length - failedActions.length;
      return this.finish(decision, { attempts: 0, skipped, failedActions }, wasPartial);
    }

    let attempts = 0;
    let skipped = 0;
    const failedActions: string[] = [];

    for (let index = 0; index < decision.actions.length; index++) {
      const action = decision.actions[index];
      const id = actionId(index, action);

      if (hasSucceeded(outcomes, id)) {
        skipped++;
        continue;
      }

      const priorAttempts = attemptCount(outcomes, id);
      const call = this.callFor(action);
      if (!call) {
        await this.record(decision, id, action, false, priorAttempts, `No ${action.kind} control plane configured`);
        failedActions.push(id);
        this.logger.error('No control plane for action', { decisionKey: key, actionId: id });
        continue;
      }

      const retry = new RetryMechanism({
        maxAttempts: this.retryPolicy.maxAttempts,
        initialDelay: this.retryPolicy.initialDelayMs,
        maxDelay: this.retryPolicy.maxDelayMs,
        backoffMultiplier: this.retryPolicy.backoffMultiplier,
        jitter: false,
        sleep: this.config.sleep,
        onRetry: (attempt, error, delay) => {
          this.logger.warn('Remediation action failed, retrying', {
            decisionKey: key,
            actionId: id,
            attempt,
            delayMs: delay,
            error: getErrorMessage(error),
          });
        },
      });

      // Only the control-plane call is retried; a success is recorded once, after the loop
      const result = await retry.execute(async attempt => {
        attempts++;
        const failure = await this.invoke(call, action);
        if (failure !== undefined) {
          await this.record(decision, id, action, false, priorAttempts + attempt - 1, failure);
          throw new ActionFailure(failure, { actionId: id, code: ErrorCode.ACTION_FAILED });
        }
      });

      if (result.success) {
        await this.record(decision, id, action, true, priorAttempts + result.attempts - 1);
      } else {
        failedActions.push(id);
        this.logger.error('Remediation action exhausted retries', {
          decisionKey: key,
          actionId: id,
          attempts: result.attempts,
          error: getErrorMessage(result.error),
        });
      }
    }

    return this.finish(decision, { attempts, skipped, failedActions }, wasPartial);
  }

  private async finish(
    decision: FailoverDecision,
    tally: Pick<RemediationReport, 'attempts' | 'skipped' | 'failedActions'>,
    wasPartial: boolean
  ): Promise<RemediationReport> {
    const key = decision.idempotencyKey;
    const report: RemediationReport = {
      decisionKey: key,
      status: tally.failedActions.length > 0 ? 'partially_applied' : 'applied',
      ...tally,
    };

    if (report.status === 'partially_applied') {
      await this.raiseStandingAlert(decision, report.failedActions);
    } else {
      this.resolve(key, wasPartial);
    }

    this.logger.info('Decision remediation finished', {
      decisionKey: key,
      status: report.status,
      attempts: report.attempts,
      skipped: report.skipped,
      failedActions: report.failedActions,
    });
    return report;
  }

  /**
   * Run one control-plane call. Returns the failure message, or undefined on success.
   */
  private async invoke(call: () => Promise<ControlPlaneResult>, action: RemediationAction): Promise<string | undefined> {
    try {
      const response = await call();
      if (response.ok) {
        return undefined;
      }
      return response.message ?? `${action.kind} control plane rejected the change`;
    } catch (error) {
      return getErrorMessage(error);
    }
  }

  private callFor(action: RemediationAction): (() => Promise<ControlPlaneResult>) | undefined {
    const { dns, cdn, scaling } = this.config.controlPlanes;
    switch (action.kind) {
      case 'dns': {
        const { zone, name, newTarget } = action;
        return dns ? () => dns.updateRecord(zone, name, newTarget) : undefined;
      }
      case 'cdn': {
        const { distributionId, newOrigin } = action;
        return cdn ? () => cdn.updateOrigin(distributionId, newOrigin) : undefined;
      }
      case 'scaling': {
        const { target, delta } = action;
        return scaling ? () => scaling.adjustCapacity(target, delta) : undefined;
      }
    }
  }

  private async record(
    decision: FailoverDecision,
    id: string,
    action: RemediationAction,
    success: boolean,
    retryCount: number,
    error?: string
  ): Promise<void> {
    const outcome: ActionOutcome = {
      decisionKey: decision.idempotencyKey,
      actionId: id,
      kind: action.kind,
      success,
      retryCount,
      timestamp: this.now(),
      ...(error !== undefined ? { error } : {}),
    };
    try {
      await this.config.outcomeLog.append(outcome);
    } catch (error) {
      const pending = this.unrecorded.get(outcome.decisionKey) ?? [];
      pending.push(outcome);
      this.unrecorded.set(outcome.decisionKey, pending);
      this.logger.error('Failed to record action outcome', {
        decisionKey: outcome.decisionKey,
        actionId: id,
        success,
        error: getErrorMessage(error),
      });
    }
  }

  private async flushUnrecorded(key: string): Promise<void> {
    const pending = this.unrecorded.get(key);
    if (!pending) {
      return;
    }
    while (pending.length > 0) {
      try {
        await this.config.outcomeLog.append(pending[0]);
        pending.shift();
      } catch (error) {
        this.logger.warn('Outcome log still refusing writes', {
          decisionKey: key,
          pending: pending.length,
          error: getErrorMessage(error),
        });
        return;
      }
    }
    this.unrecorded.delete(key);
  }

  private async raiseStandingAlert(decision: FailoverDecision, failedActions: readonly string[]): Promise<void> {
    const key = decision.idempotencyKey;
    if (this.standingAlerts.has(key) || this.acknowledged.has(key)) {
      return;
    }

    const alert: StandingAlert = {
      decisionKey: key,
      trafficGroup: decision.trafficGroup,
      message: `Decision ${key} (${decision.fromRegion} -> ${decision.toRegion}) partially applied: ${failedActions.join(', ')} failed`,
      failedActions: [...failedActions],
      raisedAt: this.now(),
    };
    this.standingAlerts.set(key, alert);

    try {
      await this.config.alertSink.notify('critical', alert.message, {
        decisionKey: key,
        trafficGroup: decision.trafficGroup,
        failedActions,
      });
    } catch (error) {
      this.logger.error('Failed to deliver standing alert', { decisionKey: key, error: getErrorMessage(error) });
    }
  }

  private resolve(key: string, wasPartial: boolean): void {
    this.partial.delete(key);
    if (wasPartial) {
      this.logger.info('Partially applied decision completed on retry', { decisionKey: key });
    }
    this.standingAlerts.delete(key);
    this.acknowledged.delete(key);
  }
}

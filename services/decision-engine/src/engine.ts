/**
 * Decision Engine
 *
 * Runs the polling cycle that turns probe readings into failover decisions:
 *
 *   probes ─▶ sample store ─▶ anomaly scorer ─▶ region aggregator
 *          ─▶ cascade analyzer ─▶ state machine (per group) ─▶ executor
 *
 * Features:
 * - Probes run through a bounded pool, each under a timeout; failures and
 *   timeouts become zero-score samples
 * - The cycle boundary is a barrier: a cycle whose probes finish after a
 *   newer cycle committed is discarded
 * - Traffic groups are evaluated and remediated concurrently
 * - Decisions left partially applied are retried at the start of each cycle
 * - Events: 'transition', 'decision', 'remediation', 'cycle'
 */

import { EventEmitter } from 'events';
import { ConfigurationError } from '@regionguard/types';
import type {
  AlertSeverity,
  AlertSink,
  FailoverDecision,
  FailoverState,
  HealthSample,
  MetricDimensions,
  MetricsSink,
  ProbeAdapter,
  RegionHealth,
  RegionId,
  RemediationReport,
  ServiceId,
  StandingAlert,
} from '@regionguard/types';
import {
  CascadeRiskAnalyzer,
  FailoverStateMachine,
  HealthSampleStore,
  RegionHealthAggregator,
  RemediationExecutor,
  aggregateRisk,
  clearIntervalSafe,
  createLogger,
  formatErrorForLog,
  getErrorMessage,
  mapConcurrent,
  withTimeout,
} from '@regionguard/core';
import type {
  ActionOutcomeLog,
  ControlPlanes,
  CycleView,
  GroupEvaluation,
  GroupStatus,
  ILogger,
} from '@regionguard/core';
import { monitoredRegions, probeTimeoutMs, serviceWeights } from '@regionguard/config';
import type { EngineConfig } from '@regionguard/config';
import { AnomalyScorer } from '@regionguard/ml';
import type { OutlierScorer } from '@regionguard/ml';
import { AlertCooldownManager } from './alerts/cooldown-manager';
import { AlertHistory } from './alerts/alert-history';
import type { EngineStateProvider } from './api/types';
import type { AlertRecord, CycleReport, EngineEvent, EngineListener, EngineStatus } from './types';

// =============================================================================
// Types
// =============================================================================

export interface DecisionEngineOptions {
  config: EngineConfig;
  /** One adapter per monitored service */
  probes: ReadonlyMap<ServiceId, ProbeAdapter>;
  controlPlanes: ControlPlanes;
  outcomeLog: ActionOutcomeLog;
  alertSink: AlertSink;
  metricsSink?: MetricsSink;
  /** Replaces the isolation-forest model behind the anomaly scorer */
  createModel?: () => OutlierScorer;
  now?: () => number;
  /** Backoff sleep used by the executor */
  sleep?: (ms: number) => Promise<void>;
  logger?: ILogger;
}

interface ProbeTarget {
  service: ServiceId;
  region: RegionId;
  adapter: ProbeAdapter;
}

const FAILOVER_STATES: readonly FailoverState[] = ['stable', 'degraded', 'failing', 'failed_over', 'recovering'];

/** Remediation reports kept for API lookups */
const MAX_REMEMBERED_REPORTS = 100;

// =============================================================================
// Engine
// =============================================================================

export class DecisionEngine extends EventEmitter implements EngineStateProvider {
  private readonly config: EngineConfig;
  private readonly logger: ILogger;
  private readonly now: () => number;
  private readonly store: HealthSampleStore;
  private readonly scorer: AnomalyScorer;
  private readonly aggregator: RegionHealthAggregator;
  private readonly cascade: CascadeRiskAnalyzer;
  private readonly stateMachine: FailoverStateMachine;
  private readonly executor: RemediationExecutor;
  private readonly alerts: AlertHistory;
  private readonly cooldowns: AlertCooldownManager;
  private readonly metricsSink?: MetricsSink;
  private readonly targets: ProbeTarget[] = [];
  private readonly regions: RegionId[];
  private readonly probeTimeout: number;

  private readonly subscribers = new Set<EngineListener>();
  private readonly reports = new Map<string, RemediationReport>();
  private readonly cascadeRisk = new Map<RegionId, number>();
  private readonly inFlight = new Set<Promise<void>>();
  private interval: NodeJS.Timeout | null = null;
  private running = false;
  private lastCommittedAt = Number.NEGATIVE_INFINITY;
  private cyclesCompleted = 0;
  private lastCycleAt: number | undefined;

  constructor(options: DecisionEngineOptions) {
    super();
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createLogger('decision-engine');
    this.now = options.now ?? Date.now;
    this.metricsSink = options.metricsSink;
    this.regions = monitoredRegions(config);
    this.probeTimeout = probeTimeoutMs(config);

    const missing: string[] = [];
    for (const service of config.services) {
      const adapter = options.probes.get(service.name);
      if (!adapter) {
        missing.push(`No probe adapter for service "${service.name}"`);
        continue;
      }
      for (const region of this.regions) {
        this.targets.push({ service: service.name, region, adapter });
      }
    }
    if (missing.length > 0) {
      throw new ConfigurationError('Decision engine is missing probe adapters', missing);
    }

    this.store = new HealthSampleStore(config.sampleWindowSize);
    this.scorer = new AnomalyScorer(
      this.store,
      {
        minSamples: config.anomaly.minSamples,
        createModel: options.createModel,
        forest: {
          trees: config.anomaly.trees,
          subsampleSize: config.anomaly.subsampleSize,
          maxBufferedRows: config.anomaly.maxBufferedRows,
          seed: config.anomaly.seed,
        },
      },
      this.logger.child({ component: 'anomaly-scorer' })
    );
    this.aggregator = new RegionHealthAggregator({
      weights: serviceWeights(config),
      healthThreshold: config.thresholds.health,
      responseTimeThresholdMs: config.thresholds.responseTimeMs,
      anomalyPenaltyWeight: config.anomalyPenaltyWeight,
      logger: this.logger.child({ component: 'region-aggregator' }),
    });
    this.cascade = new CascadeRiskAnalyzer({
      edges: config.dependencies,
      healthThreshold: config.thresholds.health,
      maxDepth: config.cascade.maxDepth,
      logger: this.logger.child({ component: 'cascade-analyzer' }),
    });
    this.stateMachine = new FailoverStateMachine({
      groups: config.trafficGroups,
      thresholds: config.thresholds,
      cooldownCycles: config.cooldownCycles,
      autoFailback: config.autoFailback,
      logger: this.logger.child({ component: 'state-machine' }),
    });
    this.alerts = new AlertHistory(options.alertSink, 200, this.now);
    this.cooldowns = new AlertCooldownManager(this.logger, { cooldownMs: config.alerts.cooldownMs });
    this.executor = new RemediationExecutor({
      controlPlanes: options.controlPlanes,
      outcomeLog: options.outcomeLog,
      alertSink: this.alerts,
      retry: config.remediation,
      sleep: options.sleep,
      now: this.now,
      logger: this.logger.child({ component: 'remediation-executor' }),
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Run one cycle now, then one every pollingIntervalMs.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info('Decision engine started', {
      pollingIntervalMs: this.config.pollingIntervalMs,
      regions: this.regions,
      trafficGroups: this.stateMachine.groupIds(),
      probes: this.targets.length,
    });

    this.tick();
    this.interval = setInterval(() => this.tick(), this.config.pollingIntervalMs);
  }

  /**
   * Stop polling and wait for cycles already running.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.interval = clearIntervalSafe(this.interval);
    await Promise.all([...this.inFlight]);
    this.logger.info('Decision engine stopped', { cyclesCompleted: this.cyclesCompleted });
  }

  isRunning(): boolean {
    return this.running;
  }

  private tick(): void {
    const cycle = this.runCycle().then(
      () => undefined,
      (error: unknown) => {
        this.logger.error('Polling cycle failed', formatErrorForLog(error));
      }
    );
    this.inFlight.add(cycle);
    void cycle.finally(() => this.inFlight.delete(cycle));
  }

  // ===========================================================================
  // Cycle
  // ===========================================================================

  /**
   * Execute one polling cycle stamped with `timestamp`.
   */
  async runCycle(timestamp: number = this.now()): Promise<CycleReport> {
    const started = this.now();
    const remediation: RemediationReport[] = [];

    if (this.config.remediation.retryPartialEachCycle) {
      remediation.push(...(await this.retryOutstanding()));
    }

    const samples = await mapConcurrent(
      this.targets,
      target => this.probe(target, timestamp),
      this.config.probe.concurrency
    );

    // Barrier: from here to group evaluation nothing awaits
    if (timestamp <= this.lastCommittedAt) {
      this.logger.warn('Discarding superseded cycle', { timestamp, lastCommittedAt: this.lastCommittedAt });
      return {
        timestamp,
        superseded: true,
        samples: samples.length,
        probeFailures: samples.filter(s => s.failureReason !== undefined).length,
        regions: [],
        cascadeRisk: {},
        transitions: [],
        decisions: [],
        remediation,
        durationMs: this.now() - started,
      };
    }
    this.lastCommittedAt = timestamp;

    const recorded = samples.map(sample => this.record(sample));
    for (const sample of recorded) {
      const anomaly = this.scorer.score(sample.service, sample.region, timestamp);
      this.aggregator.update(sample, anomaly.score);
    }

    const health = new Map<RegionId, RegionHealth>();
    const cascadeAlerts: Array<Promise<void>> = [];
    for (const region of this.regions) {
      const closed = this.aggregator.closeCycle(region, timestamp);
      health.set(region, closed);

      const risks = this.cascade.assess(region, closed);
      const risk = aggregateRisk(risks);
      this.cascadeRisk.set(region, risk);

      const worst = risks[0];
      if (worst && risk >= this.config.cascade.alertThreshold) {
        cascadeAlerts.push(
          this.raiseAlert(
            'warning',
            `Cascade risk ${risk.toFixed(3)} in ${region}: ${worst.originatingService} threatens ${worst.affectedService}`,
            { region, cascadeRisk: risk, originatingService: worst.originatingService, affectedService: worst.affectedService },
            timestamp,
            AlertCooldownManager.createKey('cascade_risk', region)
          )
        );
      }
    }

    const view: CycleView = { timestamp, health, cascadeRisk: new Map(this.cascadeRisk) };
    const evaluations = this.stateMachine.groupIds().map(id => this.stateMachine.evaluate(id, view));

    const [groupReports] = await Promise.all([
      Promise.all(evaluations.map(evaluation => this.handleEvaluation(evaluation, timestamp))),
      Promise.all(cascadeAlerts),
    ]);
    for (const report of groupReports) {
      if (report) remediation.push(report);
    }

    await this.publishMetrics(timestamp, recorded, health);

    this.cyclesCompleted++;
    this.lastCycleAt = timestamp;

    const report: CycleReport = {
      timestamp,
      superseded: false,
      samples: recorded.length,
      probeFailures: recorded.filter(s => s.failureReason !== undefined).length,
      regions: [...health.values()],
      cascadeRisk: Object.fromEntries(this.cascadeRisk),
      transitions: evaluations.flatMap(e => e.transitions),
      decisions: evaluations.flatMap(e => (e.decision ? [e.decision] : [])),
      remediation,
      durationMs: this.now() - started,
    };
    this.publish({ type: 'cycle', report });
    return report;
  }

  private async probe(target: ProbeTarget, timestamp: number): Promise<HealthSample> {
    const { service, region, adapter } = target;
    try {
      const reading = await withTimeout(
        adapter.checkHealth(service, region),
        this.probeTimeout,
        `${adapter.kind} probe ${service}@${region}`
      );
      return {
        service,
        region,
        timestamp,
        successRatio: reading.successRatio,
        latencyMs: reading.latencyMs,
        reachable: reading.reachable,
      };
    } catch (error) {
      const reason = getErrorMessage(error);
      this.logger.warn('Probe failed, recording zero-score sample', { service, region, probe: adapter.kind, error: reason });
      return this.failureSample(service, region, timestamp, reason);
    }
  }

  private failureSample(service: ServiceId, region: RegionId, timestamp: number, reason: string): HealthSample {
    return {
      service,
      region,
      timestamp,
      successRatio: 0,
      latencyMs: this.probeTimeout,
      reachable: false,
      failureReason: reason,
    };
  }

  /**
   * Store a sample; readings the store rejects are replaced by a failure sample.
   */
  private record(sample: HealthSample): HealthSample {
    try {
      return this.store.record(sample);
    } catch (error) {
      const reason = `Invalid probe reading: ${getErrorMessage(error)}`;
      this.logger.warn('Probe returned an invalid reading, recording zero-score sample', {
        service: sample.service,
        region: sample.region,
        error: reason,
      });
      return this.store.record(this.failureSample(sample.service, sample.region, sample.timestamp, reason));
    }
  }

  private async handleEvaluation(evaluation: GroupEvaluation, timestamp: number): Promise<RemediationReport | undefined> {
    for (const transition of evaluation.transitions) {
      this.publish({ type: 'transition', transition });
    }

    await Promise.all(
      evaluation.alerts.map(alert => this.raiseAlert(alert.severity, alert.message, alert.context, timestamp))
    );

    if (!evaluation.decision) {
      return undefined;
    }
    this.publish({ type: 'decision', decision: evaluation.decision });
    return this.remediate(evaluation.decision);
  }

  private async remediate(decision: FailoverDecision): Promise<RemediationReport | undefined> {
    try {
      const report = await this.executor.apply(decision);
      this.rememberReport(report);
      this.publish({ type: 'remediation', report });
      return report;
    } catch (error) {
      this.logger.error('Remediation failed', { decisionKey: decision.idempotencyKey, error: getErrorMessage(error) });
      return undefined;
    }
  }

  private async retryOutstanding(): Promise<RemediationReport[]> {
    if (this.executor.partiallyApplied().length === 0) {
      return [];
    }
    try {
      const reports = await this.executor.retryPartiallyApplied();
      for (const report of reports) {
        this.rememberReport(report);
        this.publish({ type: 'remediation', report });
      }
      return reports;
    } catch (error) {
      this.logger.error('Retrying partially applied decisions failed', { error: getErrorMessage(error) });
      return [];
    }
  }

  private async raiseAlert(
    severity: AlertSeverity,
    message: string,
    context: Record<string, unknown>,
    timestamp: number,
    cooldownKey?: string
  ): Promise<void> {
    if (cooldownKey && !this.cooldowns.shouldSendAndRecord(cooldownKey, timestamp)) {
      this.logger.debug('Alert suppressed by cooldown', { cooldownKey });
      return;
    }
    try {
      await this.alerts.notify(severity, message, context);
    } catch (error) {
      this.logger.error('Alert delivery failed', { severity, message, error: getErrorMessage(error) });
    }
  }

  private async publishMetrics(
    timestamp: number,
    samples: readonly HealthSample[],
    health: ReadonlyMap<RegionId, RegionHealth>
  ): Promise<void> {
    const sink = this.metricsSink;
    if (!sink) {
      return;
    }

    const pending: Array<Promise<void>> = [];
    const publish = (name: string, value: number, dimensions: MetricDimensions) => {
      pending.push(sink.publish(name, value, dimensions, timestamp));
    };

    for (const sample of samples) {
      const dims = { region: sample.region, service: sample.service };
      publish('service_success_ratio', sample.successRatio, dims);
      publish('service_latency_ms', sample.latencyMs, dims);
    }
    for (const [region, regionHealth] of health) {
      publish('region_composite_score', regionHealth.compositeScore, { region });
      publish('region_consecutive_failures', regionHealth.consecutiveFailures, { region });
      publish('region_cascade_risk', this.cascadeRisk.get(region) ?? 0, { region });
      for (const component of Object.values(regionHealth.components)) {
        publish('service_health_score', component.score, { region, service: component.service });
        publish('service_anomaly_score', component.anomalyScore, { region, service: component.service });
      }
    }
    for (const status of this.listGroupStatuses()) {
      for (const state of FAILOVER_STATES) {
        publish('failover_state', status.state === state ? 1 : 0, { group: status.trafficGroup, state });
      }
    }

    const results = await Promise.allSettled(pending);
    const failed = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed.length > 0) {
      this.logger.warn('Failed to publish metrics', {
        failed: failed.length,
        total: results.length,
        error: getErrorMessage(failed[0].reason),
      });
    }
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Move a group by operator command. Thresholds are bypassed; the decision
   * still goes through the executor's idempotency and retry path.
   *
   * @throws ValidationError when the group or regions don't fit
   */
  async triggerFailover(
    groupId: string,
    fromRegion: RegionId,
    toRegion: RegionId,
    reason: string,
    timestamp: number = this.now()
  ): Promise<FailoverDecision> {
    const { decision, transition } = this.stateMachine.applyManualDecision(groupId, fromRegion, toRegion, reason, timestamp);
    this.logger.info('Manual failover requested', {
      trafficGroup: groupId,
      fromRegion,
      toRegion,
      reason,
      decisionKey: decision.idempotencyKey,
    });
    this.publish({ type: 'transition', transition });
    this.publish({ type: 'decision', decision });

    const report = await this.executor.apply(decision);
    this.rememberReport(report);
    this.publish({ type: 'remediation', report });
    return decision;
  }

  acknowledgeAlert(decisionKey: string): boolean {
    return this.executor.acknowledge(decisionKey);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getRegionHealth(region: RegionId): RegionHealth | undefined {
    return this.aggregator.snapshot(region);
  }

  listRegionHealth(): RegionHealth[] {
    return this.aggregator.snapshots();
  }

  hasGroup(groupId: string): boolean {
    return this.stateMachine.hasGroup(groupId);
  }

  getGroupStatus(groupId: string): GroupStatus {
    return this.stateMachine.getStatus(groupId);
  }

  listGroupStatuses(): GroupStatus[] {
    return this.stateMachine.groupIds().map(id => this.stateMachine.getStatus(id));
  }

  getCascadeRisk(region: RegionId): number {
    return this.cascadeRisk.get(region) ?? 0;
  }

  getRemediationReport(decisionKey: string): RemediationReport | undefined {
    return this.reports.get(decisionKey);
  }

  getStandingAlerts(): StandingAlert[] {
    return this.executor.getStandingAlerts();
  }

  getAlertHistory(limit?: number): AlertRecord[] {
    return this.alerts.list(limit);
  }

  getStatus(): EngineStatus {
    return {
      running: this.running,
      cyclesCompleted: this.cyclesCompleted,
      lastCycleAt: this.lastCycleAt,
      regions: this.listRegionHealth(),
      groups: this.listGroupStatuses(),
      standingAlerts: this.getStandingAlerts(),
    };
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  /**
   * Receive every engine event. Listener errors are logged, never rethrown.
   */
  subscribe(listener: EngineListener): () => void {
    this.subscribers.add(listener);
    return () => {
      this.subscribers.delete(listener);
    };
  }

  private publish(event: EngineEvent): void {
    for (const listener of this.subscribers) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Engine listener failed', { event: event.type, error: getErrorMessage(error) });
      }
    }
    try {
      this.emit(event.type, event);
    } catch (error) {
      this.logger.error('Engine event handler failed', { event: event.type, error: getErrorMessage(error) });
    }
  }

  private rememberReport(report: RemediationReport): void {
    this.reports.delete(report.decisionKey);
    this.reports.set(report.decisionKey, report);
    if (this.reports.size > MAX_REMEMBERED_REPORTS) {
      const oldest = this.reports.keys().next();
      if (!oldest.done) this.reports.delete(oldest.value);
    }
  }
}

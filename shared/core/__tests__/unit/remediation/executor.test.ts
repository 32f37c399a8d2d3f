/**
 * RemediationExecutor Unit Tests
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import type {
  ActionOutcome,
  AlertSink,
  CdnControlPlane,
  ControlPlaneResult,
  DnsControlPlane,
  FailoverDecision,
  ScalingControlPlane,
  TrafficGroup,
} from '@regionguard/types';
import { RemediationExecutor } from '../../../src/remediation/executor';
import type { ControlPlanes } from '../../../src/remediation/executor';
import { InMemoryActionOutcomeLog } from '../../../src/remediation/outcome-log';
import { createDecision } from '../../../src/remediation/action-planner';
import { RecordingLogger } from '../../../src/logging';

const WEB: TrafficGroup = {
  id: 'web',
  primaryRegion: 'us-east-1',
  secondaryRegions: ['eu-west-1'],
  dns: { zone: 'example.com', recordName: 'www', targetTemplate: 'web.{region}.example.com' },
  cdn: { distributionId: 'dist-1', originTemplate: 'origin-{region}.example.com' },
  scaling: { targetTemplate: 'web-{region}', delta: 2 },
};

const OK: ControlPlaneResult = { ok: true };

/**
 * Outcome log that refuses its first `failures` writes.
 */
class FlakyOutcomeLog extends InMemoryActionOutcomeLog {
  constructor(private failures: number) {
    super();
  }

  async append(outcome: ActionOutcome): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('outcome store unavailable');
    }
    return super.append(outcome);
  }
}

function createControlPlanes() {
  const dns = { updateRecord: jest.fn<DnsControlPlane['updateRecord']>().mockResolvedValue(OK) };
  const cdn = { updateOrigin: jest.fn<CdnControlPlane['updateOrigin']>().mockResolvedValue(OK) };
  const scaling = { adjustCapacity: jest.fn<ScalingControlPlane['adjustCapacity']>().mockResolvedValue(OK) };
  return { dns, cdn, scaling };
}

describe('RemediationExecutor', () => {
  let planes: ReturnType<typeof createControlPlanes>;
  let outcomeLog: InMemoryActionOutcomeLog;
  let alertSink: { notify: jest.Mock<AlertSink['notify']> };
  let sleep: jest.Mock<(ms: number) => Promise<void>>;
  let logger: RecordingLogger;
  let decision: FailoverDecision;

  function createExecutor(controlPlanes: ControlPlanes = planes): RemediationExecutor {
    return new RemediationExecutor({
      controlPlanes,
      outcomeLog,
      alertSink,
      retry: { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30000, backoffMultiplier: 2 },
      sleep,
      now: () => 42,
      logger,
    });
  }

  beforeEach(() => {
    planes = createControlPlanes();
    outcomeLog = new InMemoryActionOutcomeLog();
    alertSink = { notify: jest.fn<AlertSink['notify']>().mockResolvedValue(undefined) };
    sleep = jest.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    logger = new RecordingLogger();
    decision = createDecision({
      group: WEB,
      fromRegion: 'us-east-1',
      toRegion: 'eu-west-1',
      reason: 'test failover',
      timestamp: 1000,
      kind: 'failover',
    });
  });

  it('applies every action in order and records each success', async () => {
    const order: string[] = [];
    planes.dns.updateRecord.mockImplementation(async () => { order.push('dns'); return OK; });
    planes.cdn.updateOrigin.mockImplementation(async () => { order.push('cdn'); return OK; });
    planes.scaling.adjustCapacity.mockImplementation(async () => { order.push('scaling'); return OK; });

    const report = await createExecutor().apply(decision);

    expect(report).toEqual({ decisionKey: 'web:1000', status: 'applied', attempts: 3, skipped: 0, failedActions: [] });
    expect(order).toEqual(['dns', 'cdn', 'scaling']);
    expect(planes.dns.updateRecord).toHaveBeenCalledWith('example.com', 'www', 'web.eu-west-1.example.com');
    expect(planes.cdn.updateOrigin).toHaveBeenCalledWith('dist-1', 'origin-eu-west-1.example.com');
    expect(planes.scaling.adjustCapacity).toHaveBeenCalledWith('web-eu-west-1', 2);
    expect(await outcomeLog.list('web:1000')).toEqual([
      { decisionKey: 'web:1000', actionId: '0:dns', kind: 'dns', success: true, retryCount: 0, timestamp: 42 },
      { decisionKey: 'web:1000', actionId: '1:cdn', kind: 'cdn', success: true, retryCount: 0, timestamp: 42 },
      { decisionKey: 'web:1000', actionId: '2:scaling', kind: 'scaling', success: true, retryCount: 0, timestamp: 42 },
    ]);
  });

  it('makes no external calls when re-applying an applied decision', async () => {
    const executor = createExecutor();
    await executor.apply(decision);
    const report = await executor.apply(decision);

    expect(report).toMatchObject({ status: 'applied', attempts: 0, skipped: 3 });
    expect(planes.dns.updateRecord).toHaveBeenCalledTimes(1);
    expect(planes.cdn.updateOrigin).toHaveBeenCalledTimes(1);
    expect(planes.scaling.adjustCapacity).toHaveBeenCalledTimes(1);
  });

  it('skips actions another executor already recorded in the shared log', async () => {
    await createExecutor().apply(decision);
    const fresh = createControlPlanes();
    await createExecutor(fresh).apply(decision);
    expect(fresh.dns.updateRecord).not.toHaveBeenCalled();
  });

  it('retries a failing CDN update and records two failures then one success', async () => {
    planes.cdn.updateOrigin
      .mockResolvedValueOnce({ ok: false, message: 'origin busy' })
      .mockRejectedValueOnce(new Error('gateway timeout'))
      .mockResolvedValueOnce(OK);

    const report = await createExecutor().apply(decision);
    const outcomes = await outcomeLog.list('web:1000');
    const cdn = outcomes.filter(o => o.kind === 'cdn');

    expect(report).toMatchObject({ status: 'applied', attempts: 5, failedActions: [] });
    expect(cdn.map(o => [o.success, o.retryCount, o.error])).toEqual([
      [false, 0, 'origin busy'],
      [false, 1, 'gateway timeout'],
      [true, 2, undefined],
    ]);
    expect(outcomes.filter(o => o.kind === 'dns' && o.success)).toHaveLength(1);
    expect(planes.dns.updateRecord).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 2000]);
  });

  it('continues past an exhausted action and marks the decision partially applied', async () => {
    planes.cdn.updateOrigin.mockResolvedValue({ ok: false, message: 'denied' });
    const executor = createExecutor();

    const report = await executor.apply(decision);

    expect(report).toEqual({
      decisionKey: 'web:1000',
      status: 'partially_applied',
      attempts: 5,
      skipped: 0,
      failedActions: ['1:cdn'],
    });
    expect(planes.cdn.updateOrigin).toHaveBeenCalledTimes(3);
    expect(planes.scaling.adjustCapacity).toHaveBeenCalledTimes(1);
    expect(executor.partiallyApplied()).toEqual(['web:1000']);
    expect(alertSink.notify).toHaveBeenCalledTimes(1);
    expect(alertSink.notify.mock.calls[0][0]).toBe('critical');
    expect(executor.getStandingAlerts()).toEqual([
      expect.objectContaining({ decisionKey: 'web:1000', trafficGroup: 'web', failedActions: ['1:cdn'], raisedAt: 42 }),
    ]);
  });

  it('retries only the failed action from the log and clears the alert once it succeeds', async () => {
    planes.cdn.updateOrigin.mockResolvedValue({ ok: false });
    const executor = createExecutor();
    await executor.apply(decision);

    const stillFailing = await executor.retryPartiallyApplied();
    expect(stillFailing.map(r => r.status)).toEqual(['partially_applied']);
    expect(alertSink.notify).toHaveBeenCalledTimes(1);

    planes.cdn.updateOrigin.mockResolvedValue(OK);
    const [report] = await executor.retryPartiallyApplied();

    expect(report).toMatchObject({ status: 'applied', attempts: 1, skipped: 2 });
    expect(planes.dns.updateRecord).toHaveBeenCalledTimes(1);
    expect(planes.scaling.adjustCapacity).toHaveBeenCalledTimes(1);
    expect(executor.getStandingAlerts()).toEqual([]);
    expect(executor.partiallyApplied()).toEqual([]);

    const cdnRetryCounts = (await outcomeLog.list('web:1000')).filter(o => o.kind === 'cdn').map(o => o.retryCount);
    expect(cdnRetryCounts).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('keeps retrying an acknowledged decision without alerting again', async () => {
    planes.scaling.adjustCapacity.mockResolvedValue({ ok: false });
    const executor = createExecutor();
    await executor.apply(decision);

    expect(executor.acknowledge('web:1000')).toBe(true);
    expect(executor.getStandingAlerts()).toEqual([]);
    expect(executor.acknowledge('web:1000')).toBe(false);

    await executor.retryPartiallyApplied();
    expect(planes.scaling.adjustCapacity).toHaveBeenCalledTimes(6);
    expect(alertSink.notify).toHaveBeenCalledTimes(1);
    expect(executor.getStandingAlerts()).toEqual([]);
  });

  it('records a failure without retrying when no control plane handles the action', async () => {
    const report = await createExecutor({ dns: planes.dns, scaling: planes.scaling }).apply(decision);

    expect(report).toMatchObject({ status: 'partially_applied', attempts: 2, failedActions: ['1:cdn'] });
    expect(sleep).not.toHaveBeenCalled();
    const cdn = (await outcomeLog.list('web:1000')).filter(o => o.kind === 'cdn');
    expect(cdn).toEqual([
      { decisionKey: 'web:1000', actionId: '1:cdn', kind: 'cdn', success: false, retryCount: 0, error: 'No cdn control plane configured', timestamp: 42 },
    ]);
  });

  it('shares one run between concurrent calls for the same decision', async () => {
    const executor = createExecutor();
    const [first, second] = await Promise.all([executor.apply(decision), executor.apply(decision)]);

    expect(second).toBe(first);
    expect(planes.dns.updateRecord).toHaveBeenCalledTimes(1);
  });

  it('logs and survives an alert sink failure', async () => {
    planes.dns.updateRecord.mockResolvedValue({ ok: false });
    alertSink.notify.mockRejectedValue(new Error('webhook down'));

    const report = await createExecutor().apply(decision);

    expect(report.status).toBe('partially_applied');
    expect(logger.hasLogWithMeta('error', { decisionKey: 'web:1000', error: 'webhook down' })).toBe(true);
  });
  describe('when the outcome log fails', () => {
    it('does not re-issue an action whose success could not be recorded', async () => {
      outcomeLog = new FlakyOutcomeLog(1);
      const executor = createExecutor();

      const report = await executor.apply(decision);

      expect(report).toEqual({
        decisionKey: 'web:1000',
        status: 'applied',
        attempts: 3,
        skipped: 0,
        failedActions: [],
      });
      expect(planes.dns.updateRecord).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
      expect(
        logger.hasLogWithMeta('error', { decisionKey: 'web:1000', actionId: '0:dns', success: true })
      ).toBe(true);
    });

    it('counts the held success on replay and writes it to the log', async () => {
      outcomeLog = new FlakyOutcomeLog(1);
      const executor = createExecutor();
      await executor.apply(decision);

      const replay = await executor.apply(decision);

      expect(replay).toMatchObject({ status: 'applied', attempts: 0, skipped: 3 });
      expect(planes.dns.updateRecord).toHaveBeenCalledTimes(1);
      expect((await outcomeLog.list('web:1000')).map(o => o.actionId)).toEqual(['1:cdn', '2:scaling', '0:dns']);
    });

    it('keeps a decision whose log cannot be read as partially applied and alerts', async () => {
      jest.spyOn(outcomeLog, 'list').mockRejectedValueOnce(new Error('outcome store unavailable'));
      const executor = createExecutor();

      const report = await executor.apply(decision);

      expect(report).toEqual({
        decisionKey: 'web:1000',
        status: 'partially_applied',
        attempts: 0,
        skipped: 0,
        failedActions: ['0:dns', '1:cdn', '2:scaling'],
      });
      expect(planes.dns.updateRecord).not.toHaveBeenCalled();
      expect(executor.partiallyApplied()).toEqual(['web:1000']);
      expect(alertSink.notify).toHaveBeenCalledTimes(1);
      expect(alertSink.notify.mock.calls[0][0]).toBe('critical');

      const [retried] = await executor.retryPartiallyApplied();

      expect(retried).toMatchObject({ status: 'applied', attempts: 3, skipped: 0 });
      expect(executor.partiallyApplied()).toEqual([]);
      expect(executor.getStandingAlerts()).toEqual([]);
    });

    it('keeps the decision when a missing control plane cannot be recorded', async () => {
      outcomeLog = new FlakyOutcomeLog(10);

      const executor = createExecutor({ dns: planes.dns, scaling: planes.scaling });
      const report = await executor.apply(decision);

      expect(report).toMatchObject({ status: 'partially_applied', attempts: 2, failedActions: ['1:cdn'] });
      expect(executor.partiallyApplied()).toEqual(['web:1000']);
      expect(executor.getStandingAlerts().map(a => a.decisionKey)).toEqual(['web:1000']);
    });
  });
});

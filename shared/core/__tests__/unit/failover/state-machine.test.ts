/**
 * FailoverStateMachine Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ErrorCode, ValidationError } from '@regionguard/types';
import type { RegionHealth, TrafficGroup } from '@regionguard/types';
import { FailoverStateMachine } from '../../../src/failover/state-machine';
import type { CycleView, GroupEvaluation } from '../../../src/failover/state-machine';
import { RecordingLogger } from '../../../src/logging';

const WEB: TrafficGroup = {
  id: 'web',
  primaryRegion: 'us-east-1',
  secondaryRegions: ['us-west-2', 'eu-west-1'],
  dns: { zone: 'example.com', recordName: 'www', targetTemplate: 'web.{region}.example.com' },
  cdn: { distributionId: 'dist-1', originTemplate: 'origin-{region}.example.com' },
  scaling: { targetTemplate: 'web-{region}', delta: 2 },
};

interface RegionInput {
  composite: number;
  failures?: number;
  anomaly?: number;
}

function regionHealth(region: string, input: RegionInput, timestamp: number): RegionHealth {
  return {
    region,
    compositeScore: input.composite,
    components: {},
    maxAnomalyScore: input.anomaly ?? 0,
    consecutiveFailures: input.failures ?? 0,
    lastUpdated: timestamp,
  };
}

function view(timestamp: number, regions: Record<string, RegionInput>, cascade: Record<string, number> = {}): CycleView {
  return {
    timestamp,
    health: new Map(Object.entries(regions).map(([region, input]) => [region, regionHealth(region, input, timestamp)])),
    cascadeRisk: new Map(Object.entries(cascade)),
  };
}

const HEALTHY_SECONDARIES = { 'us-west-2': { composite: 0.9 }, 'eu-west-1': { composite: 0.95 } };

function machine(options: { autoFailback?: boolean; cooldownCycles?: number } = {}) {
  const logger = new RecordingLogger();
  const sm = new FailoverStateMachine({
    groups: [WEB],
    thresholds: { health: 0.7, warning: 0.85, consecutiveFailures: 3, anomalyDegrade: 0.8, cascadeFail: 0.9 },
    cooldownCycles: options.cooldownCycles ?? 2,
    autoFailback: options.autoFailback ?? false,
    logger,
  });
  return { sm, logger };
}

function states(result: GroupEvaluation): string[] {
  return result.transitions.map(t => `${t.from}->${t.to}`);
}

/** Drive the group into failed_over on us-west-2 at t=1000. */
function failOver(sm: FailoverStateMachine): GroupEvaluation {
  return sm.evaluate('web', view(1000, {
    'us-east-1': { composite: 0.2, failures: 3 },
    'us-west-2': { composite: 0.9 },
  }));
}

describe('FailoverStateMachine', () => {
  it('starts stable on the primary region', () => {
    const { sm } = machine();
    expect(sm.getStatus('web')).toMatchObject({ state: 'stable', activeRegion: 'us-east-1', primaryRegion: 'us-east-1' });
  });

  it('walks stable -> degraded -> failing -> failed_over over three bad cycles', () => {
    const { sm } = machine();

    const first = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.5, failures: 1 }, ...HEALTHY_SECONDARIES }));
    const second = sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.6, failures: 2 }, ...HEALTHY_SECONDARIES }));
    const third = sm.evaluate('web', view(3000, { 'us-east-1': { composite: 0.65, failures: 3 }, ...HEALTHY_SECONDARIES }));

    expect(states(first)).toEqual(['stable->degraded']);
    expect(states(second)).toEqual([]);
    expect(states(third)).toEqual(['degraded->failing', 'failing->failed_over']);
    expect(first.decision).toBeUndefined();
    expect(second.decision).toBeUndefined();
    expect(third.decision).toMatchObject({
      idempotencyKey: 'web:3000',
      trafficGroup: 'web',
      fromRegion: 'us-east-1',
      toRegion: 'eu-west-1',
      kind: 'failover',
    });
    expect(third.decision?.actions).toEqual([
      { kind: 'dns', zone: 'example.com', name: 'www', newTarget: 'web.eu-west-1.example.com' },
      { kind: 'cdn', distributionId: 'dist-1', newOrigin: 'origin-eu-west-1.example.com' },
      { kind: 'scaling', target: 'web-eu-west-1', delta: 2 },
    ]);
    expect(sm.getStatus('web')).toMatchObject({ state: 'failed_over', activeRegion: 'eu-west-1' });
  });

  it('records the triggering scores on each transition', () => {
    const { sm, logger } = machine();
    const result = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.5, failures: 1, anomaly: 0.3 } }, { 'us-east-1': 0.4 }));

    expect(result.transitions[0].scores).toEqual({
      region: 'us-east-1',
      compositeScore: 0.5,
      consecutiveFailures: 1,
      anomalyScore: 0.3,
      cascadeRisk: 0.4,
    });
    expect(logger.hasLogWithMeta('info', { trafficGroup: 'web', from: 'stable', to: 'degraded' })).toBe(true);
  });

  it('fails straight from stable when the failure threshold is met in one cycle', () => {
    const { sm } = machine();
    const result = failOver(sm);

    expect(states(result)).toEqual(['stable->failing', 'failing->failed_over']);
    expect(result.decision?.toRegion).toBe('us-west-2');
  });

  it('breaks equal scores by declared secondary order', () => {
    const { sm } = machine();
    const result = sm.evaluate('web', view(1000, {
      'us-east-1': { composite: 0.1, failures: 3 },
      'us-west-2': { composite: 0.9 },
      'eu-west-1': { composite: 0.9 },
    }));
    expect(result.decision?.toRegion).toBe('us-west-2');
  });

  it('fails over on cascade risk above the cascade threshold', () => {
    const { sm } = machine();
    const result = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.95 }, ...HEALTHY_SECONDARIES }, { 'us-east-1': 0.95 }));

    expect(states(result)).toEqual(['stable->failing', 'failing->failed_over']);
    expect(result.transitions[0].reason).toMatch(/Cascade risk 0\.950/);
  });

  it('degrades on a high anomaly score and recovers in one healthy cycle', () => {
    const { sm } = machine();

    expect(states(sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.95, anomaly: 0.85 } })))).toEqual(['stable->degraded']);
    expect(states(sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } })))).toEqual(['degraded->stable']);
  });

  it('stays stable above the warning threshold', () => {
    const { sm } = machine();
    const result = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.86, anomaly: 0.8 } }));
    expect(result.transitions).toEqual([]);
  });

  it('waits in failing with one critical alert until a secondary is healthy', () => {
    const { sm } = machine();
    const unhealthy = { 'us-west-2': { composite: 0.5 }, 'eu-west-1': { composite: 0.69 } };

    const first = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.2, failures: 3 }, ...unhealthy }));
    const second = sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.2, failures: 4 }, ...unhealthy }));
    const third = sm.evaluate('web', view(3000, { 'us-east-1': { composite: 0.2, failures: 5 }, 'us-west-2': { composite: 0.8 } }));

    expect(states(first)).toEqual(['stable->failing']);
    expect(first.decision).toBeUndefined();
    expect(first.alerts).toHaveLength(1);
    expect(first.alerts[0].severity).toBe('critical');
    expect(second.transitions).toEqual([]);
    expect(second.alerts).toEqual([]);
    expect(states(third)).toEqual(['failing->failed_over']);
    expect(third.decision).toMatchObject({ idempotencyKey: 'web:3000', toRegion: 'us-west-2' });
  });

  it('returns to stable from failing when the primary recovers first', () => {
    const { sm } = machine();
    sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.2, failures: 3 } }));
    const result = sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } }));
    expect(states(result)).toEqual(['failing->stable']);
    expect(result.decision).toBeUndefined();
  });

  it('degrades instead of failing over once a stuck primary stops failing', () => {
    const { sm } = machine();
    const first = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.2, failures: 3 }, 'us-west-2': { composite: 0.3 } }));
    const second = sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.8 }, 'us-west-2': { composite: 0.95 } }));

    expect(states(first)).toEqual(['stable->failing']);
    expect(states(second)).toEqual(['failing->degraded']);
    expect(second.decision).toBeUndefined();
    expect(sm.getStatus('web')).toMatchObject({ state: 'degraded', activeRegion: 'us-east-1' });
  });

  it('alerts again when a group that left failing without a target fails once more', () => {
    const { sm } = machine();
    const first = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.2, failures: 3 } }));
    sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } }));
    const again = sm.evaluate('web', view(3000, { 'us-east-1': { composite: 0.1, failures: 3 } }));

    expect(first.alerts).toHaveLength(1);
    expect(states(again)).toEqual(['stable->failing']);
    expect(again.alerts).toHaveLength(1);
  });

  it('moves to recovering only after the full cool-down', () => {
    const { sm } = machine({ cooldownCycles: 2 });
    failOver(sm);

    expect(states(sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } })))).toEqual([]);
    expect(sm.getStatus('web').healthyStreak).toBe(1);
    expect(states(sm.evaluate('web', view(3000, { 'us-east-1': { composite: 0.8 } })))).toEqual([]);
    expect(sm.getStatus('web').healthyStreak).toBe(0);
    expect(states(sm.evaluate('web', view(4000, { 'us-east-1': { composite: 0.9 } })))).toEqual([]);
    expect(states(sm.evaluate('web', view(5000, { 'us-east-1': { composite: 0.9 } })))).toEqual(['failed_over->recovering']);
  });

  it('holds in recovering without a reversing decision when fail-back is disabled', () => {
    const { sm } = machine({ autoFailback: false, cooldownCycles: 1 });
    failOver(sm);
    sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } }));

    for (let t = 3000; t <= 6000; t += 1000) {
      const result = sm.evaluate('web', view(t, { 'us-east-1': { composite: 0.95 } }));
      expect(result.transitions).toEqual([]);
      expect(result.decision).toBeUndefined();
    }
    expect(sm.getStatus('web')).toMatchObject({ state: 'recovering', activeRegion: 'us-west-2' });
  });

  it('falls back to failed_over when the primary regresses during recovery', () => {
    const { sm } = machine({ cooldownCycles: 1 });
    failOver(sm);
    sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } }));

    const result = sm.evaluate('web', view(3000, { 'us-east-1': { composite: 0.6 } }));
    expect(states(result)).toEqual(['recovering->failed_over']);
    expect(sm.getStatus('web').healthyStreak).toBe(0);
  });

  it('emits a reversing decision when fail-back is enabled', () => {
    const { sm } = machine({ autoFailback: true, cooldownCycles: 1 });
    failOver(sm);
    sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.9 } }));

    const result = sm.evaluate('web', view(3000, { 'us-east-1': { composite: 0.9 } }));
    expect(states(result)).toEqual(['recovering->stable']);
    expect(result.decision).toMatchObject({
      idempotencyKey: 'web:3000',
      fromRegion: 'us-west-2',
      toRegion: 'us-east-1',
      kind: 'failback',
    });
    expect(sm.getStatus('web')).toMatchObject({ state: 'stable', activeRegion: 'us-east-1' });
  });

  it('never emits a decision without a failing or fail-back transition', () => {
    const { sm } = machine({ autoFailback: true, cooldownCycles: 2 });
    const composites = [0.95, 0.5, 0.6, 0.4, 0.2, 0.9, 0.9, 0.9, 0.9, 0.3, 0.3, 0.3, 0.9, 0.95, 0.95, 0.95];
    let failures = 0;
    let decisions = 0;

    composites.forEach((composite, i) => {
      failures = composite < 0.7 ? failures + 1 : 0;
      const result = sm.evaluate('web', view(1000 * (i + 1), { 'us-east-1': { composite, failures }, ...HEALTHY_SECONDARIES }));
      const emitting = result.transitions.filter(t =>
        (t.from === 'failing' && t.to === 'failed_over') || (t.from === 'recovering' && t.to === 'stable'));

      expect(result.decision ? 1 : 0).toBe(emitting.length);
      if (result.decision) decisions++;
    });

    expect(decisions).toBeGreaterThanOrEqual(2);
  });

  it('ignores cycles that are not newer than the last one', () => {
    const { sm, logger } = machine();
    sm.evaluate('web', view(2000, { 'us-east-1': { composite: 0.95 } }));
    const stale = sm.evaluate('web', view(1000, { 'us-east-1': { composite: 0.1, failures: 5 } }));

    expect(stale.transitions).toEqual([]);
    expect(logger.hasLogMatching('debug', 'Ignoring stale cycle')).toBe(true);
  });

  it('skips the group when the primary has no health yet', () => {
    const { sm } = machine();
    expect(sm.evaluate('web', view(1000, { 'us-west-2': { composite: 0.1 } })).transitions).toEqual([]);
  });

  it('keeps only the most recent transitions in history', () => {
    const { sm } = machine();
    for (let i = 0; i < 12; i++) {
      const composite = i % 2 === 0 ? 0.8 : 0.9;
      sm.evaluate('web', view(1000 * (i + 1), { 'us-east-1': { composite } }));
    }
    const history = sm.getStatus('web').history;
    expect(history).toHaveLength(10);
    expect(history[history.length - 1].timestamp).toBe(12000);
  });

  describe('applyManualDecision', () => {
    it('moves the group to the requested secondary', () => {
      const { sm } = machine();
      const { decision, transition } = sm.applyManualDecision('web', 'us-east-1', 'eu-west-1', 'maintenance', 5000);

      expect(decision).toMatchObject({
        idempotencyKey: 'web:5000:manual',
        kind: 'manual',
        fromRegion: 'us-east-1',
        toRegion: 'eu-west-1',
        reason: 'maintenance',
      });
      expect(transition).toMatchObject({ from: 'stable', to: 'failed_over', activeRegion: 'eu-west-1', reason: 'Manual: maintenance' });
      expect(sm.getStatus('web').lastDecision).toBe(decision);
    });

    it('returns to stable when moving back to the primary', () => {
      const { sm } = machine();
      failOver(sm);
      const { transition } = sm.applyManualDecision('web', 'us-west-2', 'us-east-1', 'fail back', 2000);
      expect(transition).toMatchObject({ from: 'failed_over', to: 'stable', activeRegion: 'us-east-1' });
    });

    it('rejects a source that is not the active region', () => {
      const { sm } = machine();
      expect(() => sm.applyManualDecision('web', 'us-west-2', 'eu-west-1', 'x', 1000)).toThrow(ValidationError);
    });

    it('rejects a target outside the group', () => {
      const { sm } = machine();
      expect(() => sm.applyManualDecision('web', 'us-east-1', 'ap-south-1', 'x', 1000)).toThrow(/not part of group/);
    });

    it('rejects moving to the same region', () => {
      const { sm } = machine();
      expect(() => sm.applyManualDecision('web', 'us-east-1', 'us-east-1', 'x', 1000)).toThrow(/same/);
    });
  });

  it('reports unknown groups as NOT_FOUND', () => {
    const { sm } = machine();
    try {
      sm.getStatus('checkout');
      throw new Error('expected getStatus to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError ? error.code : undefined).toBe(ErrorCode.NOT_FOUND);
    }
  });
});

/**
 * HealthSampleStore Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '@regionguard/types';
import type { HealthSample } from '@regionguard/types';
import { HealthSampleStore, sampleKey } from '../../../src/health/sample-store';

function sample(timestamp: number, overrides: Partial<HealthSample> = {}): HealthSample {
  return {
    service: 'api',
    region: 'us-east-1',
    timestamp,
    successRatio: 1,
    latencyMs: 120,
    reachable: true,
    ...overrides,
  };
}

describe('HealthSampleStore', () => {
  it('returns the window oldest to newest', () => {
    const store = new HealthSampleStore(5);
    store.record(sample(1));
    store.record(sample(2));
    store.record(sample(3));

    expect([...store.window('api', 'us-east-1')].map(s => s.timestamp)).toEqual([1, 2, 3]);
  });

  it('evicts the oldest sample once the window is full', () => {
    const store = new HealthSampleStore(3);
    for (let t = 1; t <= 5; t++) store.record(sample(t));

    expect([...store.window('api', 'us-east-1')].map(s => s.timestamp)).toEqual([3, 4, 5]);
    expect(store.size('api', 'us-east-1')).toBe(3);
    expect(store.latest('api', 'us-east-1')?.timestamp).toBe(5);
  });

  it('keeps keys independent', () => {
    const store = new HealthSampleStore(3);
    store.record(sample(1));
    store.record(sample(2, { region: 'eu-west-1' }));
    store.record(sample(3, { service: 'database' }));

    expect(store.keys().sort()).toEqual(['api|eu-west-1', 'api|us-east-1', 'database|us-east-1']);
    expect(store.size('api', 'us-east-1')).toBe(1);
    expect(sampleKey('api', 'eu-west-1')).toBe('api|eu-west-1');
  });

  it('freezes recorded samples', () => {
    const store = new HealthSampleStore(3);
    const original = sample(1);
    const recorded = store.record(original);

    expect(Object.isFrozen(recorded)).toBe(true);
    expect(recorded).not.toBe(original);
  });

  it('iterates a snapshot that later records do not change', () => {
    const store = new HealthSampleStore(3);
    store.record(sample(1));
    const iterator = store.window('api', 'us-east-1');
    store.record(sample(2));

    expect([...iterator].map(s => s.timestamp)).toEqual([1]);
    expect([...iterator]).toEqual([]);
  });

  it('returns an empty window for an unknown key', () => {
    expect([...new HealthSampleStore(3).window('api', 'ap-south-1')]).toEqual([]);
  });

  it.each([
    ['successRatio above 1', { successRatio: 1.2 }],
    ['negative successRatio', { successRatio: -0.1 }],
    ['negative latency', { latencyMs: -5 }],
    ['non-finite timestamp', { timestamp: Number.NaN }],
    ['empty service', { service: '' }],
  ])('rejects %s', (_label, overrides) => {
    const store = new HealthSampleStore(3);
    expect(() => store.record(sample(1, overrides))).toThrow(ValidationError);
  });

  it('rejects a non-positive window size', () => {
    expect(() => new HealthSampleStore(0)).toThrow(ValidationError);
  });
});

/**
 * Health Sample Store
 *
 * Bounded, time-ordered buffer of recent samples per (service, region) key.
 * Each key owns its own ring buffer, so writers to different keys never touch
 * shared state.
 *
 * Features:
 * - Validates and freezes samples on record
 * - Evicts the oldest sample once the window is full
 * - window() yields a single-pass snapshot, oldest -> newest
 */

import { ValidationError } from '@regionguard/types';
import type { HealthSample, RegionId, ServiceId } from '@regionguard/types';

/**
 * Read-side view used by the anomaly scorer.
 */
export interface SampleWindowSource {
  window(service: ServiceId, region: RegionId): IterableIterator<HealthSample>;
}

export function sampleKey(service: ServiceId, region: RegionId): string {
  return `${service}|${region}`;
}

/**
 * Fixed-capacity ring buffer.
 */
class SampleRing {
  private readonly slots: Array<HealthSample | undefined>;
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.slots = new Array<HealthSample | undefined>(capacity);
  }

  push(sample: HealthSample): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = sample;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  get size(): number {
    return this.count;
  }

  latest(): HealthSample | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  toArray(): HealthSample[] {
    const out: HealthSample[] = [];
    for (let i = 0; i < this.count; i++) {
      const sample = this.slots[(this.head + i) % this.capacity];
      if (sample) out.push(sample);
    }
    return out;
  }
}

function validateSample(sample: HealthSample): void {
  if (!sample.service || !sample.region) {
    throw new ValidationError('Sample must name a service and a region', { field: 'service' });
  }
  if (!Number.isFinite(sample.timestamp)) {
    throw new ValidationError(`Invalid sample timestamp: ${sample.timestamp}`, { field: 'timestamp' });
  }
  if (!Number.isFinite(sample.successRatio) || sample.successRatio < 0 || sample.successRatio > 1) {
    throw new ValidationError(`successRatio must be in [0, 1], got ${sample.successRatio}`, { field: 'successRatio' });
  }
  if (!Number.isFinite(sample.latencyMs) || sample.latencyMs < 0) {
    throw new ValidationError(`latencyMs must be a non-negative number, got ${sample.latencyMs}`, { field: 'latencyMs' });
  }
}

export class HealthSampleStore implements SampleWindowSource {
  private readonly rings = new Map<string, SampleRing>();

  constructor(private readonly windowSize: number) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new ValidationError(`Window size must be a positive integer, got ${windowSize}`, { field: 'windowSize' });
    }
  }

  /**
   * Validate, freeze and append a sample.
   *
   * @throws ValidationError on out-of-range values
   */
  record(sample: HealthSample): HealthSample {
    validateSample(sample);
    const frozen = Object.freeze({ ...sample });

    const key = sampleKey(sample.service, sample.region);
    let ring = this.rings.get(key);
    if (!ring) {
      ring = new SampleRing(this.windowSize);
      this.rings.set(key, ring);
    }
    ring.push(frozen);
    return frozen;
  }

  /**
   * Lazy iterator over a snapshot of the window, oldest -> newest.
   * Samples recorded after the call are not visible to it.
   */
  window(service: ServiceId, region: RegionId): IterableIterator<HealthSample> {
    const snapshot = this.rings.get(sampleKey(service, region))?.toArray() ?? [];
    return snapshot[Symbol.iterator]();
  }

  latest(service: ServiceId, region: RegionId): HealthSample | undefined {
    return this.rings.get(sampleKey(service, region))?.latest();
  }

  size(service: ServiceId, region: RegionId): number {
    return this.rings.get(sampleKey(service, region))?.size ?? 0;
  }

  keys(): string[] {
    return [...this.rings.keys()];
  }
}

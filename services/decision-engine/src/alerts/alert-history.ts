/**
 * Alert History
 *
 * AlertSink decorator that keeps the most recent alerts in a circular buffer
 * for the API, then forwards them to the real sink. Records are kept even
 * when delivery fails.
 */

import type { AlertSeverity, AlertSink } from '@regionguard/types';
import type { AlertRecord } from '../types';

export class AlertHistory implements AlertSink {
  private readonly buffer: Array<AlertRecord | undefined>;
  private head = 0;
  private count = 0;
  private nextId = 1;

  constructor(
    private readonly inner: AlertSink,
    private readonly maxSize = 200,
    private readonly now: () => number = Date.now
  ) {
    this.buffer = new Array<AlertRecord | undefined>(maxSize);
  }

  async notify(severity: AlertSeverity, message: string, context: Record<string, unknown> = {}): Promise<void> {
    this.add({ id: this.nextId++, severity, message, context, timestamp: this.now() });
    await this.inner.notify(severity, message, context);
  }

  /**
   * Most recent alerts, newest first.
   */
  list(limit = this.maxSize): AlertRecord[] {
    const out: AlertRecord[] = [];
    const take = Math.min(Math.max(limit, 0), this.count);
    for (let i = 0; i < take; i++) {
      const index = (this.head - 1 - i + this.maxSize) % this.maxSize;
      const record = this.buffer[index];
      if (record) out.push(record);
    }
    return out;
  }

  get size(): number {
    return this.count;
  }

  private add(record: AlertRecord): void {
    this.buffer[this.head] = record;
    this.head = (this.head + 1) % this.maxSize;
    if (this.count < this.maxSize) {
      this.count++;
    }
  }
}

/**
 * Alert Sinks
 *
 * Delivery channels for engine alerts.
 *
 * - LoggingAlertSink: writes every alert to the service log
 * - WebhookAlertSink: Slack-compatible incoming webhook, behind a circuit
 *   breaker so a dead endpoint is not hammered every cycle
 * - FanoutAlertSink: delivers to several sinks, isolating their failures
 */

import type { AlertSeverity, AlertSink } from '@regionguard/types';
import { createLogger, getErrorMessage } from '@regionguard/core';
import type { ILogger } from '@regionguard/core';
import { defaultFetch } from '../types';
import type { FetchFn } from '../types';

// =============================================================================
// Logging
// =============================================================================

export class LoggingAlertSink implements AlertSink {
  constructor(private readonly logger: ILogger) {}

  async notify(severity: AlertSeverity, message: string, context: Record<string, unknown> = {}): Promise<void> {
    const meta = { severity, ...context };
    switch (severity) {
      case 'critical':
        this.logger.error(`ALERT: ${message}`, meta);
        break;
      case 'warning':
        this.logger.warn(`ALERT: ${message}`, meta);
        break;
      default:
        this.logger.info(`ALERT: ${message}`, meta);
    }
  }
}

// =============================================================================
// Webhook
// =============================================================================

interface CircuitBreakerConfig {
  /** Number of failures before opening circuit */
  failureThreshold: number;
  /** Time in ms before a single attempt is let through again */
  resetTimeoutMs: number;
}

const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 60000, // 1 minute
};

export interface WebhookAlertSinkConfig {
  url: string;
  /** Shown as the message prefix (default: 'regionguard') */
  source?: string;
  circuit?: Partial<CircuitBreakerConfig>;
  fetchFn?: FetchFn;
  now?: () => number;
  logger?: ILogger;
}

const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
  critical: '🔴',
  warning: '🟠',
  info: '🔵',
};

export class WebhookAlertSink implements AlertSink {
  private readonly circuitConfig: CircuitBreakerConfig;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly logger: ILogger;
  private failures = 0;
  private openedAt: number | undefined;
  private dropped = 0;

  constructor(private readonly config: WebhookAlertSinkConfig) {
    this.circuitConfig = { ...DEFAULT_CIRCUIT_CONFIG, ...config.circuit };
    this.fetchFn = config.fetchFn ?? defaultFetch;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger('webhook-alert-sink');
  }

  /**
   * @throws Error when the webhook rejects the alert or cannot be reached
   */
  async notify(severity: AlertSeverity, message: string, context: Record<string, unknown> = {}): Promise<void> {
    if (this.isCircuitOpen()) {
      this.dropped++;
      this.logger.warn('Alert webhook circuit open, dropping alert', { severity, dropped: this.dropped });
      return;
    }

    const source = this.config.source ?? 'regionguard';
    const payload = {
      text: `${SEVERITY_EMOJI[severity]} [${source}] ${message}`,
      severity,
      context,
    };

    try {
      const response = await this.fetchFn(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
      if (!response.ok) {
        throw new Error(`Alert webhook responded ${response.status} ${response.statusText}`.trim());
      }
    } catch (error) {
      this.recordFailure();
      throw error;
    }

    this.recordSuccess();
  }

  get droppedAlerts(): number {
    return this.dropped;
  }

  /**
   * Open circuits let one attempt through once resetTimeoutMs has passed.
   */
  private isCircuitOpen(): boolean {
    if (this.openedAt === undefined) return false;
    return this.now() - this.openedAt < this.circuitConfig.resetTimeoutMs;
  }

  private recordFailure(): void {
    this.failures++;
    if (this.failures >= this.circuitConfig.failureThreshold) {
      const wasOpen = this.openedAt !== undefined;
      this.openedAt = this.now();
      if (!wasOpen) {
        this.logger.warn('Circuit breaker opened for alert webhook', {
          failures: this.failures,
          resetTimeoutMs: this.circuitConfig.resetTimeoutMs,
        });
      }
    }
  }

  private recordSuccess(): void {
    if (this.openedAt !== undefined) {
      this.logger.info('Circuit breaker closed - alert webhook recovered');
    }
    this.failures = 0;
    this.openedAt = undefined;
  }
}

// =============================================================================
// Fan-out
// =============================================================================

export class FanoutAlertSink implements AlertSink {
  constructor(
    private readonly sinks: readonly AlertSink[],
    private readonly logger: ILogger = createLogger('alert-fanout')
  ) {}

  /**
   * Rejects only when every sink failed.
   */
  async notify(severity: AlertSeverity, message: string, context?: Record<string, unknown>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(sink => sink.notify(severity, message, context)));

    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    for (const failure of failures) {
      this.logger.error('Alert delivery failed', { severity, error: getErrorMessage(failure.reason) });
    }
    if (failures.length > 0 && failures.length === this.sinks.length) {
      throw new Error(`All ${this.sinks.length} alert sinks failed`);
    }
  }
}

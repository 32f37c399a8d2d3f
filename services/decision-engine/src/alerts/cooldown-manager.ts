/**
 * Alert Cooldown Manager
 *
 * Suppresses repeats of the same alert within a cooldown window so a region
 * that stays at risk for many cycles does not page on every one of them.
 */

/**
 * Logger interface for dependency injection
 */
export interface CooldownManagerLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
}

export interface AlertCooldownManagerConfig {
  /** Cooldown duration in milliseconds (default: 300000 = 5 minutes) */
  cooldownMs?: number;
  /** Max age before cleanup in milliseconds (default: 3600000 = 1 hour) */
  maxAgeMs?: number;
  /** Size threshold to trigger automatic cleanup (default: 1000) */
  cleanupThreshold?: number;
}

const DEFAULT_CONFIG: Required<AlertCooldownManagerConfig> = {
  cooldownMs: 300000,    // 5 minutes
  maxAgeMs: 3600000,     // 1 hour
  cleanupThreshold: 1000,
};

export class AlertCooldownManager {
  private readonly cooldowns = new Map<string, number>();
  private readonly config: Required<AlertCooldownManagerConfig>;

  constructor(
    private readonly logger?: CooldownManagerLogger,
    config?: AlertCooldownManagerConfig
  ) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };
  }

  /**
   * Generate a cooldown key from alert type and subject (region, group)
   */
  static createKey(alertType: string, subject?: string): string {
    return `${alertType}_${subject || 'engine'}`;
  }

  /**
   * @returns true if the alert is on cooldown and should be suppressed
   */
  isOnCooldown(key: string, now: number = Date.now()): boolean {
    const lastAlert = this.cooldowns.get(key);
    if (lastAlert === undefined) {
      return false;
    }
    return (now - lastAlert) < this.config.cooldownMs;
  }

  /**
   * Record that an alert was sent (starts the cooldown)
   */
  recordAlert(key: string, now: number = Date.now()): void {
    this.cooldowns.set(key, now);

    if (this.cooldowns.size > this.config.cleanupThreshold) {
      this.cleanup(now);
    }
  }

  /**
   * Check if alert should be sent (not on cooldown) and record it if so
   */
  shouldSendAndRecord(key: string, now: number = Date.now()): boolean {
    if (this.isOnCooldown(key, now)) {
      return false;
    }
    this.recordAlert(key, now);
    return true;
  }

  /**
   * Drop entries older than maxAgeMs
   */
  cleanup(now: number = Date.now()): void {
    const toDelete: string[] = [];

    for (const [key, timestamp] of this.cooldowns) {
      if (now - timestamp > this.config.maxAgeMs) {
        toDelete.push(key);
      }
    }

    for (const key of toDelete) {
      this.cooldowns.delete(key);
    }

    if (toDelete.length > 0 && this.logger) {
      this.logger.debug('Cleaned up stale alert cooldowns', {
        removed: toDelete.length,
        remaining: this.cooldowns.size,
      });
    }
  }

  lastAlertAt(key: string): number | undefined {
    return this.cooldowns.get(key);
  }

  get size(): number {
    return this.cooldowns.size;
  }

  get cooldownMs(): number {
    return this.config.cooldownMs;
  }

  clear(): void {
    this.cooldowns.clear();
  }
}

/**
 * Unit tests for AlertCooldownManager
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { AlertCooldownManager } from '../../../src/alerts/cooldown-manager';
import type { CooldownManagerLogger } from '../../../src/alerts/cooldown-manager';

describe('AlertCooldownManager', () => {
  let manager: AlertCooldownManager;

  beforeEach(() => {
    manager = new AlertCooldownManager(undefined, {
      cooldownMs: 5000,
      maxAgeMs: 60000,
      cleanupThreshold: 10,
    });
  });

  describe('createKey', () => {
    it('should create key with type and subject', () => {
      expect(AlertCooldownManager.createKey('cascade_risk', 'us-east-1')).toBe('cascade_risk_us-east-1');
    });

    it('should fall back to engine when no subject is given', () => {
      expect(AlertCooldownManager.createKey('cycle_failed')).toBe('cycle_failed_engine');
      expect(AlertCooldownManager.createKey('cycle_failed', undefined)).toBe('cycle_failed_engine');
    });
  });

  describe('isOnCooldown', () => {
    it('should return false for unknown key', () => {
      expect(manager.isOnCooldown('unknown_key', 1000)).toBe(false);
    });

    it('should return true within the cooldown period', () => {
      manager.recordAlert('test_key', 10000);
      expect(manager.isOnCooldown('test_key', 14999)).toBe(true);
    });

    it('should return false once exactly cooldownMs has passed', () => {
      manager.recordAlert('test_key', 10000);
      expect(manager.isOnCooldown('test_key', 15000)).toBe(false);
    });
  });

  describe('shouldSendAndRecord', () => {
    it('should allow the first alert and suppress repeats inside the window', () => {
      expect(manager.shouldSendAndRecord('k', 1000)).toBe(true);
      expect(manager.shouldSendAndRecord('k', 2000)).toBe(false);
      expect(manager.lastAlertAt('k')).toBe(1000);
    });

    it('should allow the alert again after the window and restart it', () => {
      manager.shouldSendAndRecord('k', 1000);
      expect(manager.shouldSendAndRecord('k', 6000)).toBe(true);
      expect(manager.lastAlertAt('k')).toBe(6000);
    });

    it('should track keys independently', () => {
      expect(manager.shouldSendAndRecord('cascade_risk_us-east-1', 1000)).toBe(true);
      expect(manager.shouldSendAndRecord('cascade_risk_eu-west-1', 1000)).toBe(true);
      expect(manager.size).toBe(2);
    });
  });

  describe('cleanup', () => {
    it('should drop entries older than maxAgeMs and log the removal', () => {
      const logger: CooldownManagerLogger = { debug: jest.fn() };
      const withLogger = new AlertCooldownManager(logger, { maxAgeMs: 60000 });
      withLogger.recordAlert('old', 0);
      withLogger.recordAlert('recent', 50000);

      withLogger.cleanup(70000);

      expect(withLogger.lastAlertAt('old')).toBeUndefined();
      expect(withLogger.lastAlertAt('recent')).toBe(50000);
      expect(logger.debug).toHaveBeenCalledWith('Cleaned up stale alert cooldowns', { removed: 1, remaining: 1 });
    });

    it('should clean up automatically once the size threshold is exceeded', () => {
      for (let i = 0; i < 10; i++) {
        manager.recordAlert(`key_${i}`, 0);
      }
      expect(manager.size).toBe(10);

      manager.recordAlert('fresh', 100000);

      expect(manager.size).toBe(1);
      expect(manager.lastAlertAt('fresh')).toBe(100000);
    });
  });

  it('should use a five minute cooldown by default', () => {
    expect(new AlertCooldownManager().cooldownMs).toBe(300000);
  });

  it('should forget everything on clear', () => {
    manager.recordAlert('k', 1000);
    manager.clear();
    expect(manager.size).toBe(0);
    expect(manager.isOnCooldown('k', 1001)).toBe(false);
  });
});

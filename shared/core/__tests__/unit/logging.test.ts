/**
 * Logging Module Tests
 *
 * Verifies singleton caching of Pino loggers and the assertion helpers of
 * RecordingLogger and NullLogger.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createLogger, getLogger, resetLoggerCache, RecordingLogger, NullLogger } from '../../src/logging';

describe('Logging Module', () => {
  beforeEach(() => {
    resetLoggerCache();
  });

  afterEach(() => {
    resetLoggerCache();
  });

  describe('createLogger', () => {
    it('returns the cached instance for the same name', () => {
      const first = createLogger('decision-engine-test');
      const second = getLogger('decision-engine-test');
      expect(second).toBe(first);
    });

    it('returns a fresh instance after the cache is reset', () => {
      const first = createLogger('decision-engine-test');
      resetLoggerCache();
      expect(createLogger('decision-engine-test')).not.toBe(first);
    });

    it('honours an explicit level', () => {
      const logger = createLogger({ name: 'level-test', level: 'warn' });
      expect(logger.isLevelEnabled?.('warn')).toBe(true);
      expect(logger.isLevelEnabled?.('info')).toBe(false);
    });

    it('does not cache children created through bindings', () => {
      const parent = createLogger('binding-test');
      const child = createLogger({ name: 'binding-test', bindings: { trafficGroup: 'web' } });
      expect(child).not.toBe(parent);
      expect(createLogger('binding-test')).toBe(parent);
    });
  });

  describe('RecordingLogger', () => {
    it('captures level, message and metadata', () => {
      const logger = new RecordingLogger();
      logger.warn('Probe failed', { service: 'api', region: 'us-east-1' });

      expect(logger.countAt('warn')).toBe(1);
      expect(logger.hasLogMatching('warn', /probe failed/i)).toBe(true);
      expect(logger.hasLogWithMeta('warn', { service: 'api' })).toBe(true);
      expect(logger.hasLogWithMeta('warn', { service: 'database' })).toBe(false);
    });

    it('shares entries with children and records their bindings', () => {
      const logger = new RecordingLogger();
      logger.child({ trafficGroup: 'web' }).info('Transition');

      const entry = logger.getLastLogAt('info');
      expect(entry?.msg).toBe('Transition');
      expect(entry?.bindings).toEqual({ trafficGroup: 'web' });
    });

    it('clears captured logs', () => {
      const logger = new RecordingLogger();
      logger.error('boom');
      logger.clear();
      expect(logger.getAllLogs()).toHaveLength(0);
    });
  });

  describe('NullLogger', () => {
    it('discards everything and returns itself as child', () => {
      const logger = new NullLogger();
      logger.info('ignored');
      expect(logger.child({ a: 1 })).toBe(logger);
      expect(logger.isLevelEnabled('error')).toBe(false);
    });
  });
});

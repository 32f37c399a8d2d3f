/**
 * Runtime Wiring
 *
 * Builds the engine and its adapters from a validated EngineConfig.
 */

import Redis from 'ioredis';
import type { AlertSink, ProbeAdapter, ServiceId } from '@regionguard/types';
import {
  InMemoryActionOutcomeLog,
  RedisActionOutcomeLog,
  createLogger,
  createOutcomeStreamClient,
  getErrorMessage,
} from '@regionguard/core';
import type { ActionOutcomeLog, ControlPlanes, ILogger } from '@regionguard/core';
import { probeTimeoutMs } from '@regionguard/config';
import type { EngineConfig, ProbeSpec } from '@regionguard/config';
import { ENGINE_METRICS, PrometheusMetricsSink } from '@regionguard/metrics';
import { DnsProbeAdapter } from './adapters/dns-probe';
import { HttpProbeAdapter } from './adapters/http-probe';
import { DryRunControlPlane, HttpControlPlaneClient } from './adapters/control-plane';
import { FanoutAlertSink, LoggingAlertSink, WebhookAlertSink } from './alerts/alert-sinks';
import { DecisionEngine } from './engine';

export interface EngineRuntime {
  engine: DecisionEngine;
  metrics: PrometheusMetricsSink;
  /** Release connections opened by the wiring (Redis) */
  close(): Promise<void>;
}

export interface EngineRuntimeOptions {
  logger?: ILogger;
  /** Injected for tests; called with the outcome log URL */
  createRedis?: (url: string) => Redis;
}

export function createProbeAdapter(probe: ProbeSpec, timeoutMs: number): ProbeAdapter {
  switch (probe.kind) {
    case 'http':
      return new HttpProbeAdapter({ urlTemplate: probe.urlTemplate, timeoutMs });
    case 'dns':
      return new DnsProbeAdapter({ hostnameTemplate: probe.hostnameTemplate, attempts: probe.attempts });
  }
}

export function createControlPlanes(config: EngineConfig, logger: ILogger): ControlPlanes {
  const plane = config.controlPlane.mode === 'http'
    ? new HttpControlPlaneClient({
        baseUrl: config.controlPlane.baseUrl,
        apiToken: config.controlPlane.apiToken,
        timeoutMs: config.controlPlane.timeoutMs,
        logger: logger.child({ component: 'control-plane' }),
      })
    : new DryRunControlPlane(logger.child({ component: 'control-plane' }));
  return { dns: plane, cdn: plane, scaling: plane };
}

export function createAlertSink(config: EngineConfig, logger: ILogger): AlertSink {
  const sinks: AlertSink[] = [new LoggingAlertSink(logger.child({ component: 'alerts' }))];
  if (config.alerts.webhookUrl) {
    sinks.push(new WebhookAlertSink({ url: config.alerts.webhookUrl, logger: logger.child({ component: 'alert-webhook' }) }));
  }
  return new FanoutAlertSink(sinks, logger.child({ component: 'alert-fanout' }));
}

export function createEngineRuntime(config: EngineConfig, options: EngineRuntimeOptions = {}): EngineRuntime {
  const logger = options.logger ?? createLogger('decision-engine');

  const probes = new Map<ServiceId, ProbeAdapter>(
    config.services.map(service => [service.name, createProbeAdapter(service.probe, probeTimeoutMs(config))])
  );

  let redis: Redis | undefined;
  let outcomeLog: ActionOutcomeLog;
  if (config.outcomeLog.kind === 'redis') {
    const createRedis = options.createRedis ?? ((url: string) => new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 }));
    redis = createRedis(config.outcomeLog.url);
    outcomeLog = new RedisActionOutcomeLog(createOutcomeStreamClient(redis), {
      streamPrefix: config.outcomeLog.streamPrefix,
      logger: logger.child({ component: 'outcome-log' }),
    });
  } else {
    outcomeLog = new InMemoryActionOutcomeLog();
  }

  const metrics = new PrometheusMetricsSink({ definitions: ENGINE_METRICS });

  const engine = new DecisionEngine({
    config,
    probes,
    controlPlanes: createControlPlanes(config, logger),
    outcomeLog,
    alertSink: createAlertSink(config, logger),
    metricsSink: metrics,
    logger,
  });

  return {
    engine,
    metrics,
    async close() {
      if (!redis) return;
      try {
        await redis.quit();
      } catch (error) {
        logger.warn('Error closing Redis connection', { error: getErrorMessage(error) });
      }
    },
  };
}

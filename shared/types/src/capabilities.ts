/**
 * External Capability Interfaces
 *
 * Narrow contracts for everything the engine talks to. Implementations are
 * injected; the engine depends only on these shapes.
 */

import type { ProbeReading, RegionId, ServiceId } from './health';

/**
 * Fetches a normalized health reading. Rejects on outright failure.
 */
export interface ProbeAdapter {
  readonly kind: string;
  checkHealth(service: ServiceId, region: RegionId): Promise<ProbeReading>;
}

/**
 * Result of a control-plane call. A rejected promise also counts as failure.
 */
export interface ControlPlaneResult {
  ok: boolean;
  message?: string;
}

export interface DnsControlPlane {
  updateRecord(zone: string, name: string, newTarget: string): Promise<ControlPlaneResult>;
}

export interface CdnControlPlane {
  updateOrigin(distributionId: string, newOrigin: string): Promise<ControlPlaneResult>;
}

export interface ScalingControlPlane {
  adjustCapacity(target: string, delta: number): Promise<ControlPlaneResult>;
}

export type MetricDimensions = Record<string, string>;

export interface MetricsSink {
  publish(metricName: string, value: number, dimensions: MetricDimensions, timestamp: number): Promise<void>;
}

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface AlertSink {
  notify(severity: AlertSeverity, message: string, context?: Record<string, unknown>): Promise<void>;
}

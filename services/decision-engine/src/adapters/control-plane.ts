/**
 * Control Plane Clients
 *
 * HttpControlPlaneClient talks to a control-plane gateway that fronts the
 * DNS, CDN and autoscaling providers:
 *
 *   POST {baseUrl}/dns/records        { zone, name, target }
 *   POST {baseUrl}/cdn/origins        { distributionId, origin }
 *   POST {baseUrl}/scaling/capacity   { target, delta }
 *
 * Non-2xx responses come back as { ok: false }; network errors and requests
 * that outlive timeoutMs reject.
 * DryRunControlPlane only logs what it would change.
 */

import type {
  CdnControlPlane,
  ControlPlaneResult,
  DnsControlPlane,
  ScalingControlPlane,
} from '@regionguard/types';
import { createLogger } from '@regionguard/core';
import type { ILogger } from '@regionguard/core';
import { defaultFetch } from '../types';
import type { FetchFn } from '../types';

export type FullControlPlane = DnsControlPlane & CdnControlPlane & ScalingControlPlane;

export interface HttpControlPlaneConfig {
  baseUrl: string;
  /** Sent as a bearer token when set */
  apiToken?: string;
  /** Abort deadline per request (default: 10000) */
  timeoutMs?: number;
  fetchFn?: FetchFn;
  logger?: ILogger;
}

export class HttpControlPlaneClient implements FullControlPlane {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: ILogger;

  constructor(private readonly config: HttpControlPlaneConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.fetchFn = config.fetchFn ?? defaultFetch;
    this.logger = config.logger ?? createLogger('control-plane-client');
  }

  updateRecord(zone: string, name: string, newTarget: string): Promise<ControlPlaneResult> {
    return this.post('/dns/records', { zone, name, target: newTarget });
  }

  updateOrigin(distributionId: string, newOrigin: string): Promise<ControlPlaneResult> {
    return this.post('/cdn/origins', { distributionId, origin: newOrigin });
  }

  adjustCapacity(target: string, delta: number): Promise<ControlPlaneResult> {
    return this.post('/scaling/capacity', { target, delta });
  }

  private async post(path: string, body: Record<string, unknown>): Promise<ControlPlaneResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiToken) {
      headers.Authorization = `Bearer ${this.config.apiToken}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (response.ok) {
        return { ok: true };
      }

      const detail = (await response.text()).slice(0, 200);
      this.logger.warn('Control plane rejected request', { path, status: response.status });
      return { ok: false, message: `HTTP ${response.status}${detail ? `: ${detail}` : ''}` };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Control plane request to ${path} timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export class DryRunControlPlane implements FullControlPlane {
  constructor(private readonly logger: ILogger = createLogger('control-plane-dry-run')) {}

  async updateRecord(zone: string, name: string, newTarget: string): Promise<ControlPlaneResult> {
    this.logger.info('Dry run: DNS record update', { zone, name, newTarget });
    return { ok: true };
  }

  async updateOrigin(distributionId: string, newOrigin: string): Promise<ControlPlaneResult> {
    this.logger.info('Dry run: CDN origin switch', { distributionId, newOrigin });
    return { ok: true };
  }

  async adjustCapacity(target: string, delta: number): Promise<ControlPlaneResult> {
    this.logger.info('Dry run: capacity adjustment', { target, delta });
    return { ok: true };
  }
}

/**
 * DNS Probe Adapter
 *
 * Resolves a service hostname a number of times; the success ratio is the
 * share of lookups that returned at least one address and the latency is
 * their mean duration. Fails only when every lookup fails.
 */

import { promises as dns } from 'dns';
import { ErrorCode, ProbeFailure } from '@regionguard/types';
import type { ProbeAdapter, ProbeReading, RegionId, ServiceId } from '@regionguard/types';
import { getErrorMessage } from '@regionguard/core';
import { renderProbeTemplate } from './http-probe';

export type ResolveFn = (hostname: string) => Promise<string[]>;

export interface DnsProbeConfig {
  /** May contain {service} and {region} */
  hostnameTemplate: string;
  /** Lookups per check (default: 1) */
  attempts?: number;
  resolveFn?: ResolveFn;
  now?: () => number;
}

export class DnsProbeAdapter implements ProbeAdapter {
  readonly kind = 'dns';
  private readonly attempts: number;
  private readonly resolveFn: ResolveFn;
  private readonly now: () => number;

  constructor(private readonly config: DnsProbeConfig) {
    this.attempts = Math.max(1, config.attempts ?? 1);
    this.resolveFn = config.resolveFn ?? (hostname => dns.resolve4(hostname));
    this.now = config.now ?? Date.now;
  }

  async checkHealth(service: ServiceId, region: RegionId): Promise<ProbeReading> {
    const hostname = renderProbeTemplate(this.config.hostnameTemplate, service, region);
    let successes = 0;
    let totalLatency = 0;
    let lastError: unknown;

    for (let i = 0; i < this.attempts; i++) {
      const started = this.now();
      try {
        const addresses = await this.resolveFn(hostname);
        if (addresses.length > 0) {
          successes++;
        } else {
          lastError = new Error('no addresses returned');
        }
      } catch (error) {
        lastError = error;
      }
      totalLatency += Math.max(0, this.now() - started);
    }

    if (successes === 0) {
      throw new ProbeFailure(`DNS lookup of ${hostname} failed: ${getErrorMessage(lastError)}`, {
        service,
        region,
        code: ErrorCode.PROBE_FAILED,
        cause: lastError instanceof Error ? lastError : undefined,
      });
    }

    return {
      successRatio: successes / this.attempts,
      latencyMs: totalLatency / this.attempts,
      reachable: true,
    };
  }
}

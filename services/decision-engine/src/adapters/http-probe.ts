/**
 * HTTP Probe Adapter
 *
 * GETs a per-(service, region) health endpoint and turns the response into a
 * ProbeReading.
 *
 * - 2xx: success ratio from a JSON `successRatio` field when present, else 1
 * - Any other status: reachable, success ratio 0
 * - Network error, or no answer within timeoutMs: ProbeFailure (the engine
 *   records a zero-score sample)
 */

import { z } from 'zod';
import { ProbeFailure } from '@regionguard/types';
import type { ProbeAdapter, ProbeReading, RegionId, ServiceId } from '@regionguard/types';
import { getErrorMessage } from '@regionguard/core';
import { defaultFetch } from '../types';
import type { FetchFn } from '../types';

export interface HttpProbeConfig {
  /** May contain {service} and {region} */
  urlTemplate: string;
  /** Aborts the request once exceeded; unset leaves it to the caller */
  timeoutMs?: number;
  fetchFn?: FetchFn;
  now?: () => number;
}

const ProbeBodySchema = z.object({
  successRatio: z.number().min(0).max(1).optional(),
});

export function renderProbeTemplate(template: string, service: ServiceId, region: RegionId): string {
  return template.split('{service}').join(service).split('{region}').join(region);
}

export class HttpProbeAdapter implements ProbeAdapter {
  readonly kind = 'http';
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(private readonly config: HttpProbeConfig) {
    this.fetchFn = config.fetchFn ?? defaultFetch;
    this.now = config.now ?? Date.now;
  }

  async checkHealth(service: ServiceId, region: RegionId): Promise<ProbeReading> {
    const url = renderProbeTemplate(this.config.urlTemplate, service, region);
    const started = this.now();

    const { timeoutMs } = this.config;
    const controller = new AbortController();
    const timeoutId = timeoutMs !== undefined ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          ...(timeoutId !== undefined ? { signal: controller.signal } : {}),
        });
      } catch (error) {
        const detail = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : getErrorMessage(error);
        throw new ProbeFailure(`HTTP probe of ${url} failed: ${detail}`, {
          service,
          region,
          cause: error instanceof Error ? error : undefined,
        });
      }
      const latencyMs = Math.max(0, this.now() - started);

      if (!response.ok) {
        return { successRatio: 0, latencyMs, reachable: true };
      }

      return { successRatio: await this.readSuccessRatio(response), latencyMs, reachable: true };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readSuccessRatio(response: Response): Promise<number> {
    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch {
      return 1;
    }
    const parsed = ProbeBodySchema.safeParse(body);
    return parsed.success ? parsed.data.successRatio ?? 1 : 1;
  }
}

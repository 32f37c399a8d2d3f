/**
 * Redis-backed Action Outcome Log
 *
 * One Redis stream per decision (`<prefix><decisionKey>`). Every attempt is an
 * XADD with a single `data` field holding the JSON-encoded outcome; XRANGE
 * reads them back in append order. Streams are never trimmed.
 */

import type Redis from 'ioredis';
import { z } from 'zod';
import type { ActionOutcome } from '@regionguard/types';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import type { ActionOutcomeLog } from './outcome-log';

// =============================================================================
// DI Types
// =============================================================================

/**
 * The two stream commands the log needs. Tests pass an in-process fake.
 */
export interface OutcomeStreamClient {
  append(stream: string, payload: string): Promise<void>;
  /** Every `data` payload of the stream, oldest first */
  readAll(stream: string): Promise<string[]>;
}

export function createOutcomeStreamClient(redis: Redis): OutcomeStreamClient {
  return {
    async append(stream, payload) {
      await redis.xadd(stream, '*', 'data', payload);
    },
    async readAll(stream) {
      const entries = await redis.xrange(stream, '-', '+');
      const payloads: string[] = [];
      for (const [, fields] of entries) {
        const index = fields.indexOf('data');
        if (index >= 0 && index + 1 < fields.length) {
          payloads.push(fields[index + 1]);
        }
      }
      return payloads;
    },
  };
}

// =============================================================================
// Log
// =============================================================================

const ActionOutcomeSchema = z.object({
  decisionKey: z.string(),
  actionId: z.string(),
  kind: z.enum(['dns', 'cdn', 'scaling']),
  success: z.boolean(),
  retryCount: z.number().int().nonnegative(),
  error: z.string().optional(),
  timestamp: z.number(),
});

export interface RedisOutcomeLogOptions {
  streamPrefix?: string;
  logger?: ILogger;
}

export class RedisActionOutcomeLog implements ActionOutcomeLog {
  private readonly streamPrefix: string;
  private readonly logger: ILogger;

  constructor(private readonly client: OutcomeStreamClient, options: RedisOutcomeLogOptions = {}) {
    this.streamPrefix = options.streamPrefix ?? 'remediation:outcomes:';
    this.logger = options.logger ?? createLogger('redis-outcome-log');
  }

  async append(outcome: ActionOutcome): Promise<void> {
    await this.client.append(this.streamName(outcome.decisionKey), JSON.stringify(outcome));
  }

  /**
   * Malformed entries are skipped with a warning; they can never mark an
   * action as succeeded.
   */
  async list(decisionKey: string): Promise<ActionOutcome[]> {
    const payloads = await this.client.readAll(this.streamName(decisionKey));
    const outcomes: ActionOutcome[] = [];

    for (const payload of payloads) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(payload);
      } catch {
        this.logger.warn('Skipping unparseable outcome entry', { decisionKey });
        continue;
      }
      const result = ActionOutcomeSchema.safeParse(parsed);
      if (result.success) {
        outcomes.push(result.data);
      } else {
        this.logger.warn('Skipping malformed outcome entry', {
          decisionKey,
          issues: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
        });
      }
    }
    return outcomes;
  }

  private streamName(decisionKey: string): string {
    return `${this.streamPrefix}${decisionKey}`;
  }
}

/**
 * Action Outcome Log
 *
 * Append-only record of every remediation attempt, keyed by decision.
 * Records are never updated or removed, so a decision can be replayed at any
 * time and only the steps without a recorded success run again.
 */

import type { ActionOutcome } from '@regionguard/types';

export interface ActionOutcomeLog {
  append(outcome: ActionOutcome): Promise<void>;
  /** Attempts for one decision, in append order */
  list(decisionKey: string): Promise<ActionOutcome[]>;
}

/**
 * Whether the log holds a successful attempt of `actionId`.
 */
export function hasSucceeded(outcomes: readonly ActionOutcome[], actionId: string): boolean {
  return outcomes.some(o => o.actionId === actionId && o.success);
}

/**
 * Number of recorded attempts of `actionId`.
 */
export function attemptCount(outcomes: readonly ActionOutcome[], actionId: string): number {
  return outcomes.filter(o => o.actionId === actionId).length;
}

export class InMemoryActionOutcomeLog implements ActionOutcomeLog {
  private readonly entries = new Map<string, ActionOutcome[]>();

  async append(outcome: ActionOutcome): Promise<void> {
    const list = this.entries.get(outcome.decisionKey) ?? [];
    list.push(Object.freeze({ ...outcome }));
    this.entries.set(outcome.decisionKey, list);
  }

  async list(decisionKey: string): Promise<ActionOutcome[]> {
    return [...(this.entries.get(decisionKey) ?? [])];
  }

  decisionKeys(): string[] {
    return [...this.entries.keys()];
  }
}

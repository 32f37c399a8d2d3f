/**
 * Remediation action planning.
 *
 * Turns a traffic group's routing config into the ordered action list of a
 * decision: DNS first, then CDN, then scaling. `{region}` in a template is
 * replaced by the target region.
 */

import { ACTION_ORDER } from '@regionguard/types';
import type {
  DecisionKind,
  FailoverDecision,
  RegionId,
  RemediationAction,
  TrafficGroup,
} from '@regionguard/types';

export function renderTemplate(template: string, region: RegionId): string {
  return template.split('{region}').join(region);
}

export function planActions(group: TrafficGroup, targetRegion: RegionId): RemediationAction[] {
  const actions: RemediationAction[] = [];

  if (group.dns) {
    actions.push({
      kind: 'dns',
      zone: group.dns.zone,
      name: group.dns.recordName,
      newTarget: renderTemplate(group.dns.targetTemplate, targetRegion),
    });
  }
  if (group.cdn) {
    actions.push({
      kind: 'cdn',
      distributionId: group.cdn.distributionId,
      newOrigin: renderTemplate(group.cdn.originTemplate, targetRegion),
    });
  }
  if (group.scaling) {
    actions.push({
      kind: 'scaling',
      target: renderTemplate(group.scaling.targetTemplate, targetRegion),
      delta: group.scaling.delta,
    });
  }

  return actions.sort((a, b) => ACTION_ORDER.indexOf(a.kind) - ACTION_ORDER.indexOf(b.kind));
}

export interface DecisionInput {
  group: TrafficGroup;
  fromRegion: RegionId;
  toRegion: RegionId;
  reason: string;
  timestamp: number;
  kind: DecisionKind;
}

export function decisionKey(trafficGroup: string, timestamp: number, kind: DecisionKind): string {
  return kind === 'manual' ? `${trafficGroup}:${timestamp}:manual` : `${trafficGroup}:${timestamp}`;
}

/**
 * Build a frozen decision for moving `group` to `toRegion`.
 */
export function createDecision(input: DecisionInput): FailoverDecision {
  const actions = planActions(input.group, input.toRegion).map(action => Object.freeze(action));
  return Object.freeze({
    idempotencyKey: decisionKey(input.group.id, input.timestamp, input.kind),
    trafficGroup: input.group.id,
    fromRegion: input.fromRegion,
    toRegion: input.toRegion,
    reason: input.reason,
    timestamp: input.timestamp,
    kind: input.kind,
    actions: Object.freeze(actions),
  });
}

/**
 * Stable identifier of an action within its decision.
 */
export function actionId(index: number, action: RemediationAction): string {
  return `${index}:${action.kind}`;
}

import { LinkType } from '../link/operationLink';
import { Budget } from './budget';
import { PlannedOperation } from './plannedOperation';
import type { TargetId } from './types';

/**
 * Anything a transaction can be linked to.
 */
export type Target = PlannedOperation | Budget;

export type TargetKey = {
  readonly targetType: LinkType;
  readonly targetId: TargetId;
};

export function linkTypeOf(target: Target): LinkType {
  return target instanceof PlannedOperation ? LinkType.PLANNED_OPERATION : LinkType.BUDGET;
}

/**
 * Null for a target not stored yet.
 */
export function targetKeyOf(target: Target): TargetKey | null {
  return target.id === null ? null : { targetType: linkTypeOf(target), targetId: target.id };
}

export function formatTargetKey(key: TargetKey): string {
  return `${key.targetType}:${key.targetId}`;
}

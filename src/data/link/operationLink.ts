import { formatDate, parseDate } from '../../utils/date/date';
import type { DateString } from '../../utils/date/types';
import type { OperationId, TargetId } from '../operation/types';

export enum LinkType {
  PLANNED_OPERATION = 'planned_operation',
  BUDGET = 'budget',
}

/**
 * Association between one historic operation and one iteration of a planned
 * operation or budget. An operation carries at most one link.
 */
export type OperationLink = {
  readonly operationId: OperationId;
  readonly targetType: LinkType;
  readonly targetId: TargetId;
  /** Start date of the linked iteration. */
  readonly iterationDate: Date;
  /** True when created by the user, false when inferred by matching. */
  readonly isManual: boolean;
  readonly notes: string | null;
};

export type OperationLinkData = {
  operationId: OperationId;
  targetType: LinkType;
  targetId: TargetId;
  iterationDate: DateString;
  isManual: boolean;
  notes: string | null;
};

export function createLink(
  operationId: OperationId,
  targetType: LinkType,
  targetId: TargetId,
  iterationDate: Date,
  options: { isManual?: boolean; notes?: string | null } = {},
): OperationLink {
  return {
    operationId,
    targetType,
    targetId,
    iterationDate,
    isManual: options.isManual ?? false,
    notes: options.notes ?? null,
  };
}

export function isLinkTo(link: OperationLink, targetType: LinkType, targetId: TargetId): boolean {
  return link.targetType === targetType && link.targetId === targetId;
}

export function serializeLink(link: OperationLink): OperationLinkData {
  return { ...link, iterationDate: formatDate(link.iterationDate) };
}

export function deserializeLink(data: OperationLinkData): OperationLink {
  return { ...data, iterationDate: parseDate(data.iterationDate) };
}

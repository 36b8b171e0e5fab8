import { DateRange } from '../../data/interval/interval';
import { LinkType, OperationLink, createLink, isLinkTo } from '../../data/link/operationLink';
import { HistoricOperation } from '../../data/operation/historicOperation';
import { Target, TargetKey, targetKeyOf } from '../../data/operation/target';
import type { OperationId, TargetId } from '../../data/operation/types';
import { formatDate, isAfterOrSame, isSame } from '../date/date';
import { InvalidIterationError, UnsavedTargetError } from '../errors/errors';
import { debug, log } from '../log/logger';
import type { MatcherEntry } from './matcherCache';
import { computeMatchScore } from './matchScore';

type Candidate = {
  key: TargetKey;
  iterationDate: Date;
  score: number;
};

/**
 * Links every operation not linked yet to the best scoring target iteration
 * that accepts it. Returns only the new links, all automatic.
 */
export function createHeuristicLinks(
  operations: Iterable<HistoricOperation>,
  matchers: readonly MatcherEntry[],
  existingLinks: readonly OperationLink[] = [],
): OperationLink[] {
  const linkedOperations = new Set<OperationId>(existingLinks.map((link) => link.operationId));
  const created: OperationLink[] = [];

  for (const operation of operations) {
    if (linkedOperations.has(operation.uniqueId)) {
      continue;
    }

    let best: Candidate | null = null;
    for (const { key, matcher } of matchers) {
      if (!matcher.match(operation)) {
        continue;
      }
      const iteration = matcher.operationRange.interval.current(
        operation.date,
        matcher.approxBefore,
        matcher.approxAfter,
      );
      if (iteration === null) {
        continue;
      }
      const score = computeMatchScore(operation, matcher.operationRange, iteration.startDate, matcher.params);
      if (best === null || score > best.score) {
        best = { key, iterationDate: iteration.startDate, score };
      }
    }

    if (best !== null) {
      created.push(createLink(operation.uniqueId, best.key.targetType, best.key.targetId, best.iterationDate));
      linkedOperations.add(operation.uniqueId);
    }
  }

  if (created.length > 0) {
    log('Created heuristic links', { links: created.length });
  }
  return created;
}

export type LinkRecalculation = {
  /** Links after recalculation, for every target. */
  links: OperationLink[];
  /** Automatic links created for the target. */
  created: OperationLink[];
  /** Automatic links of the target that were dropped. */
  removed: OperationLink[];
};

/**
 * Drops the automatic links of a target and matches the operations again
 * against its current definition. Manual links are kept as they are.
 */
export function recalculateLinksForTarget(
  target: Target,
  operations: Iterable<HistoricOperation>,
  links: readonly OperationLink[],
): LinkRecalculation {
  const key = targetKeyOf(target);
  if (key === null) {
    return { links: [...links], created: [], removed: [] };
  }

  const removed = links.filter((link) => isLinkTo(link, key.targetType, key.targetId) && !link.isManual);
  const kept = links.filter((link) => !removed.includes(link));
  const manualLinks = kept.filter((link) => isLinkTo(link, key.targetType, key.targetId));

  const matcher = target.matcher.withLinks(manualLinks);
  const created = createHeuristicLinks(operations, [{ key, matcher }], kept);
  debug('Recalculated links', key.targetType, key.targetId, { removed: removed.length, created: created.length });
  return { links: [...kept, ...created], created, removed };
}

/**
 * Moves the links of iterations on or after `splitDate` from the terminated
 * target to its continuation. Manual flags and notes are preserved.
 */
export function migrateLinksAfterSplit(
  links: readonly OperationLink[],
  targetType: LinkType,
  oldTargetId: TargetId,
  newTargetId: TargetId,
  splitDate: Date,
): OperationLink[] {
  let migrated = 0;
  const result = links.map((link) => {
    if (!isLinkTo(link, targetType, oldTargetId) || !isAfterOrSame(link.iterationDate, splitDate)) {
      return link;
    }
    migrated += 1;
    return { ...link, targetId: newTargetId };
  });
  if (migrated > 0) {
    log('Migrated links after split', {
      targetType,
      from: oldTargetId,
      to: newTargetId,
      splitDate,
      links: migrated,
    });
  }
  return result;
}

/**
 * Builds a user link after checking the date starts one of the target's iterations.
 */
export function createManualLink(
  operation: HistoricOperation,
  target: Target,
  iterationDate: Date,
  notes: string | null = null,
): OperationLink {
  const key = targetKeyOf(target);
  if (key === null) {
    throw new UnsavedTargetError(target.description);
  }
  const iteration = target.interval.current(iterationDate);
  if (iteration === null || !isSame(iteration.startDate, iterationDate)) {
    throw new InvalidIterationError(
      `Invalid iteration date ${formatDate(iterationDate)} for '${target.description}'`,
      formatDate(iterationDate),
    );
  }
  return createLink(operation.uniqueId, key.targetType, key.targetId, iterationDate, { isManual: true, notes });
}

/**
 * First iteration from `fromDate` that no link points at. The iteration in
 * progress at `fromDate` counts. Null for a one-off target.
 */
export function nextNonActualizedIteration(
  target: Target,
  links: readonly OperationLink[],
  fromDate: Date,
): DateRange | null {
  const key = targetKeyOf(target);
  if (key === null || target.interval.kind !== 'recurring') {
    return null;
  }
  const linkedDates = new Set(
    links.filter((link) => isLinkTo(link, key.targetType, key.targetId)).map((link) => formatDate(link.iterationDate)),
  );
  for (const iteration of target.interval.iterate(fromDate)) {
    if (iteration.isExpired(fromDate)) {
      continue;
    }
    if (!linkedDates.has(formatDate(iteration.startDate))) {
      return iteration;
    }
  }
  return null;
}

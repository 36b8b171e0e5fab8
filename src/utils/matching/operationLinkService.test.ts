import { describe, it, expect } from 'vitest';
import {
  createHeuristicLinks,
  createManualLink,
  migrateLinksAfterSplit,
  nextNonActualizedIteration,
  recalculateLinksForTarget,
} from './operationLinkService';
import { MatcherCache } from './matcherCache';
import { Amount } from '../../data/amount/amount';
import { DateRange, RecurringDateRange, SingleDay } from '../../data/interval/interval';
import { LinkType, createLink } from '../../data/link/operationLink';
import { formatDate } from '../date/date';
import { months } from '../date/duration';
import { InvalidIterationError, UnsavedTargetError } from '../errors/errors';
import { createBudget, createOperation, createPlannedOperation, d } from '../test/mockData';

describe('operationLinkService', () => {
  const rent = createPlannedOperation();
  const groceries = createBudget({
    interval: new RecurringDateRange(new DateRange(d('2025-01-01'), months(1)), months(1)),
  });

  describe('createHeuristicLinks', () => {
    it('should link each unlinked operation to the target accepting it', () => {
      const cache = MatcherCache.fromForecast({ operations: [rent], budgets: [groceries] });
      const operations = [
        createOperation({ uniqueId: 1, date: '2025-01-02' }),
        createOperation({ uniqueId: 2, description: 'Market', amount: -40, category: 'Groceries', date: '2025-01-10' }),
        createOperation({ uniqueId: 3, date: '2025-01-20' }),
        createOperation({ uniqueId: 4, date: '2025-02-01' }),
      ];
      const existing = [createLink(4, LinkType.PLANNED_OPERATION, 1, d('2025-02-01'))];

      const created = createHeuristicLinks(operations, cache.entries(), existing);

      expect(created).toEqual([
        createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01')),
        createLink(2, LinkType.BUDGET, 1, d('2025-01-01')),
      ]);
    });

    it('should prefer the best scoring target', () => {
      const hinted = createPlannedOperation({ id: 2, matcherParams: { descriptionHints: new Set(['payment']) } });
      const cache = MatcherCache.fromForecast({ operations: [rent, hinted], budgets: [] });

      const created = createHeuristicLinks([createOperation({ date: '2025-01-02' })], cache.entries());

      expect(created).toEqual([createLink(1, LinkType.PLANNED_OPERATION, 2, d('2025-01-01'))]);
    });
  });

  describe('recalculateLinksForTarget', () => {
    it('should replace automatic links and keep manual ones', () => {
      const updated = rent.withAmount(new Amount(-850));
      const automatic = createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01'));
      const manual = createLink(2, LinkType.PLANNED_OPERATION, 1, d('2025-02-01'), { isManual: true });
      const other = createLink(3, LinkType.BUDGET, 1, d('2025-01-01'));
      const operations = [
        createOperation({ uniqueId: 1, amount: -850, date: '2025-01-03' }),
        createOperation({ uniqueId: 2, amount: -800, date: '2025-02-01' }),
        createOperation({ uniqueId: 3, amount: -850, category: 'Groceries', date: '2025-01-05' }),
      ];

      const result = recalculateLinksForTarget(updated, operations, [automatic, manual, other]);

      expect(result.removed).toEqual([automatic]);
      expect(result.created).toEqual([createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01'))]);
      expect(result.links).toEqual([manual, other, ...result.created]);
    });

    it('should leave links alone for a target not stored yet', () => {
      const links = [createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01'))];

      const result = recalculateLinksForTarget(createPlannedOperation({ id: null }), [], links);

      expect(result).toEqual({ links, created: [], removed: [] });
    });
  });

  describe('migrateLinksAfterSplit', () => {
    it('should move links from the split date to the continuation', () => {
      const before = createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01'));
      const after = createLink(2, LinkType.PLANNED_OPERATION, 1, d('2025-03-01'), { isManual: true, notes: 'bonus' });
      const otherTarget = createLink(3, LinkType.PLANNED_OPERATION, 2, d('2025-03-01'));
      const otherType = createLink(4, LinkType.BUDGET, 1, d('2025-03-01'));

      const migrated = migrateLinksAfterSplit(
        [before, after, otherTarget, otherType],
        LinkType.PLANNED_OPERATION,
        1,
        5,
        d('2025-03-01'),
      );

      expect(migrated).toEqual([before, { ...after, targetId: 5 }, otherTarget, otherType]);
    });
  });

  describe('createManualLink', () => {
    const operation = createOperation({ uniqueId: 8, date: '2025-02-03' });

    it('should link to an iteration start', () => {
      expect(createManualLink(operation, rent, d('2025-02-01'), 'late transfer')).toEqual({
        operationId: 8,
        targetType: LinkType.PLANNED_OPERATION,
        targetId: 1,
        iterationDate: d('2025-02-01'),
        isManual: true,
        notes: 'late transfer',
      });
    });

    it('should refuse a date off the iteration grid', () => {
      expect(() => createManualLink(operation, rent, d('2025-02-02'))).toThrow(InvalidIterationError);
    });

    it('should refuse a target not stored yet', () => {
      expect(() => createManualLink(operation, createBudget({ id: null }), d('2023-01-01'))).toThrow(
        UnsavedTargetError,
      );
    });
  });

  describe('nextNonActualizedIteration', () => {
    it('should skip linked iterations', () => {
      const links = [
        createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01')),
        createLink(2, LinkType.PLANNED_OPERATION, 1, d('2025-02-01')),
        createLink(3, LinkType.BUDGET, 1, d('2025-03-01')),
      ];

      const next = nextNonActualizedIteration(rent, links, d('2025-01-01'));

      expect(next && formatDate(next.startDate)).toBe('2025-03-01');
    });

    it('should skip iterations already over', () => {
      const next = nextNonActualizedIteration(rent, [], d('2025-02-15'));

      expect(next && formatDate(next.startDate)).toBe('2025-03-01');
    });

    it('should count the iteration in progress', () => {
      const next = nextNonActualizedIteration(groceries, [], d('2025-01-15'));

      expect(next && formatDate(next.startDate)).toBe('2025-01-01');
    });

    it('should return null for a one-off target', () => {
      const once = createPlannedOperation({ interval: new SingleDay(d('2025-01-01')) });

      expect(nextNonActualizedIteration(once, [], d('2024-12-01'))).toBeNull();
    });
  });
});

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MATCHER_PARAMS,
  OperationMatcher,
  UNBOUNDED_TOLERANCE,
  matchesDescriptionHints,
  ratioTolerance,
} from './operationMatcher';
import { Amount } from '../../data/amount/amount';
import { RecurringDay } from '../../data/interval/interval';
import { LinkType, createLink } from '../../data/link/operationLink';
import { OperationRange } from '../../data/operation/operationRange';
import { formatDate } from '../date/date';
import { days, months } from '../date/duration';
import { DuplicateLinkError, InvalidIntervalError, InvalidIterationError } from '../errors/errors';
import { createOperation, d } from '../test/mockData';

describe('OperationMatcher', () => {
  const rent = new OperationRange('Rent', new Amount(-800), 'Housing', new RecurringDay(d('2025-01-01'), months(1)));
  const matcher = new OperationMatcher(rent);

  it('should default to five days and five percent', () => {
    expect(matcher.approxBefore).toBe(5);
    expect(matcher.approxAfter).toBe(5);
    expect(matcher.amountTolerance).toEqual(ratioTolerance(0.05));
    expect(matcher.params).toEqual(DEFAULT_MATCHER_PARAMS);
  });

  it('should reject negative tolerances', () => {
    expect(() => new OperationMatcher(rent, { approxBefore: -1 })).toThrow(InvalidIntervalError);
    expect(() => matcher.withParams({ amountTolerance: ratioTolerance(-0.1) })).toThrow(InvalidIntervalError);
  });

  describe('heuristics', () => {
    it('should accept amounts within the ratio of the planned amount', () => {
      expect(matcher.matchAmount(createOperation({ amount: -840 }))).toBe(true);
      expect(matcher.matchAmount(createOperation({ amount: -850 }))).toBe(false);
    });

    it('should refuse another currency', () => {
      const dollars = createOperation().withAmount(new Amount(-800, 'USD'));

      expect(matcher.matchAmount(dollars)).toBe(false);
    });

    it('should accept any amount when unbounded', () => {
      const unbounded = matcher.withParams({ amountTolerance: UNBOUNDED_TOLERANCE });

      expect(unbounded.matchAmount(createOperation({ amount: -5 }))).toBe(true);
    });

    it('should compare categories exactly', () => {
      expect(matcher.matchCategory(createOperation({ category: 'Housing' }))).toBe(true);
      expect(matcher.matchCategory(createOperation({ category: 'housing' }))).toBe(false);
    });

    it('should look for description hints ignoring case', () => {
      const hinted = matcher.withParams({ descriptionHints: new Set(['landlord']) });

      expect(hinted.matchDescription(createOperation({ description: 'Transfer to LANDLORD' }))).toBe(true);
      expect(hinted.match(createOperation({ description: 'Card payment' }))).toBe(false);
      expect(matchesDescriptionHints('anything', new Set())).toBe(false);
    });

    it('should skip the description when no hints are configured', () => {
      expect(matcher.match(createOperation({ description: 'Card payment' }))).toBe(true);
    });

    it('should accept dates inside a widened iteration', () => {
      expect(matcher.matchDate(createOperation({ date: '2025-02-04' }))).toBe(true);
      expect(matcher.matchDate(createOperation({ date: '2025-01-27' }))).toBe(true);
      expect(matcher.matchDate(createOperation({ date: '2025-01-15' }))).toBe(false);
    });

    it('should assign the closest reachable iteration', () => {
      expect(formatDate(matcher.iterationFor(createOperation({ date: '2025-01-29' })) ?? d('2000-01-01'))).toBe(
        '2025-02-01',
      );
      expect(matcher.iterationFor(createOperation({ date: '2025-01-15' }))).toBeNull();
    });
  });

  describe('links', () => {
    const unusual = createOperation({ uniqueId: 7, amount: -300, category: 'Other', date: '2025-01-30' });
    const linked = new OperationMatcher(rent, {}, [createLink(7, LinkType.PLANNED_OPERATION, 1, d('2025-01-01'))]);

    it('should match a linked operation whatever the heuristics say', () => {
      expect(matcher.match(unusual)).toBe(false);
      expect(linked.match(unusual)).toBe(true);
      expect(linked.isLinked(unusual)).toBe(true);
    });

    it('should use the linked iteration over the heuristic one', () => {
      const nearFebruary = createOperation({ uniqueId: 7, date: '2025-01-30' });

      expect(formatDate(matcher.iterationFor(nearFebruary) ?? d('2000-01-01'))).toBe('2025-02-01');
      expect(formatDate(linked.iterationFor(nearFebruary) ?? d('2000-01-01'))).toBe('2025-01-01');
    });

    it('should reject a link off the iteration grid', () => {
      expect(() => new OperationMatcher(rent, {}, [createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-02'))])).toThrow(
        InvalidIterationError,
      );
    });

    it('should reject two links for one operation', () => {
      const links = [
        createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-01-01')),
        createLink(1, LinkType.PLANNED_OPERATION, 1, d('2025-02-01')),
      ];

      expect(() => new OperationMatcher(rent, {}, links)).toThrow(DuplicateLinkError);
    });

    it('should keep links only while the range is unchanged', () => {
      expect(linked.withOperationRange(rent.withDescription('Rent')).links).toHaveLength(1);
      expect(linked.withOperationRange(rent.withAmount(new Amount(-900))).links).toHaveLength(0);
      expect(linked.withParams({ approxAfter: 2 }).links).toHaveLength(1);
    });
  });

  describe('pool queries', () => {
    const january = createOperation({ uniqueId: 1, date: '2025-01-02' });
    const february = createOperation({ uniqueId: 2, date: '2025-02-03' });
    const groceries = createOperation({ uniqueId: 3, category: 'Groceries', date: '2025-02-03' });

    it('should list every matching operation', () => {
      expect(matcher.matches([january, february, groceries])).toEqual([january, february]);
    });

    it('should restrict to the iteration current at a date', () => {
      expect(matcher.latestMatchingOperations(d('2025-02-03'), [january, february, groceries])).toEqual([february]);
      expect(matcher.latestMatchingOperations(d('2025-02-15'), [january, february])).toEqual([]);
    });

    it('should report a due iteration without a matching operation as late', () => {
      const late = matcher.lateDateRanges(d('2025-02-04'), [january]);

      expect(late.map((range) => formatDate(range.startDate))).toEqual(['2025-02-01']);
    });

    it('should not report an explained iteration as late', () => {
      expect(matcher.lateDateRanges(d('2025-02-04'), [january, february])).toEqual([]);
    });

    it('should stop reporting once the tolerance window has closed', () => {
      expect(matcher.lateDateRanges(d('2025-02-10'), [january])).toEqual([]);
    });

    it('should let one operation explain a single iteration', () => {
      const everyOtherDay = new OperationMatcher(
        new OperationRange('Cleaning', new Amount(-50), 'Home', new RecurringDay(d('2025-01-01'), days(2))),
        { approxBefore: 2, approxAfter: 2 },
      );
      const paid = createOperation({ uniqueId: 9, amount: -50, category: 'Home', date: '2025-01-04' });

      const late = everyOtherDay.lateDateRanges(d('2025-01-05'), [paid]);

      expect(late.map((range) => formatDate(range.startDate))).toEqual(['2025-01-05']);
    });

    it('should pair future iterations with operations paid early', () => {
      const early = createOperation({ uniqueId: 4, date: '2025-01-28' });

      const anticipated = matcher.anticipatedDateRanges(d('2025-01-28'), [early]);

      expect(anticipated.map(([range, operation]) => [formatDate(range.startDate), operation.uniqueId])).toEqual([
        ['2025-02-01', 4],
      ]);
    });

    it('should ignore operations dated after the reference date', () => {
      const later = createOperation({ uniqueId: 5, date: '2025-01-30' });

      expect(matcher.anticipatedDateRanges(d('2025-01-28'), [later])).toEqual([]);
    });
  });
});

import { Account } from '../../data/account/account';
import { Amount } from '../../data/amount/amount';
import { DateRange, SingleDay, compareIntervals } from '../../data/interval/interval';
import { LinkType, OperationLink } from '../../data/link/operationLink';
import { Budget } from '../../data/operation/budget';
import { PlannedOperation } from '../../data/operation/plannedOperation';
import type { OperationId, PlannedOperationId } from '../../data/operation/types';
import { addDays, daysBetween, formatDate, isAfter, isBefore, isBeforeOrSame, parseDate } from '../date/date';
import type { DateString } from '../date/types';
import { days } from '../date/duration';
import { debug } from '../log/logger';
import type { Forecast } from './forecast';

type IterationKey = `${number}@${DateString}`;

function iterationKey(targetId: number, iterationDate: Date): IterationKey {
  return `${targetId}@${formatDate(iterationDate)}`;
}

/**
 * Brings a forecast up to date with what actually happened on an account.
 *
 * Planned operations move past the iterations already paid and keep the
 * iterations that are due but unpaid by postponing them to the day after the
 * balance date. Budgets are cut down to what remains of their current
 * iteration once the linked transactions are deducted.
 *
 * Links are the only source of truth here: heuristic matches must have been
 * turned into links beforehand.
 */
export class ForecastActualizer {
  private readonly account: Account;
  private readonly links: readonly OperationLink[];

  private readonly linkedIterations = new Map<PlannedOperationId, DateString[]>();
  private readonly plannedLinkedOperations = new Map<IterationKey, OperationId[]>();
  private readonly budgetLinkedOperations = new Map<IterationKey, OperationId[]>();
  private readonly operationDates = new Map<OperationId, Date>();

  constructor(account: Account, links: readonly OperationLink[] = []) {
    this.account = account;
    this.links = links;
    for (const operation of account.operations) {
      this.operationDates.set(operation.uniqueId, operation.date);
    }
    this.buildIndexes();
  }

  private buildIndexes(): void {
    for (const link of this.links) {
      const key = iterationKey(link.targetId, link.iterationDate);
      switch (link.targetType) {
        case LinkType.PLANNED_OPERATION: {
          const dates = this.linkedIterations.get(link.targetId) ?? [];
          const date = formatDate(link.iterationDate);
          if (!dates.includes(date)) {
            dates.push(date);
          }
          this.linkedIterations.set(link.targetId, dates);
          this.plannedLinkedOperations.set(key, [...(this.plannedLinkedOperations.get(key) ?? []), link.operationId]);
          break;
        }
        case LinkType.BUDGET:
          this.budgetLinkedOperations.set(key, [...(this.budgetLinkedOperations.get(key) ?? []), link.operationId]);
          break;
      }
    }
    debug('Built link indexes', {
      links: this.links.length,
      plannedOperations: this.linkedIterations.size,
      budgetIterations: this.budgetLinkedOperations.size,
    });
  }

  get balanceDate(): Date {
    return this.account.balanceDate;
  }

  actualize(forecast: Forecast): Forecast {
    return {
      operations: this.actualizePlannedOperations(forecast.operations),
      budgets: this.actualizeBudgets(forecast.budgets),
    };
  }

  private linkedIterationDates(plannedOperation: PlannedOperation): DateString[] {
    if (plannedOperation.id === null) {
      return [];
    }
    return this.linkedIterations.get(plannedOperation.id) ?? [];
  }

  private linkedOperationIds(budget: Budget, iterationDate: Date): OperationId[] {
    if (budget.id === null) {
      return [];
    }
    return this.budgetLinkedOperations.get(iterationKey(budget.id, iterationDate)) ?? [];
  }

  /**
   * Iterations started before the balance date, still inside the after
   * tolerance window, and without any link.
   */
  private lateIterations(plannedOperation: PlannedOperation, linkedDates: readonly DateString[]): DateRange[] {
    if (plannedOperation.id === null) {
      return [];
    }
    const approximation = plannedOperation.matcher.approxAfter;
    const late: DateRange[] = [];
    for (const iteration of plannedOperation.interval.iterate(addDays(this.balanceDate, -approximation))) {
      if (!isBefore(iteration.startDate, this.balanceDate)) {
        break;
      }
      if (!iteration.isWithin(this.balanceDate, 0, approximation)) {
        continue;
      }
      if (!linkedDates.includes(formatDate(iteration.startDate))) {
        late.push(iteration);
      }
    }
    return late;
  }

  /**
   * One single-day copy per late iteration on the day after the balance date,
   * then the recurring operation moved past that day.
   */
  private postponeLateIterations(plannedOperation: PlannedOperation, late: readonly DateRange[]): PlannedOperation[] {
    const postponedDate = addDays(this.balanceDate, 1);
    const result: PlannedOperation[] = late.map(() => plannedOperation.withInterval(new SingleDay(postponedDate)));

    const next = plannedOperation.interval.next(postponedDate);
    if (next !== null) {
      result.push(plannedOperation.withStartDate(next.startDate));
    }
    debug('Postponed late iterations', plannedOperation.id, {
      late: late.length,
      to: postponedDate,
    });
    return result;
  }

  /**
   * An iteration is actualized once its date is reached, or once a transaction
   * linked to it has happened.
   */
  private isIterationActualized(plannedOperationId: PlannedOperationId, iterationDate: Date): boolean {
    if (isBeforeOrSame(iterationDate, this.balanceDate)) {
      return true;
    }
    const linked = this.plannedLinkedOperations.get(iterationKey(plannedOperationId, iterationDate)) ?? [];
    return linked.some((operationId) => {
      const operationDate = this.operationDates.get(operationId);
      return operationDate !== undefined && isBeforeOrSame(operationDate, this.balanceDate);
    });
  }

  private advancePlannedOperation(
    plannedOperation: PlannedOperation,
    linkedDates: readonly DateString[],
  ): PlannedOperation | null {
    const id = plannedOperation.id;
    if (id === null) {
      return plannedOperation;
    }

    const actualized = linkedDates
      .map((date) => parseDate(date))
      .filter((date) => this.isIterationActualized(id, date));

    if (actualized.length === 0) {
      if (plannedOperation.interval.isFuture(this.balanceDate)) {
        return plannedOperation;
      }
      const next = plannedOperation.interval.next(this.balanceDate);
      return next === null ? null : plannedOperation.withStartDate(next.startDate);
    }

    const lastActualized = actualized.reduce((latest, date) => (isAfter(date, latest) ? date : latest));
    const next = plannedOperation.interval.next(lastActualized);
    return next === null ? null : plannedOperation.withStartDate(next.startDate);
  }

  private actualizePlannedOperations(plannedOperations: readonly PlannedOperation[]): PlannedOperation[] {
    const sorted = [...plannedOperations].sort((a, b) => daysBetween(b.interval.startDate, a.interval.startDate));
    const result: PlannedOperation[] = [];
    for (const plannedOperation of sorted) {
      const linkedDates = this.linkedIterationDates(plannedOperation);
      const late = this.lateIterations(plannedOperation, linkedDates);
      if (late.length > 0) {
        result.push(...this.postponeLateIterations(plannedOperation, late));
        continue;
      }
      const updated = this.advancePlannedOperation(plannedOperation, linkedDates);
      if (updated !== null) {
        result.push(updated);
      }
    }
    return result;
  }

  /**
   * Remaining part of a budget iteration once its linked transactions are
   * deducted, starting the day after the balance date. Null when nothing remains.
   */
  private consumeBudget(budget: Budget, linkedOperationIds: readonly OperationId[]): Budget | null {
    debug('Actualizing budget', budget.id, { category: budget.category, links: linkedOperationIds.length });
    let remaining = budget.amount.value;

    for (const operationId of linkedOperationIds) {
      const operation = this.account.operationById(operationId);
      if (operation === undefined) {
        continue;
      }
      // A positive budget only absorbs incomes, a negative one only expenses
      if (operation.amount.value * remaining < 0) {
        continue;
      }
      const consumed =
        remaining > 0 ? Math.min(operation.amount.value, remaining) : Math.max(operation.amount.value, remaining);
      remaining -= consumed;
      if (remaining === 0) {
        debug('Budget fully consumed', budget.id);
        return null;
      }
    }

    debug('Budget consumption', budget.id, {
      consumed: (budget.amount.value - remaining).toFixed(2),
      remaining: remaining.toFixed(2),
    });

    const newStart = addDays(this.balanceDate, 1);
    const lastDate = budget.interval.lastDate;
    if (isAfter(newStart, lastDate)) {
      return null;
    }
    return budget
      .withInterval(new DateRange(newStart, days(daysBetween(newStart, lastDate) + 1)))
      .withAmount(new Amount(remaining, budget.currency));
  }

  private actualizeBudgets(budgets: readonly Budget[]): Budget[] {
    const sorted = [...budgets].sort((a, b) => compareIntervals(a.interval, b.interval));
    const result: Budget[] = [];
    for (const budget of sorted) {
      if (budget.interval.isExpired(this.balanceDate)) {
        continue;
      }

      const current = budget.interval.current(this.balanceDate);
      if (current !== null) {
        const currentBudget = budget.withInterval(current);
        const remaining = this.consumeBudget(currentBudget, this.linkedOperationIds(budget, current.startDate));
        if (remaining !== null) {
          result.push(remaining);
        }
        const next = budget.interval.next(this.balanceDate);
        if (next !== null) {
          result.push(budget.withInterval(budget.interval.withStartDate(next.startDate)));
        }
        continue;
      }

      if (budget.interval.isFuture(this.balanceDate)) {
        result.push(budget);
        continue;
      }

      // Between two iterations of a recurring budget
      const next = budget.interval.next(this.balanceDate);
      if (next !== null) {
        result.push(budget.withInterval(budget.interval.withStartDate(next.startDate)));
      }
    }
    return result;
  }
}

export function actualizeForecast(account: Account, forecast: Forecast, links: readonly OperationLink[] = []): Forecast {
  return new ForecastActualizer(account, links).actualize(forecast);
}

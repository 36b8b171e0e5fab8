import { Account } from '../../data/account/account';
import { Amount } from '../../data/amount/amount';
import { HistoricOperation } from '../../data/operation/historicOperation';
import { OperationRange } from '../../data/operation/operationRange';
import { addDays, formatDate, isAfter, isBefore, isBeforeOrSame, isSame, maxDate, minDate } from '../date/date';
import { InvalidIntervalError } from '../errors/errors';
import type { DateString } from '../date/types';
import type { Forecast } from './forecast';

export type BalancePoint = {
  date: Date;
  balance: number;
};

/**
 * Rebuilds the state of an account at any date: rewinds recorded
 * transactions for a past date, and spreads the forecast over the days up to
 * a future date.
 */
export class AccountForecaster {
  private readonly account: Account;
  private readonly forecast: Forecast;

  constructor(account: Account, forecast: Forecast) {
    this.account = account;
    this.forecast = forecast;
  }

  at(targetDate: Date): Account {
    const balanceDate = this.account.balanceDate;
    if (isSame(targetDate, balanceDate)) {
      return this.account;
    }
    if (isBefore(targetDate, balanceDate)) {
      return this.pastState(targetDate);
    }
    return this.futureState(targetDate);
  }

  private pastState(targetDate: Date): Account {
    let balance = this.account.balance;
    const operations: HistoricOperation[] = [];
    for (const operation of this.account.operations) {
      if (isAfter(operation.date, targetDate) && isBeforeOrSame(operation.date, this.account.balanceDate)) {
        balance -= operation.amount.value;
        continue;
      }
      operations.push(operation);
    }
    return this.account.withState(balance, targetDate, operations);
  }

  private futureState(targetDate: Date): Account {
    let nextId = this.account.maxOperationId;
    let balance = this.account.balance;
    const operations: HistoricOperation[] = [...this.account.operations];

    const ranges: OperationRange[] = [...this.forecast.operations, ...this.forecast.budgets];
    for (const range of ranges) {
      for (const { date, amount } of this.spread(range, targetDate)) {
        nextId += 1;
        operations.push(
          new HistoricOperation({
            uniqueId: nextId,
            description: range.description,
            amount: new Amount(amount, range.currency),
            category: range.category,
            date,
          }),
        );
        balance += amount;
      }
    }
    return this.account.withState(balance, targetDate, operations);
  }

  /**
   * Daily shares of every iteration between the day after the balance date and `targetDate`.
   */
  private *spread(range: OperationRange, targetDate: Date): Generator<{ date: Date; amount: number }> {
    const balanceDate = this.account.balanceDate;
    for (const iteration of range.interval.iterate(balanceDate)) {
      if (iteration.isFuture(targetDate)) {
        break;
      }
      if (iteration.isExpired(balanceDate)) {
        continue;
      }
      const amountPerDay = range.amount.value / iteration.totalDays;
      const lastDay = minDate(iteration.lastDate, targetDate);
      let day = maxDate(iteration.startDate, addDays(balanceDate, 1));
      while (isBeforeOrSame(day, lastDay)) {
        yield { date: day, amount: amountPerDay };
        day = addDays(day, 1);
      }
    }
  }

  /**
   * Balance at the end of each day from `from` to `to`, both included.
   */
  balanceEvolution(from: Date, to: Date): BalancePoint[] {
    if (isAfter(from, to)) {
      throw new InvalidIntervalError(`Evolution start ${formatDate(from)} is after its end ${formatDate(to)}`);
    }
    const balanceDate = this.account.balanceDate;
    const recordedIds = this.account.maxOperationId;
    const movements = new Map<DateString, number>();
    const record = (operation: HistoricOperation): void => {
      const key = formatDate(operation.date);
      movements.set(key, (movements.get(key) ?? 0) + operation.amount.value);
    };

    for (const operation of this.account.operations) {
      if (isBeforeOrSame(operation.date, balanceDate)) {
        record(operation);
      }
    }
    if (isAfter(to, balanceDate)) {
      for (const operation of this.at(to).operations) {
        if (operation.uniqueId > recordedIds) {
          record(operation);
        }
      }
    }

    const points: BalancePoint[] = [];
    let balance = this.at(from).balance;
    for (let day = from; isBeforeOrSame(day, to); day = addDays(day, 1)) {
      if (!isSame(day, from)) {
        balance += movements.get(formatDate(day)) ?? 0;
      }
      points.push({ date: day, balance });
    }
    return points;
  }
}

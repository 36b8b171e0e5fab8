import { HistoricOperation } from '../operation/historicOperation';
import { DEFAULT_CURRENCY } from '../amount/amount';
import { formatDate } from '../../utils/date/date';
import type { OperationId } from '../operation/types';

export type AccountData = {
  name: string;
  balance: number;
  currency?: string;
  balanceDate: Date;
  operations?: readonly HistoricOperation[];
};

/**
 * Snapshot of an account: its balance as of `balanceDate` and the
 * transactions recorded so far, kept in date order.
 */
export class Account {
  readonly name: string;
  readonly balance: number;
  readonly currency: string;
  readonly balanceDate: Date;
  readonly operations: readonly HistoricOperation[];

  constructor(data: AccountData) {
    this.name = data.name;
    this.balance = data.balance;
    this.currency = data.currency ?? DEFAULT_CURRENCY;
    this.balanceDate = data.balanceDate;
    this.operations = [...(data.operations ?? [])].sort(
      (a, b) => a.date.getTime() - b.date.getTime() || a.uniqueId - b.uniqueId,
    );
  }

  /**
   * Highest transaction id, 0 for an empty account.
   */
  get maxOperationId(): OperationId {
    return this.operations.reduce((max, operation) => Math.max(max, operation.uniqueId), 0);
  }

  operationById(id: OperationId): HistoricOperation | undefined {
    return this.operations.find((operation) => operation.uniqueId === id);
  }

  withState(balance: number, balanceDate: Date, operations: readonly HistoricOperation[]): Account {
    return new Account({ name: this.name, currency: this.currency, balance, balanceDate, operations });
  }

  toString(): string {
    return `${this.name}: ${this.balance.toFixed(2)} ${this.currency} on ${formatDate(this.balanceDate)}`;
  }
}

import { Amount } from '../amount/amount';
import { SingleDay } from '../interval/interval';
import { OperationRange } from './operationRange';
import type { Category, OperationId } from './types';

export type HistoricOperationData = {
  uniqueId: OperationId;
  description: string;
  amount: Amount;
  category: Category;
  date: Date;
};

/**
 * A transaction that already happened on the account.
 */
export class HistoricOperation extends OperationRange<SingleDay> {
  readonly uniqueId: OperationId;

  constructor(data: HistoricOperationData) {
    super(data.description, data.amount, data.category, new SingleDay(data.date));
    this.uniqueId = data.uniqueId;
  }

  get date(): Date {
    return this.interval.startDate;
  }

  private toData(): HistoricOperationData {
    return {
      uniqueId: this.uniqueId,
      description: this.description,
      amount: this.amount,
      category: this.category,
      date: this.date,
    };
  }

  override withDescription(description: string): HistoricOperation {
    return new HistoricOperation({ ...this.toData(), description });
  }

  override withAmount(amount: Amount): HistoricOperation {
    return new HistoricOperation({ ...this.toData(), amount });
  }

  override withCategory(category: Category): HistoricOperation {
    return new HistoricOperation({ ...this.toData(), category });
  }

  withDate(date: Date): HistoricOperation {
    return new HistoricOperation({ ...this.toData(), date });
  }

  override toString(): string {
    return `${this.uniqueId} - ${super.toString()}`;
  }
}

import { Bill } from '../ledger/Bill';
import { Contract } from '../contracts/Contract';
import { PreconditionViolationError } from '../errors/BillingErrors';
import { BillSummary, CallRecord } from '../types';

/**
 * A phone line and its month-by-month bills.
 *
 * The line owns one Bill per opened month and hands the current one to its
 * contract; calls are only accepted for months that have been opened.
 */
export class PhoneLine {
  private bills: Map<string, Bill> = new Map();
  private currentKey: string | null = null;

  constructor(readonly number: string, readonly contract: Contract) {}

  get isActive(): boolean {
    return this.contract.isActive;
  }

  /**
   * Open <month>/<year> on this line. Re-opening the current month is a no-op.
   */
  newMonth(month: number, year: number): void {
    const key = monthKey(month, year);
    if (this.currentKey === key) {
      return;
    }

    const bill = new Bill(month, year);
    this.contract.advanceMonth(month, year, bill);
    this.bills.set(key, bill);
    this.currentKey = key;
  }

  makeCall(call: CallRecord): void {
    const key = monthKey(call.time.getMonth() + 1, call.time.getFullYear());
    if (key !== this.currentKey) {
      throw new PreconditionViolationError(
        `Line ${this.number} has no open bill for ${key}; open the month before billing its calls`
      );
    }
    this.contract.billCall(call);
  }

  /**
   * Cancel the contract and return the amount owed
   */
  cancelLine(): number {
    return this.contract.cancel();
  }

  getBill(month: number, year: number): BillSummary | null {
    return this.bills.get(monthKey(month, year))?.getSummary() ?? null;
  }

  getMonthlyHistory(): BillSummary[] {
    return Array.from(this.bills.values())
      .map(bill => bill.getSummary())
      .sort((a, b) => a.year - b.year || a.month - b.month);
  }
}

function monthKey(month: number, year: number): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}

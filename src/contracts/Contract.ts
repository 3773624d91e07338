import { Bill } from '../ledger/Bill';
import { billableMinutes } from '../calls/Call';
import { PreconditionViolationError } from '../errors/BillingErrors';
import { CallRecord, ContractType, RateSchedule } from '../types';

/**
 * A contract for a phone line.
 *
 * A driver advances the contract into each month with a fresh Bill, bills
 * that month's calls against it, and may finally cancel the contract, which
 * returns the amount owed and leaves the contract inactive for good.
 */
export abstract class Contract {
  abstract readonly type: ContractType;

  protected activeBill: Bill | null = null;
  private startDate: Date | null;

  constructor(start: Date, protected readonly rates: RateSchedule) {
    this.startDate = start;
  }

  get start(): Date | null {
    return this.startDate;
  }

  get isActive(): boolean {
    return this.startDate !== null;
  }

  /**
   * Open the month <month>/<year> (month is 1-12) on <bill>: set the plan's
   * rate and fixed costs and keep the bill as the active one.
   */
  abstract advanceMonth(month: number, year: number, bill: Bill): void;

  billCall(call: CallRecord): void {
    this.requireBill('bill a call').addBilledMinutes(billableMinutes(call));
  }

  /**
   * Close the line and return what the customer owes for the current month.
   */
  cancel(): number {
    const bill = this.requireBill('cancel');
    this.startDate = null;
    const owed = this.settle(bill);
    this.activeBill = null;
    return owed;
  }

  /**
   * Final amount for a cancelled contract; plans apply refunds or floors here.
   */
  protected settle(bill: Bill): number {
    return bill.getCost();
  }

  protected bind(bill: Bill): void {
    this.activeBill = bill;
  }

  /**
   * Contract start as a Date, failing once the contract has been cancelled
   */
  protected requireStart(action: string): Date {
    if (this.startDate === null) {
      throw new PreconditionViolationError(`Cannot ${action}: the ${this.type} contract has been cancelled`);
    }
    return this.startDate;
  }

  protected requireBill(action: string): Bill {
    this.requireStart(action);
    if (this.activeBill === null) {
      throw new PreconditionViolationError(`Cannot ${action}: no bill has been opened for the current month`);
    }
    return this.activeBill;
  }
}

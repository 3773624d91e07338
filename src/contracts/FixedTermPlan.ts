import { differenceInCalendarMonths, isBefore, isSameMonth } from 'date-fns';
import { Bill } from '../ledger/Bill';
import { billableMinutes } from '../calls/Call';
import { InvalidContractError } from '../errors/BillingErrors';
import { CallRecord, RateSchedule } from '../types';
import { Contract } from './Contract';

/**
 * Fixed-term commitment.
 *
 * A deposit is charged in the first month and refunded on cancellation only
 * if the contract has been billed into its end month. Each month includes a
 * quota of free minutes; usage beyond it is billed at the term rate.
 */
export class FixedTermPlan extends Contract {
  readonly type = 'term' as const;

  private released = false;
  private usedThisMonth = 0;

  constructor(start: Date, readonly end: Date, rates: RateSchedule) {
    super(start, rates);
    if (isBefore(end, start)) {
      throw new InvalidContractError(`Term contract ends (${end.toISOString()}) before it starts (${start.toISOString()})`);
    }
  }

  get depositReleased(): boolean {
    return this.released;
  }

  get minutesUsedThisMonth(): number {
    return this.usedThisMonth;
  }

  advanceMonth(month: number, year: number, bill: Bill): void {
    const start = this.requireStart('advance the month');
    const { monthlyFee, perMinute, deposit } = this.rates.term;
    const billed = new Date(year, month - 1, 1);

    bill.setRates('TERM', perMinute);
    bill.addFixedCost(monthlyFee);
    this.usedThisMonth = 0;

    if (isSameMonth(billed, start)) {
      bill.addFixedCost(deposit);
    } else if (differenceInCalendarMonths(billed, this.end) >= 0) {
      // Reached the end month: the deposit goes back on cancellation
      this.released = true;
    }

    this.bind(bill);
  }

  billCall(call: CallRecord): void {
    const bill = this.requireBill('bill a call');
    const minutes = billableMinutes(call);
    const overage = this.usedThisMonth + minutes - this.rates.term.includedMinutes;
    const billed = Math.min(minutes, Math.max(0, overage));

    bill.addBilledMinutes(billed);
    bill.addFreeMinutes(minutes - billed);
    this.usedThisMonth += minutes;
  }

  protected settle(bill: Bill): number {
    if (this.released) {
      bill.addFixedCost(-this.rates.term.deposit);
    }
    return bill.getCost();
  }
}

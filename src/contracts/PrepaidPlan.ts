import { Bill } from '../ledger/Bill';
import { RateSchedule } from '../types';
import { Contract } from './Contract';

/**
 * Prepaid credit.
 *
 * The balance is negative while the customer has credit. Every month the
 * balance is carried onto the bill as a fixed cost, and when the remaining
 * credit falls under the threshold the line is topped up (and the top-up
 * billed). Unused credit is never paid back on cancellation.
 */
export class PrepaidPlan extends Contract {
  readonly type = 'prepaid' as const;

  private currentBalance: number;
  private toppedUp = 0;

  constructor(start: Date, initialCredit: number, rates: RateSchedule) {
    super(start, rates);
    this.currentBalance = -initialCredit;
  }

  get balance(): number {
    return this.currentBalance;
  }

  /**
   * Sum of every automatic top-up charged so far
   */
  get topUpsCharged(): number {
    return this.toppedUp;
  }

  advanceMonth(month: number, year: number, bill: Bill): void {
    this.requireStart('advance the month');
    const { perMinute, topUpThreshold, topUpAmount } = this.rates.prepaid;

    if (this.currentBalance > topUpThreshold) {
      this.currentBalance -= topUpAmount;
      this.toppedUp += topUpAmount;
      bill.addFixedCost(topUpAmount);
    }
    bill.setRates('PREPAID', perMinute);
    bill.addFixedCost(this.currentBalance);
    this.bind(bill);
  }

  protected settle(bill: Bill): number {
    const cost = bill.getCost();
    return cost < 0 ? 0 : cost;
  }
}

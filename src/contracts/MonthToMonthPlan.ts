import { Bill } from '../ledger/Bill';
import { Contract } from './Contract';

/**
 * No commitment: flat monthly fee and every minute billed at the MTM rate.
 */
export class MonthToMonthPlan extends Contract {
  readonly type = 'mtm' as const;

  advanceMonth(month: number, year: number, bill: Bill): void {
    this.requireStart('advance the month');
    const { monthlyFee, perMinute } = this.rates.monthToMonth;

    bill.setRates('MTM', perMinute);
    bill.addFixedCost(monthlyFee);
    this.bind(bill);
  }
}

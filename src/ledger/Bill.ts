import { BillSummary, PlanLabel } from '../types';

/**
 * Monthly ledger for one phone line.
 *
 * Contracts set the rate once per month and then accumulate fixed costs
 * (signed: refunds and prepaid credit arrive as negative amounts) and
 * minutes. The total is fixed costs plus rate times billed minutes.
 */
export class Bill {
  private planLabel: PlanLabel | null = null;
  private minuteRate = 0;
  private fixedCost = 0;
  private billedMinutes = 0;
  private freeMinutes = 0;

  constructor(readonly month: number, readonly year: number) {}

  setRates(planLabel: PlanLabel, perMinuteRate: number): void {
    this.planLabel = planLabel;
    this.minuteRate = perMinuteRate;
  }

  addFixedCost(amount: number): void {
    this.fixedCost += amount;
  }

  addBilledMinutes(count: number): void {
    this.billedMinutes += count;
  }

  addFreeMinutes(count: number): void {
    this.freeMinutes += count;
  }

  /**
   * Total owed for the month, unrounded
   */
  getCost(): number {
    return this.fixedCost + this.minuteRate * this.billedMinutes;
  }

  getSummary(): BillSummary {
    return {
      month: this.month,
      year: this.year,
      type: this.planLabel,
      fixed: this.fixedCost,
      free_mins: this.freeMinutes,
      billed_mins: this.billedMinutes,
      min_rate: this.minuteRate,
      total: this.getCost(),
    };
  }
}

import { parseISO } from 'date-fns';
import { ContractSpec, RateSchedule } from '../types';
import { DEFAULT_RATES } from '../config/RateSchedule';
import { Contract } from './Contract';
import { MonthToMonthPlan } from './MonthToMonthPlan';
import { FixedTermPlan } from './FixedTermPlan';
import { PrepaidPlan } from './PrepaidPlan';

export class ContractFactory {
  constructor(private rates: RateSchedule = DEFAULT_RATES) {}

  /**
   * Build the plan described by a validated contract spec
   */
  create(spec: ContractSpec): Contract {
    const start = parseISO(spec.start);

    switch (spec.type) {
      case 'mtm':
        return new MonthToMonthPlan(start, this.rates);
      case 'term':
        return new FixedTermPlan(start, parseISO(spec.end), this.rates);
      case 'prepaid':
        return new PrepaidPlan(start, spec.balance, this.rates);
    }
  }
}

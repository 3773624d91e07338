export { Contract } from './Contract';
export { MonthToMonthPlan } from './MonthToMonthPlan';
export { FixedTermPlan } from './FixedTermPlan';
export { PrepaidPlan } from './PrepaidPlan';
export { ContractFactory } from './ContractFactory';

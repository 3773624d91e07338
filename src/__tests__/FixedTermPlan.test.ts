import { FixedTermPlan } from '../contracts/FixedTermPlan';
import { Bill } from '../ledger/Bill';
import { createCall } from '../calls/Call';
import { DEFAULT_RATES } from '../config/RateSchedule';
import { InvalidContractError, PreconditionViolationError } from '../errors/BillingErrors';

const call = (minutes: number) =>
  createCall({ source: '555-0102', destination: '555-0199', time: '2024-01-15T10:00:00', durationSeconds: minutes * 60 });

describe('FixedTermPlan', () => {
  let contract: FixedTermPlan;

  beforeEach(() => {
    contract = new FixedTermPlan(new Date(2024, 0, 10), new Date(2026, 0, 10), DEFAULT_RATES);
  });

  function openMonth(month: number, year: number): Bill {
    const bill = new Bill(month, year);
    contract.advanceMonth(month, year, bill);
    return bill;
  }

  describe('advanceMonth', () => {
    it('should charge the monthly fee and the deposit in the start month', () => {
      const bill = openMonth(1, 2024);

      expect(bill.getCost()).toBe(320);
      expect(bill.getSummary().type).toBe('TERM');
      expect(bill.getSummary().min_rate).toBe(0.1);
    });

    it('should charge only the monthly fee after the start month', () => {
      openMonth(1, 2024);
      const bill = openMonth(2, 2024);

      expect(bill.getCost()).toBe(20);
    });

    it('should reset the minutes used at every month', () => {
      const january = openMonth(1, 2024);
      contract.billCall(call(90));
      expect(contract.minutesUsedThisMonth).toBe(90);

      const february = openMonth(2, 2024);
      expect(contract.minutesUsedThisMonth).toBe(0);
      contract.billCall(call(90));

      expect(january.getSummary().billed_mins).toBe(0);
      expect(february.getSummary().billed_mins).toBe(0);
      expect(february.getSummary().free_mins).toBe(90);
    });

    it('should release the deposit once the end month is reached', () => {
      contract = new FixedTermPlan(new Date(2024, 0, 10), new Date(2024, 2, 31), DEFAULT_RATES);
      openMonth(1, 2024);
      openMonth(2, 2024);
      expect(contract.depositReleased).toBe(false);

      openMonth(3, 2024);
      expect(contract.depositReleased).toBe(true);
    });

    it('should release the deposit when the end year has already passed', () => {
      contract = new FixedTermPlan(new Date(2023, 10, 1), new Date(2023, 11, 15), DEFAULT_RATES);
      openMonth(11, 2023);
      openMonth(1, 2024);

      expect(contract.depositReleased).toBe(true);
    });

    it('should not release the deposit in a later calendar month of an earlier year', () => {
      contract = new FixedTermPlan(new Date(2024, 0, 10), new Date(2025, 5, 30), DEFAULT_RATES);
      openMonth(1, 2024);
      openMonth(8, 2024);

      expect(contract.depositReleased).toBe(false);
    });
  });

  describe('billCall', () => {
    it('should keep calls within the monthly allowance free', () => {
      const bill = openMonth(2, 2024);
      contract.billCall(call(60));
      contract.billCall(call(40));

      expect(bill.getSummary().free_mins).toBe(100);
      expect(bill.getSummary().billed_mins).toBe(0);
      expect(bill.getCost()).toBe(20);
    });

    it('should split a call that crosses the allowance', () => {
      const bill = openMonth(1, 2024);
      contract.billCall(call(105));

      expect(bill.getSummary().free_mins).toBe(100);
      expect(bill.getSummary().billed_mins).toBe(5);
      expect(bill.getCost()).toBe(320.5);
    });

    it('should split on the cumulative minutes of the month', () => {
      const bill = openMonth(2, 2024);
      contract.billCall(call(95));
      contract.billCall(call(10));

      expect(bill.getSummary().free_mins).toBe(100);
      expect(bill.getSummary().billed_mins).toBe(5);
    });

    it('should bill every minute once the allowance is exhausted', () => {
      const bill = openMonth(2, 2024);
      contract.billCall(call(100));
      contract.billCall(call(10));
      contract.billCall(call(7));

      expect(bill.getSummary().free_mins).toBe(100);
      expect(bill.getSummary().billed_mins).toBe(17);
      expect(contract.minutesUsedThisMonth).toBe(117);
      expect(bill.getCost()).toBeCloseTo(21.7, 10);
    });

    it('should round partial minutes up before applying the allowance', () => {
      const bill = openMonth(2, 2024);
      contract.billCall(createCall({ source: 'a', destination: 'b', time: '2024-02-01T00:00:00', durationSeconds: 5941 }));

      expect(contract.minutesUsedThisMonth).toBe(100);
      expect(bill.getSummary().billed_mins).toBe(0);
    });
  });

  describe('cancel', () => {
    it('should refund the deposit when cancelled in or after the end month', () => {
      contract = new FixedTermPlan(new Date(2024, 0, 10), new Date(2024, 2, 31), DEFAULT_RATES);
      openMonth(1, 2024);
      openMonth(2, 2024);
      const march = openMonth(3, 2024);

      expect(contract.cancel()).toBe(-280);
      expect(march.getSummary().fixed).toBe(-280);
    });

    it('should keep the deposit when cancelled before the end month', () => {
      contract = new FixedTermPlan(new Date(2024, 0, 10), new Date(2024, 2, 31), DEFAULT_RATES);
      openMonth(1, 2024);
      openMonth(2, 2024);

      expect(contract.cancel()).toBe(20);
      expect(contract.depositReleased).toBe(false);
    });

    it('should keep the deposit when cancelled in the start month', () => {
      openMonth(1, 2024);

      expect(contract.cancel()).toBe(320);
    });

    it('should refund the deposit only once', () => {
      contract = new FixedTermPlan(new Date(2024, 0, 10), new Date(2024, 1, 28), DEFAULT_RATES);
      openMonth(1, 2024);
      const february = openMonth(2, 2024);

      expect(contract.cancel()).toBe(-280);
      expect(() => contract.cancel()).toThrow(PreconditionViolationError);
      expect(february.getCost()).toBe(-280);
    });
  });

  it('should follow a contract through January to a March cancellation', () => {
    const january = openMonth(1, 2024);
    contract.billCall(call(50));
    expect(january.getSummary().free_mins).toBe(50);
    expect(january.getSummary().billed_mins).toBe(0);
    expect(january.getCost()).toBe(320);

    const february = openMonth(2, 2024);
    contract.billCall(call(50));
    contract.billCall(call(80));
    expect(february.getSummary().free_mins).toBe(100);
    expect(february.getSummary().billed_mins).toBe(30);
    expect(february.getCost()).toBe(23);

    const march = openMonth(3, 2024);
    expect(contract.cancel()).toBe(20);
    expect(march.getSummary().fixed).toBe(20);
    expect(contract.depositReleased).toBe(false);
  });

  it('should reject an end date before the start date', () => {
    expect(() => new FixedTermPlan(new Date(2024, 5, 1), new Date(2024, 0, 1), DEFAULT_RATES)).toThrow(
      InvalidContractError
    );
  });

  it('should report an invalid term with its own error code', () => {
    let caught: unknown;
    try {
      new FixedTermPlan(new Date(2024, 5, 1), new Date(2024, 0, 1), DEFAULT_RATES);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidContractError);
    if (caught instanceof InvalidContractError) {
      expect(caught.code).toBe('INVALID_CONTRACT');
      expect(caught.name).toBe('InvalidContractError');
    }
  });
});

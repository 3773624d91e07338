import { DEFAULT_RATES, loadRateSchedule } from '../config/RateSchedule';
import { ConfigError } from '../errors/BillingErrors';

describe('loadRateSchedule', () => {
  it('should return the default rates when nothing is overridden', () => {
    expect(loadRateSchedule({}, {})).toEqual(DEFAULT_RATES);
  });

  it('should apply explicit overrides', () => {
    const rates = loadRateSchedule({ term: { includedMinutes: 200 }, prepaid: { topUpAmount: 50 } }, {});

    expect(rates.term.includedMinutes).toBe(200);
    expect(rates.term.deposit).toBe(300);
    expect(rates.prepaid.topUpAmount).toBe(50);
    expect(rates.prepaid.perMinute).toBe(0.025);
  });

  it('should read overrides from the environment', () => {
    const rates = loadRateSchedule({}, { TERM_DEPOSIT: '250', MTM_PER_MINUTE: '0.04' });

    expect(rates.term.deposit).toBe(250);
    expect(rates.monthToMonth.perMinute).toBe(0.04);
  });

  it('should prefer explicit overrides to the environment', () => {
    const rates = loadRateSchedule({ term: { deposit: 100 } }, { TERM_DEPOSIT: '250' });

    expect(rates.term.deposit).toBe(100);
  });

  it('should ignore blank environment values', () => {
    const rates = loadRateSchedule({}, { TERM_MONTHLY_FEE: '  ' });

    expect(rates.term.monthlyFee).toBe(20);
  });

  it('should reject a negative fee', () => {
    expect(() => loadRateSchedule({ monthToMonth: { monthlyFee: -1 } }, {})).toThrow(ConfigError);
  });

  it('should report every invalid field', () => {
    let caught: unknown;
    try {
      loadRateSchedule({ monthToMonth: { monthlyFee: -1 } }, { TERM_DEPOSIT: 'abc' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.errors.map(e => e.field)).toEqual(['monthToMonth.monthlyFee', 'term.deposit']);
    }
  });

  it('should not mutate the defaults', () => {
    loadRateSchedule({ term: { deposit: 1 } }, {});

    expect(DEFAULT_RATES.term.deposit).toBe(300);
  });
});

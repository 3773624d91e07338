import { z } from 'zod';
import { RateOverrides, RateSchedule } from '../types';
import { ConfigError } from '../errors/BillingErrors';

export const DEFAULT_RATES: RateSchedule = {
  monthToMonth: {
    monthlyFee: 50.0,
    perMinute: 0.05,
  },
  term: {
    monthlyFee: 20.0,
    perMinute: 0.1,
    includedMinutes: 100,
    deposit: 300.0,
  },
  prepaid: {
    perMinute: 0.025,
    // Top up whenever the balance is above -10, i.e. less than $10 of credit left
    topUpThreshold: -10,
    topUpAmount: 25,
  },
};

const Amount = z.number().nonnegative();

const RateScheduleSchema = z.object({
  monthToMonth: z.object({
    monthlyFee: Amount,
    perMinute: Amount,
  }),
  term: z.object({
    monthlyFee: Amount,
    perMinute: Amount,
    includedMinutes: z.number().int().nonnegative(),
    deposit: Amount,
  }),
  prepaid: z.object({
    perMinute: Amount,
    topUpThreshold: z.number(),
    topUpAmount: z.number().positive(),
  }),
});

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return Number(raw);
}

/**
 * Build the rate schedule used by every plan.
 *
 * Explicit overrides win over environment variables, which win over
 * DEFAULT_RATES. Throws ConfigError listing every invalid field.
 */
export function loadRateSchedule(overrides: RateOverrides = {}, env: NodeJS.ProcessEnv = process.env): RateSchedule {
  const { monthToMonth, term, prepaid } = DEFAULT_RATES;

  const candidate = {
    monthToMonth: {
      monthlyFee: overrides.monthToMonth?.monthlyFee ?? envNumber(env, 'MTM_MONTHLY_FEE') ?? monthToMonth.monthlyFee,
      perMinute: overrides.monthToMonth?.perMinute ?? envNumber(env, 'MTM_PER_MINUTE') ?? monthToMonth.perMinute,
    },
    term: {
      monthlyFee: overrides.term?.monthlyFee ?? envNumber(env, 'TERM_MONTHLY_FEE') ?? term.monthlyFee,
      perMinute: overrides.term?.perMinute ?? envNumber(env, 'TERM_PER_MINUTE') ?? term.perMinute,
      includedMinutes: overrides.term?.includedMinutes ?? envNumber(env, 'TERM_INCLUDED_MINUTES') ?? term.includedMinutes,
      deposit: overrides.term?.deposit ?? envNumber(env, 'TERM_DEPOSIT') ?? term.deposit,
    },
    prepaid: {
      perMinute: overrides.prepaid?.perMinute ?? envNumber(env, 'PREPAID_PER_MINUTE') ?? prepaid.perMinute,
      topUpThreshold: overrides.prepaid?.topUpThreshold ?? envNumber(env, 'PREPAID_TOP_UP_THRESHOLD') ?? prepaid.topUpThreshold,
      topUpAmount: overrides.prepaid?.topUpAmount ?? envNumber(env, 'PREPAID_TOP_UP_AMOUNT') ?? prepaid.topUpAmount,
    },
  };

  const result = RateScheduleSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return result.data;
}

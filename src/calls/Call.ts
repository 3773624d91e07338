import { parseISO } from 'date-fns';
import { z } from 'zod';
import { CallRecord } from '../types';
import { DatasetValidationError, InvalidDurationError } from '../errors/BillingErrors';

const CallSchema = z.object({
  source: z.string().min(1),
  destination: z.string().min(1),
  time: z.date(),
});

const DurationSchema = z.number().int().nonnegative();

export interface CallInput {
  source: string;
  destination: string;
  time: Date | string;
  durationSeconds: number;
}

/**
 * Create an immutable call record.
 *
 * A negative or fractional duration throws InvalidDurationError; other bad
 * fields throw DatasetValidationError.
 */
export function createCall(input: CallInput): CallRecord {
  if (!DurationSchema.safeParse(input.durationSeconds).success) {
    throw new InvalidDurationError(input.durationSeconds);
  }

  const result = CallSchema.safeParse({
    source: input.source,
    destination: input.destination,
    time: typeof input.time === 'string' ? parseISO(input.time) : input.time,
  });
  if (!result.success) {
    throw new DatasetValidationError(
      'Invalid call record',
      result.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return Object.freeze({
    source: result.data.source,
    destination: result.data.destination,
    time: result.data.time,
    durationSeconds: input.durationSeconds,
  });
}

/**
 * Whole minutes charged for a call; any started minute counts
 */
export function billableMinutes(call: CallRecord): number {
  return Math.ceil(call.durationSeconds / 60);
}

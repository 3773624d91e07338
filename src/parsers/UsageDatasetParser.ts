import { isBefore, isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { UsageDataset, ValidationError } from '../types';

// Zod schemas for validation
const ContractSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('mtm'),
    start: z.string(),
  }),
  z.object({
    type: z.literal('term'),
    start: z.string(),
    end: z.string(),
  }),
  z.object({
    type: z.literal('prepaid'),
    start: z.string(),
    balance: z.number().nonnegative(),
  }),
]);

const LineSchema = z.object({
  number: z.string().min(1),
  contract: ContractSchema,
  cancelled_on: z.string().optional(),
});

const CallSchema = z.object({
  source: z.string().min(1),
  destination: z.string().min(1),
  time: z.string(),
  duration_seconds: z.number().int().nonnegative(),
});

const UsageDatasetSchema = z.object({
  lines: z.array(LineSchema).min(1),
  calls: z.array(CallSchema),
});

export class UsageDatasetParser {
  /**
   * Parse and validate a usage dataset from JSON
   */
  parse(data: unknown): { dataset?: UsageDataset; errors: ValidationError[] } {
    const result = UsageDatasetSchema.safeParse(data);

    if (!result.success) {
      // Convert Zod errors to our ValidationError format
      const errors = result.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
        value: valueAt(data, issue.path),
      }));
      return { errors };
    }

    const dataset: UsageDataset = result.data;

    const errors = this.validateBusinessLogic(dataset);
    if (errors.length > 0) {
      return { errors };
    }

    return { dataset, errors: [] };
  }

  /**
   * Validate business logic rules
   */
  private validateBusinessLogic(dataset: UsageDataset): ValidationError[] {
    const errors: ValidationError[] = [];
    const numbers = new Set<string>();

    dataset.lines.forEach((line, index) => {
      const prefix = `lines.${index}`;

      if (numbers.has(line.number)) {
        errors.push({
          field: `${prefix}.number`,
          message: `Duplicate phone number ${line.number}`,
          value: line.number,
        });
      }
      numbers.add(line.number);

      const start = parseISO(line.contract.start);
      if (!isValid(start)) {
        errors.push({
          field: `${prefix}.contract.start`,
          message: 'Contract start is not a valid date',
          value: line.contract.start,
        });
        return;
      }

      if (line.contract.type === 'term') {
        const end = parseISO(line.contract.end);
        if (!isValid(end)) {
          errors.push({
            field: `${prefix}.contract.end`,
            message: 'Contract end is not a valid date',
            value: line.contract.end,
          });
        } else if (!isBefore(start, end)) {
          errors.push({
            field: `${prefix}.contract.end`,
            message: 'Term contract end date must be after start date',
            value: line.contract.end,
          });
        }
      }

      if (line.cancelled_on !== undefined) {
        const cancelledOn = parseISO(line.cancelled_on);
        if (!isValid(cancelledOn)) {
          errors.push({
            field: `${prefix}.cancelled_on`,
            message: 'Cancellation is not a valid date',
            value: line.cancelled_on,
          });
        } else if (isBefore(cancelledOn, start)) {
          errors.push({
            field: `${prefix}.cancelled_on`,
            message: 'Line cannot be cancelled before its contract starts',
            value: line.cancelled_on,
          });
        }
      }
    });

    dataset.calls.forEach((call, index) => {
      if (!numbers.has(call.source)) {
        errors.push({
          field: `calls.${index}.source`,
          message: `Unknown source line ${call.source}`,
          value: call.source,
        });
      }
      if (!isValid(parseISO(call.time))) {
        errors.push({
          field: `calls.${index}.time`,
          message: 'Call time is not a valid date',
          value: call.time,
        });
      }
    });

    return errors;
  }
}

function valueAt(data: unknown, path: (string | number)[]): unknown {
  let current: unknown = data;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

import { ValidationError } from '../types';

export type BillingErrorCode =
  | 'PRECONDITION_VIOLATION'
  | 'INVALID_DURATION'
  | 'INVALID_CONTRACT'
  | 'DATASET_INVALID'
  | 'CONFIG_INVALID';

export class BillingError extends Error {
  constructor(public readonly code: BillingErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a driver calls into a contract out of sequence, e.g. billing a
 * call before the month was opened or touching a cancelled contract.
 */
export class PreconditionViolationError extends BillingError {
  constructor(message: string) {
    super('PRECONDITION_VIOLATION', message);
  }
}

export class InvalidDurationError extends BillingError {
  constructor(public readonly durationSeconds: unknown) {
    super('INVALID_DURATION', `Call duration must be a non-negative whole number of seconds, got ${String(durationSeconds)}`);
  }
}

export class InvalidContractError extends BillingError {
  constructor(message: string) {
    super('INVALID_CONTRACT', message);
  }
}

export class DatasetValidationError extends BillingError {
  constructor(message: string, public readonly errors: ValidationError[]) {
    super('DATASET_INVALID', message);
  }
}

export class ConfigError extends BillingError {
  constructor(public readonly errors: ValidationError[]) {
    super('CONFIG_INVALID', `Invalid rate schedule: ${errors.map(e => `${e.field} (${e.message})`).join(', ')}`);
  }
}

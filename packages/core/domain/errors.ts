/**
 * Domain Errors
 *
 * Typed failures raised by the snapshot operations. The four business
 * kinds (validation, conflict, not-found, occupied) are expected outcomes
 * of normal use and are reported back to the originating session.
 * DataIntegrityError is collected by the expiry sweep and only logged.
 *
 * @module packages/core/domain/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for programmatic handling.
 */
export enum DomainErrorCode {
  /** Malformed input: non-numeric or out-of-range values, bad identifiers */
  VALIDATION = 'VALIDATION',
  /** Duplicate identifier or an operation blocked by existing references */
  CONFLICT = 'CONFLICT',
  /** Unknown person, account, service, duration, slot or index */
  NOT_FOUND = 'NOT_FOUND',
  /** Slot is not empty */
  OCCUPIED = 'OCCUPIED',
  /** Stored record cannot be interpreted (e.g. unparsable date) */
  DATA_INTEGRITY = 'DATA_INTEGRITY',
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for every domain failure.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;

  constructor(message: string, code: DomainErrorCode) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, DomainErrorCode.VALIDATION);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends DomainError {
  constructor(message: string) {
    super(message, DomainErrorCode.CONFLICT);
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string) {
    super(message, DomainErrorCode.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export class OccupiedError extends DomainError {
  constructor(message: string) {
    super(message, DomainErrorCode.OCCUPIED);
    this.name = 'OccupiedError';
  }
}

/**
 * Raised for stored records the sweep cannot interpret.
 * Carries the location of the record so it can be found and fixed by hand.
 */
export class DataIntegrityError extends DomainError {
  readonly person: string;
  readonly field: 'end_date' | 'last_active';
  readonly value: string;
  readonly subscriptionIndex?: number;

  constructor(options: {
    person: string;
    field: 'end_date' | 'last_active';
    value: string;
    subscriptionIndex?: number;
  }) {
    const where =
      options.subscriptionIndex === undefined
        ? `person '${options.person}'`
        : `subscription #${options.subscriptionIndex} of '${options.person}'`;
    super(`Unparsable ${options.field} '${options.value}' on ${where}`, DomainErrorCode.DATA_INTEGRITY);
    this.name = 'DataIntegrityError';
    this.person = options.person;
    this.field = options.field;
    this.value = options.value;
    this.subscriptionIndex = options.subscriptionIndex;
  }
}

// =============================================================================
// Guards
// =============================================================================

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Business errors are the ones reported back to a session rather than logged
 * as faults.
 */
export function isBusinessError(error: unknown): error is DomainError {
  return isDomainError(error) && error.code !== DomainErrorCode.DATA_INTEGRITY;
}

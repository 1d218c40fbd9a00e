/**
 * Loan Tracker - Error Taxonomy
 *
 * Every error a route can map to a status code extends AppError.
 * Anything else reaching a handler is an unexpected 500.
 */

export type ErrorCode = 'VALIDATION_ERROR' | 'INVALID_REFERENCE' | 'STORE_ERROR';

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ErrorCode;
}

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * ValidationError - Malformed, missing or out-of-range input
 */
export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR' as const;

  constructor(public readonly issues: FieldIssue[]) {
    super(`Invalid fields: ${[...new Set(issues.map(i => i.field))].join(', ')}`);
    this.name = 'ValidationError';
  }
}

export type ReferenceFailure = 'malformed' | 'not_found';

/**
 * RecordReferenceError - A customer_id / partner_id that cannot be resolved
 */
export class RecordReferenceError extends AppError {
  readonly statusCode = 400;
  readonly code = 'INVALID_REFERENCE' as const;

  constructor(
    public readonly field: string,
    public readonly reason: ReferenceFailure,
    recordType: string
  ) {
    super(
      reason === 'malformed'
        ? `${field} is not a valid identifier`
        : `${field} does not match an existing ${recordType}`
    );
    this.name = 'RecordReferenceError';
  }
}

/**
 * StoreError - The database is unreachable or rejected the operation
 */
export class StoreError extends AppError {
  readonly statusCode = 500;
  readonly code = 'STORE_ERROR' as const;

  constructor(
    public readonly operation: string,
    public readonly originalError?: unknown
  ) {
    super(
      `Store operation "${operation}" failed: ` +
      (originalError instanceof Error ? originalError.message : 'unknown error')
    );
    this.name = 'StoreError';
  }
}

export class MalformedIdentifierError extends Error {
  constructor(public readonly input: string) {
    super(`Malformed record identifier: "${input}"`);
    this.name = 'MalformedIdentifierError';
  }
}

/**
 * Loan Tracker - Error Responses
 * Maps the error taxonomy onto HTTP status codes
 */

import { Response } from 'express';
import { RecordReferenceError, StoreError, ValidationError } from '../shared/errors';

export function sendError(res: Response, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      validationErrors: error.issues,
    });
    return;
  }

  if (error instanceof RecordReferenceError) {
    res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      field: error.field,
      reason: error.reason,
    });
    return;
  }

  console.error('[Error]', error);

  if (error instanceof StoreError) {
    res.status(error.statusCode).json({ error: 'Database operation failed', code: error.code });
    return;
  }

  res.status(500).json({ error: 'Internal server error' });
}

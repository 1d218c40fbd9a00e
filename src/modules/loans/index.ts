/**
 * Loan Tracker - Loans Module
 *
 * Loan admission (reference checks, commission on funding) and listing.
 */

export * from './loan.schema';
export * from './commission';
export { LoanService, Clock, toIsoDate } from './loan.service';

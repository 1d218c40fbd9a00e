/**
 * Loans collection schema
 * Collection name: "loan"
 */

import { z } from 'zod';

// ============================================================================
// LOAN STATUS
// ============================================================================

export const LOAN_STATUSES = [
  'applied',    // Application received
  'approved',   // Approved, not yet funded
  'funded',     // Funded; commission computed at creation
  'rejected',
  'closed',
] as const;

export type LoanStatus = (typeof LOAN_STATUSES)[number];

export const LoanStatusSchema = z.enum(LOAN_STATUSES);

// ============================================================================
// LOAN RECORD
// ============================================================================

/** Calendar date, YYYY-MM-DD */
const isoDate = z.string().date();

export const LoanSchema = z.object({
  customer_id: z.string(),
  partner_id: z.string().nullish(),
  amount: z.number().finite().positive(),
  status: LoanStatusSchema.default('applied'),
  application_date: isoDate.nullish(),
  funded_date: isoDate.nullish(),
  commission_amount: z.number().finite().nonnegative().nullish(),
});

export type LoanInput = z.infer<typeof LoanSchema>;

export const LoanListQuerySchema = z.object({
  status: LoanStatusSchema.optional(),
});

export type LoanListQuery = z.infer<typeof LoanListQuerySchema>;

/**
 * Referral partners collection schema
 * Collection name: "partner"
 */

import { z } from 'zod';
import { optionalText } from '../../shared/validation';

export const DEFAULT_COMMISSION_RATE = 5.0;

export const PartnerSchema = z.object({
  name: z.string(),
  contact_name: optionalText,
  email: optionalText,
  phone: optionalText,
  // Percentage of a funded loan's amount
  commission_rate: z.number().min(0).max(100).default(DEFAULT_COMMISSION_RATE),
  notes: optionalText,
});

export type PartnerInput = z.infer<typeof PartnerSchema>;

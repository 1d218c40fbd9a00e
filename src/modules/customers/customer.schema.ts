/**
 * Customers collection schema
 * Collection name: "customer"
 */

import { z } from 'zod';
import { optionalText } from '../../shared/validation';

export const CustomerSchema = z.object({
  first_name: z.string(),
  last_name: z.string(),
  email: optionalText,
  phone: optionalText,
  address: optionalText,
  city: optionalText,
  state: optionalText,
  postal_code: optionalText,
  notes: optionalText,
});

export type CustomerInput = z.infer<typeof CustomerSchema>;

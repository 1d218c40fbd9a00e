/**
 * Loan Tracker - Partner Commission
 *
 * commission = amount * rate / 100, rounded half-up to cents.
 */

/**
 * Round half-up to two decimal places.
 * The epsilon nudge keeps binary artifacts (1.005 -> 100.49999...)
 * from rounding down.
 */
export function roundToCents(value: number): number {
  return Math.round(value * 100 * (1 + Number.EPSILON)) / 100;
}

/**
 * Read a partner's commission_rate from its stored document.
 * Missing or non-numeric rates count as 0.
 */
export function resolveCommissionRate(partner: Record<string, unknown> | null): number {
  if (!partner) return 0;

  const raw = partner.commission_rate;
  const rate = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : NaN;

  return Number.isFinite(rate) ? rate : 0;
}

export function computeCommission(amount: number, ratePercent: number): number {
  return roundToCents((amount * ratePercent) / 100);
}

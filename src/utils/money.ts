import { Decimal } from 'decimal.js';

/**
 * Cent rounding for emitted forecast amounts and the booked per-currency net.
 * Non-finite input becomes 0 so a record never carries NaN.
 */
export function roundMoney(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const rounded = new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
  // Avoid emitting -0.
  return rounded === 0 ? 0 : rounded;
}

import type { RateTable } from './forecast.types.js';

// 2024 averages, used whenever a resolved rate is missing or absurd.
export const FALLBACK_RATES: RateTable = Object.freeze({
  EUR: 1,
  USD: 0.92,
  JPY: 0.0065,
});

export const MAX_SANE_RATE = 1000;

export function normalizeCurrency(currency: string | null | undefined): string | null {
  const s = String(currency ?? '').trim().toUpperCase();
  return s ? s : null;
}

export function isSaneRate(rate: unknown): rate is number {
  return typeof rate === 'number' && Number.isFinite(rate) && rate > 0 && rate < MAX_SANE_RATE;
}

/**
 * Converts an amount to EUR. Missing amounts count as 0; unknown currencies are
 * treated as already-EUR.
 */
export function convertToEUR(
  amount: number | null | undefined,
  currency: string | null | undefined,
  rateTable: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): number {
  if (amount === null || amount === undefined || !Number.isFinite(amount)) return 0;

  const code = normalizeCurrency(currency);
  if (code === null || code === 'EUR') return amount;

  const rate = rateTable[code];
  if (isSaneRate(rate)) return amount * rate;

  const fallback = fallbackRates[code];
  if (isSaneRate(fallback)) return amount * fallback;

  return amount;
}

/** Effective EUR multiplier for a currency under the resolver's rules. */
export function rateFor(
  currency: string,
  rateTable: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): number {
  return convertToEUR(1, currency, rateTable, fallbackRates);
}

/**
 * Validates a candidate rate table. Any tracked currency with a missing or
 * out-of-range rate discards the whole candidate in favour of the fallback table.
 */
export function resolveRateTable(
  candidate: Readonly<Record<string, unknown>> | null | undefined,
  fallbackRates: RateTable = FALLBACK_RATES
): RateTable {
  if (!candidate) return { ...fallbackRates, EUR: 1 };

  const resolved: Record<string, number> = {};
  for (const [rawCode, rate] of Object.entries(candidate)) {
    const code = normalizeCurrency(rawCode);
    if (!code || code === 'EUR') continue;
    if (!isSaneRate(rate)) {
      if (code in fallbackRates) return { ...fallbackRates, EUR: 1 };
      continue;
    }
    resolved[code] = rate;
  }

  for (const code of Object.keys(fallbackRates)) {
    if (code !== 'EUR' && !(code in resolved)) return { ...fallbackRates, EUR: 1 };
  }

  return { ...resolved, EUR: 1 };
}

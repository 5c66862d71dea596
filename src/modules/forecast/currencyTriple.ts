import { roundMoney } from '../../utils/money.js';
import { FALLBACK_RATES, rateFor } from './currency.service.js';
import type { CurrencyTriple, RateTable, TrackedCurrency } from './forecast.types.js';

export function isTrackedCurrency(code: string | null | undefined): code is TrackedCurrency {
  return code === 'EUR' || code === 'USD' || code === 'JPY';
}

export function triple(EUR = 0, USD = 0, JPY = 0): CurrencyTriple {
  return { EUR, USD, JPY };
}

export function zeroTriple(): CurrencyTriple {
  return triple();
}

export function mapTriple(t: CurrencyTriple, fn: (value: number, currency: TrackedCurrency) => number): CurrencyTriple {
  return { EUR: fn(t.EUR, 'EUR'), USD: fn(t.USD, 'USD'), JPY: fn(t.JPY, 'JPY') };
}

export function addTriples(a: CurrencyTriple, b: CurrencyTriple): CurrencyTriple {
  return { EUR: a.EUR + b.EUR, USD: a.USD + b.USD, JPY: a.JPY + b.JPY };
}

export function subtractTriples(a: CurrencyTriple, b: CurrencyTriple): CurrencyTriple {
  return { EUR: a.EUR - b.EUR, USD: a.USD - b.USD, JPY: a.JPY - b.JPY };
}

export function scaleTriple(t: CurrencyTriple, factor: number): CurrencyTriple {
  return mapTriple(t, (v) => v * factor);
}

export function roundTriple(t: CurrencyTriple): CurrencyTriple {
  return mapTriple(t, roundMoney);
}

export function sumTriple(t: CurrencyTriple): number {
  return t.EUR + t.USD + t.JPY;
}

/** EUR multipliers for the tracked currencies (EUR is always 1). */
export function trackedRates(rates: RateTable, fallbackRates: RateTable = FALLBACK_RATES): CurrencyTriple {
  return {
    EUR: 1,
    USD: rateFor('USD', rates, fallbackRates),
    JPY: rateFor('JPY', rates, fallbackRates),
  };
}

/** Native per-currency amounts -> one EUR-equivalent figure. */
export function consolidate(t: CurrencyTriple, rates: RateTable, fallbackRates: RateTable = FALLBACK_RATES): number {
  const r = trackedRates(rates, fallbackRates);
  return t.EUR + t.USD * r.USD + t.JPY * r.JPY;
}

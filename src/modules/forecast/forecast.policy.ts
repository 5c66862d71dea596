import { FALLBACK_RATES } from './currency.service.js';
import type { CurrencyTriple, RateTable } from './forecast.types.js';

/**
 * Business-given constants consumed by the engine. Passed in per run so that
 * alternate debt assumptions can be forecast side by side.
 */
export type ForecastPolicy = {
  debtPrincipal: number;
  debtAnnualInterestRate: number;
  debtMonthlyInterest: number;
  maxForecastDate: string;
  maxHorizonDays: number;
  criticalThreshold: number;
  seedOffset: number;
  tolerance: number;
  defaultCurrencyShares: CurrencyTriple;
  fallbackRates: RateTable;
  recurringCategories: readonly string[];
  loanInterestCategory: string;
};

// EUR 20M at Euribor 3M (3.5%) + 1.2% spread.
export const DEBT_PRINCIPAL = 20_000_000;
export const EURIBOR_3M_BASE = 0.035;
export const DEBT_SPREAD = 0.012;
export const DEBT_INTEREST_RATE = EURIBOR_3M_BASE + DEBT_SPREAD;

export const RECURRING_CATEGORIES: readonly string[] = ['Loan Interest', 'Payroll', 'Bank Fee'];
export const LOAN_INTEREST_CATEGORY = 'Loan Interest';

export function monthlyInterest(principal: number, annualRate: number): number {
  return principal * (annualRate / 12);
}

export const DEFAULT_FORECAST_POLICY: Readonly<ForecastPolicy> = Object.freeze({
  debtPrincipal: DEBT_PRINCIPAL,
  debtAnnualInterestRate: DEBT_INTEREST_RATE,
  debtMonthlyInterest: monthlyInterest(DEBT_PRINCIPAL, DEBT_INTEREST_RATE),
  maxForecastDate: '2025-03-31',
  maxHorizonDays: 90,
  criticalThreshold: -100_000,
  seedOffset: 100,
  tolerance: 0.01,
  defaultCurrencyShares: Object.freeze({ EUR: 0.86, USD: 0.04, JPY: 0.14 }),
  fallbackRates: FALLBACK_RATES,
  recurringCategories: RECURRING_CATEGORIES,
  loanInterestCategory: LOAN_INTEREST_CATEGORY,
});

/**
 * Builds a policy from partial overrides. Monthly interest follows principal and
 * rate unless given explicitly.
 */
export function createForecastPolicy(overrides: Partial<ForecastPolicy> = {}): ForecastPolicy {
  const debtPrincipal = overrides.debtPrincipal ?? DEFAULT_FORECAST_POLICY.debtPrincipal;
  const debtAnnualInterestRate = overrides.debtAnnualInterestRate ?? DEFAULT_FORECAST_POLICY.debtAnnualInterestRate;
  return {
    ...DEFAULT_FORECAST_POLICY,
    ...overrides,
    debtPrincipal,
    debtAnnualInterestRate,
    debtMonthlyInterest: overrides.debtMonthlyInterest ?? monthlyInterest(debtPrincipal, debtAnnualInterestRate),
  };
}

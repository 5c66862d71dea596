import { monthKey, toDateOnly } from '../../utils/date.js';
import { convertToEUR, FALLBACK_RATES, normalizeCurrency } from './currency.service.js';
import { isTrackedCurrency, sumTriple, zeroTriple } from './currencyTriple.js';
import { LOAN_INTEREST_CATEGORY, RECURRING_CATEGORIES } from './forecast.policy.js';
import type { CurrencyTriple, InitialPosition, RateTable, Transaction } from './forecast.types.js';

/** EUR magnitude of a transaction; a stored EUR figure wins over re-conversion. */
export function transactionEurMagnitude(
  tx: Transaction,
  rateTable: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): number {
  const stored = tx.amountEur;
  const eur =
    stored !== null && stored !== undefined && Number.isFinite(stored)
      ? stored
      : convertToEUR(tx.amount, tx.currency, rateTable, fallbackRates);
  return Math.abs(eur);
}

function directionSign(tx: Transaction): 1 | -1 {
  return tx.direction === 'debit' ? -1 : 1;
}

function historyBefore(transactions: readonly Transaction[], startDate: string): Transaction[] {
  return transactions.filter((tx) => {
    const d = toDateOnly(tx.date);
    return d !== null && d < startDate;
  });
}

/**
 * Opening position from every movement strictly before the start date. Credits
 * add and debits subtract regardless of the sign stored on the row.
 */
export function computeInitialBalance(
  transactions: readonly Transaction[],
  startDate: string,
  rateTable: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): InitialPosition {
  const perCurrencyOriginal = zeroTriple();
  const perCurrencyEUR = zeroTriple();

  for (const tx of historyBefore(transactions, startDate)) {
    const currency = normalizeCurrency(tx.currency) ?? 'EUR';
    if (!isTrackedCurrency(currency)) continue;
    const sign = directionSign(tx);
    const amount = Number.isFinite(tx.amount) ? Math.abs(tx.amount) : 0;
    perCurrencyOriginal[currency] += sign * amount;
    perCurrencyEUR[currency] += sign * transactionEurMagnitude(tx, rateTable, fallbackRates);
  }

  return { perCurrencyOriginal, perCurrencyEUR, totalEUR: sumTriple(perCurrencyEUR) };
}

export function netPosition(position: InitialPosition, debtPrincipal: number): number {
  return position.totalEUR - debtPrincipal;
}

function monthlyAverage(transactions: readonly Transaction[], rateTable: RateTable, fallbackRates: RateTable): number {
  const byMonth = new Map<string, number>();
  for (const tx of transactions) {
    const d = toDateOnly(tx.date);
    if (!d) continue;
    const key = monthKey(d);
    byMonth.set(key, (byMonth.get(key) ?? 0) + transactionEurMagnitude(tx, rateTable, fallbackRates));
  }
  if (byMonth.size === 0) return 0;
  let total = 0;
  for (const v of byMonth.values()) total += v;
  return total / byMonth.size;
}

function monthsPresent(transactions: readonly Transaction[]): number {
  const months = new Set<string>();
  for (const tx of transactions) {
    const d = toDateOnly(tx.date);
    if (d) months.add(monthKey(d));
  }
  return months.size;
}

export type RecurringOptions = {
  categories?: readonly string[];
  loanInterestCategory?: string;
  fallbackRates?: RateTable;
};

/**
 * Average monthly recurring outflow (loan interest, payroll, bank fees) in EUR.
 *
 * History may carry only part of the contractual interest. When the loan
 * interest found averages under half of `debtMonthlyInterest` the shortfall is
 * added, and the result never drops below the other recurring categories'
 * average plus the full monthly interest.
 */
export function computeAverageMonthlyRecurring(
  transactions: readonly Transaction[],
  rateTable: RateTable,
  debtMonthlyInterest: number,
  options: RecurringOptions = {}
): number {
  const categories = new Set(options.categories ?? RECURRING_CATEGORIES);
  const loanCategory = options.loanInterestCategory ?? LOAN_INTEREST_CATEGORY;
  const fallbackRates = options.fallbackRates ?? FALLBACK_RATES;

  const recurring = transactions.filter((tx) => tx.category !== null && categories.has(tx.category));
  if (recurring.length === 0) return debtMonthlyInterest;

  let average = monthlyAverage(recurring, rateTable, fallbackRates);

  const months = monthsPresent(recurring);
  const loanTotal = recurring
    .filter((tx) => tx.category === loanCategory)
    .reduce((sum, tx) => sum + transactionEurMagnitude(tx, rateTable, fallbackRates), 0);
  const loanPerMonth = months > 0 ? loanTotal / months : 0;

  if (loanPerMonth < debtMonthlyInterest * 0.5) {
    average += debtMonthlyInterest - loanPerMonth;
  }

  const others = recurring.filter((tx) => tx.category !== loanCategory);
  const floor = monthlyAverage(others, rateTable, fallbackRates) + debtMonthlyInterest;

  return Math.max(average, floor);
}

export type CurrencyShares = { credit: CurrencyTriple; debit: CurrencyTriple };

function normalizeShares(shares: CurrencyTriple): CurrencyTriple {
  const total = sumTriple(shares);
  if (!(total > 0)) return { EUR: 1, USD: 0, JPY: 0 };
  return { EUR: shares.EUR / total, USD: shares.USD / total, JPY: shares.JPY / total };
}

/**
 * EUR-equivalent share of credit and debit volume per tracked currency, from
 * history strictly before the start date. Computed once per run.
 */
export function computeCurrencyShares(
  transactions: readonly Transaction[],
  startDate: string,
  rateTable: RateTable,
  defaults: CurrencyTriple,
  fallbackRates: RateTable = FALLBACK_RATES
): CurrencyShares {
  const volume = { credit: zeroTriple(), debit: zeroTriple() };

  for (const tx of historyBefore(transactions, startDate)) {
    const currency = normalizeCurrency(tx.currency) ?? 'EUR';
    if (!isTrackedCurrency(currency)) continue;
    volume[tx.direction][currency] += transactionEurMagnitude(tx, rateTable, fallbackRates);
  }

  const pick = (v: CurrencyTriple) => normalizeShares(sumTriple(v) > 0 ? v : defaults);
  return { credit: pick(volume.credit), debit: pick(volume.debit) };
}

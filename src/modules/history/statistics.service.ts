import { daysBetween, monthKey, toDateOnly, weekdayOf, type Weekday } from '../../utils/date.js';
import { FALLBACK_RATES } from '../forecast/currency.service.js';
import { transactionEurMagnitude } from '../forecast/initialPosition.service.js';
import type {
  Direction,
  ForecastParams,
  Invoice,
  RateTable,
  Transaction,
  WeeklyPattern,
} from '../forecast/forecast.types.js';

export const INFLATION_CATEGORIES: readonly string[] = ['Supplier Payment', 'Payroll', 'Loan Interest'];
export const DEFAULT_INFLATION_RATE = 0.02;
export const MAX_PLAUSIBLE_INFLATION = 0.1;
export const MIN_INFLATION_MONTHS = 6;

export type MeanAndStd = { mean: number; std: number; count: number };

export type DailyStatistics = {
  avgDailyCredit: number;
  avgDailyDebit: number;
  stdDailyCredit: number;
  stdDailyDebit: number;
};

export type HistorySet = {
  transactions: readonly Transaction[];
  sales: readonly Invoice[];
  purchases: readonly Invoice[];
};

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

/** Sample standard deviation; 0 below two samples. */
function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let sq = 0;
  for (const v of values) sq += (v - m) ** 2;
  return Math.sqrt(sq / (values.length - 1));
}

export function describe(values: readonly number[]): MeanAndStd {
  return { mean: mean(values), std: sampleStd(values), count: values.length };
}

/** Days from issue to payment over paid invoices that carry both dates (DSO / DPO). */
export function computeMeanDelay(invoices: readonly Invoice[]): MeanAndStd {
  const delays: number[] = [];
  for (const inv of invoices) {
    if (inv.status !== 'Paid') continue;
    const issued = toDateOnly(inv.issueDate);
    const paid = toDateOnly(inv.paymentDate);
    if (!issued || !paid) continue;
    delays.push(daysBetween(issued, paid));
  }
  return describe(delays);
}

type DailyTotal = { date: string; direction: Direction; total: number };

function dailyTotals(transactions: readonly Transaction[], rates: RateTable, fallbackRates: RateTable): DailyTotal[] {
  const byKey = new Map<string, DailyTotal>();
  for (const tx of transactions) {
    const date = toDateOnly(tx.date);
    if (!date) continue;
    const key = `${date}:${tx.direction}`;
    const entry = byKey.get(key) ?? { date, direction: tx.direction, total: 0 };
    entry.total += transactionEurMagnitude(tx, rates, fallbackRates);
    byKey.set(key, entry);
  }
  return [...byKey.values()];
}

/** Mean and spread of the per-day EUR totals, per direction, over days with activity. */
export function computeDailyStatistics(
  transactions: readonly Transaction[],
  rates: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): DailyStatistics {
  const totals = dailyTotals(transactions, rates, fallbackRates);
  const credits = describe(totals.filter((t) => t.direction === 'credit').map((t) => t.total));
  const debits = describe(totals.filter((t) => t.direction === 'debit').map((t) => t.total));
  return {
    avgDailyCredit: credits.mean,
    avgDailyDebit: debits.mean,
    stdDailyCredit: credits.std,
    stdDailyDebit: debits.std,
  };
}

/** Average daily EUR total per weekday; weekdays with no activity are absent. */
export function computeWeeklyPatterns(
  transactions: readonly Transaction[],
  rates: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): { credit: WeeklyPattern; debit: WeeklyPattern } {
  const buckets: Record<Direction, Map<Weekday, number[]>> = { credit: new Map(), debit: new Map() };
  for (const t of dailyTotals(transactions, rates, fallbackRates)) {
    const weekday = weekdayOf(t.date);
    const list = buckets[t.direction].get(weekday) ?? [];
    list.push(t.total);
    buckets[t.direction].set(weekday, list);
  }

  const toPattern = (m: Map<Weekday, number[]>): WeeklyPattern => {
    const pattern: WeeklyPattern = {};
    for (const [weekday, values] of m) pattern[weekday] = mean(values);
    return pattern;
  };
  return { credit: toPattern(buckets.credit), debit: toPattern(buckets.debit) };
}

/** Coefficient of variation; 0 when the mean is not positive. */
export function volatilityCoefficient(std: number, average: number): number {
  if (!(average > 0) || !Number.isFinite(std)) return 0;
  return std / average;
}

/**
 * Annualized month-over-month growth of recurring costs. Needs at least six
 * months of data; anything outside [0, 10%] is treated as activity growth or
 * noise and replaced by the 2% default.
 */
export function estimateInflationRate(
  transactions: readonly Transaction[],
  rates: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): number {
  const categories = new Set(INFLATION_CATEGORIES);
  const monthly = new Map<string, number>();
  for (const tx of transactions) {
    if (tx.category === null || !categories.has(tx.category)) continue;
    const date = toDateOnly(tx.date);
    if (!date) continue;
    const key = monthKey(date);
    monthly.set(key, (monthly.get(key) ?? 0) + transactionEurMagnitude(tx, rates, fallbackRates));
  }

  const series = [...monthly.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([, total]) => total);
  if (series.length < MIN_INFLATION_MONTHS) return DEFAULT_INFLATION_RATE;

  const growth: number[] = [];
  for (let i = 1; i < series.length; i += 1) {
    const prev = series[i - 1] ?? 0;
    const cur = series[i] ?? 0;
    if (prev > 0) growth.push((cur - prev) / prev);
  }
  if (growth.length === 0) return DEFAULT_INFLATION_RATE;

  const annual = mean(growth) * 12;
  if (annual < 0 || annual > MAX_PLAUSIBLE_INFLATION) return DEFAULT_INFLATION_RATE;
  return annual;
}

/** Engine parameters from raw history. */
export function deriveForecastParams(
  history: HistorySet,
  rates: RateTable,
  window: { startDate: string; maxForecastDate: string },
  fallbackRates: RateTable = FALLBACK_RATES
): ForecastParams {
  const daily = computeDailyStatistics(history.transactions, rates, fallbackRates);
  const weekly = computeWeeklyPatterns(history.transactions, rates, fallbackRates);
  return {
    startDate: window.startDate,
    maxForecastDate: window.maxForecastDate,
    dsoMean: computeMeanDelay(history.sales).mean,
    dpoMean: computeMeanDelay(history.purchases).mean,
    avgDailyCredit: daily.avgDailyCredit,
    avgDailyDebit: daily.avgDailyDebit,
    weeklyCreditPattern: weekly.credit,
    weeklyDebitPattern: weekly.debit,
    inflationRate: estimateInflationRate(history.transactions, rates, fallbackRates),
    volumeVolatilityCredit: volatilityCoefficient(daily.stdDailyCredit, daily.avgDailyCredit),
    volumeVolatilityDebit: volatilityCoefficient(daily.stdDailyDebit, daily.avgDailyDebit),
  };
}

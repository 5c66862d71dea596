import { addDays, toDateOnly } from '../../utils/date.js';
import { convertToEUR, FALLBACK_RATES, normalizeCurrency } from './currency.service.js';
import { isTrackedCurrency, zeroTriple } from './currencyTriple.js';
import type { CurrencyTriple, Invoice, RateTable, ScheduledItem } from './forecast.types.js';

const OPEN_STATUSES = new Set<Invoice['status']>(['Open', 'Overdue']);

export type DailySchedule = {
  /** Original amounts; untracked currencies sit in EUR at their EUR equivalent. */
  native: CurrencyTriple;
  /** Stored EUR equivalents bucketed the same way. */
  eurEquivalent: CurrencyTriple;
  storedEurTotal: number;
  itemCount: number;
};

/** Mean delay in whole days; missing or non-finite delays count as 0. */
export function roundDelayDays(meanDelayDays: number | null | undefined): number {
  if (meanDelayDays === null || meanDelayDays === undefined || !Number.isFinite(meanDelayDays)) return 0;
  return Math.round(meanDelayDays);
}

/**
 * Projects open and overdue invoices onto their expected settlement date
 * (due date + mean delay). Invoices without a usable due date cannot be dated and
 * are left out.
 */
export function scheduleOpenItems(
  invoices: readonly Invoice[],
  meanDelayDays: number,
  rateTable: RateTable,
  fallbackRates: RateTable = FALLBACK_RATES
): ScheduledItem[] {
  const delay = roundDelayDays(meanDelayDays);
  const items: ScheduledItem[] = [];

  for (const inv of invoices) {
    if (!OPEN_STATUSES.has(inv.status)) continue;
    const due = toDateOnly(inv.dueDate);
    if (!due) continue;

    const currency = normalizeCurrency(inv.currency) ?? 'EUR';
    const amount = Number.isFinite(inv.amount) ? inv.amount : 0;
    items.push({
      invoiceId: inv.id ?? null,
      dueDate: due,
      expectedPaymentDate: addDays(due, delay),
      amount,
      currency,
      amountEur: convertToEUR(amount, currency, rateTable, fallbackRates),
    });
  }

  return items;
}

export function aggregateByDate(items: readonly ScheduledItem[]): Map<string, DailySchedule> {
  const byDate = new Map<string, DailySchedule>();

  for (const item of items) {
    const day =
      byDate.get(item.expectedPaymentDate) ??
      { native: zeroTriple(), eurEquivalent: zeroTriple(), storedEurTotal: 0, itemCount: 0 };

    const c = normalizeCurrency(item.currency) ?? 'EUR';
    if (isTrackedCurrency(c)) {
      day.native[c] += item.amount;
      day.eurEquivalent[c] += item.amountEur;
    } else {
      day.native.EUR += item.amountEur;
      day.eurEquivalent.EUR += item.amountEur;
    }
    day.storedEurTotal += item.amountEur;
    day.itemCount += 1;
    byDate.set(item.expectedPaymentDate, day);
  }

  return byDate;
}

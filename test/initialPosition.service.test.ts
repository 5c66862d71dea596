import test from 'node:test';
import assert from 'node:assert/strict';
import {
  computeAverageMonthlyRecurring,
  computeCurrencyShares,
  computeInitialBalance,
  netPosition,
} from '../src/modules/forecast/initialPosition.service.js';
import type { Transaction } from '../src/modules/forecast/forecast.types.js';

const rates = { EUR: 1, USD: 0.92, JPY: 0.0065 };
const defaults = { EUR: 0.86, USD: 0.04, JPY: 0.14 };

function tx(
  date: string,
  direction: Transaction['direction'],
  amount: number,
  currency: string | null = 'EUR',
  extra: Partial<Transaction> = {}
): Transaction {
  return { date, direction, amount, currency, category: null, ...extra };
}

const history: Transaction[] = [
  tx('2025-01-10', 'credit', 1000),
  tx('2025-01-11', 'debit', 300),
  tx('2025-01-12', 'debit', -200),
  tx('2025-01-12', 'credit', 100, 'USD', { amountEur: 95 }),
  tx('2025-01-13', 'credit', 10000, 'JPY'),
  tx('2025-01-14', 'credit', 500, 'GBP'),
  tx('2025-01-15', 'credit', 9999),
];

test('initial position: sums signed history strictly before the start date', () => {
  const pos = computeInitialBalance(history, '2025-01-15', rates);
  assert.deepEqual(pos.perCurrencyOriginal, { EUR: 500, USD: 100, JPY: 10000 });
  assert.deepEqual(pos.perCurrencyEUR, { EUR: 500, USD: 95, JPY: 65 });
  assert.equal(pos.totalEUR, 660);
});

test('initial position: start date itself belongs to the forecast', () => {
  const pos = computeInitialBalance(history, '2025-01-16', rates);
  assert.equal(pos.perCurrencyOriginal.EUR, 500 + 9999);
});

test('initial position: no history gives zero balances', () => {
  const pos = computeInitialBalance([], '2025-01-15', rates);
  assert.deepEqual(pos, { perCurrencyOriginal: { EUR: 0, USD: 0, JPY: 0 }, perCurrencyEUR: { EUR: 0, USD: 0, JPY: 0 }, totalEUR: 0 });
});

test('initial position: net position subtracts the debt principal', () => {
  const pos = computeInitialBalance(history, '2025-01-15', rates);
  assert.equal(netPosition(pos, 1000), -340);
});

test('recurring: no recurring history falls back to contractual interest', () => {
  assert.equal(computeAverageMonthlyRecurring([tx('2025-01-02', 'debit', 50)], rates, 7500), 7500);
});

test('recurring: adds the interest shortfall when history holds under half of it', () => {
  const txs = [
    tx('2024-11-25', 'debit', 10000, 'EUR', { category: 'Payroll' }),
    tx('2024-11-01', 'debit', 1000, 'EUR', { category: 'Loan Interest' }),
    tx('2024-12-25', 'debit', 12000, 'EUR', { category: 'Payroll' }),
    tx('2024-12-01', 'debit', 1000, 'EUR', { category: 'Loan Interest' }),
    tx('2024-12-03', 'debit', 999, 'EUR', { category: 'Office' }),
  ];
  // months: 11000 and 13000 -> 12000; loan 1000/month < 5000 -> +9000
  const avg = computeAverageMonthlyRecurring(txs, rates, 10000);
  assert.equal(avg, 21000);
  // floor: other recurring (11000) + full interest
  assert.ok(avg >= 11000 + 10000);
});

test('recurring: floor applies when history already holds enough interest', () => {
  const txs = [
    tx('2024-11-25', 'debit', 10000, 'EUR', { category: 'Payroll' }),
    tx('2024-11-01', 'debit', 6000, 'EUR', { category: 'Loan Interest' }),
    tx('2024-12-25', 'debit', 12000, 'EUR', { category: 'Payroll' }),
    tx('2024-12-01', 'debit', 6000, 'EUR', { category: 'Loan Interest' }),
    tx('2024-12-05', 'debit', 40, 'USD', { category: 'Bank Fee', amountEur: 36 }),
  ];
  // months: 16000 and 18036 -> 17018; floor: (10000 + 12036) / 2 + 10000 = 21018
  assert.equal(computeAverageMonthlyRecurring(txs, rates, 10000), 21018);
});

test('recurring: categories are configurable', () => {
  const txs = [tx('2024-11-25', 'debit', 300, 'EUR', { category: 'Rent' })];
  assert.equal(
    computeAverageMonthlyRecurring(txs, rates, 0, { categories: ['Rent'], loanInterestCategory: 'Interest' }),
    300
  );
});

test('currency shares: defaults are normalized when there is no history', () => {
  const shares = computeCurrencyShares([], '2025-01-15', rates, defaults);
  const total = 0.86 + 0.04 + 0.14;
  assert.deepEqual(shares.credit, { EUR: 0.86 / total, USD: 0.04 / total, JPY: 0.14 / total });
  assert.deepEqual(shares.debit, shares.credit);
});

test('currency shares: observed EUR-equivalent volume before the start date', () => {
  const txs = [
    tx('2025-01-02', 'credit', 300),
    tx('2025-01-03', 'credit', 120, 'USD', { amountEur: 100 }),
    tx('2025-01-20', 'credit', 5000, 'JPY'),
  ];
  const shares = computeCurrencyShares(txs, '2025-01-15', rates, defaults);
  assert.deepEqual(shares.credit, { EUR: 0.75, USD: 0.25, JPY: 0 });
  const total = 0.86 + 0.04 + 0.14;
  assert.equal(shares.debit.EUR, 0.86 / total);
});

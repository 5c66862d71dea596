import test from 'node:test';
import assert from 'node:assert/strict';
import { FALLBACK_RATES } from '../src/modules/forecast/currency.service.js';
import { consolidate, zeroTriple } from '../src/modules/forecast/currencyTriple.js';
import type { DailyForecastRecord } from '../src/modules/forecast/forecast.types.js';
import type { DailySchedule } from '../src/modules/forecast/openItems.service.js';
import {
  classifyRisk,
  inflationMultiplier,
  projectDailyCashflow,
  reconcileFinalBalance,
  selectWorstDay,
  splitScheduledForDay,
  volumeMultipliers,
  type ProjectionContext,
  type ProjectionLogger,
} from '../src/modules/forecast/projection.service.js';
import { roundMoney } from '../src/utils/money.js';

const rates = { EUR: 1, USD: 0.92, JPY: 0.0065 };
const total = 0.86 + 0.04 + 0.14;
const shares = { EUR: 0.86 / total, USD: 0.04 / total, JPY: 0.14 / total };

function context(overrides: Partial<ProjectionContext> = {}): ProjectionContext {
  return {
    startDate: '2025-01-15',
    days: 10,
    ceilingDate: '2025-03-31',
    params: {
      avgDailyCredit: 1000,
      avgDailyDebit: 800,
      weeklyCreditPattern: {},
      weeklyDebitPattern: {},
      inflationRate: 0,
      volumeVolatilityCredit: 0,
      volumeVolatilityDebit: 0,
    },
    rates,
    fallbackRates: FALLBACK_RATES,
    shares: { credit: shares, debit: shares },
    receivables: new Map(),
    payables: new Map(),
    averageMonthlyRecurring: 0,
    initialCumulative: zeroTriple(),
    initialBalance: 0,
    debtPrincipal: 0,
    criticalThreshold: -100_000,
    seedOffset: 100,
    tolerance: 0.01,
    ...overrides,
  };
}

function schedule(native: DailySchedule['native'], eurEquivalent: DailySchedule['eurEquivalent']): DailySchedule {
  return {
    native,
    eurEquivalent,
    storedEurTotal: eurEquivalent.EUR + eurEquivalent.USD + eurEquivalent.JPY,
    itemCount: 1,
  };
}

function recordWithNetOfDebt(date: string, cumulativeNetOfDebt: number): DailyForecastRecord {
  return {
    date,
    weekday: 'Monday',
    month: 'January',
    inflow: zeroTriple(),
    outflow: zeroTriple(),
    netFlow: zeroTriple(),
    inflowEur: 0,
    outflowEur: 0,
    netFlowEur: 0,
    cumulative: zeroTriple(),
    cumulativeEur: cumulativeNetOfDebt + 1000,
    cumulativeNetOfDebt,
    risk: classifyRisk(cumulativeNetOfDebt, -100_000),
  };
}

test('risk: thresholds on the net-of-debt balance', () => {
  assert.equal(classifyRisk(-100_000.01, -100_000), 'Critical');
  assert.equal(classifyRisk(-100_000, -100_000), 'Warning');
  assert.equal(classifyRisk(-0.01, -100_000), 'Warning');
  assert.equal(classifyRisk(0, -100_000), 'Safe');
  assert.equal(classifyRisk(25, -100_000), 'Safe');
});

test('inflation: linear ramp from day 0', () => {
  assert.equal(inflationMultiplier(0.05, 0), 1);
  assert.equal(inflationMultiplier(0.0365, 10), 1.001);
  assert.equal(inflationMultiplier(Number.NaN, 10), 1);
});

test('volume: zero or missing volatility leaves volume unchanged', () => {
  assert.deepEqual(volumeMultipliers(3, 100, 0, 0), { credit: 1, debit: 1 });
  assert.deepEqual(volumeMultipliers(3, 100, Number.NaN, -1), { credit: 1, debit: 1 });
});

test('volume: draws depend only on the day index', () => {
  const a = volumeMultipliers(7, 100, 0.4, 0.6);
  volumeMultipliers(8, 100, 0.4, 0.6);
  const b = volumeMultipliers(7, 100, 0.4, 0.6);
  assert.deepEqual(a, b);
  assert.notDeepEqual(volumeMultipliers(7, 100, 0.4, 0.6), volumeMultipliers(8, 100, 0.4, 0.6));
});

test('volume: multiplier never drops below 0.5', () => {
  const values: number[] = [];
  for (let day = 0; day < 200; day += 1) {
    const m = volumeMultipliers(day, 100, 10, 10);
    values.push(m.credit, m.debit);
  }
  assert.ok(values.every((v) => v >= 0.5));
  assert.ok(values.some((v) => v === 0.5));
  assert.ok(values.some((v) => v > 1));
});

test('scheduled split: nothing scheduled gives zeros', () => {
  assert.deepEqual(splitScheduledForDay(undefined, rates, FALLBACK_RATES, 0.01), {
    native: zeroTriple(),
    repaired: false,
  });
});

test('scheduled split: original amounts are used when they match the stored total', () => {
  const day = schedule({ EUR: 10, USD: 100, JPY: 1000 }, { EUR: 10, USD: 92, JPY: 6.5 });
  assert.deepEqual(splitScheduledForDay(day, rates, FALLBACK_RATES, 0.01), {
    native: { EUR: 10, USD: 100, JPY: 1000 },
    repaired: false,
  });
});

test('scheduled split: rebuilt from stored EUR equivalents when rates moved', () => {
  const day = schedule({ EUR: 0, USD: 100, JPY: 0 }, { EUR: 0, USD: 90, JPY: 0 });
  const split = splitScheduledForDay(day, rates, FALLBACK_RATES, 0.01);
  assert.equal(split.repaired, true);
  assert.deepEqual(split.native, { EUR: 0, USD: 90 / 0.92, JPY: 0 });
});

test('worst day: minimum net-of-debt balance wins even if later days recover', () => {
  const records = [100, -50, -200, -10, 50].map((v, i) => recordWithNetOfDebt(`2025-01-0${i + 1}`, v));
  assert.deepEqual(selectWorstDay(records, '2025-01-01', 0, 0), {
    date: '2025-01-03',
    cumulativeEur: 800,
    cumulativeNetOfDebt: -200,
  });
});

test('worst day: earliest of equal minima wins', () => {
  const records = [recordWithNetOfDebt('2025-01-01', -5), recordWithNetOfDebt('2025-01-02', -5)];
  assert.equal(selectWorstDay(records, '2025-01-01', 0, 0).date, '2025-01-01');
});

test('worst day: empty series reports the starting state', () => {
  assert.deepEqual(selectWorstDay([], '2025-04-01', 1234.567, 1000), {
    date: '2025-04-01',
    cumulativeEur: 1234.57,
    cumulativeNetOfDebt: 234.57,
  });
});

test('projection: recurring outflow lands on the first of the month in EUR', () => {
  const outcome = projectDailyCashflow(
    context({
      startDate: '2025-01-31',
      days: 3,
      params: { ...context().params, avgDailyCredit: 0, avgDailyDebit: 0 },
      averageMonthlyRecurring: 5000,
    })
  );
  assert.deepEqual(
    outcome.records.map((r) => [r.date, r.outflowEur, r.outflow.EUR, r.cumulativeEur, r.risk]),
    [
      ['2025-01-31', 0, 0, 0, 'Safe'],
      ['2025-02-01', 5000, 5000, -5000, 'Warning'],
      ['2025-02-02', 0, 0, -5000, 'Warning'],
    ]
  );
  assert.deepEqual(outcome.riskZones, { Safe: 1, Warning: 2, Critical: 0 });
  assert.deepEqual(outcome.negativeDays, ['2025-02-01', '2025-02-02']);
});

test('projection: stops at the ceiling date', () => {
  const outcome = projectDailyCashflow(context({ days: 10, ceilingDate: '2025-01-17' }));
  assert.deepEqual(
    outcome.records.map((r) => r.date),
    ['2025-01-15', '2025-01-16', '2025-01-17']
  );
});

test('projection: weekday pattern overrides the daily average', () => {
  const outcome = projectDailyCashflow(
    context({
      days: 2,
      params: { ...context().params, weeklyCreditPattern: { Thursday: 1500 }, avgDailyDebit: 0 },
    })
  );
  assert.deepEqual(
    outcome.records.map((r) => [r.weekday, r.inflowEur]),
    [
      ['Wednesday', 1000],
      ['Thursday', 1500],
    ]
  );
});

test('projection: drifted scheduled split is repaired and logged', () => {
  const warnings: string[] = [];
  const logger: ProjectionLogger = {
    warn: (_obj: unknown, msg?: string) => {
      warnings.push(msg ?? '');
    },
    debug: () => {},
  };
  const outcome = projectDailyCashflow(
    context({
      days: 1,
      params: { ...context().params, avgDailyCredit: 0, avgDailyDebit: 0 },
      receivables: new Map([['2025-01-15', schedule({ EUR: 0, USD: 100, JPY: 0 }, { EUR: 0, USD: 90, JPY: 0 })]]),
      logger,
    })
  );
  assert.equal(outcome.scheduledSplitRepairs, 1);
  assert.equal(outcome.netFlowRepairs, 0);
  assert.equal(warnings.length, 1);
  assert.equal(outcome.records[0]?.inflowEur, 90);
});

test('projection: per-day currency consistency and balance conservation', () => {
  const ctx = context({
    days: 60,
    initialCumulative: { EUR: 5000, USD: 1000, JPY: 100000 },
    initialBalance: 5000 + 920 + 650,
    params: {
      ...context().params,
      inflationRate: 0.03,
      volumeVolatilityCredit: 0.4,
      volumeVolatilityDebit: 0.5,
      weeklyDebitPattern: { Friday: 2500 },
    },
    receivables: new Map([['2025-01-20', schedule({ EUR: 0, USD: 3000, JPY: 0 }, { EUR: 0, USD: 2760, JPY: 0 })]]),
    payables: new Map([['2025-02-03', schedule({ EUR: 0, USD: 0, JPY: 500000 }, { EUR: 0, USD: 0, JPY: 3250 })]]),
    averageMonthlyRecurring: 12000,
  });
  const outcome = projectDailyCashflow(ctx);

  assert.equal(outcome.records.length, 60);
  for (const r of outcome.records) {
    assert.ok(Math.abs(r.netFlowEur - consolidate(r.netFlow, rates)) <= 0.01, r.date);
    assert.ok(Math.abs(r.netFlowEur - (r.inflowEur - r.outflowEur)) <= 0.01, r.date);
  }

  const last = outcome.records[59];
  assert.ok(last);
  const emittedSum = outcome.records.reduce((sum, r) => sum + r.netFlowEur, 0);
  assert.equal(last.cumulativeEur, roundMoney(roundMoney(ctx.initialBalance) + emittedSum));
  assert.equal(outcome.finalBalance, last.cumulativeEur);
  assert.ok(Math.abs(consolidate(outcome.finalCumulative, rates) - last.cumulativeEur) <= 0.01);
  assert.equal(outcome.scheduledSplitRepairs + outcome.netFlowRepairs, 0);
});

test('projection: identical inputs give identical records', () => {
  const ctx = context({
    days: 30,
    params: { ...context().params, volumeVolatilityCredit: 0.3, volumeVolatilityDebit: 0.3, inflationRate: 0.02 },
  });
  assert.deepEqual(projectDailyCashflow(ctx), projectDailyCashflow(ctx));
});

const finalCheck = {
  initialBalance: 0,
  debtPrincipal: 0,
  criticalThreshold: -100_000,
  rates,
  fallbackRates: FALLBACK_RATES,
  tolerance: 0.01,
};

test('reconciliation: clean run is left untouched', () => {
  const outcome = projectDailyCashflow(context({ days: 5 }));
  const checked = reconcileFinalBalance(outcome, finalCheck);
  assert.equal(checked.repaired, false);
  assert.equal(checked.outcome, outcome);
});

test('reconciliation: last balance follows the emitted daily net flows', () => {
  const outcome = projectDailyCashflow(context({ days: 5 }));
  const records = outcome.records.map((r, i) => (i === 2 ? { ...r, netFlowEur: r.netFlowEur + 3 } : r));
  const checked = reconcileFinalBalance({ ...outcome, records }, finalCheck);

  const expected = roundMoney(records.reduce((sum, r) => sum + r.netFlowEur, 0));
  const last = checked.outcome.records[4];
  assert.ok(last);
  assert.equal(checked.repaired, true);
  assert.equal(expected, roundMoney((outcome.records[4]?.cumulativeEur ?? 0) + 3));
  assert.equal(last.cumulativeEur, expected);
  assert.equal(checked.outcome.finalBalance, expected);
  assert.ok(Math.abs(consolidate(checked.outcome.finalCumulative, rates) - expected) < 1e-6);
  assert.ok(Math.abs(consolidate(last.cumulative, rates) - expected) <= 0.01);
  assert.deepEqual(checked.outcome.riskZones, outcome.riskZones);
  assert.equal(checked.outcome.records.length, 5);
});

test('reconciliation: per-currency cumulative is rescaled to the consolidated balance', () => {
  const outcome = projectDailyCashflow(context({ days: 5 }));
  const perturbed = {
    ...outcome,
    finalCumulative: {
      EUR: outcome.finalCumulative.EUR * 2,
      USD: outcome.finalCumulative.USD * 2,
      JPY: outcome.finalCumulative.JPY * 2,
    },
  };
  const checked = reconcileFinalBalance(perturbed, finalCheck);

  const balance = outcome.records[4]?.cumulativeEur ?? 0;
  assert.equal(checked.repaired, true);
  assert.equal(checked.outcome.finalBalance, balance);
  assert.equal(checked.outcome.records[4]?.cumulativeEur, balance);
  assert.ok(Math.abs(consolidate(checked.outcome.finalCumulative, rates) - balance) < 1e-6);
  assert.deepEqual(checked.outcome.records.slice(0, 4), outcome.records.slice(0, 4));
});

test('reconciliation: empty series needs no repair', () => {
  const outcome = projectDailyCashflow(context({ days: 0 }));
  const checked = reconcileFinalBalance({ ...outcome, finalBalance: 99 }, finalCheck);
  assert.equal(checked.repaired, false);
});

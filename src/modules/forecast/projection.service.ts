import type { FastifyBaseLogger } from 'fastify';
import { addDays, dayOfMonth, monthNameOf, weekdayOf } from '../../utils/date.js';
import { roundMoney } from '../../utils/money.js';
import { createSeededRandom, standardNormalPair } from '../../utils/random.js';
import {
  addTriples,
  consolidate,
  mapTriple,
  roundTriple,
  scaleTriple,
  subtractTriples,
  trackedRates,
  zeroTriple,
} from './currencyTriple.js';
import type { CurrencyShares } from './initialPosition.service.js';
import type { DailySchedule } from './openItems.service.js';
import type {
  CurrencyTriple,
  DailyForecastRecord,
  ForecastParams,
  RateTable,
  RiskLevel,
  RiskTally,
  WeeklyPattern,
  WorstDay,
} from './forecast.types.js';

export type ProjectionLogger = Pick<FastifyBaseLogger, 'warn' | 'debug'>;

export type ProjectionParams = Pick<
  ForecastParams,
  | 'avgDailyCredit'
  | 'avgDailyDebit'
  | 'weeklyCreditPattern'
  | 'weeklyDebitPattern'
  | 'inflationRate'
  | 'volumeVolatilityCredit'
  | 'volumeVolatilityDebit'
>;

export type ProjectionContext = {
  startDate: string;
  /** Horizon length; already capped by the caller. */
  days: number;
  ceilingDate: string;
  params: ProjectionParams;
  rates: RateTable;
  fallbackRates: RateTable;
  shares: CurrencyShares;
  receivables: ReadonlyMap<string, DailySchedule>;
  payables: ReadonlyMap<string, DailySchedule>;
  averageMonthlyRecurring: number;
  /** Native per-currency opening balances. */
  initialCumulative: CurrencyTriple;
  initialBalance: number;
  debtPrincipal: number;
  criticalThreshold: number;
  seedOffset: number;
  tolerance: number;
  logger?: ProjectionLogger;
};

export type ProjectionOutcome = {
  records: DailyForecastRecord[];
  /** Last emitted consolidated cumulative. */
  finalBalance: number;
  /** Native per-currency cumulative, unrounded. */
  finalCumulative: CurrencyTriple;
  negativeDays: string[];
  riskZones: RiskTally;
  scheduledSplitRepairs: number;
  netFlowRepairs: number;
};

const VOLATILITY_SCALE = 0.3;
const MIN_VOLUME_MULTIPLIER = 0.5;

export function emptyRiskTally(): RiskTally {
  return { Safe: 0, Warning: 0, Critical: 0 };
}

export function classifyRisk(netOfDebt: number, criticalThreshold: number): RiskLevel {
  if (netOfDebt < criticalThreshold) return 'Critical';
  if (netOfDebt < 0) return 'Warning';
  return 'Safe';
}

/** Linear ramp from day 0; not compounded. */
export function inflationMultiplier(inflationRate: number, day: number): number {
  if (!Number.isFinite(inflationRate)) return 1;
  return 1 + (inflationRate * day) / 365;
}

function legMultiplier(volatility: number, z: number): number {
  const sigma = volatility * VOLATILITY_SCALE;
  if (!Number.isFinite(sigma) || sigma <= 0) return 1;
  return Math.max(MIN_VOLUME_MULTIPLIER, 1 + sigma * z);
}

/**
 * Random volume adjustment for both legs of one day. A fresh generator is seeded
 * with `seedOffset + day`, so the result depends on nothing but its arguments.
 */
export function volumeMultipliers(
  day: number,
  seedOffset: number,
  volatilityCredit: number,
  volatilityDebit: number
): { credit: number; debit: number } {
  const [zCredit, zDebit] = standardNormalPair(createSeededRandom(seedOffset + day));
  return {
    credit: legMultiplier(volatilityCredit, zCredit),
    debit: legMultiplier(volatilityDebit, zDebit),
  };
}

function baselineFor(pattern: WeeklyPattern, weekday: keyof WeeklyPattern, average: number): number {
  const fromPattern = pattern[weekday];
  if (fromPattern !== undefined && Number.isFinite(fromPattern)) return fromPattern;
  return Number.isFinite(average) ? average : 0;
}

/**
 * Native per-currency amounts settling on one day. When the original amounts no
 * longer consolidate to the EUR total stored at scheduling time (rates moved),
 * the split is rebuilt from the stored EUR equivalents.
 */
export function splitScheduledForDay(
  schedule: DailySchedule | undefined,
  rates: RateTable,
  fallbackRates: RateTable,
  tolerance: number
): { native: CurrencyTriple; repaired: boolean } {
  if (!schedule) return { native: zeroTriple(), repaired: false };

  const drift = Math.abs(consolidate(schedule.native, rates, fallbackRates) - schedule.storedEurTotal);
  if (drift <= tolerance) return { native: { ...schedule.native }, repaired: false };

  const r = trackedRates(rates, fallbackRates);
  return {
    native: {
      EUR: schedule.eurEquivalent.EUR,
      USD: schedule.eurEquivalent.USD / r.USD,
      JPY: schedule.eurEquivalent.JPY / r.JPY,
    },
    repaired: true,
  };
}

/** EUR baseline spread over currencies by share, expressed in native units. */
function baselineNative(baselineEur: number, shares: CurrencyTriple, rates: CurrencyTriple): CurrencyTriple {
  return mapTriple(shares, (share, currency) => (baselineEur * share) / rates[currency]);
}

/** Minimum net-of-debt balance; the earliest of equal minima wins. */
export function selectWorstDay(
  records: readonly DailyForecastRecord[],
  startDate: string,
  initialBalance: number,
  debtPrincipal: number
): WorstDay {
  let worst: DailyForecastRecord | null = null;
  for (const record of records) {
    if (worst === null || record.cumulativeNetOfDebt < worst.cumulativeNetOfDebt) worst = record;
  }
  if (worst === null) {
    return {
      date: startDate,
      cumulativeEur: roundMoney(initialBalance),
      cumulativeNetOfDebt: roundMoney(initialBalance - debtPrincipal),
    };
  }
  return { date: worst.date, cumulativeEur: worst.cumulativeEur, cumulativeNetOfDebt: worst.cumulativeNetOfDebt };
}

export function projectDailyCashflow(ctx: ProjectionContext): ProjectionOutcome {
  const rates = trackedRates(ctx.rates, ctx.fallbackRates);
  const records: DailyForecastRecord[] = [];
  const negativeDays: string[] = [];
  const riskZones = emptyRiskTally();
  let scheduledSplitRepairs = 0;
  let netFlowRepairs = 0;

  let cumulative: CurrencyTriple = { ...ctx.initialCumulative };
  // Zero unless the opening EUR balance came from stored historical conversions.
  const openingOffset = ctx.initialBalance - consolidate(cumulative, ctx.rates, ctx.fallbackRates);
  let previousCumulativeEur = roundMoney(ctx.initialBalance);

  for (let day = 0; day < ctx.days; day += 1) {
    const date = addDays(ctx.startDate, day);
    if (date > ctx.ceilingDate) break;

    // 1. weekday baseline
    const weekday = weekdayOf(date);
    const baseCredit = baselineFor(ctx.params.weeklyCreditPattern, weekday, ctx.params.avgDailyCredit);
    const baseDebit = baselineFor(ctx.params.weeklyDebitPattern, weekday, ctx.params.avgDailyDebit);

    // 2. open items settling today
    const inflowSplit = splitScheduledForDay(ctx.receivables.get(date), ctx.rates, ctx.fallbackRates, ctx.tolerance);
    const outflowSplit = splitScheduledForDay(ctx.payables.get(date), ctx.rates, ctx.fallbackRates, ctx.tolerance);
    for (const split of [inflowSplit, outflowSplit]) {
      if (!split.repaired) continue;
      scheduledSplitRepairs += 1;
      ctx.logger?.warn({ date }, 'scheduled split drifted from stored EUR total; rebuilt from EUR equivalents');
    }

    // 3. baseline per currency
    const creditBase = baselineNative(baseCredit, ctx.shares.credit, rates);
    const debitBase = baselineNative(baseDebit, ctx.shares.debit, rates);

    // 4-5. multipliers
    const inflation = inflationMultiplier(ctx.params.inflationRate, day);
    const volume = volumeMultipliers(
      day,
      ctx.seedOffset,
      ctx.params.volumeVolatilityCredit,
      ctx.params.volumeVolatilityDebit
    );

    // 6. legs
    const recurring =
      dayOfMonth(date) === 1 && Number.isFinite(ctx.averageMonthlyRecurring) ? ctx.averageMonthlyRecurring : 0;
    const credit = scaleTriple(addTriples(creditBase, inflowSplit.native), inflation * volume.credit);
    const debitBeforeAdjust = addTriples(debitBase, outflowSplit.native);
    debitBeforeAdjust.EUR += recurring;
    const debit = scaleTriple(debitBeforeAdjust, inflation * volume.debit);
    const net = subtractTriples(credit, debit);

    // 7. consolidation with cross-check
    const creditEur = consolidate(credit, ctx.rates, ctx.fallbackRates);
    const debitEur = consolidate(debit, ctx.rates, ctx.fallbackRates);
    const netFromCurrencies = consolidate(net, ctx.rates, ctx.fallbackRates);
    if (Math.abs(creditEur - debitEur - netFromCurrencies) > ctx.tolerance) {
      netFlowRepairs += 1;
      ctx.logger?.warn(
        { date, netEur: creditEur - debitEur, netFromCurrencies },
        'net flow drift between consolidation paths; per-currency figures kept'
      );
    }

    // 8. running balances, booked from the rounded per-currency net
    const inflow = roundTriple(credit);
    const outflow = roundTriple(debit);
    const netFlow = roundTriple(subtractTriples(inflow, outflow));
    cumulative = addTriples(cumulative, netFlow);
    const cumulativeEur = roundMoney(openingOffset + consolidate(cumulative, ctx.rates, ctx.fallbackRates));
    const netFlowEur = roundMoney(cumulativeEur - previousCumulativeEur);
    const inflowEur = roundMoney(creditEur);
    previousCumulativeEur = cumulativeEur;

    // 9. risk
    const netOfDebt = cumulativeEur - ctx.debtPrincipal;
    const risk = classifyRisk(netOfDebt, ctx.criticalThreshold);
    riskZones[risk] += 1;
    if (netOfDebt < 0) negativeDays.push(date);

    // 10. record
    records.push({
      date,
      weekday,
      month: monthNameOf(date),
      inflow,
      outflow,
      netFlow,
      inflowEur,
      outflowEur: roundMoney(inflowEur - netFlowEur),
      netFlowEur,
      cumulative: roundTriple(cumulative),
      cumulativeEur,
      cumulativeNetOfDebt: roundMoney(netOfDebt),
      risk,
    });
  }

  return {
    records,
    finalBalance: previousCumulativeEur,
    finalCumulative: cumulative,
    negativeDays,
    riskZones,
    scheduledSplitRepairs,
    netFlowRepairs,
  };
}

export type FinalBalanceCheck = {
  initialBalance: number;
  debtPrincipal: number;
  criticalThreshold: number;
  rates: RateTable;
  fallbackRates: RateTable;
  tolerance: number;
};

/**
 * Two checks on the emitted series. The last cumulative must equal the rounded
 * opening balance plus the sum of the emitted daily net flows, and the FX-weighted
 * per-currency cumulative must match that balance. On either drift the last record
 * takes the derived balance, its per-currency cumulatives are scaled to it and the
 * day's zone is re-derived.
 */
export function reconcileFinalBalance(
  outcome: ProjectionOutcome,
  check: FinalBalanceCheck
): { outcome: ProjectionOutcome; repaired: boolean } {
  const last = outcome.records[outcome.records.length - 1];
  if (last === undefined) return { outcome, repaired: false };

  let expected = roundMoney(check.initialBalance);
  for (const record of outcome.records) expected += record.netFlowEur;
  expected = roundMoney(expected);

  const balanceDrift = Math.abs(last.cumulativeEur - expected) > check.tolerance;
  const corrected = balanceDrift ? expected : last.cumulativeEur;
  const fxWeighted = consolidate(outcome.finalCumulative, check.rates, check.fallbackRates);
  const currencyDrift = Math.abs(fxWeighted - corrected) > check.tolerance;
  if (!balanceDrift && !currencyDrift) return { outcome, repaired: false };

  const finalCumulative =
    Math.abs(fxWeighted) > check.tolerance
      ? scaleTriple(outcome.finalCumulative, corrected / fxWeighted)
      : { ...outcome.finalCumulative };

  const netOfDebt = corrected - check.debtPrincipal;
  const risk = classifyRisk(netOfDebt, check.criticalThreshold);
  const riskZones = { ...outcome.riskZones };
  riskZones[last.risk] -= 1;
  riskZones[risk] += 1;

  const negativeDays = outcome.negativeDays.filter((d) => d !== last.date);
  if (netOfDebt < 0) negativeDays.push(last.date);

  const repairedLast: DailyForecastRecord = {
    ...last,
    cumulative: roundTriple(finalCumulative),
    cumulativeEur: corrected,
    cumulativeNetOfDebt: roundMoney(netOfDebt),
    risk,
  };

  return {
    outcome: {
      ...outcome,
      records: [...outcome.records.slice(0, -1), repairedLast],
      finalBalance: corrected,
      finalCumulative,
      negativeDays,
      riskZones,
    },
    repaired: true,
  };
}

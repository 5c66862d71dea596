import { addDays, daysBetween } from '../../utils/date.js';
import { roundMoney } from '../../utils/money.js';
import { resolveRateTable } from './currency.service.js';
import { createForecastPolicy, type ForecastPolicy } from './forecast.policy.js';
import { describeIssues, ForecastParamsSchema, ForecastPolicyOverridesSchema, type ForecastParamsInput } from './forecast.schemas.js';
import type { ForecastInputs, ForecastParams, ForecastRunResult, ForecastScenario } from './forecast.types.js';
import {
  computeAverageMonthlyRecurring,
  computeCurrencyShares,
  computeInitialBalance,
  netPosition,
} from './initialPosition.service.js';
import { aggregateByDate, scheduleOpenItems } from './openItems.service.js';
import {
  projectDailyCashflow,
  reconcileFinalBalance,
  selectWorstDay,
  type ProjectionLogger,
} from './projection.service.js';

export type RunForecastOptions = {
  logger?: ProjectionLogger;
};

function preconditionError(message: string): Error {
  return Object.assign(new Error(message), { statusCode: 400 });
}

/**
 * Shifts the mean collection (DSO) and payment (DPO) delays.
 * Conservative: collections slower, payments earlier. Optimistic: the reverse.
 */
export function applyScenario(params: ForecastParams, scenario: ForecastScenario): ForecastParams {
  if (scenario === 'conservative') return { ...params, dsoMean: params.dsoMean + 7, dpoMean: params.dpoMean - 3 };
  if (scenario === 'optimistic') return { ...params, dsoMean: params.dsoMean - 5, dpoMean: params.dpoMean + 3 };
  return params;
}

/** Days to project: capped by the horizon limit and the ceiling date, never negative. */
export function resolveHorizon(startDate: string, ceilingDate: string, maxHorizonDays: number): number {
  return Math.max(0, Math.min(maxHorizonDays, daysBetween(startDate, ceilingDate) + 1));
}

/**
 * Runs one forecast from already-loaded history. Synchronous and free of I/O;
 * identical inputs give identical output.
 *
 * Throws (statusCode 400) only for malformed parameters or policy. Everything
 * else degrades: bad rates fall back, missing history yields defaults and a
 * start past the ceiling yields an empty series.
 */
export function runForecast(
  inputs: ForecastInputs,
  paramsInput: ForecastParamsInput,
  policyOverrides: Partial<ForecastPolicy> = {},
  options: RunForecastOptions = {}
): ForecastRunResult {
  const parsedParams = ForecastParamsSchema.safeParse(paramsInput);
  if (!parsedParams.success) throw preconditionError(`invalid forecast params: ${describeIssues(parsedParams.error)}`);
  const parsedPolicy = ForecastPolicyOverridesSchema.safeParse(policyOverrides);
  if (!parsedPolicy.success) throw preconditionError(`invalid forecast policy: ${describeIssues(parsedPolicy.error)}`);

  const params: ForecastParams = parsedParams.data;
  const policy = createForecastPolicy(parsedPolicy.data);
  const { logger } = options;
  const fallbackRates = policy.fallbackRates;
  const rates = resolveRateTable(inputs.rates, fallbackRates);
  const { startDate } = params;
  const ceilingDate = params.maxForecastDate < policy.maxForecastDate ? params.maxForecastDate : policy.maxForecastDate;

  const receivables = scheduleOpenItems(inputs.sales, params.dsoMean, rates, fallbackRates);
  const payables = scheduleOpenItems(inputs.purchases, params.dpoMean, rates, fallbackRates);

  const initialPosition = computeInitialBalance(inputs.transactions, startDate, rates, fallbackRates);
  const initialBalance = initialPosition.totalEUR;
  const averageMonthlyRecurring = computeAverageMonthlyRecurring(
    inputs.transactions,
    rates,
    policy.debtMonthlyInterest,
    {
      categories: policy.recurringCategories,
      loanInterestCategory: policy.loanInterestCategory,
      fallbackRates,
    }
  );
  const shares = computeCurrencyShares(
    inputs.transactions,
    startDate,
    rates,
    policy.defaultCurrencyShares,
    fallbackRates
  );

  const days = resolveHorizon(startDate, ceilingDate, policy.maxHorizonDays);

  const projected = projectDailyCashflow({
    startDate,
    days,
    ceilingDate,
    params,
    rates,
    fallbackRates,
    shares,
    receivables: aggregateByDate(receivables),
    payables: aggregateByDate(payables),
    averageMonthlyRecurring,
    initialCumulative: initialPosition.perCurrencyOriginal,
    initialBalance,
    debtPrincipal: policy.debtPrincipal,
    criticalThreshold: policy.criticalThreshold,
    seedOffset: policy.seedOffset,
    tolerance: policy.tolerance,
    logger,
  });

  const { outcome, repaired } = reconcileFinalBalance(projected, {
    initialBalance,
    debtPrincipal: policy.debtPrincipal,
    criticalThreshold: policy.criticalThreshold,
    rates,
    fallbackRates,
    tolerance: policy.tolerance,
  });
  if (repaired) {
    logger?.warn(
      { observed: projected.finalBalance, corrected: outcome.finalBalance },
      'final balance drifted from the daily net flows or the per-currency cumulative; corrected'
    );
  }

  const totalNetFlow = roundMoney(outcome.records.reduce((sum, record) => sum + record.netFlowEur, 0));
  const finalBalance = outcome.records.length > 0 ? outcome.finalBalance : initialBalance;

  logger?.debug(
    { startDate, days: outcome.records.length, scheduled: receivables.length + payables.length },
    'forecast computed'
  );

  return {
    records: outcome.records,
    startDate,
    endDate: addDays(startDate, days - 1),
    forecastDaysCount: outcome.records.length,
    initialPosition,
    initialBalance,
    initialBalanceNet: netPosition(initialPosition, policy.debtPrincipal),
    finalBalance,
    finalBalanceNet: finalBalance - policy.debtPrincipal,
    totalNetFlow,
    averageMonthlyRecurring,
    negativeDays: outcome.negativeDays,
    riskZones: outcome.riskZones,
    worstDay: selectWorstDay(outcome.records, startDate, initialBalance, policy.debtPrincipal),
    scheduled: { receivables, payables },
    reconciliation: {
      scheduledSplitRepairs: outcome.scheduledSplitRepairs,
      netFlowRepairs: outcome.netFlowRepairs,
      finalBalanceRepaired: repaired,
    },
  };
}

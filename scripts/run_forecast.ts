import path from 'node:path';
import { loadConfig } from '../src/config.js';
import { createMemorySnapshotCache } from '../src/infrastructure/snapshotCache.js';
import { FALLBACK_RATES } from '../src/modules/forecast/currency.service.js';
import { ScenarioSchema } from '../src/modules/forecast/forecast.schemas.js';
import { applyScenario, runForecast } from '../src/modules/forecast/forecast.service.js';
import { loadHistory } from '../src/modules/history/csvLoader.js';
import { deriveForecastParams } from '../src/modules/history/statistics.service.js';
import { getExchangeRates, type ResolvedRates } from '../src/modules/rates/rates.service.js';
import { isoNow, toDateOnly } from '../src/utils/date.js';

/**
 * Runs a forecast from CSV history and prints a summary.
 *
 * Usage:
 *   npx tsx scripts/run_forecast.ts --data=./data --start=2025-01-01
 *
 * Options:
 *   --data=DIR            (optional; default DATA_DIR or ./data)
 *   --start=YYYY-MM-DD    (required)
 *   --until=YYYY-MM-DD    (optional; default MAX_FORECAST_DATE)
 *   --scenario=base|conservative|optimistic  (optional; default base)
 *   --offline=true        (optional; skip the live FX quote)
 */

function getArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const found = process.argv.find((a) => a.startsWith(prefix));
  return found ? found.slice(prefix.length) : undefined;
}

function fmt(n: number): string {
  return n.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

async function main() {
  const config = loadConfig();

  const startRaw = getArg('start');
  if (!startRaw) throw new Error('Missing required --start=YYYY-MM-DD');
  const startDate = toDateOnly(startRaw);
  if (!startDate) throw new Error(`Invalid --start: ${startRaw}`);

  const untilRaw = getArg('until');
  const maxForecastDate = untilRaw ? toDateOnly(untilRaw) : config.maxForecastDate;
  if (!maxForecastDate) throw new Error(`Invalid --until: ${untilRaw ?? ''}`);

  const scenarioParsed = ScenarioSchema.safeParse(getArg('scenario') ?? 'base');
  if (!scenarioParsed.success) throw new Error('Invalid --scenario (base, conservative, optimistic)');
  const scenario = scenarioParsed.data;

  const dataDir = path.resolve(getArg('data') ?? config.dataDir);
  const offline = (getArg('offline') ?? 'false').toLowerCase() === 'true';

  console.log(`📂 Loading history from ${dataDir}`);
  const history = await loadHistory(dataDir);
  console.log(
    `   ${history.transactions.length} transactions, ${history.sales.length} sales invoices, ${history.purchases.length} purchase invoices`
  );

  const fx: ResolvedRates = offline
    ? { rates: { ...FALLBACK_RATES, EUR: 1 }, source: 'fallback', fetchedAt: isoNow() }
    : await getExchangeRates({
        url: config.fxRatesUrl,
        cache: createMemorySnapshotCache(),
        ttlSeconds: config.fxCacheTtlSeconds,
        log: { warn: console.warn, info: console.log },
      });
  console.log(`💱 FX (${fx.source}): USD=${fx.rates.USD} JPY=${fx.rates.JPY}`);

  const params = applyScenario(deriveForecastParams(history, fx.rates, { startDate, maxForecastDate }), scenario);
  console.log(
    `📐 DSO ${params.dsoMean.toFixed(1)}d, DPO ${params.dpoMean.toFixed(1)}d, inflation ${(params.inflationRate * 100).toFixed(1)}%`
  );

  const result = runForecast({ ...history, rates: fx.rates }, params, {
    debtPrincipal: config.debtPrincipal,
    debtAnnualInterestRate: config.debtInterestRate,
    maxForecastDate: config.maxForecastDate,
  });

  console.log(`\n📊 Forecast ${result.startDate} → ${result.endDate} (${result.forecastDaysCount} days, ${scenario})`);
  console.log(`   Initial balance:   ${fmt(result.initialBalance)} EUR (net of debt ${fmt(result.initialBalanceNet)})`);
  console.log(`   Final balance:     ${fmt(result.finalBalance)} EUR (net of debt ${fmt(result.finalBalanceNet)})`);
  console.log(`   Total net flow:    ${fmt(result.totalNetFlow)} EUR`);
  console.log(`   Monthly recurring: ${fmt(result.averageMonthlyRecurring)} EUR`);
  console.log(
    `   Risk zones:        Safe ${result.riskZones.Safe}, Warning ${result.riskZones.Warning}, Critical ${result.riskZones.Critical}`
  );
  console.log(`   Negative days:     ${result.negativeDays.length}`);
  console.log(
    `   Worst day:         ${result.worstDay.date} (${fmt(result.worstDay.cumulativeNetOfDebt)} EUR net of debt)`
  );

  const { scheduledSplitRepairs, netFlowRepairs, finalBalanceRepaired } = result.reconciliation;
  if (scheduledSplitRepairs || netFlowRepairs || finalBalanceRepaired) {
    console.warn(
      `⚠️  Reconciliation applied: split=${scheduledSplitRepairs} net=${netFlowRepairs} final=${finalBalanceRepaired}`
    );
  }
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});

import type { FastifyBaseLogger, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../../config.js';
import { readSnapshot, snapshotKey, writeSnapshot, type SnapshotCache } from '../../infrastructure/snapshotCache.js';
import { isoNow } from '../../utils/date.js';
import type { HistorySet } from '../history/statistics.service.js';
import { deriveForecastParams } from '../history/statistics.service.js';
import type { ResolvedRates } from '../rates/rates.service.js';
import { resolveRateTable } from './currency.service.js';
import type { ForecastPolicy } from './forecast.policy.js';
import { describeIssues, ForecastQuerySchema, ForecastRunBodySchema } from './forecast.schemas.js';
import { applyScenario, runForecast } from './forecast.service.js';

export type ForecastRouteDeps = {
  config: AppConfig;
  cache: SnapshotCache;
  resolveRates: (log: FastifyBaseLogger) => Promise<ResolvedRates>;
  loadHistory: (dir: string) => Promise<HistorySet>;
};

const SnapshotSchema = z.object({ computedAt: z.string() }).passthrough();

function configPolicy(config: AppConfig): Partial<ForecastPolicy> {
  return {
    debtPrincipal: config.debtPrincipal,
    debtAnnualInterestRate: config.debtInterestRate,
    maxForecastDate: config.maxForecastDate,
  };
}

export const forecastRoutes: FastifyPluginAsync<ForecastRouteDeps> = async (fastify, deps) => {
  const { config, cache } = deps;

  // ---------------------------------------------------------------------------
  // Forecast from caller-supplied history (deterministic; snapshot cached)
  // ---------------------------------------------------------------------------
  fastify.post('/forecast/run', async (request, reply) => {
    const parsed = ForecastRunBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.status(400);
      return { error: describeIssues(parsed.error), issues: parsed.error.issues };
    }
    const body = parsed.data;

    const policy = { ...configPolicy(config), ...body.policy };
    const rates = body.rates
      ? { rates: resolveRateTable(body.rates, policy.fallbackRates), source: 'request' as const }
      : await deps.resolveRates(request.log);

    const key = snapshotKey('forecast', {
      transactions: body.transactions,
      sales: body.sales,
      purchases: body.purchases,
      params: body.params,
      scenario: body.scenario,
      policy,
      rates: rates.rates,
    });

    const cached = await readSnapshot(cache, key, request.log);
    if (cached) {
      try {
        const hit = SnapshotSchema.safeParse(JSON.parse(cached));
        if (hit.success) return { ...hit.data, source: 'snapshot' as const };
        request.log.warn({ key }, 'forecast snapshot has an unexpected shape; recomputing');
      } catch (err) {
        request.log.warn({ err, key }, 'forecast snapshot is not valid JSON; recomputing');
      }
    }

    const result = runForecast(
      { transactions: body.transactions, sales: body.sales, purchases: body.purchases, rates: rates.rates },
      applyScenario(body.params, body.scenario),
      policy,
      { logger: request.log }
    );

    const snapshot = { ...result, scenario: body.scenario, ratesSource: rates.source, computedAt: isoNow() };
    await writeSnapshot(cache, key, JSON.stringify(snapshot), config.forecastCacheTtlSeconds, request.log);
    return { ...snapshot, source: 'computed' as const };
  });

  // ---------------------------------------------------------------------------
  // Forecast from the CSV history in DATA_DIR
  // ---------------------------------------------------------------------------
  fastify.get('/forecast', async (request, reply) => {
    const parsed = ForecastQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      reply.status(400);
      return { error: describeIssues(parsed.error) };
    }
    const { startDate, scenario } = parsed.data;
    const maxForecastDate = parsed.data.maxForecastDate ?? config.maxForecastDate;

    const history = await deps.loadHistory(config.dataDir);
    const rates = await deps.resolveRates(request.log);
    const params = deriveForecastParams(history, rates.rates, { startDate, maxForecastDate });

    const result = runForecast(
      { ...history, rates: rates.rates },
      applyScenario(params, scenario),
      configPolicy(config),
      { logger: request.log }
    );
    return { ...result, scenario, ratesSource: rates.source, computedAt: isoNow(), source: 'computed' as const };
  });
};

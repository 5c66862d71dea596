import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config.js';
import { createMemorySnapshotCache, type SnapshotCache } from './infrastructure/snapshotCache.js';
import { forecastRoutes } from './modules/forecast/forecast.routes.js';
import { loadHistory as loadHistoryFromCsv } from './modules/history/csvLoader.js';
import type { HistorySet } from './modules/history/statistics.service.js';
import { ratesRoutes } from './modules/rates/rates.routes.js';
import { getExchangeRates, type QuoteFetcher } from './modules/rates/rates.service.js';

export type AppDeps = {
  config: AppConfig;
  /** Defaults to a per-process in-memory cache. */
  cache?: SnapshotCache;
  fetchQuote?: QuoteFetcher;
  loadHistory?: (dir: string) => Promise<HistorySet>;
  logger?: FastifyServerOptions['logger'];
};

export async function buildApp(deps: AppDeps) {
  const { config } = deps;
  const cache = deps.cache ?? createMemorySnapshotCache();
  const fastify = Fastify({ logger: deps.logger ?? { level: config.logLevel } });

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  const resolveRates = (log: FastifyBaseLogger) =>
    getExchangeRates({
      url: config.fxRatesUrl,
      cache,
      ttlSeconds: config.fxCacheTtlSeconds,
      log,
      fetchQuote: deps.fetchQuote,
    });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  await fastify.register(ratesRoutes, { resolveRates });
  await fastify.register(forecastRoutes, {
    config,
    cache,
    resolveRates,
    loadHistory: deps.loadHistory ?? loadHistoryFromCsv,
  });

  return fastify;
}

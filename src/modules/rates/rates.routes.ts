import type { FastifyBaseLogger, FastifyPluginAsync } from 'fastify';
import type { ResolvedRates } from './rates.service.js';

export type RatesRouteDeps = {
  resolveRates: (log: FastifyBaseLogger) => Promise<ResolvedRates>;
};

export const ratesRoutes: FastifyPluginAsync<RatesRouteDeps> = async (fastify, deps) => {
  fastify.get('/rates', async (request) => {
    return await deps.resolveRates(request.log);
  });
};

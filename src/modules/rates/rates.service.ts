import axios from 'axios';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { readSnapshot, writeSnapshot, type SnapshotCache } from '../../infrastructure/snapshotCache.js';
import { isoNow } from '../../utils/date.js';
import { FALLBACK_RATES, isSaneRate, resolveRateTable } from '../forecast/currency.service.js';
import type { RateTable } from '../forecast/forecast.types.js';

export type RatesSource = 'cache' | 'live' | 'fallback';

export type ResolvedRates = {
  rates: RateTable;
  source: RatesSource;
  fetchedAt: string;
};

/** Returns the raw JSON body of an EUR-based quote. */
export type QuoteFetcher = (url: string) => Promise<unknown>;

export type ExchangeRateDeps = {
  url: string;
  cache: SnapshotCache;
  ttlSeconds: number;
  log: Pick<FastifyBaseLogger, 'warn' | 'info'>;
  fetchQuote?: QuoteFetcher;
  fallbackRates?: RateTable;
};

const QUOTE_TIMEOUT_MS = 5_000;
const CACHE_KEY = 'fx:eur';

const QuoteSchema = z.object({
  rates: z.record(z.string(), z.number()),
});

const CachedRatesSchema = z.object({
  rates: z.record(z.string(), z.number()),
  fetchedAt: z.string(),
});

export const fetchQuoteWithAxios: QuoteFetcher = async (url) => {
  const res = await axios.get<unknown>(url, { timeout: QUOTE_TIMEOUT_MS });
  return res.data;
};

/**
 * Converts a quote in units-per-EUR (`{ rates: { USD: 1.08, JPY: 160 } }`) into
 * EUR-per-unit. Missing or non-positive quotes take the fallback rate. A JPY rate
 * still above 1 was quoted the other way round and is inverted back.
 */
export function parseEurBaseQuote(payload: unknown, fallbackRates: RateTable = FALLBACK_RATES): RateTable | null {
  const parsed = QuoteSchema.safeParse(payload);
  if (!parsed.success) return null;

  const candidate: Record<string, number> = { EUR: 1 };
  for (const code of Object.keys(fallbackRates)) {
    if (code === 'EUR') continue;
    const quoted = parsed.data.rates[code];
    const fallback = fallbackRates[code];
    let rate = quoted !== undefined && quoted > 0 ? 1 / quoted : fallback;
    if (rate === undefined) continue;
    if (code === 'JPY' && rate > 1) rate = 1 / rate;
    candidate[code] = rate;
  }

  for (const code of Object.keys(fallbackRates)) {
    if (code !== 'EUR' && !isSaneRate(candidate[code])) return null;
  }
  return resolveRateTable(candidate, fallbackRates);
}

/**
 * FX table for a run: cached quote, else live quote, else the fallback table.
 * Never throws; every failure is logged and degrades to the next source.
 */
export async function getExchangeRates(deps: ExchangeRateDeps): Promise<ResolvedRates> {
  const fallbackRates = deps.fallbackRates ?? FALLBACK_RATES;
  const fetchQuote = deps.fetchQuote ?? fetchQuoteWithAxios;

  const cached = await readSnapshot(deps.cache, CACHE_KEY, deps.log);
  if (cached) {
    try {
      const hit = CachedRatesSchema.safeParse(JSON.parse(cached));
      if (hit.success) {
        return { rates: resolveRateTable(hit.data.rates, fallbackRates), source: 'cache', fetchedAt: hit.data.fetchedAt };
      }
      deps.log.warn({ key: CACHE_KEY }, 'cached FX snapshot has an unexpected shape; refetching');
    } catch (err) {
      deps.log.warn({ err, key: CACHE_KEY }, 'cached FX snapshot is not valid JSON; refetching');
    }
  }

  try {
    const payload = await fetchQuote(deps.url);
    const rates = parseEurBaseQuote(payload, fallbackRates);
    if (rates) {
      const fetchedAt = isoNow();
      await writeSnapshot(deps.cache, CACHE_KEY, JSON.stringify({ rates, fetchedAt }), deps.ttlSeconds, deps.log);
      deps.log.info({ url: deps.url }, 'FX rates fetched');
      return { rates, source: 'live', fetchedAt };
    }
    deps.log.warn({ url: deps.url }, 'FX quote rejected; using fallback rates');
  } catch (err) {
    const message = axios.isAxiosError(err) ? err.message : String(err);
    deps.log.warn({ url: deps.url, error: message }, 'FX quote fetch failed; using fallback rates');
  }

  return { rates: { ...fallbackRates, EUR: 1 }, source: 'fallback', fetchedAt: isoNow() };
}

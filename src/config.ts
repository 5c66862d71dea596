import { toDateOnly } from './utils/date.js';
import { DEFAULT_FORECAST_POLICY } from './modules/forecast/forecast.policy.js';

export type AppConfig = {
  port: number;
  host: string;
  dataDir: string;
  redisUrl: string | null;
  fxRatesUrl: string;
  fxCacheTtlSeconds: number;
  forecastCacheTtlSeconds: number;
  maxForecastDate: string;
  debtPrincipal: number;
  debtInterestRate: number;
  logLevel: string;
};

type Env = Readonly<Record<string, string | undefined>>;

function optionalEnv(env: Env, name: string): string | undefined {
  const v = env[name];
  if (v === undefined) return undefined;
  const s = String(v).trim();
  return s ? s : undefined;
}

function numberEnv(env: Env, name: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const raw = optionalEnv(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || (opts.integer && !Number.isInteger(n)) || (opts.min !== undefined && n < opts.min)) {
    throw new Error(`Invalid env var ${name}: ${raw}`);
  }
  return n;
}

function dateEnv(env: Env, name: string, fallback: string): string {
  const raw = optionalEnv(env, name);
  if (raw === undefined) return fallback;
  const day = toDateOnly(raw);
  if (!day) throw new Error(`Invalid env var ${name}: ${raw} (expected YYYY-MM-DD)`);
  return day;
}

/** Reads configuration once at startup; invalid values fail fast. */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: numberEnv(env, 'PORT', 8080, { min: 0, integer: true }),
    host: optionalEnv(env, 'HOST') ?? '0.0.0.0',
    dataDir: optionalEnv(env, 'DATA_DIR') ?? 'data',
    redisUrl: optionalEnv(env, 'REDIS_URL') ?? null,
    fxRatesUrl: optionalEnv(env, 'FX_RATES_URL') ?? 'https://api.exchangerate-api.com/v4/latest/EUR',
    fxCacheTtlSeconds: numberEnv(env, 'FX_CACHE_TTL_SECONDS', 3600, { min: 1, integer: true }),
    forecastCacheTtlSeconds: numberEnv(env, 'FORECAST_CACHE_TTL_SECONDS', 600, { min: 1, integer: true }),
    maxForecastDate: dateEnv(env, 'MAX_FORECAST_DATE', DEFAULT_FORECAST_POLICY.maxForecastDate),
    debtPrincipal: numberEnv(env, 'DEBT_PRINCIPAL', DEFAULT_FORECAST_POLICY.debtPrincipal, { min: 0 }),
    debtInterestRate: numberEnv(env, 'DEBT_INTEREST_RATE', DEFAULT_FORECAST_POLICY.debtAnnualInterestRate, { min: 0 }),
    logLevel: optionalEnv(env, 'LOG_LEVEL') ?? 'info',
  };
}

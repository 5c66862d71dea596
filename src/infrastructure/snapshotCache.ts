import { createHash } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { Redis } from 'ioredis';

/** String key/value store with expiry, used for FX quotes and forecast snapshots. */
export interface SnapshotCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export function createRedisSnapshotCache(redis: Redis, prefix = 'cash-forecast'): SnapshotCache {
  return {
    async get(key) {
      return await redis.get(`${prefix}:${key}`);
    },
    async set(key, value, ttlSeconds) {
      await redis.set(`${prefix}:${key}`, value, 'EX', Math.max(1, Math.floor(ttlSeconds)));
    },
  };
}

/** Per-process fallback when no Redis is configured. */
export function createMemorySnapshotCache(now: () => number = Date.now): SnapshotCache {
  const entries = new Map<string, { expiresAt: number; value: string }>();
  return {
    async get(key) {
      const hit = entries.get(key);
      if (!hit) return null;
      if (hit.expiresAt <= now()) {
        entries.delete(key);
        return null;
      }
      return hit.value;
    },
    async set(key, value, ttlSeconds) {
      entries.set(key, { value, expiresAt: now() + ttlSeconds * 1000 });
    },
  };
}

type CacheLogger = Pick<FastifyBaseLogger, 'warn'>;

/** Cache read that treats any store error as a miss. */
export async function readSnapshot(cache: SnapshotCache, key: string, log: CacheLogger): Promise<string | null> {
  try {
    return await cache.get(key);
  } catch (err) {
    log.warn({ err, key }, 'snapshot cache read failed');
    return null;
  }
}

/** Cache write that logs and drops store errors. */
export async function writeSnapshot(
  cache: SnapshotCache,
  key: string,
  value: string,
  ttlSeconds: number,
  log: CacheLogger
): Promise<void> {
  try {
    await cache.set(key, value, ttlSeconds);
  } catch (err) {
    log.warn({ err, key }, 'snapshot cache write failed');
  }
}

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) out[k] = canonical(Reflect.get(value, k));
    return out;
  }
  return value;
}

/** Stable hash of a JSON-able request; key order does not matter. */
export function snapshotKey(namespace: string, payload: unknown): string {
  const digest = createHash('sha256').update(JSON.stringify(canonical(payload))).digest('hex');
  return `${namespace}:${digest}`;
}

import { Redis } from 'ioredis';

const clients = new Map<string, Redis>();

/**
 * Redis client for FX and forecast snapshots, one per URL.
 * Lazy connects on the first command so the process starts (and tests run) without a server.
 */
export function getRedis(url: string): Redis {
  const existing = clients.get(url);
  if (existing) return existing;

  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });

  client.on('error', (err: unknown) => {
    // Log but do not crash; callers degrade to recomputing.
    console.error('Redis error', err);
  });

  clients.set(url, client);
  return client;
}

export async function closeRedis(): Promise<void> {
  const open = [...clients.values()];
  clients.clear();
  for (const c of open) {
    // A client that never sent a command has no connection to quit.
    if (c.status === 'wait') c.disconnect();
    else await c.quit();
  }
}

import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { closeRedis, getRedis } from './infrastructure/redis.js';
import { createMemorySnapshotCache, createRedisSnapshotCache } from './infrastructure/snapshotCache.js';

const start = async () => {
  const config = loadConfig();
  const cache = config.redisUrl ? createRedisSnapshotCache(getRedis(config.redisUrl)) : createMemorySnapshotCache();
  const app = await buildApp({ config, cache });

  app.addHook('onClose', async () => {
    await closeRedis();
  });

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error('Failed to start', err);
  process.exit(1);
});

import { createClient } from 'redis';
import { logger } from '../config/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

/**
 * Connect the shared Redis client used by the audit log, work queue and dead-letter sink.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  if (client) {
    return client;
  }

  const redis = createClient({ url });

  redis.on('error', (err: Error) => {
    logger.error('Redis client error', { error: err.message });
  });

  await redis.connect();
  await redis.ping();
  logger.info('Redis connected', { url: redactUrl(url) });

  client = redis;
  return redis;
}

export async function disconnectRedis() {
  if (!client) {
    return;
  }
  await client.quit();
  client = null;
  logger.info('Redis connection closed');
}

function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

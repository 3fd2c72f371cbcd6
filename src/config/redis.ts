import Redis from 'ioredis';
import logger from './logger';

const MAX_RETRY_DELAY_MS = 2000;
const RETRY_LOG_EVERY = 30; // attempts; about one line per minute once the delay is capped
const ERROR_LOG_INTERVAL_MS = 60000;

/**
 * Delay before reconnect attempt `attempt`. Never null: sessions have no other store,
 * so the client keeps trying for as long as Redis is away.
 */
export function reconnectDelay(attempt: number): number {
  return Math.min(attempt * 50, MAX_RETRY_DELAY_MS);
}

/**
 * Creates the Redis client behind the session store.
 * Connects lazily on the first command; while Redis is down, commands fail after one retry
 * and the handler answers "did not complete" instead of waiting.
 */
export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    retryStrategy: (attempt) => {
      const delay = reconnectDelay(attempt);
      if (attempt === 1 || attempt % RETRY_LOG_EVERY === 0) {
        logger.warn(`Redis unreachable, reconnect attempt ${attempt} in ${delay}ms`);
      }
      return delay;
    },
    maxRetriesPerRequest: 1,
    connectTimeout: 5000,
  });

  let lastErrorLog = 0;
  client.on('error', (error: unknown) => {
    const now = Date.now();
    if (now - lastErrorLog > ERROR_LOG_INTERVAL_MS) {
      lastErrorLog = now;
      logger.error('Redis session store error:', { error: error instanceof Error ? error.message : 'Unknown error' });
    }
  });

  client.on('ready', () => {
    logger.info('Redis session store ready');
  });

  client.on('end', () => {
    logger.warn('Redis session store connection ended');
  });

  return client;
}

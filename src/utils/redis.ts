/**
 * Redis client factory for the optional distributed cache backend.
 *
 * Unlike a process-wide singleton, each run gets its own connection which is
 * closed when the run's validation context is disposed. Connection errors are
 * logged and the cache falls back to memory; they never fail a validation.
 */

import Redis from 'ioredis';
import { CacheConfig } from '../config/env';
import { Logger } from './logger';

/**
 * The subset of ioredis the cache uses. Tests provide an in-process fake.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Remove credentials from URL for logging
 */
export function sanitizeRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return url.replace(/:([^@]+)@/, ':***@');
  }
}

export function createRedisClient(cacheConfig: CacheConfig, logger: Logger): Redis {
  const url = sanitizeRedisUrl(cacheConfig.redis.url);

  const client = new Redis(cacheConfig.redis.url, {
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    enableOfflineQueue: true,  // Commands issued before 'ready' wait for the connection

    retryStrategy: (times: number) => {
      if (times > 5) {
        logger.error('Redis max reconnection attempts reached, giving up', { attempts: times });
        return null;
      }
      const delay = Math.min(times * 100, 2000);
      logger.warn('Redis reconnecting...', { attempt: times, delayMs: delay });
      return delay;
    },

    connectTimeout: 5000,
    commandTimeout: 3000,
  });

  client.on('ready', () => {
    logger.info('Redis client ready', { url });
  });

  client.on('error', (error: Error) => {
    logger.error('Redis connection error (cache falls back to memory)', error);
  });

  client.on('close', () => {
    logger.debug('Redis connection closed', { url });
  });

  return client;
}

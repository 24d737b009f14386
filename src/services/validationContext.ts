/**
 * Everything one run of the pipeline shares: configuration, network
 * capabilities, caches and the host throttle.
 *
 * A context is created per bulk run (or per single-address call) and
 * disposed when it ends, so caches never leak from one batch into the next
 * and tests can swap any capability for a stub.
 */

import Redis from 'ioredis';
import { PipelineConfig, defaultPipelineConfig, validatePipelineConfig } from '../config/env';
import { DnsCapability, HttpCapability, SmtpConnector } from '../types/capabilities';
import { ValidationCache, CacheStore, InMemoryCacheStore, RedisCacheStore } from '../utils/cache';
import { NodeDnsClient } from '../utils/dnsClient';
import { FetchHttpClient } from '../utils/httpClient';
import { Logger, logger as rootLogger } from '../utils/logger';
import { RedisCommands, createRedisClient } from '../utils/redis';
import { SocketSmtpConnector } from '../utils/smtpConnection';
import { HostThrottle } from '../utils/throttleState';

const THROTTLE_MAX_WAIT_MS = 60000;

export interface ValidationDependencies {
  dns: DnsCapability;
  http: HttpCapability;
  smtp: SmtpConnector;
}

export interface ValidationContext {
  readonly runId: string;
  readonly config: PipelineConfig;
  readonly dns: DnsCapability;
  readonly http: HttpCapability;
  readonly smtp: SmtpConnector;
  readonly cache: ValidationCache;
  readonly throttle: HostThrottle;
  readonly logger: Logger;
}

export interface ValidationContextOptions {
  /** Defaults to the built-in defaults, not process.env */
  config?: PipelineConfig;
  dependencies?: Partial<ValidationDependencies>;
  logger?: Logger;
  /** Use this client instead of connecting when Redis caching is enabled */
  redisClient?: RedisCommands;
}

export interface DisposableValidationContext extends ValidationContext {
  /** Release the cache and any Redis connection this context opened */
  dispose(): Promise<void>;
}

function generateRunId(): string {
  return `run_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Build a context for one run.
 * @throws ConfigError when the configuration is invalid
 */
export function createValidationContext(options: ValidationContextOptions = {}): DisposableValidationContext {
  const config = options.config ?? defaultPipelineConfig();
  validatePipelineConfig(config);

  const runId = generateRunId();
  const logger = options.logger ?? rootLogger;

  let store: CacheStore = new InMemoryCacheStore();
  let ownedRedis: Redis | null = null;

  if (config.cache.redis.enabled) {
    let client: RedisCommands;
    if (options.redisClient) {
      client = options.redisClient;
    } else {
      ownedRedis = createRedisClient(config.cache, logger.child('redis'));
      client = ownedRedis;
    }
    store = new RedisCacheStore(client, `${config.cache.redis.keyPrefix}${runId}:`, logger.child('cache'));
  }

  const cache = new ValidationCache(store, config.cache.ttlSeconds * 1000, logger.child('cache'));

  const throttle = new HostThrottle(
    {
      maxConnectionsPerHost: config.smtp.maxConnectionsPerHost,
      perHostMinIntervalMs: config.smtp.perHostMinIntervalMs,
      maxWaitMs: THROTTLE_MAX_WAIT_MS,
    },
    logger.child('throttle')
  );

  return {
    runId,
    config,
    dns: options.dependencies?.dns ?? new NodeDnsClient(),
    http: options.dependencies?.http ?? new FetchHttpClient(),
    smtp: options.dependencies?.smtp ?? new SocketSmtpConnector(config.smtp.replyTimeoutMs, logger.child('smtp')),
    cache,
    throttle,
    logger,

    async dispose(): Promise<void> {
      const open = throttle.activeConnections();
      if (open > 0) {
        logger.warn(`Disposing run ${runId} with ${open} SMTP connection slot(s) still held`);
      }
      await cache.clear();
      if (ownedRedis) {
        const client = ownedRedis;
        ownedRedis = null;
        try {
          await client.quit();
        } catch (error) {
          logger.warn('Error disconnecting Redis client', error);
        }
      }
    },
  };
}

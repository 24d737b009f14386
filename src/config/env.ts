/**
 * Environment configuration loader with validation.
 * All configuration comes from environment variables with sensible defaults.
 * Nothing in the pipeline reads this module directly: entry points call
 * loadConfig() and hand the result to the validation context.
 */

import dotenv from 'dotenv';
import { join } from 'path';
import { ConfigError } from '../types/errors';

// Load .env file from root directory
dotenv.config({ path: join(__dirname, '../../.env') });

export type InconclusivePolicy = 'accept' | 'reject';

export interface SmtpConfig {
  port: number;
  connectTimeoutMs: number;            // TCP connection timeout
  replyTimeoutMs: number;              // Max wait for each server reply
  heloDomain: string;                  // Domain to use in EHLO/HELO
  mailFrom: string;                    // MAIL FROM address, empty for the null sender
  maxMxAttempts: number;               // Max MX hosts to try before giving up
  maxConnectionsPerHost: number;       // Concurrent connections per MX host
  perHostMinIntervalMs: number;        // Min time between connections to one host
}

export interface CacheConfig {
  ttlSeconds: number;
  redis: {
    enabled: boolean;
    url: string;
    keyPrefix: string;                 // Run id is appended per invocation
  };
}

/**
 * Everything the validation pipeline needs. Scoped to one run.
 */
export interface PipelineConfig {
  dnsTimeoutMs: number;
  websiteTimeoutMs: number;
  /** Outcome for domains whose mail servers refuse to answer probes */
  inconclusivePolicy: InconclusivePolicy;
  skipSmtp: boolean;
  smtp: SmtpConfig;
  cache: CacheConfig;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  bulkConcurrency: number;
  pipeline: PipelineConfig;
}

type Env = Record<string, string | undefined>;

/**
 * Parse environment variable as integer with validation
 * @throws ConfigError if value is invalid or out of range
 */
function getEnvInt(
  env: Env,
  key: string,
  defaultValue: number,
  options: { min?: number; max?: number } = {}
): number {
  const value = env[key];

  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isInteger(parsed)) {
    throw new ConfigError([`Environment variable ${key}="${value}" is not a valid integer`]);
  }

  if (options.min !== undefined && parsed < options.min) {
    throw new ConfigError([`Environment variable ${key}=${parsed} is below minimum ${options.min}`]);
  }

  if (options.max !== undefined && parsed > options.max) {
    throw new ConfigError([`Environment variable ${key}=${parsed} exceeds maximum ${options.max}`]);
  }

  return parsed;
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined ? defaultValue : value.trim();
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getInconclusivePolicy(env: Env): InconclusivePolicy {
  const value = getEnvString(env, 'SMTP_INCONCLUSIVE_POLICY', 'accept').toLowerCase();
  if (value === 'accept' || value === 'reject') {
    return value;
  }
  throw new ConfigError([`SMTP_INCONCLUSIVE_POLICY must be "accept" or "reject" (got: "${value}")`]);
}

/**
 * Load configuration from environment
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: getEnvInt(env, 'PORT', 4000, { min: 1, max: 65535 }),
    nodeEnv: getEnvString(env, 'NODE_ENV', 'development'),
    bulkConcurrency: getEnvInt(env, 'BULK_CONCURRENCY', 10, { min: 1, max: 200 }),

    pipeline: {
      dnsTimeoutMs: getEnvInt(env, 'DNS_TIMEOUT_MS', 4000, { min: 100, max: 60000 }),
      websiteTimeoutMs: getEnvInt(env, 'WEBSITE_TIMEOUT_MS', 5000, { min: 100, max: 60000 }),
      inconclusivePolicy: getInconclusivePolicy(env),
      skipSmtp: getEnvBool(env, 'SKIP_SMTP', false),

      smtp: {
        port: getEnvInt(env, 'SMTP_PORT', 25, { min: 1, max: 65535 }),
        connectTimeoutMs: getEnvInt(env, 'SMTP_CONNECT_TIMEOUT_MS', 7000, { min: 100, max: 60000 }),
        replyTimeoutMs: getEnvInt(env, 'SMTP_REPLY_TIMEOUT_MS', 7000, { min: 100, max: 60000 }),
        heloDomain: getEnvString(env, 'SMTP_HELO_DOMAIN', 'example.com'),
        mailFrom: getEnvString(env, 'SMTP_MAIL_FROM', ''),
        maxMxAttempts: getEnvInt(env, 'SMTP_MAX_MX_ATTEMPTS', 5, { min: 1, max: 20 }),
        maxConnectionsPerHost: getEnvInt(env, 'SMTP_MAX_CONNECTIONS_PER_HOST', 2, { min: 1, max: 50 }),
        perHostMinIntervalMs: getEnvInt(env, 'SMTP_PER_HOST_MIN_INTERVAL_MS', 0, { min: 0, max: 60000 }),
      },

      cache: {
        ttlSeconds: getEnvInt(env, 'CACHE_TTL_SECONDS', 3600, { min: 1, max: 86400 }),
        redis: {
          enabled: getEnvBool(env, 'REDIS_ENABLED', false),
          url: getEnvString(env, 'REDIS_URL', 'redis://localhost:6379'),
          keyPrefix: getEnvString(env, 'REDIS_KEY_PREFIX', 'emailpipe:'),
        },
      },
    },
  };
}

/**
 * Defaults without touching process.env (library callers, tests)
 */
export function defaultPipelineConfig(): PipelineConfig {
  return loadConfig({}).pipeline;
}

/**
 * Validate cross-field rules. Collects every problem before throwing.
 * @throws ConfigError
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const errors: string[] = [];

  if (!config.smtp.heloDomain || !config.smtp.heloDomain.includes('.')) {
    errors.push(`SMTP_HELO_DOMAIN must be a valid domain (got: "${config.smtp.heloDomain}")`);
  }

  // Empty is the null sender; anything else must look like an address
  if (config.smtp.mailFrom && !/^[^@\s<>]+@[^@\s<>]+$/.test(config.smtp.mailFrom)) {
    errors.push(`SMTP_MAIL_FROM must be empty or a valid email address (got: "${config.smtp.mailFrom}")`);
  }

  const positive: Array<[string, number]> = [
    ['DNS_TIMEOUT_MS', config.dnsTimeoutMs],
    ['WEBSITE_TIMEOUT_MS', config.websiteTimeoutMs],
    ['SMTP_CONNECT_TIMEOUT_MS', config.smtp.connectTimeoutMs],
    ['SMTP_REPLY_TIMEOUT_MS', config.smtp.replyTimeoutMs],
    ['SMTP_MAX_MX_ATTEMPTS', config.smtp.maxMxAttempts],
    ['SMTP_MAX_CONNECTIONS_PER_HOST', config.smtp.maxConnectionsPerHost],
  ];
  for (const [name, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${name} must be > 0 (got: ${value})`);
    }
  }

  if (config.smtp.perHostMinIntervalMs < 0) {
    errors.push(`SMTP_PER_HOST_MIN_INTERVAL_MS must be >= 0 (got: ${config.smtp.perHostMinIntervalMs})`);
  }

  if (config.inconclusivePolicy !== 'accept' && config.inconclusivePolicy !== 'reject') {
    errors.push(`SMTP_INCONCLUSIVE_POLICY must be "accept" or "reject"`);
  }

  if (config.cache.redis.enabled && !config.cache.redis.url) {
    errors.push('REDIS_URL is required when REDIS_ENABLED=true');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.bulkConcurrency) || config.bulkConcurrency < 1) {
    errors.push(`BULK_CONCURRENCY must be an integer >= 1 (got: ${config.bulkConcurrency})`);
  }

  try {
    validatePipelineConfig(config.pipeline);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    errors.push(...error.problems);
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

/**
 * Run-scoped cache for MX lookups, website probes and SMTP answers.
 *
 * A cache instance lives exactly as long as one validation context (one
 * bulk run or one single-address call), so nothing leaks between batches.
 * With REDIS_ENABLED the entries go to Redis under a per-run namespace,
 * which lets several worker processes share one run; otherwise memory.
 */

import { MxHost, SmtpHostAttempt, SmtpProbeStatus, WebsiteProbeResult } from '../types/email';
import { getErrorMessage } from '../types/errors';
import { Logger } from './logger';
import { RedisCommands } from './redis';

/**
 * Pluggable key/value store. Values come back as unknown and are checked
 * by the typed accessors in ValidationCache.
 */
export interface CacheStore {
  /** @returns undefined when missing or expired */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlMs: number): Promise<void>;
  clear(): Promise<void>;
}

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

export class InMemoryCacheStore implements CacheStore {
  private cache: Map<string, CacheEntry> = new Map();

  async get(key: string): Promise<unknown> {
    const entry = this.cache.get(key);

    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.data;
  }

  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    this.cache.set(key, {
      data: value,
      expiresAt: Date.now() + ttlMs,
    });
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }
}

/**
 * Redis-backed store. Every key is prefixed with the run namespace.
 * Falls back to memory when a command fails.
 */
export class RedisCacheStore implements CacheStore {
  private fallback = new InMemoryCacheStore();

  constructor(
    private readonly client: RedisCommands,
    private readonly namespace: string,
    private readonly logger: Logger
  ) {}

  async get(key: string): Promise<unknown> {
    try {
      const value = await this.client.get(this.namespace + key);
      if (value !== null) {
        return JSON.parse(value);
      }
    } catch (error) {
      this.logger.warn('Redis GET failed, using in-memory cache', { key, error: getErrorMessage(error) });
    }

    return this.fallback.get(key);
  }

  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    // Always keep a local copy for when Redis goes down mid-run
    await this.fallback.set(key, value, ttlMs);

    try {
      await this.client.set(this.namespace + key, JSON.stringify(value), 'PX', ttlMs);
    } catch (error) {
      this.logger.warn('Redis SET failed, using in-memory cache only', { key, error: getErrorMessage(error) });
    }
  }

  /**
   * Local copy only; the Redis namespace expires by TTL
   */
  async clear(): Promise<void> {
    await this.fallback.clear();
  }
}

export type CachedMxLookup =
  | { status: 'found'; hosts: MxHost[] }
  | { status: 'no_mx' }
  | { status: 'lookup_failed'; detail: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isMxHost(value: unknown): value is MxHost {
  return isRecord(value) && typeof value.hostname === 'string' && typeof value.priority === 'number';
}

function isCachedMxLookup(value: unknown): value is CachedMxLookup {
  if (!isRecord(value)) return false;
  if (value.status === 'found') {
    return Array.isArray(value.hosts) && value.hosts.every(isMxHost);
  }
  if (value.status === 'lookup_failed') {
    return typeof value.detail === 'string';
  }
  return value.status === 'no_mx';
}

function isWebsiteProbeResult(value: unknown): value is WebsiteProbeResult {
  return isRecord(value) && typeof value.reachable === 'boolean' && typeof value.url === 'string';
}

const SMTP_STATUSES: SmtpProbeStatus[] = ['accepted', 'rejected', 'inconclusive'];

function isSmtpHostAttempt(value: unknown): value is SmtpHostAttempt {
  if (!isRecord(value)) return false;
  const status = value.status;
  return (
    typeof value.host === 'string' &&
    SMTP_STATUSES.some(known => known === status) &&
    (value.code === null || typeof value.code === 'number') &&
    typeof value.response === 'string'
  );
}

/**
 * Typed accessors over a CacheStore. Owns the key naming and TTL.
 */
export class ValidationCache {
  constructor(
    private readonly store: CacheStore,
    private readonly ttlMs: number,
    private readonly logger: Logger
  ) {}

  async getMx(domain: string): Promise<CachedMxLookup | null> {
    const value = await this.store.get(`mx:${domain.toLowerCase()}`);
    if (isCachedMxLookup(value)) {
      this.logger.debug(`MX cache hit for domain: ${domain}`);
      return value;
    }
    return null;
  }

  async setMx(domain: string, lookup: CachedMxLookup): Promise<void> {
    await this.store.set(`mx:${domain.toLowerCase()}`, lookup, this.ttlMs);
  }

  async getWebsite(url: string): Promise<WebsiteProbeResult | null> {
    const value = await this.store.get(`web:${url}`);
    return isWebsiteProbeResult(value) ? value : null;
  }

  async setWebsite(url: string, result: WebsiteProbeResult): Promise<void> {
    await this.store.set(`web:${url}`, result, this.ttlMs);
  }

  async getSmtpAttempt(host: string, address: string): Promise<SmtpHostAttempt | null> {
    const value = await this.store.get(`smtp:${host.toLowerCase()}|${address.toLowerCase()}`);
    return isSmtpHostAttempt(value) ? value : null;
  }

  async setSmtpAttempt(attempt: SmtpHostAttempt, address: string): Promise<void> {
    await this.store.set(`smtp:${attempt.host.toLowerCase()}|${address.toLowerCase()}`, attempt, this.ttlMs);
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }
}

/**
 * Per-MX-host throttling for SMTP probes.
 *
 * Bulk runs often contain many addresses at the same provider. The worker
 * pool bounds total parallelism; this bounds how many of those workers may
 * hold a connection to one MX host at a time, and optionally spaces out
 * connection attempts. One instance per run.
 */

import { SmtpError } from '../types/errors';
import { Logger } from './logger';
import { sleep } from './timeout';

export interface ThrottleConfig {
  maxConnectionsPerHost: number;
  perHostMinIntervalMs: number;
  /** Give up waiting for a slot after this long */
  maxWaitMs: number;
}

/**
 * State tracking for each MX host
 */
interface HostEntry {
  active: number;                   // Current open connections
  lastAttemptAt?: number;           // Last slot acquisition (ms)
  waiters: Array<() => void>;
}

export class HostThrottle {
  private hosts: Map<string, HostEntry> = new Map();

  constructor(
    private readonly config: ThrottleConfig,
    private readonly logger: Logger
  ) {}

  private getOrCreate(mxHost: string): HostEntry {
    const key = mxHost.toLowerCase();
    let entry = this.hosts.get(key);
    if (!entry) {
      entry = { active: 0, waiters: [] };
      this.hosts.set(key, entry);
    }
    return entry;
  }

  /**
   * Acquire a connection slot for an MX host, waiting while the host is at
   * its connection limit or inside its minimum interval.
   * @throws SmtpError (phase "throttle") when no slot frees up in time
   */
  async acquireSlot(mxHost: string): Promise<void> {
    const entry = this.getOrCreate(mxHost);
    const deadline = Date.now() + this.config.maxWaitMs;

    while (true) {
      const now = Date.now();

      if (now >= deadline) {
        throw new SmtpError('throttle', mxHost, `Timeout waiting for a connection slot to ${mxHost}`);
      }

      if (entry.active >= this.config.maxConnectionsPerHost) {
        this.logger.debug(`Host limit reached for ${mxHost} (${entry.active}/${this.config.maxConnectionsPerHost}), waiting...`);
        await this.waitForRelease(entry, deadline - now);
        continue;
      }

      if (entry.lastAttemptAt !== undefined && this.config.perHostMinIntervalMs > 0) {
        const sinceLast = now - entry.lastAttemptAt;
        if (sinceLast < this.config.perHostMinIntervalMs) {
          await sleep(Math.min(this.config.perHostMinIntervalMs - sinceLast, deadline - now));
          continue;
        }
      }

      entry.active++;
      entry.lastAttemptAt = now;
      return;
    }
  }

  /**
   * Release a slot after the SMTP connection is closed
   */
  releaseSlot(mxHost: string): void {
    const entry = this.hosts.get(mxHost.toLowerCase());

    if (!entry) {
      this.logger.warn(`Attempted to release slot for unknown MX host: ${mxHost}`);
      return;
    }

    entry.active = Math.max(0, entry.active - 1);
    const next = entry.waiters.shift();
    if (next) next();
  }

  /**
   * Slots currently held for one host, or across all hosts
   */
  activeConnections(mxHost?: string): number {
    if (mxHost !== undefined) {
      return this.hosts.get(mxHost.toLowerCase())?.active ?? 0;
    }
    let total = 0;
    for (const entry of this.hosts.values()) {
      total += entry.active;
    }
    return total;
  }

  private waitForRelease(entry: HostEntry, timeoutMs: number): Promise<void> {
    return new Promise(resolve => {
      const wake = () => {
        clearTimeout(timer);
        const index = entry.waiters.indexOf(wake);
        if (index !== -1) entry.waiters.splice(index, 1);
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      entry.waiters.push(wake);
    });
  }
}

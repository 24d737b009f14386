/**
 * Tests for per-host SMTP throttling
 */

import { SmtpError } from '../src/types/errors';
import { Logger, LogLevel } from '../src/utils/logger';
import { HostThrottle, ThrottleConfig } from '../src/utils/throttleState';

const silent = new Logger({ level: LogLevel.SILENT });

function throttle(overrides: Partial<ThrottleConfig> = {}): HostThrottle {
  return new HostThrottle(
    { maxConnectionsPerHost: 2, perHostMinIntervalMs: 0, maxWaitMs: 1000, ...overrides },
    silent
  );
}

function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('HostThrottle', () => {
  it('should hand out slots up to the host limit', async () => {
    const t = throttle();

    await t.acquireSlot('mx.example.com');
    await t.acquireSlot('MX.Example.com');

    expect(t.activeConnections('mx.example.com')).toBe(2);
    expect(t.activeConnections()).toBe(2);
  });

  it('should make callers wait while the host is at its limit', async () => {
    const t = throttle({ maxConnectionsPerHost: 1 });
    await t.acquireSlot('mx.example.com');

    let acquired = false;
    const waiting = t.acquireSlot('mx.example.com').then(() => {
      acquired = true;
    });

    await flush();
    expect(acquired).toBe(false);

    t.releaseSlot('mx.example.com');
    await waiting;

    expect(acquired).toBe(true);
    expect(t.activeConnections('mx.example.com')).toBe(1);
  });

  it('should not let one host block another', async () => {
    const t = throttle({ maxConnectionsPerHost: 1 });
    await t.acquireSlot('mx1.example.com');

    await t.acquireSlot('mx2.example.com');

    expect(t.activeConnections('mx2.example.com')).toBe(1);
  });

  it('should give up with a throttle SmtpError after maxWaitMs', async () => {
    const t = throttle({ maxConnectionsPerHost: 1, maxWaitMs: 20 });
    await t.acquireSlot('mx.example.com');

    const error = await t.acquireSlot('mx.example.com').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SmtpError);
    expect(error).toMatchObject({ phase: 'throttle', host: 'mx.example.com' });
  });

  it('should space out connections by the minimum interval', async () => {
    const t = throttle({ perHostMinIntervalMs: 40 });
    await t.acquireSlot('mx.example.com');
    t.releaseSlot('mx.example.com');

    const start = Date.now();
    await t.acquireSlot('mx.example.com');

    // Timers may fire a millisecond early
    expect(Date.now() - start).toBeGreaterThanOrEqual(35);
  });

  it('should ignore releases for hosts it has never seen', () => {
    const t = throttle();
    expect(() => t.releaseSlot('unknown.example.com')).not.toThrow();
  });

  it('should count held slots across hosts', async () => {
    const t = throttle();
    await t.acquireSlot('mx1.example.com');
    await t.acquireSlot('mx2.example.com');
    t.releaseSlot('mx1.example.com');

    expect(t.activeConnections()).toBe(1);
    expect(t.activeConnections('mx1.example.com')).toBe(0);
    expect(t.activeConnections('never-seen.example.com')).toBe(0);
  });

  it('should never let the active count go negative', async () => {
    const t = throttle();
    await t.acquireSlot('mx.example.com');
    t.releaseSlot('mx.example.com');
    t.releaseSlot('mx.example.com');

    expect(t.activeConnections('mx.example.com')).toBe(0);
  });
});

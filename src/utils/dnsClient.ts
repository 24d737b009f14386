/**
 * DNS capability backed by Node's resolver.
 */

import { promises as dns } from 'dns';
import { DnsCapability } from '../types/capabilities';
import { MxHost } from '../types/email';
import { ResolutionError } from '../types/errors';
import { withTimeout } from './timeout';

export class NodeDnsClient implements DnsCapability {
  constructor(private readonly servers?: string[]) {}

  async resolveMx(domain: string, timeoutMs: number): Promise<MxHost[]> {
    // One resolver per lookup so cancel() only affects this query
    const resolver = new dns.Resolver({ timeout: timeoutMs, tries: 1 });
    if (this.servers && this.servers.length > 0) {
      resolver.setServers(this.servers);
    }

    try {
      const records = await withTimeout(
        resolver.resolveMx(domain),
        timeoutMs,
        () => new ResolutionError('timeout', domain, `MX lookup for ${domain} timed out after ${timeoutMs}ms`)
      );
      return records.map(record => ({ hostname: record.exchange, priority: record.priority }));
    } finally {
      resolver.cancel();
    }
  }
}

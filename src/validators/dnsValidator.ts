/**
 * DNS and MX record validator.
 * Queries DNS for MX records to verify the domain can receive email.
 * A timeout is reported separately from "no MX records" so callers can tell
 * an unlucky lookup from a domain that really has no mail exchanger.
 */

import { ValidationContext } from '../services/validationContext';
import { MxHost } from '../types/email';
import { ResolutionError, getErrorCode, getErrorMessage } from '../types/errors';

export type MxValidationResult =
  | { status: 'found'; hosts: MxHost[]; cached: boolean }
  | { status: 'no_mx'; cached: boolean; detail?: string }
  | { status: 'lookup_failed'; cached: boolean; detail: string }
  | { status: 'timeout'; cached: false; detail: string };

const NO_MX_CODES = new Set(['ENOTFOUND', 'ENODATA', 'NXDOMAIN']);
const TIMEOUT_CODES = new Set(['ETIMEOUT', 'ETIMEDOUT']);

/**
 * Lower-case, strip the root dot, drop null MX ("." / empty) and sort by
 * ascending priority. Sort is stable so equal priorities keep DNS order.
 */
export function normalizeMxHosts(records: MxHost[]): MxHost[] {
  return records
    .map(record => ({
      hostname: record.hostname.trim().toLowerCase().replace(/\.$/, ''),
      priority: record.priority,
    }))
    .filter(record => record.hostname.length > 0)
    .sort((a, b) => a.priority - b.priority);
}

/**
 * Resolve the mail exchangers of a domain
 *
 * @param domain - Domain name to check (normalized to lowercase)
 */
export async function validateMx(domain: string, ctx: ValidationContext): Promise<MxValidationResult> {
  const normalizedDomain = domain.toLowerCase();
  const log = ctx.logger;

  const cached = await ctx.cache.getMx(normalizedDomain);
  if (cached) {
    switch (cached.status) {
      case 'found':
        return { status: 'found', hosts: cached.hosts, cached: true };
      case 'no_mx':
        return { status: 'no_mx', cached: true };
      case 'lookup_failed':
        return { status: 'lookup_failed', cached: true, detail: cached.detail };
    }
  }

  try {
    log.debug(`Performing DNS MX lookup for domain: ${normalizedDomain}`);

    const hosts = normalizeMxHosts(await ctx.dns.resolveMx(normalizedDomain, ctx.config.dnsTimeoutMs));

    log.debug(`MX lookup successful for ${normalizedDomain}`, { recordCount: hosts.length, records: hosts });

    if (hosts.length === 0) {
      await ctx.cache.setMx(normalizedDomain, { status: 'no_mx' });
      return { status: 'no_mx', cached: false };
    }

    await ctx.cache.setMx(normalizedDomain, { status: 'found', hosts });
    return { status: 'found', hosts, cached: false };

  } catch (error) {
    const code = getErrorCode(error);
    const detail = code ? `${code}: ${getErrorMessage(error)}` : getErrorMessage(error);

    log.debug(`MX lookup failed for ${normalizedDomain}`, { error: getErrorMessage(error), code });

    // Don't cache timeout results - might be temporary
    if ((error instanceof ResolutionError && error.kind === 'timeout') || (code && TIMEOUT_CODES.has(code))) {
      return { status: 'timeout', cached: false, detail };
    }

    if ((error instanceof ResolutionError && error.kind === 'no_mx') || (code && NO_MX_CODES.has(code))) {
      await ctx.cache.setMx(normalizedDomain, { status: 'no_mx' });
      return { status: 'no_mx', cached: false, detail };
    }

    log.warn(`DNS lookup error for ${normalizedDomain}`, { detail });
    await ctx.cache.setMx(normalizedDomain, { status: 'lookup_failed', detail });
    return { status: 'lookup_failed', cached: false, detail };
  }
}

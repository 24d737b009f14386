/**
 * Website reachability probe.
 * A record's website counts as reachable when a GET answers 2xx or 3xx
 * within the configured timeout.
 */

import { ValidationContext } from '../services/validationContext';
import { WebsiteProbeResult } from '../types/email';
import { getErrorMessage } from '../types/errors';

/**
 * Prepend https:// when the input has no http(s) scheme
 */
export function normalizeWebsiteUrl(website: string): string {
  const trimmed = website.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function isReachableStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

/**
 * Probe a website. Transport failures are reported as unreachable, never thrown.
 *
 * @param website - Bare domain or full URL
 */
export async function validateWebsite(website: string, ctx: ValidationContext): Promise<WebsiteProbeResult> {
  const url = normalizeWebsiteUrl(website);

  const cached = await ctx.cache.getWebsite(url);
  if (cached) {
    ctx.logger.debug(`Website cache hit for ${url}`);
    return cached;
  }

  let result: WebsiteProbeResult;

  try {
    const response = await ctx.http.get(url, ctx.config.websiteTimeoutMs);
    result = { reachable: isReachableStatus(response.status), url, status: response.status };
  } catch (error) {
    result = { reachable: false, url, error: getErrorMessage(error) };
  }

  ctx.logger.debug(`Website probe for ${url}: ${result.reachable ? 'reachable' : 'unreachable'}`, {
    status: result.status,
    error: result.error,
  });

  await ctx.cache.setWebsite(url, result);
  return result;
}

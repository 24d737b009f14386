/**
 * Mail provider fingerprinting.
 * The SMTP banner usually names the software or operator behind an MX
 * host; the hostname is the fallback. Reported with SMTP results so a
 * rejected or inconclusive answer can be read in context.
 */

import { MailProvider } from '../types/email';

const FINGERPRINTS: Array<{ provider: MailProvider; patterns: string[] }> = [
  { provider: 'gmail', patterns: ['google', 'gmail', 'googlemail.com'] },
  { provider: 'outlook', patterns: ['outlook', 'microsoft', 'hotmail.com', 'protection.outlook.com'] },
  { provider: 'yahoo', patterns: ['yahoo', 'yahoodns.net', 'aol.com'] },
  { provider: 'icloud', patterns: ['icloud', 'apple.com'] },
  { provider: 'zoho', patterns: ['zoho'] },
];

function match(text: string): MailProvider | null {
  const lower = text.toLowerCase();
  for (const { provider, patterns } of FINGERPRINTS) {
    if (patterns.some(pattern => lower.includes(pattern))) {
      return provider;
    }
  }
  return null;
}

/**
 * Detect email provider from the SMTP banner, then the MX hostname
 */
export function detectProvider(banner: string, mxHost: string): MailProvider {
  return match(banner) ?? match(mxHost) ?? 'generic';
}

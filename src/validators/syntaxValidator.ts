/**
 * Email syntax validator.
 * Checks the address against a conservative grammar and the 'validator'
 * package's RFC 5321/5322 check, and produces the EmailAddress value the
 * later stages work on.
 */

import validator from 'validator';
import { EmailAddress } from '../types/email';
import { EmailSyntaxError, SyntaxErrorCode } from '../types/errors';

export type SyntaxValidationResult =
  | { valid: true; address: EmailAddress }
  | { valid: false; error: EmailSyntaxError };

const LOCAL_PART_CHARS = /^[A-Za-z0-9_.+-]+$/;
const DOMAIN_CHARS = /^[A-Za-z0-9.-]+$/;

function invalid(code: SyntaxErrorCode, candidate: string): SyntaxValidationResult {
  return { valid: false, error: new EmailSyntaxError(code, candidate) };
}

/**
 * Validate email syntax and extract components. Never throws.
 *
 * @param email - Candidate address, surrounding whitespace is ignored
 */
export function validateSyntax(email: string): SyntaxValidationResult {
  const trimmedEmail = typeof email === 'string' ? email.trim() : '';

  if (!trimmedEmail) {
    return invalid('empty', trimmedEmail);
  }

  const atCount = (trimmedEmail.match(/@/g) || []).length;

  if (atCount === 0) {
    return invalid('missing_at_sign', trimmedEmail);
  }

  if (atCount > 1) {
    return invalid('multiple_at_signs', trimmedEmail);
  }

  const [localPart, rawDomain] = trimmedEmail.split('@');

  if (!localPart) {
    return invalid('empty_local_part', trimmedEmail);
  }

  if (!rawDomain) {
    return invalid('empty_domain', trimmedEmail);
  }

  // Domains are case-insensitive; the local part is kept as given
  const domain = rawDomain.toLowerCase();

  if (!LOCAL_PART_CHARS.test(localPart) || !DOMAIN_CHARS.test(domain)) {
    return invalid('invalid_characters', trimmedEmail);
  }

  if (!domain.includes('.')) {
    return invalid('domain_missing_dot', trimmedEmail);
  }

  // Reject leading/trailing and consecutive dots
  if (
    localPart.startsWith('.') || localPart.endsWith('.') ||
    domain.startsWith('.') || domain.endsWith('.') ||
    localPart.includes('..') || domain.includes('..')
  ) {
    return invalid('invalid_format', trimmedEmail);
  }

  if (!validator.isEmail(trimmedEmail)) {
    return invalid('invalid_format', trimmedEmail);
  }

  return {
    valid: true,
    address: Object.freeze({ address: `${localPart}@${domain}`, localPart, domain }),
  };
}

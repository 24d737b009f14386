/**
 * Error taxonomy. Everything except ConfigError is recoverable and ends up
 * as an outcome reason rather than escaping a single record.
 */

export type SyntaxErrorCode =
  | 'empty'
  | 'missing_at_sign'
  | 'multiple_at_signs'
  | 'empty_local_part'
  | 'empty_domain'
  | 'domain_missing_dot'
  | 'invalid_characters'
  | 'invalid_format';

export class EmailSyntaxError extends Error {
  constructor(
    public readonly code: SyntaxErrorCode,
    public readonly candidate: string
  ) {
    super(`Invalid email syntax (${code})`);
    this.name = 'EmailSyntaxError';
  }
}

export type ResolutionErrorKind = 'no_mx' | 'lookup_failed' | 'timeout';

export class ResolutionError extends Error {
  constructor(
    public readonly kind: ResolutionErrorKind,
    public readonly domain: string,
    message?: string
  ) {
    super(message ?? `MX resolution for ${domain} failed (${kind})`);
    this.name = 'ResolutionError';
  }
}

export class ProbeError extends Error {
  constructor(public readonly url: string, message: string) {
    super(message);
    this.name = 'ProbeError';
  }
}

export type SmtpPhase = 'connect' | 'banner' | 'ehlo' | 'mail' | 'rcpt' | 'reply' | 'throttle' | 'connection';

export class SmtpError extends Error {
  constructor(
    public readonly phase: SmtpPhase,
    public readonly host: string,
    message: string
  ) {
    super(message);
    this.name = 'SmtpError';
  }
}

export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFormatError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Configuration validation failed:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Read the errno-style `code` of a thrown value, if it has one
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

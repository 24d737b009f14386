/**
 * Core types shared by the validators, the pipeline and the bulk runner.
 */

/**
 * A syntactically valid address. Only produced by the syntax validator,
 * so downstream stages never see malformed input.
 */
export interface EmailAddress {
  /** Trimmed address as it will be sent in RCPT TO */
  readonly address: string;
  readonly localPart: string;
  /** Lower-cased domain */
  readonly domain: string;
}

/**
 * One unit of bulk input
 */
export interface ValidationRecord {
  readonly email: string;
  readonly website?: string;
}

/**
 * Why a record was rejected (or, for smtp-inconclusive, why it was only
 * accepted on the benefit of the doubt)
 */
export type OutcomeReason =
  | 'syntax'
  | 'no-mail-exchange'
  | 'dns-timeout'
  | 'website-unreachable'
  | 'mailbox-rejected'
  | 'smtp-inconclusive'
  | 'internal-error';

/**
 * Stage that produced the final decision
 */
export type ValidationStage = 'syntax' | 'dns' | 'website' | 'smtp' | 'internal';

export interface ValidationOutcome {
  readonly accepted: boolean;
  readonly reason: OutcomeReason | null;
  readonly stage: ValidationStage;
  /** Human-readable diagnostics (SMTP reply, HTTP status, error message) */
  readonly detail?: string;
}

/**
 * MX record information. Lower priority value = more preferred.
 */
export interface MxHost {
  hostname: string;
  priority: number;
}

export type SmtpProbeStatus = 'accepted' | 'rejected' | 'inconclusive';

/**
 * Mail provider guessed from the SMTP banner or MX hostname
 */
export type MailProvider = 'gmail' | 'outlook' | 'yahoo' | 'icloud' | 'zoho' | 'generic';

/**
 * What happened on a single MX host
 */
export interface SmtpHostAttempt {
  host: string;
  status: SmtpProbeStatus;
  code: number | null;
  response: string;
}

export interface SmtpProbeResult {
  status: SmtpProbeStatus;
  /** RCPT TO reply code of the deciding host, null when no host answered it */
  code: number | null;
  response: string;
  /** Host that produced a definitive answer */
  host?: string;
  provider: MailProvider;
  attempts: SmtpHostAttempt[];
}

export interface WebsiteProbeResult {
  reachable: boolean;
  url: string;
  status?: number;
  error?: string;
}

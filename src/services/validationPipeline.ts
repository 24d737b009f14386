/**
 * Email validation pipeline.
 * Runs the validation stages in order and stops at the first one that
 * rejects the record:
 *   1. Syntax
 *   2. DNS/MX lookup
 *   3. Website reachability (only when a website is supplied)
 *   4. SMTP mailbox verification (unless skipSmtp)
 *
 * The pipeline holds no state of its own; everything shared between records
 * lives in the ValidationContext it was built with.
 */

import { OutcomeReason, ValidationOutcome, ValidationStage } from '../types/email';
import { hashEmailForLogging } from '../utils/logger';
import { validateMx } from '../validators/dnsValidator';
import { validateSmtp } from '../validators/smtpValidator';
import { validateSyntax } from '../validators/syntaxValidator';
import { validateWebsite } from '../validators/websiteValidator';
import { ValidationContext, ValidationContextOptions, createValidationContext } from './validationContext';

function outcome(
  accepted: boolean,
  reason: OutcomeReason | null,
  stage: ValidationStage,
  detail?: string
): ValidationOutcome {
  return Object.freeze(detail === undefined ? { accepted, reason, stage } : { accepted, reason, stage, detail });
}

export class ValidationPipeline {
  constructor(private readonly ctx: ValidationContext) {}

  /**
   * Validate one address (and optionally its website).
   * Expected failures come back as a rejected outcome; only bugs throw.
   *
   * @param website - Skipped when missing or blank
   */
  async validate(email: string, website?: string): Promise<ValidationOutcome> {
    const log = this.ctx.logger;
    const config = this.ctx.config;

    // Step 1: Syntax validation
    const syntax = validateSyntax(email);
    if (!syntax.valid) {
      log.debug(`Validation failed: invalid syntax (${syntax.error.code})`);
      return outcome(false, 'syntax', 'syntax', syntax.error.code);
    }

    const { address } = syntax;
    const emailHash = hashEmailForLogging(address.address);
    log.debug('Starting validation', { emailHash, domain: address.domain });

    // Step 2: DNS/MX validation
    const mx = await validateMx(address.domain, this.ctx);
    switch (mx.status) {
      case 'timeout':
        log.debug('Validation failed: DNS timeout', { emailHash, domain: address.domain });
        return outcome(false, 'dns-timeout', 'dns', mx.detail);
      case 'no_mx':
      case 'lookup_failed':
        log.debug('Validation failed: no mail exchange', { emailHash, domain: address.domain });
        return outcome(false, 'no-mail-exchange', 'dns', mx.detail);
    }

    let lastStage: ValidationStage = 'dns';

    // Step 3: Website reachability
    if (website !== undefined && website.trim() !== '') {
      const probe = await validateWebsite(website, this.ctx);
      if (!probe.reachable) {
        const detail = probe.status !== undefined ? `HTTP ${probe.status}` : probe.error;
        log.debug('Validation failed: website unreachable', { emailHash, url: probe.url });
        return outcome(false, 'website-unreachable', 'website', detail);
      }
      lastStage = 'website';
    }

    if (config.skipSmtp) {
      log.debug('SMTP validation skipped (skipSmtp=true)', { emailHash });
      return outcome(true, null, lastStage);
    }

    // Step 4: SMTP verification
    const smtp = await validateSmtp(address, mx.hosts, this.ctx);
    switch (smtp.status) {
      case 'accepted':
        return outcome(true, null, 'smtp', smtp.response);
      case 'rejected':
        return outcome(false, 'mailbox-rejected', 'smtp', smtp.response);
      case 'inconclusive':
        return outcome(config.inconclusivePolicy === 'accept', 'smtp-inconclusive', 'smtp', smtp.response);
    }
  }
}

export interface SingleValidationResult {
  accepted: boolean;
  reason: OutcomeReason | null;
}

/**
 * Validate a single address with a context of its own
 * @throws ConfigError when options.config is invalid
 */
export async function validateEmailPipeline(
  email: string,
  website?: string,
  options: ValidationContextOptions = {}
): Promise<SingleValidationResult> {
  const ctx = createValidationContext(options);
  try {
    const result = await new ValidationPipeline(ctx).validate(email, website);
    return { accepted: result.accepted, reason: result.reason };
  } finally {
    await ctx.dispose();
  }
}

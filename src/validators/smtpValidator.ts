/**
 * SMTP mailbox verifier.
 *
 * Connects to the domain's MX hosts in priority order and asks each one
 * whether it would accept the recipient (EHLO/HELO, MAIL FROM, RCPT TO),
 * without sending a message. The first definitive answer wins:
 *   2xx on RCPT TO -> accepted
 *   5xx on RCPT TO -> rejected
 * Anything else (4xx, refused greeting, transport failure, timeout) moves on
 * to the next host. A host is never asked twice for the same address.
 *
 * WARNING: Performs real network connections. Use sparingly and responsibly.
 */

import { ValidationContext } from '../services/validationContext';
import { SmtpConnection, SmtpReply } from '../types/capabilities';
import { EmailAddress, MailProvider, MxHost, SmtpHostAttempt, SmtpProbeResult } from '../types/email';
import { SmtpError, getErrorCode, getErrorMessage } from '../types/errors';
import { Logger, hashEmailForLogging } from '../utils/logger';
import { detectProvider } from './providers';

interface HostProbe {
  attempt: SmtpHostAttempt;
  banner: string;
}

function isPositive(code: number): boolean {
  return code >= 200 && code < 300;
}

/**
 * Network and protocol failures are expected and move on to the next host.
 * Anything else is a bug and propagates, including Node's own `ERR_*`
 * argument and state errors.
 */
export function isTransportError(error: unknown): boolean {
  if (error instanceof SmtpError) {
    return true;
  }
  const code = getErrorCode(error);
  return code !== undefined && !code.startsWith('ERR_');
}

/**
 * Interpret the RCPT TO reply
 */
export function classifyRcptReply(host: string, reply: SmtpReply): SmtpHostAttempt {
  if (isPositive(reply.code)) {
    return { host, status: 'accepted', code: reply.code, response: reply.text };
  }
  if (reply.code >= 500 && reply.code < 600) {
    return { host, status: 'rejected', code: reply.code, response: reply.text };
  }
  return { host, status: 'inconclusive', code: reply.code, response: reply.text };
}

function inconclusive(host: string, response: string, code: number | null = null): SmtpHostAttempt {
  return { host, status: 'inconclusive', code, response };
}

async function sendQuit(connection: SmtpConnection, host: string, log: Logger): Promise<void> {
  try {
    await connection.sendLine('QUIT');
  } catch (error) {
    log.debug(`QUIT to ${host} failed: ${getErrorMessage(error)}`);
  }
}

/**
 * One conversation with one MX host. The connection is closed and the
 * throttle slot released on every path out of here.
 */
async function probeHost(address: EmailAddress, host: string, ctx: ValidationContext): Promise<HostProbe> {
  const cfg = ctx.config.smtp;
  const log = ctx.logger;

  let connection: SmtpConnection | null = null;
  let slotAcquired = false;
  let banner = '';

  try {
    await ctx.throttle.acquireSlot(host);
    slotAcquired = true;

    log.debug(`Connecting to MX ${host}:${cfg.port}`);
    connection = await ctx.smtp.connect(host, cfg.port, cfg.connectTimeoutMs);

    const greeting = await connection.readResponse();
    banner = greeting.text;
    if (greeting.code !== 220) {
      await sendQuit(connection, host, log);
      return { attempt: inconclusive(host, `Unexpected greeting: ${greeting.text}`, greeting.code), banner };
    }

    await connection.sendLine(`EHLO ${cfg.heloDomain}`);
    let hello = await connection.readResponse();
    if (!isPositive(hello.code)) {
      // Older servers only speak HELO
      await connection.sendLine(`HELO ${cfg.heloDomain}`);
      hello = await connection.readResponse();
      if (!isPositive(hello.code)) {
        await sendQuit(connection, host, log);
        return { attempt: inconclusive(host, `HELO rejected: ${hello.text}`, hello.code), banner };
      }
    }

    await connection.sendLine(`MAIL FROM:<${cfg.mailFrom}>`);
    const mail = await connection.readResponse();
    if (!isPositive(mail.code)) {
      await sendQuit(connection, host, log);
      return { attempt: inconclusive(host, `MAIL FROM rejected: ${mail.text}`, mail.code), banner };
    }

    await connection.sendLine(`RCPT TO:<${address.address}>`);
    const rcpt = await connection.readResponse();
    await sendQuit(connection, host, log);

    return { attempt: classifyRcptReply(host, rcpt), banner };

  } catch (error) {
    if (!isTransportError(error)) {
      throw error;
    }
    const code = getErrorCode(error);
    const message = code && !getErrorMessage(error).includes(code)
      ? `${code}: ${getErrorMessage(error)}`
      : getErrorMessage(error);
    log.warn(`SMTP conversation with ${host} failed`, { error: message });
    return { attempt: inconclusive(host, message), banner };

  } finally {
    if (connection) {
      connection.close();
    }
    if (slotAcquired) {
      ctx.throttle.releaseSlot(host);
    }
  }
}

/**
 * Verify a mailbox against a domain's MX hosts
 *
 * @param address - Syntactically valid address
 * @param hosts - MX hosts; tried in ascending priority, at most smtp.maxMxAttempts
 */
export async function validateSmtp(
  address: EmailAddress,
  hosts: MxHost[],
  ctx: ValidationContext
): Promise<SmtpProbeResult> {
  const log = ctx.logger;
  const emailHash = hashEmailForLogging(address.address);

  const ordered = [...hosts].sort((a, b) => a.priority - b.priority);
  const toTry = ordered.slice(0, ctx.config.smtp.maxMxAttempts);
  log.debug(`Will try ${toTry.length} of ${ordered.length} MX hosts`, { emailHash });

  const attempts: SmtpHostAttempt[] = [];
  let provider: MailProvider = toTry.length > 0 ? detectProvider('', toTry[0].hostname) : 'generic';

  for (const mx of toTry) {
    const cached = await ctx.cache.getSmtpAttempt(mx.hostname, address.address);
    const probe: HostProbe = cached
      ? { attempt: cached, banner: '' }
      : await probeHost(address, mx.hostname, ctx);

    attempts.push(probe.attempt);
    provider = detectProvider(probe.banner, mx.hostname);

    if (probe.attempt.status !== 'inconclusive') {
      if (!cached) {
        await ctx.cache.setSmtpAttempt(probe.attempt, address.address);
      }
      log.info(`SMTP verification complete: ${probe.attempt.status}`, {
        emailHash,
        mx: mx.hostname,
        code: probe.attempt.code,
      });
      return {
        status: probe.attempt.status,
        code: probe.attempt.code,
        response: probe.attempt.response,
        host: mx.hostname,
        provider,
        attempts,
      };
    }

    log.debug(`MX ${mx.hostname} was inconclusive, trying next...`, { response: probe.attempt.response });
  }

  const last = attempts[attempts.length - 1];
  const response = attempts.length > 0
    ? `All ${attempts.length} MX hosts failed: ${attempts.map(a => `${a.host}=${a.response}`).join('; ')}`
    : 'No MX hosts to try';

  log.warn('SMTP verification inconclusive', { emailHash, hosts: attempts.length });

  return {
    status: 'inconclusive',
    code: last ? last.code : null,
    response,
    provider,
    attempts,
  };
}

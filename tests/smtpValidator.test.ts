/**
 * Tests for the SMTP verifier
 * All conversations run against scripted in-process connections
 */

import { EmailAddress, MxHost } from '../src/types/email';
import { SmtpError } from '../src/types/errors';
import { classifyRcptReply, isTransportError, validateSmtp } from '../src/validators/smtpValidator';
import { StubSmtpConnector, createHarness, errnoError } from './helpers/stubs';

const address: EmailAddress = { address: 'user@example.com', localPart: 'user', domain: 'example.com' };

const twoHosts: MxHost[] = [
  { hostname: 'mx-b.example.net', priority: 20 },
  { hostname: 'mx-a.example.net', priority: 10 },
];

describe('SmtpValidator', () => {
  describe('classifyRcptReply', () => {
    it('should map 2xx, 5xx and everything else', () => {
      const reply = (code: number) => ({ code, lines: [`${code} x`], text: `${code} x` });
      expect(classifyRcptReply('mx', reply(250)).status).toBe('accepted');
      expect(classifyRcptReply('mx', reply(550)).status).toBe('rejected');
      expect(classifyRcptReply('mx', reply(450)).status).toBe('inconclusive');
      expect(classifyRcptReply('mx', reply(0)).status).toBe('inconclusive');
    });
  });

  describe('isTransportError', () => {
    it('should treat SmtpError and errno errors as transport failures', () => {
      expect(isTransportError(new SmtpError('reply', 'mx', 'timeout'))).toBe(true);
      expect(isTransportError(errnoError('ECONNRESET', 'read ECONNRESET'))).toBe(true);
      expect(isTransportError(new TypeError('bug'))).toBe(false);
    });

    it('should not mistake Node argument errors for network failures', () => {
      const argError = Object.assign(new TypeError('The "port" argument must be of type number'), {
        code: 'ERR_INVALID_ARG_TYPE',
      });
      expect(isTransportError(argError)).toBe(false);
    });
  });

  describe('validateSmtp', () => {
    it('should run the full conversation and accept on 250', async () => {
      const smtp = new StubSmtpConnector();
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, [{ hostname: 'mx-a.example.net', priority: 10 }], ctx);

      expect(result).toEqual({
        status: 'accepted',
        code: 250,
        response: '250 2.1.5 OK',
        host: 'mx-a.example.net',
        provider: 'generic',
        attempts: [{ host: 'mx-a.example.net', status: 'accepted', code: 250, response: '250 2.1.5 OK' }],
      });
      expect(smtp.sentTo('mx-a.example.net')).toEqual([
        'EHLO example.com',
        'MAIL FROM:<>',
        'RCPT TO:<user@example.com>',
        'QUIT',
      ]);
    });

    it('should use the configured HELO domain and sender', async () => {
      const smtp = new StubSmtpConnector();
      const { ctx } = createHarness({
        smtp,
        config: { smtp: { heloDomain: 'probe.example.org', mailFrom: 'verify@probe.example.org' } },
      });

      await validateSmtp(address, [{ hostname: 'mx-a.example.net', priority: 10 }], ctx);

      expect(smtp.sentTo('mx-a.example.net').slice(0, 2)).toEqual([
        'EHLO probe.example.org',
        'MAIL FROM:<verify@probe.example.org>',
      ]);
    });

    it('should fall back to HELO when EHLO is refused', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { EHLO: '502 5.5.2 command not recognized' } });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, [{ hostname: 'mx-a.example.net', priority: 10 }], ctx);

      expect(result.status).toBe('accepted');
      expect(smtp.sentTo('mx-a.example.net').slice(0, 2)).toEqual(['EHLO example.com', 'HELO example.com']);
    });

    it('should reject on 5xx and stop trying hosts', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { RCPT: '550 5.1.1 no such user' } });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, twoHosts, ctx);

      expect(result.status).toBe('rejected');
      expect(result.code).toBe(550);
      expect(result.response).toBe('550 5.1.1 no such user');
      expect(smtp.connectOrder).toEqual(['mx-a.example.net']);
    });

    it('should try hosts in priority order and move on after a 4xx', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { RCPT: '451 4.7.1 greylisted, try later' } });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, twoHosts, ctx);

      expect(smtp.connectOrder).toEqual(['mx-a.example.net', 'mx-b.example.net']);
      expect(result.status).toBe('accepted');
      expect(result.host).toBe('mx-b.example.net');
      expect(result.attempts.map(a => a.status)).toEqual(['inconclusive', 'accepted']);
    });

    it('should move on when a host refuses the connection', async () => {
      const smtp = new StubSmtpConnector({
        'mx-a.example.net': { connectError: errnoError('ECONNREFUSED', 'connect ECONNREFUSED 192.0.2.1:25') },
      });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, twoHosts, ctx);

      expect(result.status).toBe('accepted');
      expect(result.attempts[0]).toEqual({
        host: 'mx-a.example.net',
        status: 'inconclusive',
        code: null,
        response: 'connect ECONNREFUSED 192.0.2.1:25',
      });
    });

    it('should treat a reply timeout as inconclusive for that host', async () => {
      const smtp = new StubSmtpConnector({
        'mx-a.example.net': { RCPT: new SmtpError('reply', 'mx-a.example.net', 'No reply within 7000ms') },
      });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, [{ hostname: 'mx-a.example.net', priority: 10 }], ctx);

      expect(result.status).toBe('inconclusive');
      expect(result.response).toBe('All 1 MX hosts failed: mx-a.example.net=No reply within 7000ms');
    });

    it('should not accept a greeting other than 220', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { banner: '554 5.7.1 no service' } });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, [{ hostname: 'mx-a.example.net', priority: 10 }], ctx);

      expect(result.attempts).toEqual([
        { host: 'mx-a.example.net', status: 'inconclusive', code: 554, response: 'Unexpected greeting: 554 5.7.1 no service' },
      ]);
      expect(smtp.sentTo('mx-a.example.net')).toEqual(['QUIT']);
    });

    it('should report inconclusive with every attempt when all hosts fail', async () => {
      const smtp = new StubSmtpConnector({
        'mx-a.example.net': { RCPT: '451 try later' },
        'mx-b.example.net': { MAIL: '421 too busy' },
      });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, twoHosts, ctx);

      expect(result).toEqual({
        status: 'inconclusive',
        code: 421,
        response: 'All 2 MX hosts failed: mx-a.example.net=451 try later; mx-b.example.net=MAIL FROM rejected: 421 too busy',
        provider: 'generic',
        attempts: [
          { host: 'mx-a.example.net', status: 'inconclusive', code: 451, response: '451 try later' },
          { host: 'mx-b.example.net', status: 'inconclusive', code: 421, response: 'MAIL FROM rejected: 421 too busy' },
        ],
      });
    });

    it('should try no more than maxMxAttempts hosts', async () => {
      const hosts = ['mx1', 'mx2', 'mx3'].map((name, i) => ({ hostname: `${name}.example.net`, priority: i }));
      const smtp = new StubSmtpConnector(
        Object.fromEntries(hosts.map(h => [h.hostname, { RCPT: '450 mailbox busy' }]))
      );
      const { ctx } = createHarness({ smtp, config: { smtp: { maxMxAttempts: 2 } } });

      await validateSmtp(address, hosts, ctx);

      expect(smtp.connectOrder).toEqual(['mx1.example.net', 'mx2.example.net']);
    });

    it('should let programming errors propagate', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { connectError: new TypeError('socket is not a function') } });
      const { ctx } = createHarness({ smtp });

      await expect(validateSmtp(address, twoHosts, ctx)).rejects.toThrow(TypeError);
      expect(ctx.throttle.activeConnections()).toBe(0);
    });

    it('should let Node ERR_* errors from the connector propagate', async () => {
      const argError = Object.assign(new TypeError('The "port" argument must be of type number'), {
        code: 'ERR_INVALID_ARG_TYPE',
      });
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { connectError: argError } });
      const { ctx } = createHarness({ smtp });

      await expect(validateSmtp(address, twoHosts, ctx)).rejects.toThrow('The "port" argument must be of type number');
      expect(smtp.connectOrder).toEqual(['mx-a.example.net']);
    });

    it('should close every connection and release every slot', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { RCPT: '451 try later' } });
      const { ctx } = createHarness({ smtp });

      await validateSmtp(address, twoHosts, ctx);

      expect([...smtp.connections.values()].every(c => c.closed)).toBe(true);
      expect(ctx.throttle.activeConnections()).toBe(0);
    });

    it('should reuse a definitive answer for the same host and address', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { RCPT: '550 no such user' } });
      const { ctx } = createHarness({ smtp });

      await validateSmtp(address, twoHosts, ctx);
      const second = await validateSmtp(address, twoHosts, ctx);

      expect(second.status).toBe('rejected');
      expect(smtp.connectOrder).toEqual(['mx-a.example.net']);
    });

    it('should not cache inconclusive answers', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { RCPT: '451 try later' } });
      const { ctx } = createHarness({ smtp });
      const single = [{ hostname: 'mx-a.example.net', priority: 10 }];

      await validateSmtp(address, single, ctx);
      await validateSmtp(address, single, ctx);

      expect(smtp.connectOrder).toEqual(['mx-a.example.net', 'mx-a.example.net']);
    });

    it('should fingerprint the provider from the banner', async () => {
      const smtp = new StubSmtpConnector({ 'mx-a.example.net': { banner: '220 mx.google.com ESMTP ready' } });
      const { ctx } = createHarness({ smtp });

      const result = await validateSmtp(address, [{ hostname: 'mx-a.example.net', priority: 10 }], ctx);

      expect(result.provider).toBe('gmail');
    });

    it('should report inconclusive without hosts', async () => {
      const { ctx } = createHarness();

      const result = await validateSmtp(address, [], ctx);

      expect(result).toEqual({
        status: 'inconclusive',
        code: null,
        response: 'No MX hosts to try',
        provider: 'generic',
        attempts: [],
      });
    });
  });
});

/**
 * SMTP capability over a raw TCP socket.
 *
 * Only the line protocol lives here: connect, write a command, read the next
 * complete reply. The conversation itself is driven by the SMTP validator.
 */

import { Socket } from 'net';
import { SmtpConnection, SmtpConnector, SmtpReply } from '../types/capabilities';
import { SmtpError } from '../types/errors';
import { Logger } from './logger';

/**
 * Extract SMTP status code from a reply line
 */
export function extractSmtpCode(line: string): number {
  const match = line.match(/^(\d{3})/);
  return match ? parseInt(match[1], 10) : 0;
}

interface PendingRead {
  resolve: (reply: SmtpReply) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class SocketSmtpConnection implements SmtpConnection {
  private buffer = '';
  private replyLines: string[] = [];
  private replies: SmtpReply[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  constructor(
    private readonly socket: Socket,
    private readonly host: string,
    private readonly replyTimeoutMs: number,
    private readonly logger: Logger
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (err: Error) => this.fail(err));
    socket.on('close', () => this.fail(new SmtpError('connection', host, `Connection to ${host} closed`)));
  }

  private onData(chunk: string): void {
    this.buffer += chunk;

    const lines = this.buffer.split(/\r?\n/);
    this.buffer = lines.pop() || ''; // Keep incomplete line in buffer

    for (const line of lines) {
      if (!line) continue;

      this.logger.debug(`SMTP [${this.host}] <<< ${line}`);
      this.replyLines.push(line);

      // Multi-line replies continue while the code is followed by '-'
      if (/^\d{3}-/.test(line)) {
        continue;
      }

      const replyLines = this.replyLines;
      this.replyLines = [];
      this.deliver({
        code: extractSmtpCode(line),
        lines: replyLines,
        text: replyLines.join('\n'),
      });
    }
  }

  private deliver(reply: SmtpReply): void {
    if (this.pending) {
      const { resolve, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      resolve(reply);
      return;
    }
    this.replies.push(reply);
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    if (this.pending) {
      const { reject, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      reject(this.failure);
    }
  }

  sendLine(line: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    this.logger.debug(`SMTP [${this.host}] >>> ${line}`);

    return new Promise((resolve, reject) => {
      this.socket.write(`${line}\r\n`, err => (err ? reject(err) : resolve()));
    });
  }

  readResponse(): Promise<SmtpReply> {
    const queued = this.replies.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new SmtpError('reply', this.host, 'A reply is already being awaited'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new SmtpError('reply', this.host, `No reply from ${this.host} within ${this.replyTimeoutMs}ms`));
      }, this.replyTimeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  close(): void {
    if (this.pending) {
      clearTimeout(this.pending.timer);
      this.pending = null;
    }
    this.socket.removeAllListeners('data');
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
  }
}

export class SocketSmtpConnector implements SmtpConnector {
  constructor(
    private readonly replyTimeoutMs: number,
    private readonly logger: Logger
  ) {}

  connect(host: string, port: number, timeoutMs: number): Promise<SmtpConnection> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new SmtpError('connect', host, `Timed out connecting to ${host}:${port} after ${timeoutMs}ms`));
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(err);
      };

      socket.once('error', onError);
      socket.connect(port, host, () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        // Listeners attach before the first 'data' event can be emitted
        resolve(new SocketSmtpConnection(socket, host, this.replyTimeoutMs, this.logger));
      });
    });
  }
}

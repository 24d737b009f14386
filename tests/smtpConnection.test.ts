/**
 * Tests for the socket SMTP line protocol
 * Each test talks to a throwaway server on the loopback interface
 */

import { AddressInfo, Server, Socket, createServer } from 'net';
import { SmtpError } from '../src/types/errors';
import { Logger, LogLevel } from '../src/utils/logger';
import { SocketSmtpConnector, extractSmtpCode } from '../src/utils/smtpConnection';

const silent = new Logger({ level: LogLevel.SILENT });

let server: Server;
let sockets: Socket[];

function listen(onConnection: (socket: Socket) => void): Promise<number> {
  sockets = [];
  server = createServer(socket => {
    sockets.push(socket);
    onConnection(socket);
  });
  return new Promise(resolve => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function closeServer(): Promise<void> {
  sockets.forEach(socket => socket.destroy());
  return new Promise(resolve => server.close(() => resolve()));
}

describe('extractSmtpCode', () => {
  it('should read the leading three digits', () => {
    expect(extractSmtpCode('250-mx.example.com')).toBe(250);
    expect(extractSmtpCode('554 no service')).toBe(554);
    expect(extractSmtpCode('hello')).toBe(0);
  });
});

describe('SocketSmtpConnector', () => {
  afterEach(async () => {
    if (server.listening) {
      await closeServer();
    }
  });

  it('should read the greeting and multi-line replies', async () => {
    const port = await listen(socket => {
      socket.write('220 local ready\r\n');
      socket.on('data', data => {
        if (data.toString().startsWith('EHLO')) {
          socket.write('250-local\r\n250-SIZE 1000\r\n250 OK\r\n');
        }
      });
    });
    const connection = await new SocketSmtpConnector(1000, silent).connect('127.0.0.1', port, 1000);

    const greeting = await connection.readResponse();
    await connection.sendLine('EHLO example.com');
    const ehlo = await connection.readResponse();
    connection.close();

    expect(greeting).toEqual({ code: 220, lines: ['220 local ready'], text: '220 local ready' });
    expect(ehlo).toEqual({
      code: 250,
      lines: ['250-local', '250-SIZE 1000', '250 OK'],
      text: '250-local\n250-SIZE 1000\n250 OK',
    });
  });

  it('should time out waiting for a reply', async () => {
    const port = await listen(() => undefined);
    const connection = await new SocketSmtpConnector(30, silent).connect('127.0.0.1', port, 1000);

    const error = await connection.readResponse().catch((e: unknown) => e);
    connection.close();

    expect(error).toBeInstanceOf(SmtpError);
    expect(error).toMatchObject({ phase: 'reply', message: 'No reply from 127.0.0.1 within 30ms' });
  });

  it('should fail pending reads when the server hangs up', async () => {
    const port = await listen(socket => socket.end('220 bye\r\n'));
    const connection = await new SocketSmtpConnector(1000, silent).connect('127.0.0.1', port, 1000);

    const greeting = await connection.readResponse();
    const error = await connection.readResponse().catch((e: unknown) => e);
    connection.close();

    expect(greeting.code).toBe(220);
    expect(error).toMatchObject({ phase: 'connection', message: 'Connection to 127.0.0.1 closed' });
  });

  it('should reject with the errno error when nothing listens', async () => {
    const port = await listen(() => undefined);
    await closeServer();

    const error = await new SocketSmtpConnector(1000, silent).connect('127.0.0.1', port, 1000).catch((e: unknown) => e);

    expect(error).toMatchObject({ code: 'ECONNREFUSED' });
  });
});

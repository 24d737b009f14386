/**
 * Narrow interfaces for the network capabilities the pipeline calls through.
 * Production implementations live in src/utils; tests pass stubs.
 */

import { MxHost } from './email';

export interface DnsCapability {
  /**
   * Resolve MX records. Rejects with a ResolutionError or an errno-coded
   * error (ENOTFOUND, ENODATA, ETIMEOUT...) on failure.
   */
  resolveMx(domain: string, timeoutMs: number): Promise<MxHost[]>;
}

export interface HttpResponseInfo {
  status: number;
}

export interface HttpCapability {
  /**
   * Fetch a URL. Rejects on transport failure (DNS, TLS, refused, timeout).
   */
  get(url: string, timeoutMs: number): Promise<HttpResponseInfo>;
}

/**
 * A complete SMTP reply. Multi-line replies (`250-...`) are folded into one.
 */
export interface SmtpReply {
  code: number;
  lines: string[];
  text: string;
}

export interface SmtpConnection {
  sendLine(line: string): Promise<void>;
  readResponse(): Promise<SmtpReply>;
  close(): void;
}

export interface SmtpConnector {
  connect(host: string, port: number, timeoutMs: number): Promise<SmtpConnection>;
}

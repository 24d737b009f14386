/**
 * HTTP capability backed by the global fetch.
 */

import { HttpCapability, HttpResponseInfo } from '../types/capabilities';
import { ProbeError, getErrorMessage } from '../types/errors';

export class FetchHttpClient implements HttpCapability {
  constructor(private readonly userAgent = 'email-pipeline-validator/1.0') {}

  async get(url: string, timeoutMs: number): Promise<HttpResponseInfo> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal,
        headers: { 'user-agent': this.userAgent },
      });

      // Only the status matters; drop the body so the socket goes back to the pool
      await response.body?.cancel();

      return { status: response.status };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ProbeError(url, `Request timed out after ${timeoutMs}ms`);
      }
      // fetch wraps the socket error in `cause`
      const cause = error instanceof Error && error.cause !== undefined ? `: ${getErrorMessage(error.cause)}` : '';
      throw new ProbeError(url, `${getErrorMessage(error)}${cause}`);
    } finally {
      clearTimeout(timer);
    }
  }
}

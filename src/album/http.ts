/**
 * HTTP transport with bounded timeouts and typed failures.
 */

import { DataError, TransportError, TransportTimeoutError } from '../exceptions';

export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;

  /** User-Agent header sent with every request */
  userAgent?: string;

  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
}

function isTimeout(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Thin wrapper over fetch.
 *
 * Every request is bounded by a timeout. Network errors and non-2xx
 * statuses become TransportError; timeouts become TransportTimeoutError.
 */
export class HttpTransport {
  static readonly DEFAULT_TIMEOUT = 30000;
  static readonly DEFAULT_USER_AGENT = 'inkframe/0.1';

  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? HttpTransport.DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent ?? HttpTransport.DEFAULT_USER_AGENT;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * POST a JSON body and parse the JSON response.
   *
   * The body is sent as `text/plain`, which the album endpoints expect.
   *
   * @throws {TransportError} On network failure or non-2xx status
   * @throws {TransportTimeoutError} If the request exceeds the timeout
   * @throws {DataError} If the response is not JSON
   */
  async postJson(url: string, body: unknown): Promise<unknown> {
    const text = await this.request(url, 'POST', (response) => response.text(), JSON.stringify(body));
    try {
      return JSON.parse(text);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DataError(`Invalid JSON from ${url}: ${detail}`);
    }
  }

  /**
   * GET raw response bytes.
   *
   * @throws {TransportError} On network failure or non-2xx status
   * @throws {TransportTimeoutError} If the request exceeds the timeout
   */
  async getBytes(url: string): Promise<Uint8Array> {
    const buffer = await this.request(url, 'GET', (response) => response.arrayBuffer());
    return new Uint8Array(buffer);
  }

  private async request<T>(
    url: string,
    method: string,
    read: (response: Response) => Promise<T>,
    body?: string
  ): Promise<T> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    if (body !== undefined) {
      headers['Content-Type'] = 'text/plain';
    }

    const host = hostOf(url);
    console.debug(`${method} ${host}`);

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new TransportError(`${method} ${host} failed with HTTP ${response.status}`, {
          status: response.status,
          retryable: response.status >= 500 || response.status === 429,
        });
      }
      return await read(response);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (isTimeout(error)) {
        throw new TransportTimeoutError(`${method} ${host} timed out after ${this.timeoutMs}ms`);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${method} ${host} failed: ${detail}`);
    }
  }
}

/**
 * Host part of a URL, for logs. Signed download paths stay out of the logs.
 */
function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Operations REST Client
 *
 * Thin wrapper over `fetch()` that adds OpsToken auth and maps failures onto
 * the error taxonomy: 401 → AuthExpiredError, other non-2xx →
 * RemoteRejectedError, network failures → TransportError.
 */

import { AuthExpiredError, RemoteRejectedError, TransportError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';

/**
 * The subset of `fetch` the client needs. Tests pass an in-process fake.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Options for a single request
 */
export interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * Options for constructing an OpsClient
 */
export interface OpsClientOptions {
  /** e.g. https://ops.example.test/suite-api/api */
  baseUrl: string;
  token: string;
  logger: Logger;
  fetch?: FetchLike;
  /** No timeout when unset */
  timeoutMs?: number;
}

export class OpsClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs?: number;
  private token: string;

  constructor(options: OpsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Replace the bearer token used for subsequent requests.
   */
  setToken(token: string): void {
    this.token = token;
  }

  /**
   * Build the absolute URL for a path and query.
   */
  url(path: string, query?: Record<string, string>): string {
    const search = query ? `?${new URLSearchParams(query).toString()}` : '';
    return `${this.baseUrl}${path}${search}`;
  }

  /**
   * Issue a request and return the parsed JSON body (undefined when empty).
   *
   * @throws AuthExpiredError on HTTP 401
   * @throws RemoteRejectedError on any other non-2xx status
   * @throws TransportError when no response was received
   */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.url(path, options.query);
    this.logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          Authorization: `OpsToken ${this.token}`,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new TransportError(`${method} ${url} failed: ${reason}`, url, 'TRANSPORT_FAILED', {
        cause: error,
      });
    }

    if (response.status === 401) {
      throw new AuthExpiredError(url);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new RemoteRejectedError(
        `${method} ${url} returned HTTP ${response.status}`,
        response.status,
        url,
        text
      );
    }

    if (text.trim() === '') {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new RemoteRejectedError(
        `${method} ${url} returned a body that is not JSON`,
        response.status,
        url,
        text
      );
    }
  }
}

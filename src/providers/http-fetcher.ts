/**
 * HTTP Fetcher Provider
 *
 * Thin wrapper over the global fetch API. One request per call, no retries
 * and no timeout beyond what the transport itself applies.
 */

import { FetchError, errorMessage } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('http-fetcher');

export interface Fetcher {
  fetch(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  userAgent?: string;
  headers?: Record<string, string>;
}

export class HttpFetcher implements Fetcher {
  private readonly headers: Record<string, string>;

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = {
      'Accept': 'text/html',
      ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
      ...(options.headers ?? {})
    };
  }

  /**
   * Fetch a URL and return its body text. Rejects with a FetchError when the
   * request cannot be made or the server answers with a non-2xx status.
   */
  async fetch(url: string): Promise<string> {
    log.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { method: 'GET', headers: this.headers });
    } catch (error) {
      throw new FetchError(url, `Request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FetchError(url, `Failed to read body: ${errorMessage(error)}`, { cause: error });
    }
  }
}

import fetch from 'node-fetch';

/**
 * Narrow HTTP surface used by the job sources
 */
export interface HttpClient {
  getJson(url: string): Promise<unknown>;
  getText(url: string): Promise<string>;
}

/**
 * Non-2xx response from an upstream
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`GET ${url} returned ${status}`);
    this.name = 'HttpError';
  }
}

/**
 * Response body did not have the shape a source expects
 */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

/**
 * node-fetch backed client with a fixed per-request timeout.
 * Timeouts reject with node-fetch's FetchError (type "request-timeout").
 */
export class FetchHttpClient implements HttpClient {
  constructor(private readonly timeoutMs: number = 20000) {}

  async getJson(url: string): Promise<unknown> {
    const response = await fetch(url, {
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
      timeout: this.timeoutMs,
    });
    if (!response.ok) {
      throw new HttpError(response.status, url);
    }
    return await response.json();
  }

  async getText(url: string): Promise<string> {
    const response = await fetch(url, {
      headers: { Accept: 'text/html,application/xhtml+xml,application/xml', 'User-Agent': USER_AGENT },
      timeout: this.timeoutMs,
    });
    if (!response.ok) {
      throw new HttpError(response.status, url);
    }
    return await response.text();
  }
}

import { Readable } from 'stream';
import got, { type PlainResponse } from 'got';

export type HeaderValue = string | string[] | undefined;

/**
 * A response whose headers have arrived but whose body hasn't been read.
 */
export interface FetchedResponse {
  /**
   * The URL the body came from, after any HTTP redirects.
   */
  url: string,
  statusCode: number,
  statusMessage?: string,
  headers: Record<string, HeaderValue>,

  /**
   * Every URL visited on the way to `url`, in order.
   */
  redirects: string[],
  body: Readable,
}

/**
 * Requests a URL, following HTTP redirects. Rejects only when no response at
 * all could be obtained; HTTP error statuses resolve normally.
 */
export type Fetcher = (url: string) => Promise<FetchedResponse>;

export interface GotFetcherOptions {
  timeout?: number,
  userAgent?: string,
}

export function createGotFetcher(options: GotFetcherOptions = {}): Fetcher {
  return (url: string) => new Promise<FetchedResponse>((resolve, reject) => {
    const stream = got.stream(url, {
      throwHttpErrors: false,
      followRedirect: true,
      timeout: { request: options.timeout ?? 10_000 },
      headers: options.userAgent ? { 'user-agent': options.userAgent } : {},
    });

    // Errors after the response arrived surface through the body stream;
    // this listener keeps them from going unhandled before anyone reads it.
    stream.on('error', reject);
    stream.once('response', (response: PlainResponse) => {
      resolve({
        url: response.url,
        statusCode: response.statusCode,
        statusMessage: response.statusMessage,
        headers: response.headers,
        redirects: response.redirectUrls.map(u => u.href),
        body: stream,
      });
    });
  });
}

/**
 * Throws away a body that will never be read, releasing the connection.
 */
export function discard(response: FetchedResponse) {
  if (!response.body.destroyed) response.body.destroy();
}

export function headerValue(response: FetchedResponse, name: string): string | undefined {
  const value = response.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

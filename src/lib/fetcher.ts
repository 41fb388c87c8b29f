import { Agent, request, type Dispatcher } from 'undici';

import { downloadToFile, USER_AGENT } from './download.js';
import { FetchError, errorMessage } from './errors.js';

export interface PageResponse {
  statusCode: number;
  body: string;
}

export type DownloadOutcome =
  | { ok: true; bytes: number }
  | { ok: false; reason: string };

/**
 * Network capability used by the runners. `get` returns non-200 responses
 * rather than throwing; `download` never throws.
 */
export interface Fetcher {
  get(url: string, timeoutMs: number): Promise<PageResponse>;
  download(url: string, destination: string, timeoutMs: number): Promise<DownloadOutcome>;
}

export interface HttpFetcherOptions {
  // The source site has served broken certificate chains; opt in explicitly.
  insecureTls?: boolean;
}

export function createHttpFetcher(opts: HttpFetcherOptions = {}): Fetcher {
  const dispatcher: Dispatcher | undefined = opts.insecureTls
    ? new Agent({ connect: { rejectUnauthorized: false } })
    : undefined;

  return {
    async get(url, timeoutMs) {
      try {
        const res = await request(url, {
          method: 'GET',
          headers: { 'User-Agent': USER_AGENT },
          bodyTimeout: timeoutMs,
          headersTimeout: timeoutMs,
          dispatcher,
        });
        return { statusCode: res.statusCode, body: await res.body.text() };
      } catch (e) {
        throw new FetchError(url, `GET ${url} failed: ${errorMessage(e)}`, { cause: e });
      }
    },

    async download(url, destination, timeoutMs) {
      try {
        const { bytes } = await downloadToFile(url, destination, { timeoutMs, dispatcher });
        return { ok: true, bytes };
      } catch (e) {
        return { ok: false, reason: errorMessage(e) };
      }
    },
  };
}

import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';

import { FetchError, errorMessage } from './errors.js';
import { ensureDir } from './storage.js';

export const USER_AGENT = 'open-hutbe-api harvester (+https://github.com/TalhaY61/open-hutbe-api)';

export interface DownloadResult {
  bytes: number;
}

export interface RequestOptions {
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Streams a 200 response body to `outPath` through a `.tmp` sibling, so a
 * failed transfer never leaves a partial file under the final name.
 * Throws FetchError on any status other than 200 and on transport failures.
 */
export async function downloadToFile(url: string, outPath: string, opts: RequestOptions): Promise<DownloadResult> {
  ensureDir(path.dirname(outPath));

  let res: Dispatcher.ResponseData;
  try {
    res = await request(url, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      bodyTimeout: opts.timeoutMs,
      headersTimeout: opts.timeoutMs,
      dispatcher: opts.dispatcher,
    });
  } catch (e) {
    throw new FetchError(url, `Download failed for ${url}: ${errorMessage(e)}`, { cause: e });
  }

  if (res.statusCode !== 200) {
    await res.body.dump();
    throw new FetchError(url, `Download failed: ${res.statusCode} for ${url}`);
  }

  const tmpPath = `${outPath}.tmp`;
  try {
    await pipeline(res.body, fs.createWriteStream(tmpPath));
  } catch (e) {
    fs.rmSync(tmpPath, { force: true });
    throw new FetchError(url, `Download interrupted for ${url}: ${errorMessage(e)}`, { cause: e });
  }

  const bytes = fs.statSync(tmpPath).size;
  fs.renameSync(tmpPath, outPath);
  return { bytes };
}

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('undici', () => ({
  request: vi.fn(),
  Agent: vi.fn(),
}));

import { Agent, request, type Dispatcher } from 'undici';
import { classifyError, FetchError } from './errors.js';
import { createHttpFetcher } from './fetcher.js';

function fakeResponse(statusCode: number, payload = ''): Dispatcher.ResponseData {
  const body = Object.assign(Readable.from([Buffer.from(payload)]), {
    text: async () => payload,
    dump: async () => {},
  });
  return { statusCode, headers: {}, trailers: {}, opaque: null, context: {}, body } as unknown as Dispatcher.ResponseData;
}

describe('createHttpFetcher', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hutbe-fetcher-'));
  });

  afterEach(() => {
    vi.mocked(request).mockReset();
    vi.mocked(Agent).mockClear();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns non-200 listing responses instead of throwing', async () => {
    vi.mocked(request).mockResolvedValueOnce(fakeResponse(404, 'Not Found'));
    const res = await createHttpFetcher().get('https://example.org/list?page=9', 1000);
    expect(res).toEqual({ statusCode: 404, body: 'Not Found' });
  });

  it('passes the timeout to undici for headers and body', async () => {
    vi.mocked(request).mockResolvedValueOnce(fakeResponse(200, '<html></html>'));
    await createHttpFetcher().get('https://example.org/list?page=1', 1234);
    expect(vi.mocked(request).mock.calls[0]?.[1]).toMatchObject({ method: 'GET', headersTimeout: 1234, bodyTimeout: 1234 });
  });

  it('wraps transport failures as network errors', async () => {
    vi.mocked(request).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const err = await createHttpFetcher().get('https://example.org/list', 1000).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(classifyError(err)).toBe('network');
    expect(String(err)).toContain('connect ECONNREFUSED');
  });

  it('streams a 200 download to the destination, creating directories', async () => {
    vi.mocked(request).mockResolvedValueOnce(fakeResponse(200, '%PDF-1.4 test'));
    const dest = path.join(tmpDir, 'en', '2020', 'sermon-a.pdf');

    const outcome = await createHttpFetcher().download('https://example.org/a.pdf', dest, 1000);

    expect(outcome).toEqual({ ok: true, bytes: 13 });
    expect(fs.readFileSync(dest, 'utf8')).toBe('%PDF-1.4 test');
    expect(fs.existsSync(`${dest}.tmp`)).toBe(false);
  });

  it('reports a failed download on non-200 without writing the file', async () => {
    vi.mocked(request).mockResolvedValueOnce(fakeResponse(500));
    const dest = path.join(tmpDir, 'a.pdf');

    const outcome = await createHttpFetcher().download('https://example.org/a.pdf', dest, 1000);

    expect(outcome).toEqual({ ok: false, reason: 'Download failed: 500 for https://example.org/a.pdf' });
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('reports a failed download on network errors', async () => {
    vi.mocked(request).mockRejectedValueOnce(new Error('Headers Timeout Error'));
    const outcome = await createHttpFetcher().download('https://example.org/a.pdf', path.join(tmpDir, 'a.pdf'), 1000);
    expect(outcome).toEqual({
      ok: false,
      reason: 'Download failed for https://example.org/a.pdf: Headers Timeout Error',
    });
  });

  it('uses a dispatcher without certificate checks only when asked', () => {
    createHttpFetcher();
    expect(Agent).not.toHaveBeenCalled();

    createHttpFetcher({ insecureTls: true });
    expect(Agent).toHaveBeenCalledWith({ connect: { rejectUnauthorized: false } });
  });
});

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadConfig, pagesBaseUrl } from './config.js';
import { LANGUAGES } from './types.js';

describe('loadConfig', () => {
  let repoRoot: string;

  beforeEach(() => {
    repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'hutbe-config-'));
  });

  afterEach(() => {
    fs.rmSync(repoRoot, { recursive: true, force: true });
  });

  it('uses defaults without config.yml or env', () => {
    const config = loadConfig(repoRoot, {});
    expect(config).toEqual({
      pages: {
        githubUsername: 'TalhaY61',
        githubRepo: 'open-hutbe-api',
        baseUrl: 'https://TalhaY61.github.io/open-hutbe-api',
      },
      crawl: {
        startPage: 1,
        maxPages: 10,
        timeoutMs: 45_000,
        languages: [...LANGUAGES],
        insecureTls: false,
      },
      storage: { root: path.resolve(repoRoot) },
    });
  });

  it('derives the pages base from env account and repo', () => {
    const config = loadConfig(repoRoot, { GITHUB_USERNAME: 'someone', GITHUB_REPO: 'mirror', HUTBE_MAX_PAGES: '3' });
    expect(config.pages.baseUrl).toBe('https://someone.github.io/mirror');
    expect(config.crawl.maxPages).toBe(3);
  });

  it('lets env win over config.yml', () => {
    fs.writeFileSync(
      path.join(repoRoot, 'config.yml'),
      ['crawl:', '  maxPages: 5', '  timeoutMs: 1000', '  languages: [en, de]', 'storage:', '  root: out'].join('\n')
    );
    const config = loadConfig(repoRoot, { HUTBE_MAX_PAGES: '2', HUTBE_INSECURE_TLS: 'true' });
    expect(config.crawl).toEqual({ startPage: 1, maxPages: 2, timeoutMs: 1000, languages: ['en', 'de'], insecureTls: true });
    expect(config.storage.root).toBe(path.join(repoRoot, 'out'));
  });

  it('treats empty env values as unset and trims an explicit base url', () => {
    const config = loadConfig(repoRoot, { HUTBE_MAX_PAGES: '', HUTBE_PAGES_BASE: 'https://cdn.example.org/hutbe/' });
    expect(config.crawl.maxPages).toBe(10);
    expect(config.pages.baseUrl).toBe('https://cdn.example.org/hutbe');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig(repoRoot, { HUTBE_MAX_PAGES: 'abc' })).toThrow();
    expect(() => loadConfig(repoRoot, { HUTBE_TIMEOUT_MS: '0' })).toThrow();

    fs.writeFileSync(path.join(repoRoot, 'config.yml'), 'crawl:\n  languages: [xx]\n');
    expect(() => loadConfig(repoRoot, {})).toThrow();
  });
});

describe('pagesBaseUrl', () => {
  it('builds a github pages project url', () => {
    expect(pagesBaseUrl('a', 'b')).toBe('https://a.github.io/b');
  });
});

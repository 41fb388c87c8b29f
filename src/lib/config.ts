import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { LANGUAGES, type HarvestConfig } from './types.js';

const positiveInt = z.coerce.number().int().min(1);

const FileConfigSchema = z.object({
  pages: z
    .object({
      githubUsername: z.string().min(1).optional(),
      githubRepo: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
    })
    .default({}),
  crawl: z
    .object({
      startPage: positiveInt.optional(),
      maxPages: positiveInt.optional(),
      timeoutMs: positiveInt.optional(),
      languages: z.array(z.enum(LANGUAGES)).min(1).optional(),
      insecureTls: z.boolean().optional(),
    })
    .default({}),
  storage: z
    .object({
      root: z.string().min(1).optional(),
    })
    .default({}),
});

const EnvSchema = z.object({
  GITHUB_USERNAME: z.string().min(1).optional(),
  GITHUB_REPO: z.string().min(1).optional(),
  HUTBE_PAGES_BASE: z.string().url().optional(),
  HUTBE_MAX_PAGES: positiveInt.optional(),
  HUTBE_TIMEOUT_MS: positiveInt.optional(),
  HUTBE_STORAGE_ROOT: z.string().min(1).optional(),
  HUTBE_INSECURE_TLS: z
    .enum(['1', '0', 'true', 'false'])
    .transform((v) => v === '1' || v === 'true')
    .optional(),
});

const DEFAULTS = {
  githubUsername: 'TalhaY61',
  githubRepo: 'open-hutbe-api',
  startPage: 1,
  maxPages: 10,
  timeoutMs: 45_000,
} as const;

function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw) ?? {};
}

export function pagesBaseUrl(username: string, repo: string): string {
  return `https://${username}.github.io/${repo}`;
}

// Empty env strings count as unset, the same as a missing variable.
function envValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const v = env[key];
    if (v !== undefined && v.trim() !== '') out[key] = v.trim();
  }
  return out;
}

export function loadConfig(repoRoot: string, env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const configPath = path.join(repoRoot, 'config.yml');
  const file = FileConfigSchema.parse(fs.existsSync(configPath) ? loadYamlFile(configPath) : {});
  const vars = EnvSchema.parse(envValues(env));

  const githubUsername = vars.GITHUB_USERNAME ?? file.pages.githubUsername ?? DEFAULTS.githubUsername;
  const githubRepo = vars.GITHUB_REPO ?? file.pages.githubRepo ?? DEFAULTS.githubRepo;
  const baseUrl = vars.HUTBE_PAGES_BASE ?? file.pages.baseUrl ?? pagesBaseUrl(githubUsername, githubRepo);
  const root = vars.HUTBE_STORAGE_ROOT ?? file.storage.root ?? '.';

  return {
    pages: {
      githubUsername,
      githubRepo,
      baseUrl: baseUrl.replace(/\/+$/, ''),
    },
    crawl: {
      startPage: file.crawl.startPage ?? DEFAULTS.startPage,
      maxPages: vars.HUTBE_MAX_PAGES ?? file.crawl.maxPages ?? DEFAULTS.maxPages,
      timeoutMs: vars.HUTBE_TIMEOUT_MS ?? file.crawl.timeoutMs ?? DEFAULTS.timeoutMs,
      languages: file.crawl.languages ?? [...LANGUAGES],
      insecureTls: vars.HUTBE_INSECURE_TLS ?? file.crawl.insecureTls ?? false,
    },
    storage: {
      root: path.resolve(repoRoot, root),
    },
  };
}

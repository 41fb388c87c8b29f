import fs from 'node:fs';

import type { Candidate, HarvestConfig, HutbeEntry, IsoDate, Language } from '../types.js';
import type { Fetcher } from '../fetcher.js';
import { KnownIndex, loadCatalog, saveCatalog, type CatalogItem } from '../catalog.js';
import { classifyError, errorMessage, type ErrorKind } from '../errors.js';
import { extractCandidates } from '../extract.js';
import { deriveId, slugify } from '../ids.js';
import { listingPageUrl } from '../sources.js';
import { hutbePdfPath, publicPdfUrl, storagePaths } from '../storage.js';
import { resolveYear } from '../year.js';

const COLLISION_SUFFIX_LENGTH = 6;

interface PageRef {
  language: Language;
  page: number;
  url: string;
}

export type PageOutcome =
  | (PageRef & { status: 'ok'; candidates: number; added: number })
  | (PageRef & { status: 'end-of-results'; statusCode: number })
  | (PageRef & { status: 'empty' })
  | (PageRef & { status: 'failed'; kind: ErrorKind; error: string });

export interface CrawlRunOptions {
  config: HarvestConfig;
  fetcher: Fetcher;
  now?: Date;
  pageUrl?: (language: Language, page: number) => string;
}

export interface CrawlRunResult {
  added: HutbeEntry[];
  catalogSize: number;
  skippedKnown: number;
  failedDownloads: Array<{ sourcePdfUrl: string; reason: string }>;
  pages: PageOutcome[];
  saved: boolean;
}

interface CrawlState {
  config: HarvestConfig;
  fetcher: Fetcher;
  now: Date;
  pdfRoot: string;
  catalog: CatalogItem[];
  known: KnownIndex;
  result: CrawlRunResult;
}

function isoDate(now: Date): IsoDate {
  return now.toISOString().slice(0, 10);
}

export interface PlannedFile {
  year: number;
  filename: string;
  localPath: string;
}

/**
 * Picks `<language>/<year>/<slug>.pdf`, or `<slug>-<id prefix>.pdf` when the
 * plain name is taken. The suffixed name is not re-checked.
 */
export function planFile(pdfRoot: string, language: Language, candidate: Candidate, id: string, now: Date): PlannedFile {
  const year = resolveYear(candidate, now);
  const baseSlug = slugify(candidate.title);

  let filename = `${baseSlug}.pdf`;
  let localPath = hutbePdfPath(pdfRoot, language, year, filename);
  if (fs.existsSync(localPath)) {
    filename = `${baseSlug}-${id.slice(0, COLLISION_SUFFIX_LENGTH)}.pdf`;
    localPath = hutbePdfPath(pdfRoot, language, year, filename);
  }

  return { year, filename, localPath };
}

async function processCandidate(state: CrawlState, language: Language, candidate: Candidate): Promise<boolean> {
  const { config, fetcher, known, result } = state;
  const sourceUrl = candidate.sourcePdfUrl;
  const id = deriveId(sourceUrl);

  if (known.has(id, sourceUrl)) {
    result.skippedKnown += 1;
    return false;
  }

  const { year, filename, localPath } = planFile(state.pdfRoot, language, candidate, id, state.now);

  console.log(`      Downloading: ${candidate.title}`);
  const outcome = await fetcher.download(sourceUrl, localPath, config.crawl.timeoutMs);
  if (!outcome.ok) {
    console.warn(`      Download failed for ${sourceUrl}: ${outcome.reason}`);
    result.failedDownloads.push({ sourcePdfUrl: sourceUrl, reason: outcome.reason });
    return false;
  }

  const entry: HutbeEntry = {
    id,
    title: candidate.title,
    date: candidate.date ?? isoDate(state.now),
    year,
    language,
    filename,
    source_pdf_url: sourceUrl,
    pdf_url: publicPdfUrl(config.pages.baseUrl, [language, year], filename),
  };

  result.added.push(entry);
  state.catalog.unshift(entry);
  known.add(id, sourceUrl);
  return true;
}

async function processPage(state: CrawlState, ref: PageRef): Promise<PageOutcome> {
  const response = await state.fetcher.get(ref.url, state.config.crawl.timeoutMs);
  if (response.statusCode !== 200) {
    return { ...ref, status: 'end-of-results', statusCode: response.statusCode };
  }

  const candidates = extractCandidates(response.body, ref.url);
  if (candidates.length === 0) return { ...ref, status: 'empty' };

  let added = 0;
  for (const candidate of candidates) {
    if (await processCandidate(state, ref.language, candidate)) added += 1;
  }
  return { ...ref, status: 'ok', candidates: candidates.length, added };
}

/**
 * Walks every configured language section page by page, downloads PDFs not yet
 * in hutbes.json and prepends them to the catalog.
 *
 * A non-200 listing or a page without candidates ends that language. Any other
 * failure on a page is logged and the walk moves on to the next page. The
 * catalog is written only when something was added.
 */
export async function runHutbeCrawl(opts: CrawlRunOptions): Promise<CrawlRunResult> {
  const { config, fetcher, now = new Date(), pageUrl = listingPageUrl } = opts;
  const paths = storagePaths(config.storage.root);

  const catalog = loadCatalog(paths.hutbesCatalog);
  const state: CrawlState = {
    config,
    fetcher,
    now,
    pdfRoot: paths.pdfRoot,
    catalog,
    known: KnownIndex.fromCatalog(catalog),
    result: { added: [], catalogSize: catalog.length, skippedKnown: 0, failedDownloads: [], pages: [], saved: false },
  };

  console.log(`\nStarting Hutbe Scan: ${catalog.length} existing items found.`);

  for (const language of config.crawl.languages) {
    console.log(`--- Scanning Language: ${language.toUpperCase()} ---`);

    for (let page = config.crawl.startPage; page <= config.crawl.maxPages; page += 1) {
      const ref: PageRef = { language, page, url: pageUrl(language, page) };
      console.log(`   Scanning page ${page}...`);

      let outcome: PageOutcome;
      try {
        outcome = await processPage(state, ref);
      } catch (e) {
        outcome = { ...ref, status: 'failed', kind: classifyError(e), error: errorMessage(e) };
        console.warn(`   Error (${outcome.kind}) on ${ref.url}: ${outcome.error}`);
      }
      state.result.pages.push(outcome);

      if (outcome.status === 'end-of-results') {
        console.log('   Page not found, skipping.');
        break;
      }
      if (outcome.status === 'empty') {
        console.log('   Content not found, stopping.');
        break;
      }
    }
  }

  const { result } = state;
  result.catalogSize = catalog.length;

  if (result.added.length > 0) {
    saveCatalog(catalog, paths.hutbesCatalog);
    result.saved = true;
    console.log(`Complete. Added ${result.added.length} new hutbes.`);
  } else {
    console.log('No new hutbes found.');
  }

  return result;
}

import type { HarvestConfig } from '../types.js';
import type { Fetcher } from '../fetcher.js';
import { runHutbeCrawl, type CrawlRunResult } from './hutbes.js';
import { runPrayers, type PrayerRunResult } from './prayers.js';

export interface HarvestRunOptions {
  config: HarvestConfig;
  fetcher: Fetcher;
  now?: Date;
}

export type HarvestStatus = 'ok' | 'warn';

export interface HarvestStats {
  prayers: { downloaded: number; alreadyPresent: number; failed: number };
  hutbes: {
    added: number;
    catalogSize: number;
    skippedKnown: number;
    failedDownloads: number;
    failedPages: Array<{ language: string; page: number; kind: string; error: string }>;
  };
}

export interface HarvestRunResult {
  status: HarvestStatus;
  prayers: PrayerRunResult;
  hutbes: CrawlRunResult;
  stats: HarvestStats;
}

function summarize(prayers: PrayerRunResult, hutbes: CrawlRunResult): HarvestStats {
  const failedPages: HarvestStats['hutbes']['failedPages'] = [];
  for (const p of hutbes.pages) {
    if (p.status === 'failed') failedPages.push({ language: p.language, page: p.page, kind: p.kind, error: p.error });
  }

  return {
    prayers: {
      downloaded: prayers.downloaded,
      alreadyPresent: prayers.alreadyPresent,
      failed: prayers.failed.length,
    },
    hutbes: {
      added: hutbes.added.length,
      catalogSize: hutbes.catalogSize,
      skippedKnown: hutbes.skippedKnown,
      failedDownloads: hutbes.failedDownloads.length,
      failedPages,
    },
  };
}

/** Prayer pass, then the hutbe crawl. Per-item and per-page failures downgrade the status to `warn`. */
export async function runHarvest(opts: HarvestRunOptions): Promise<HarvestRunResult> {
  const { config, fetcher, now } = opts;

  const prayers = await runPrayers({ config, fetcher });
  const hutbes = await runHutbeCrawl({ config, fetcher, now });
  const stats = summarize(prayers, hutbes);

  const hadFailures = stats.prayers.failed > 0 || stats.hutbes.failedDownloads > 0 || stats.hutbes.failedPages.length > 0;
  const status: HarvestStatus = hadFailures ? 'warn' : 'ok';

  if (status === 'warn') {
    console.warn(
      `Harvest completed with warnings: ${stats.hutbes.failedDownloads} failed downloads, ` +
        `${stats.hutbes.failedPages.length} failed pages, ${stats.prayers.failed} failed prayers.`
    );
  }

  return { status, prayers, hutbes, stats };
}

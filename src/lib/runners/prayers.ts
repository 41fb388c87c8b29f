import fs from 'node:fs';
import path from 'node:path';

import type { HarvestConfig, PrayerEntry } from '../types.js';
import type { Fetcher } from '../fetcher.js';
import { saveCatalog } from '../catalog.js';
import { slugify } from '../ids.js';
import { PRAYER_SOURCES, type PrayerSource } from '../sources.js';
import { PRAYERS_DIR, ensureDir, prayerPdfPath, publicPdfUrl, storagePaths } from '../storage.js';

export interface PrayerRunOptions {
  config: HarvestConfig;
  fetcher: Fetcher;
  sources?: readonly PrayerSource[];
}

export interface PrayerRunResult {
  entries: PrayerEntry[];
  downloaded: number;
  alreadyPresent: number;
  failed: Array<{ key: string; reason: string }>;
}

/**
 * Mirrors the fixed prayer PDFs and rewrites prayers.json from scratch.
 * A prayer whose download fails is left out of this run's catalog.
 */
export async function runPrayers(opts: PrayerRunOptions): Promise<PrayerRunResult> {
  const { config, fetcher, sources = PRAYER_SOURCES } = opts;
  const paths = storagePaths(config.storage.root);

  console.log('\n--- Processing Prayers ---');
  ensureDir(path.join(paths.pdfRoot, PRAYERS_DIR));

  const result: PrayerRunResult = { entries: [], downloaded: 0, alreadyPresent: 0, failed: [] };

  for (const source of sources) {
    const filename = `${slugify(source.title)}.pdf`;
    const localPath = prayerPdfPath(paths.pdfRoot, filename);

    if (fs.existsSync(localPath)) {
      console.log(`Prayer already exists: ${source.title}`);
      result.alreadyPresent += 1;
    } else {
      console.log(`Downloading prayer: ${source.title}`);
      const outcome = await fetcher.download(source.url, localPath, config.crawl.timeoutMs);
      if (!outcome.ok) {
        console.warn(`Failed to download prayer: ${source.title} (${outcome.reason})`);
        result.failed.push({ key: source.key, reason: outcome.reason });
        continue;
      }
      result.downloaded += 1;
    }

    result.entries.push({
      id: source.key,
      title: source.title,
      filename,
      pdf_url: publicPdfUrl(config.pages.baseUrl, [PRAYERS_DIR], filename),
      source_url: source.url,
    });
  }

  saveCatalog(result.entries, paths.prayersCatalog);
  console.log('prayers.json updated.');

  return result;
}

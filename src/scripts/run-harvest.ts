// Full harvest: prayer PDFs, then every hutbe language section.
// Meant to be triggered by an external scheduler; never run two at once
// against the same storage root (hutbes.json is not locked).

import path from 'node:path';

import { loadConfig } from '../lib/config.js';
import { createHttpFetcher } from '../lib/fetcher.js';
import { runHarvest } from '../lib/runners/harvest.js';

const repoRoot = path.resolve(process.cwd());
const config = loadConfig(repoRoot);

const fetcher = createHttpFetcher({ insecureTls: config.crawl.insecureTls });

const { status, stats } = await runHarvest({ config, fetcher });

console.log(
  `Harvest ${status}. Hutbes added: ${stats.hutbes.added} (catalog: ${stats.hutbes.catalogSize}). ` +
    `Prayers downloaded: ${stats.prayers.downloaded}.`
);
// Machine-readable summary for the job runner's log.
console.log(JSON.stringify({ kind: 'harvest', status, ...stats }));

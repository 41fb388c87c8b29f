import fs from 'node:fs';
import path from 'node:path';

import type { Language } from './types.js';

export const PDF_DIR = 'pdfs';
export const PRAYERS_DIR = 'prayers';

export interface StoragePaths {
  hutbesCatalog: string;
  prayersCatalog: string;
  pdfRoot: string;
}

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function storagePaths(root: string): StoragePaths {
  return {
    hutbesCatalog: path.join(root, 'hutbes.json'),
    prayersCatalog: path.join(root, 'prayers.json'),
    pdfRoot: path.join(root, PDF_DIR),
  };
}

export function hutbePdfPath(pdfRoot: string, language: Language, year: number, filename: string): string {
  return path.join(pdfRoot, language, String(year), filename);
}

export function prayerPdfPath(pdfRoot: string, filename: string): string {
  return path.join(pdfRoot, PRAYERS_DIR, filename);
}

// Directory segments go in as-is; only the filename is percent-encoded.
export function publicPdfUrl(baseUrl: string, dirs: ReadonlyArray<string | number>, filename: string): string {
  return [baseUrl, PDF_DIR, ...dirs.map(String), encodeURIComponent(filename)].join('/');
}

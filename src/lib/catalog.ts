import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { errorMessage } from './errors.js';
import { ensureDir } from './storage.js';

// Elements written by hand or by older runs are kept verbatim, whatever their shape.
export type CatalogItem = unknown;

const StoredCatalogSchema = z.array(z.unknown());

/**
 * Reads a JSON array catalog. Missing files, unreadable files and anything that
 * is not a JSON array load as an empty catalog.
 */
export function loadCatalog(filePath: string): CatalogItem[] {
  if (!fs.existsSync(filePath)) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    console.warn(`Catalog at ${filePath} is unreadable, starting empty: ${errorMessage(e)}`);
    return [];
  }

  const parsed = StoredCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`Catalog at ${filePath} is not a JSON array, starting empty.`);
    return [];
  }
  return parsed.data;
}

// Direct overwrite; an interrupted write leaves a truncated file that the next
// load treats as empty.
export function saveCatalog(items: readonly CatalogItem[], filePath: string): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(items, null, 2), 'utf8');
}

function stringField(item: CatalogItem, key: 'id' | 'source_pdf_url'): string | null {
  if (typeof item !== 'object' || item === null || !(key in item)) return null;
  const v: unknown = Reflect.get(item, key);
  return typeof v === 'string' ? v : null;
}

export class KnownIndex {
  readonly ids = new Set<string>();
  readonly urls = new Set<string>();

  static fromCatalog(items: readonly CatalogItem[]): KnownIndex {
    const index = new KnownIndex();
    for (const item of items) {
      const id = stringField(item, 'id');
      const url = stringField(item, 'source_pdf_url');
      if (id) index.ids.add(id);
      if (url) index.urls.add(url);
    }
    return index;
  }

  // The URL check is redundant while ids derive from URLs; it still catches
  // hand-edited entries whose id was changed.
  has(id: string, sourceUrl: string): boolean {
    return this.ids.has(id) || this.urls.has(sourceUrl);
  }

  add(id: string, sourceUrl: string): void {
    this.ids.add(id);
    this.urls.add(sourceUrl);
  }
}

import crypto from 'node:crypto';
import path from 'node:path';

const ID_LENGTH = 16;
export const SLUG_FALLBACK = 'hutbe';

const TURKISH_MAP: Record<string, string> = {
  ı: 'i', İ: 'i', ğ: 'g', Ğ: 'g', ü: 'u', Ü: 'u',
  ş: 's', Ş: 's', ö: 'o', Ö: 'o', ç: 'c', Ç: 'c',
};

// Content address over the exact URL string. Percent-encoding variants of the
// same resource hash differently.
export function deriveId(sourceUrl: string): string {
  return crypto.createHash('sha1').update(sourceUrl, 'utf8').digest('hex').slice(0, ID_LENGTH);
}

// Decodes every %XX run as UTF-8 bytes; invalid sequences become U+FFFD and a
// stray `%` stays as-is.
export function safeDecode(text: string): string {
  return text.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}

export function slugify(text: string): string {
  let s = safeDecode(text).trim();
  s = s.replace(/[ıİğĞüÜşŞöÖçÇ]/g, (ch) => TURKISH_MAP[ch] ?? ch);
  s = s.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');
  s = s.replace(/[^A-Za-z0-9]+/g, '-').replace(/^-+|-+$/g, '').toLowerCase();
  return s || SLUG_FALLBACK;
}

// Last path segment of a URL, percent-decoded, extension stripped.
export function remoteStem(sourceUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(sourceUrl).pathname;
  } catch {
    pathname = sourceUrl.split(/[?#]/)[0] ?? '';
  }
  const base = path.posix.basename(safeDecode(pathname));
  const ext = path.posix.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

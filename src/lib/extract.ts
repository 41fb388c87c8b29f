import path from 'node:path';
import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

import { ExtractError } from './errors.js';
import { remoteStem } from './ids.js';
import { BASE_SITE } from './sources.js';
import type { Candidate, IsoDate } from './types.js';

const DATE_RE = /\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/;
const MIN_TITLE_LENGTH = 3;

function isPdfHref(href: string): boolean {
  return href.trim().toLowerCase().endsWith('.pdf');
}

// Text nodes trimmed and joined by single spaces, so cell boundaries survive.
export function flattenText(nodes: AnyNode[], out: string[] = []): string {
  for (const node of nodes) {
    if (isText(node)) {
      const t = node.data.trim();
      if (t) out.push(t);
    } else if (hasChildren(node)) {
      flattenText(node.children, out);
    }
  }
  return out.join(' ');
}

/**
 * Resolves a listing href against the site root. The href's own encoding is
 * kept byte for byte: candidate ids hash the resulting string.
 */
export function resolveSiteUrl(href: string, base = BASE_SITE): string {
  const h = href.trim();
  if (/^[a-z][a-z0-9+.-]*:/i.test(h)) return h;
  if (h.startsWith('//')) return `${new URL(base).protocol}${h}`;

  const rel = h.startsWith('/') ? h : `/${h}`;
  const cut = rel.search(/[?#]/);
  const pathPart = cut === -1 ? rel : rel.slice(0, cut);
  const rest = cut === -1 ? '' : rel.slice(cut);
  const normalized = /(^|\/)\.\.?(\/|$)/.test(pathPart) ? path.posix.normalize(pathPart) : pathPart;
  return `${base.replace(/\/+$/, '')}${normalized}${rest}`;
}

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1] ?? 0;
}

/** First DD.MM.YYYY in the text as an ISO date, null when there is none. */
export function findDate(text: string, pageUrl: string): IsoDate | null {
  const m = text.match(DATE_RE);
  if (!m) return null;

  const [raw, dd, mm, yyyy] = m;
  const day = Number(dd);
  const month = Number(mm);
  const year = Number(yyyy);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new ExtractError(pageUrl, `Invalid date "${raw}" on ${pageUrl}`);
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function titleFor(anchorText: string, sourcePdfUrl: string): string {
  if (anchorText.length < MIN_TITLE_LENGTH) return remoteStem(sourcePdfUrl);
  return anchorText;
}

/**
 * Pulls PDF candidates out of one listing page.
 *
 * Table rows are read first: the first PDF link in a row is the document and the
 * row text carries its date. Pages without such rows fall back to every PDF link
 * on the page, undated.
 */
export function extractCandidates(html: string, pageUrl: string): Candidate[] {
  const $ = cheerio.load(html);
  const candidates: Candidate[] = [];

  for (const row of $('tr').toArray()) {
    const anchor = $(row)
      .find('a[href]')
      .toArray()
      .find((a) => isPdfHref($(a).attr('href') ?? ''));
    if (!anchor) continue;

    const sourcePdfUrl = resolveSiteUrl($(anchor).attr('href') ?? '');
    candidates.push({
      sourcePdfUrl,
      title: titleFor(flattenText([anchor]), sourcePdfUrl),
      date: findDate(flattenText([row]), pageUrl),
      foundOnPage: pageUrl,
    });
  }

  if (candidates.length > 0) return candidates;

  for (const anchor of $('a[href]').toArray()) {
    const href = $(anchor).attr('href') ?? '';
    if (!isPdfHref(href)) continue;

    const sourcePdfUrl = resolveSiteUrl(href);
    candidates.push({
      sourcePdfUrl,
      title: titleFor(flattenText([anchor]), sourcePdfUrl),
      date: null,
      foundOnPage: pageUrl,
    });
  }

  return candidates;
}

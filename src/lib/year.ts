import { remoteStem } from './ids.js';
import type { Candidate } from './types.js';

const YEAR_RE = /(20\d{2})/;

export function resolveYear(candidate: Pick<Candidate, 'date' | 'sourcePdfUrl'>, now = new Date()): number {
  if (candidate.date) return Number(candidate.date.slice(0, 4));

  const m = remoteStem(candidate.sourcePdfUrl).match(YEAR_RE);
  if (m?.[1]) return Number(m[1]);

  return now.getUTCFullYear();
}

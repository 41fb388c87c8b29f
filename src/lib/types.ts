export type IsoDate = string; // YYYY-MM-DD

export const LANGUAGES = ['tr', 'de', 'en', 'fr', 'ru', 'ar', 'it', 'es'] as const;
export type Language = (typeof LANGUAGES)[number];

export interface HarvestConfig {
  pages: {
    githubUsername: string;
    githubRepo: string;
    baseUrl: string; // public hosting base, no trailing slash
  };
  crawl: {
    startPage: number;
    maxPages: number; // last page number visited, inclusive
    timeoutMs: number;
    languages: Language[];
    insecureTls: boolean;
  };
  storage: {
    root: string;
  };
}

export interface HutbeEntry {
  id: string;
  title: string;
  date: IsoDate;
  year: number;
  language: Language;
  filename: string;
  source_pdf_url: string;
  pdf_url: string;
}

export interface PrayerEntry {
  id: string;
  title: string;
  filename: string;
  pdf_url: string;
  source_url: string;
}

export interface Candidate {
  sourcePdfUrl: string;
  title: string;
  date: IsoDate | null;
  foundOnPage: string;
}

import type { Language } from './types.js';

export const BASE_SITE = 'https://dinhizmetleri.diyanet.gov.tr';

const HUTBE_SECTION = `${BASE_SITE}/kategoriler/yayinlarimiz/hutbeler`;

export const SECTION_URLS: Record<Language, string> = {
  tr: `${HUTBE_SECTION}/türkçe`,
  de: `${HUTBE_SECTION}/deutsche-(almanca)`,
  en: `${HUTBE_SECTION}/english-(ingilizce)`,
  fr: `${HUTBE_SECTION}/français-(fransızca)`,
  ru: `${HUTBE_SECTION}/русский-(rusça)`,
  ar: `${HUTBE_SECTION}/عربي-(arapça)`,
  it: `${HUTBE_SECTION}/italiano-(italyanca)`,
  es: `${HUTBE_SECTION}/espanol-(ispanyolca)`,
};

export interface PrayerSource {
  key: string;
  title: string;
  url: string;
}

export const PRAYER_SOURCES: readonly PrayerSource[] = [
  {
    key: 'friday_prayer',
    title: 'Friday Khutbah Prayers',
    url: `${BASE_SITE}/HutbeDualari/Cuma%20Hutbesi%20Dualar%C4%B1.pdf`,
  },
  {
    key: 'eid_prayer',
    title: 'Eid Khutbah Prayers',
    url: `${BASE_SITE}/HutbeDualari/Bayram%20Hutbesi%20Dualar%C4%B1.pdf`,
  },
];

export function listingPageUrl(language: Language, page: number): string {
  return `${SECTION_URLS[language]}?page=${page}`;
}

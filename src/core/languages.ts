import type { LanguageKey } from "./types.js";

export interface LanguageProfile {
  /** Canonical name, e.g. "german". */
  name: string;
  /** BCP 47 tag for Intl APIs. */
  locale: string;
  /** ISO 639-3 code, used to pick the curated stopword list. */
  iso3: string;
}

export const DEFAULT_LANGUAGE: LanguageKey = "german";

const PROFILES: LanguageProfile[] = [
  { name: "german", locale: "de", iso3: "deu" },
  { name: "english", locale: "en", iso3: "eng" },
  { name: "french", locale: "fr", iso3: "fra" },
  { name: "spanish", locale: "es", iso3: "spa" },
  { name: "italian", locale: "it", iso3: "ita" },
  { name: "dutch", locale: "nl", iso3: "nld" },
  { name: "portuguese", locale: "pt", iso3: "por" },
  { name: "swedish", locale: "sv", iso3: "swe" },
  { name: "danish", locale: "da", iso3: "dan" },
  { name: "finnish", locale: "fi", iso3: "fin" },
  { name: "russian", locale: "ru", iso3: "rus" },
  { name: "polish", locale: "pl", iso3: "pol" },
];

const BY_KEY = new Map<string, LanguageProfile>();
for (const p of PROFILES) {
  BY_KEY.set(p.name, p);
  BY_KEY.set(p.locale, p);
  BY_KEY.set(p.iso3, p);
}

export function normalizeLanguageKey(language: LanguageKey): string {
  return language.trim().toLowerCase();
}

/** Accepts "german", "de", "deu", "DE-at" (region dropped). Unknown keys give undefined. */
export function resolveLanguage(language: LanguageKey): LanguageProfile | undefined {
  const key = normalizeLanguageKey(language);
  return BY_KEY.get(key) ?? BY_KEY.get(key.split(/[-_]/)[0] ?? key);
}

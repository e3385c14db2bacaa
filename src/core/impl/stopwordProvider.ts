import { dan, deu, eng, fin, fra, ita, nld, pol, por, rus, spa, swe } from "stopword";

import type { LanguageKey, Term } from "../types.js";
import type { ResourceLoader } from "../resources.js";
import { type Logger, type Outcome, ResourceUnavailableError } from "../diagnostics.js";
import { resolveLanguage } from "../languages.js";

/** High-frequency German function words, used when no curated list can be loaded. */
export const FALLBACK_STOPWORDS: ReadonlySet<Term> = new Set([
  "der",
  "die",
  "das",
  "und",
  "oder",
  "in",
  "zu",
  "ein",
  "eine",
  "ist",
  "mit",
  "von",
]);

const CURATED: Record<string, readonly string[]> = {
  dan,
  deu,
  eng,
  fin,
  fra,
  ita,
  nld,
  pol,
  por,
  rus,
  spa,
  swe,
};

export function loadCuratedStopwords(language: LanguageKey): ReadonlySet<Term> {
  const profile = resolveLanguage(language);
  const list = profile ? CURATED[profile.iso3] : undefined;
  if (!list) {
    throw new ResourceUnavailableError("stopword list", language, "no curated list for this language");
  }
  return new Set(list.map((w) => w.toLowerCase()));
}

export interface StopwordProvider {
  stopwords(language: LanguageKey): Outcome<ReadonlySet<Term>>;
}

export class CuratedStopwordProvider implements StopwordProvider {
  constructor(
    private readonly lists: ResourceLoader<ReadonlySet<Term>>,
    private readonly logger: Logger = console,
  ) {}

  stopwords(language: LanguageKey): Outcome<ReadonlySet<Term>> {
    try {
      return { result: this.lists.getOrLoad(language), diagnostics: [] };
    } catch (e) {
      if (!(e instanceof ResourceUnavailableError)) throw e;
      const message = `${e.message}; using the built-in fallback set`;
      this.logger.warn(`[Stopwords] ${message}`);
      return {
        result: FALLBACK_STOPWORDS,
        diagnostics: [{ code: "RESOURCE_UNAVAILABLE", source: "stopwords", message, language }],
      };
    }
  }
}

import type { LanguageKey } from "./types.js";

/**
 * Per-language resource source (word segmenters, stopword lists).
 *
 * Contract notes:
 * - `getOrLoad` loads a known language at most once per loader, whichever alias names it;
 *   later calls see the same value
 * - failures are raised as `ResourceUnavailableError`, and are remembered too
 */
export interface ResourceLoader<T> {
  getOrLoad(language: LanguageKey): T;
}

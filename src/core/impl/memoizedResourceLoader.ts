import type { LanguageKey } from "../types.js";
import type { ResourceLoader } from "../resources.js";
import { ResourceUnavailableError, errorMessage } from "../diagnostics.js";
import { normalizeLanguageKey, resolveLanguage } from "../languages.js";

type Entry<T> = { ok: true; value: T } | { ok: false; error: ResourceUnavailableError };

/**
 * Memoizing loader keyed by resolved language, so "german", "de", "deu" and "de-AT" share
 * one entry. Keys that resolve to no known language are loaded on every call and never
 * stored; the cache holds at most one entry per known language.
 *
 * Loads are synchronous, so the first caller for a language completes the load before any
 * other caller can observe the cache; both outcomes are stored and replayed.
 */
export class MemoizedResourceLoader<T> implements ResourceLoader<T> {
  private readonly cache = new Map<string, Entry<T>>();

  constructor(
    private readonly resource: string,
    private readonly load: (language: LanguageKey) => T,
  ) {}

  getOrLoad(language: LanguageKey): T {
    const name = resolveLanguage(language)?.name;
    if (name === undefined) return unwrap(this.tryLoad(normalizeLanguageKey(language)));

    let entry = this.cache.get(name);
    if (!entry) {
      entry = this.tryLoad(name);
      this.cache.set(name, entry);
    }
    return unwrap(entry);
  }

  private tryLoad(key: string): Entry<T> {
    try {
      return { ok: true, value: this.load(key) };
    } catch (e) {
      const error =
        e instanceof ResourceUnavailableError
          ? e
          : new ResourceUnavailableError(this.resource, key, errorMessage(e), { cause: e });
      return { ok: false, error };
    }
  }
}

function unwrap<T>(entry: Entry<T>): T {
  if (!entry.ok) throw entry.error;
  return entry.value;
}

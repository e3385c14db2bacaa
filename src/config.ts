/**
 * Service configuration, read once from the environment.
 */

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.floor(n);
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) return fallback;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    port: parsePositiveInt(env.PORT, 3000),

    // analysis defaults, overridable per request
    language: env.ANALYSIS_LANGUAGE?.trim() || "german",
    topN: parsePositiveInt(env.ANALYSIS_TOP_N, 10),
    keywords: parseList(env.ANALYSIS_KEYWORDS, ["content", "marketing", "seo"]),

    // request limits
    maxDocuments: parsePositiveInt(env.MAX_DOCUMENTS, 1000),
    maxTextLength: parsePositiveInt(env.MAX_TEXT_LENGTH, 10 * 1024 * 1024),
    maxBodyBytes: parsePositiveInt(env.MAX_BODY_BYTES, 10 * 1024 * 1024),
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();

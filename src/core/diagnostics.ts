import type { LanguageKey } from "./types.js";

export type DiagnosticCode = "RESOURCE_UNAVAILABLE" | "DEGENERATE_INPUT" | "COMPUTATION_FAILED";

/** Non-fatal problem reported next to a result instead of being thrown. */
export interface Diagnostic {
  code: DiagnosticCode;
  /** Component that produced it, e.g. "tokenizer" or "readability". */
  source: string;
  message: string;
  language?: LanguageKey;
}

/** Every scorer returns a usable result, possibly a default one, plus what went wrong on the way. */
export interface Outcome<T> {
  result: T;
  diagnostics: Diagnostic[];
}

export interface Logger {
  warn(message: string): void;
  error(message: string): void;
}

export class ResourceUnavailableError extends Error {
  readonly code = "RESOURCE_UNAVAILABLE";

  constructor(
    readonly resource: string,
    readonly language: LanguageKey,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${resource} unavailable for language "${language}": ${detail}`, options);
    this.name = "ResourceUnavailableError";
  }
}

/** Raised for calls that cannot be answered at all (wrong argument types). */
export class InvalidArgumentError extends Error {
  readonly code = "INVALID_ARGUMENT";

  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "InvalidArgumentError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function assertText(value: unknown, path: string): asserts value is string {
  if (typeof value !== "string") throw new InvalidArgumentError(path, "must be a string");
}

import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

export interface StringRule {
  /** Rejects strings that are empty after trimming. */
  nonEmpty?: boolean;
  maxLength?: number;
}

/** Reads a string field; records a field error at `path` and returns undefined when it does not fit. */
export function readString(v: unknown, path: string, errors: FieldError[], rule: StringRule = {}): string | undefined {
  if (typeof v !== "string" || (rule.nonEmpty && !v.trim())) {
    pushErr(errors, path, rule.nonEmpty ? "must be a non-empty string" : "must be a string");
    return undefined;
  }
  if (rule.maxLength !== undefined && v.length > rule.maxLength) {
    pushErr(errors, path, "too long");
    return undefined;
  }
  return v;
}

export function readInt(v: unknown, path: string, errors: FieldError[], min: number, max = Infinity): number | undefined {
  if (typeof v === "number" && Number.isInteger(v) && v >= min && v <= max) return v;
  if (max !== Infinity) pushErr(errors, path, `must be between ${min} and ${max}`);
  else pushErr(errors, path, min === 0 ? "must be a non-negative integer" : `must be an integer of at least ${min}`);
  return undefined;
}

export function readStringArray(v: unknown, path: string, errors: FieldError[]): string[] | undefined {
  if (Array.isArray(v) && v.every((x): x is string => typeof x === "string")) return v;
  pushErr(errors, path, "must be an array of strings");
  return undefined;
}

import type { FieldError } from "./problem.js";

export const LIMITS = {
  wordLength: 256,
  batchSize: 1000,
  textLength: 200_000,
  count: 1000,
  pageSize: 1000,
} as const;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asBoolean(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** Word checks shared by body items and query parameters. Returns an error message or undefined. */
export function checkWord(v: unknown): string | undefined {
  if (typeof v !== "string") return "must be a string";
  if (v.length > LIMITS.wordLength) return `must be at most ${LIMITS.wordLength} characters`;
  return undefined;
}

/** Query parameter as integer; undefined when absent, NaN when not an integer. */
export function intParam(params: URLSearchParams, name: string): number | undefined {
  const raw = params.get(name);
  if (raw === null) return undefined;
  return /^-?\d+$/.test(raw) ? Number(raw) : Number.NaN;
}

/** Query parameter as boolean; undefined when absent or not "true"/"false". */
export function boolParam(params: URLSearchParams, name: string): boolean | undefined {
  const raw = params.get(name);
  if (raw === "true") return true;
  if (raw === "false") return false;
  return undefined;
}

import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Integers outside the safe range are rejected since they cannot be counted exactly. */
export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) ? v : undefined;
}

/** Parses a decimal integer query parameter; anything else (including "1.5", "") is undefined. */
export function parseIntParam(v: string | null): number | undefined {
  if (v === null || !/^-?\d+$/.test(v)) return undefined;
  return Number(v);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

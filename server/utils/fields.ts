import { isIsoDate } from "@shared/interest";
import { ValidationError } from "./http-error";

export function ensureNumber(value: unknown) {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return NaN;
}

/** Blank or missing form values fall back to `fallback`; anything else must be a finite number. */
export function optionalNumber(value: unknown, fallback: number, field: string) {
  if (value == null || (typeof value === "string" && value.trim() === "")) {
    return fallback;
  }
  const parsed = ensureNumber(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Invalid ${field}`);
  }
  return parsed;
}

export function text(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

export function optionalText(value: unknown): string | undefined {
  const result = text(value);
  return result ? result : undefined;
}

export function optionalDate(value: unknown, field: string): string | undefined {
  const raw = text(value);
  if (!raw) return undefined;
  if (!isIsoDate(raw)) {
    throw new ValidationError(`Invalid ${field}`);
  }
  return raw;
}

export function oneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

import { Result, err, errorMessage, ok } from "../errors";

// Field-level readers for JSON that arrives from gh or from disk. Each returns
// null on a shape mismatch instead of coercing.

export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown): JsonRecord | null {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  const record: JsonRecord = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = entry;
  }
  return record;
}

export function asArray(value: unknown): unknown[] | null {
  return Array.isArray(value) ? value : null;
}

export function getString(record: JsonRecord, key: string): string | null {
  const value = record[key];
  return typeof value === "string" ? value : null;
}

export function getBoolean(record: JsonRecord, key: string): boolean | null {
  const value = record[key];
  return typeof value === "boolean" ? value : null;
}

export function getInteger(record: JsonRecord, key: string): number | null {
  const value = record[key];
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

export function getRecord(record: JsonRecord, key: string): JsonRecord | null {
  return asRecord(record[key]);
}

export function getArray(record: JsonRecord, key: string): unknown[] | null {
  return asArray(record[key]);
}

export function parseJson(text: string): Result<unknown, string> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(errorMessage(error));
  }
}

export function isFullSha(value: string): boolean {
  return /^[0-9a-fA-F]{40}$/.test(value);
}

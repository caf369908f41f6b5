export type JsonRecord = Record<string, unknown>;

export function asRecord(value: unknown, label: string): JsonRecord {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function requireString(record: JsonRecord, key: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new Error(`${key} must be a string`);
  }
  return value;
}

export function requireNumber(record: JsonRecord, key: string): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${key} must be an integer`);
  }
  return value;
}

export function requireArray(record: JsonRecord, key: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw new Error(`${key} must be an array`);
  }
  return value;
}

export function requireOneOf<const T extends readonly string[]>(record: JsonRecord, key: string, allowed: T): T[number] {
  const value = record[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${key} must be one of ${allowed.join(", ")}`);
  }
  return match;
}

// packages/core/src/json.ts
// Narrowing helpers for values that come out of JSON.parse / YAML.parse.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function asOptionalString(value: unknown): string | undefined {
  const s = asString(value);
  return s ? s : undefined;
}

export function asNumber(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isFinite(n) ? n : fallback;
}

export function asStringList(value: unknown): string[] {
  if (typeof value === 'string') return value ? [value] : [];
  return asArray(value)
    .map((entry) => asString(entry).trim())
    .filter(Boolean);
}

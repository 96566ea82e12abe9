/**
 * Narrowing helpers for untyped JSON read from backup files.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a string field; numbers are stringified (Xray ids are often numeric). */
export function readId(obj: JsonObject, field: string): string | null {
  const value = obj[field];
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function readString(obj: JsonObject, field: string): string | null {
  const value = obj[field];
  return typeof value === 'string' ? value : null;
}

export function readNumber(obj: JsonObject, field: string): number | null {
  const value = obj[field];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Read an array of ids. Returns null when the field is present but not an
 * array, an empty array when it is absent.
 */
export function readIdList(obj: JsonObject, field: string): string[] | null {
  const value = obj[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return null;

  const ids: string[] = [];
  for (const item of value) {
    if (typeof item === 'string' && item.trim() !== '') {
      ids.push(item.trim());
    } else if (typeof item === 'number' && Number.isFinite(item)) {
      ids.push(String(item));
    }
  }
  return ids;
}

/** Xray stores flags such as `cucumber` as strings; any non-empty value counts. */
export function isTruthyField(obj: JsonObject, field: string): boolean {
  const value = obj[field];
  if (typeof value === 'string') return value.trim() !== '';
  return Boolean(value);
}

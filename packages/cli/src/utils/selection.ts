/**
 * Parsing and application of CLI record selection options.
 */

import type { RecordStore, TestRecord } from '@testbridge/core';

export interface RecordSelection {
  /** Inclusive index range over the loaded records */
  range?: [number, number];

  /** Case-insensitive keyword over summary and description */
  keyword?: string;

  /** Record ids or source keys to pick explicitly */
  refs?: string[];

  /** Include non-test records (preconditions, plans, sets) */
  allKinds?: boolean;
}

export interface SelectionResult {
  records: TestRecord[];

  /** Explicit refs that matched no record */
  unknownRefs: string[];
}

/** commander option parser for repeatable, comma-separated lists */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map((v) => v.trim()).filter(Boolean)];
}

/** Parse "start:end" (inclusive). Either side may be omitted. */
export function parseRange(value: string): [number, number] | null {
  const match = /^\s*(\d*)\s*:\s*(\d*)\s*$/.exec(value);
  if (!match) return null;
  const start = match[1] === '' ? 0 : parseInt(match[1], 10);
  const end = match[2] === '' ? Number.MAX_SAFE_INTEGER : parseInt(match[2], 10);
  if (end < start) return null;
  return [start, end];
}

/** Parse "REF=KEY" pairs. Returns the pairs and any entries that did not parse. */
export function parseKeyAssignments(values: readonly string[]): {
  assignments: Array<[string, string]>;
  invalid: string[];
} {
  const assignments: Array<[string, string]> = [];
  const invalid: string[] = [];
  for (const value of values) {
    const eq = value.indexOf('=');
    const ref = eq > 0 ? value.slice(0, eq).trim() : '';
    const key = eq > 0 ? value.slice(eq + 1).trim() : '';
    if (!ref || !key) {
      invalid.push(value);
      continue;
    }
    assignments.push([ref, key]);
  }
  return { assignments, invalid };
}

/** Parse repeated --key options, passing a warning for each one that does not parse */
export function readKeyOptions(
  values: readonly string[],
  warn: (message: string) => void
): Array<[string, string]> {
  const { assignments, invalid } = parseKeyAssignments(values);
  for (const value of invalid) {
    warn(`Ignoring --key "${value}" (expected ref=KEY)`);
  }
  return assignments;
}

/** Find a record by id first, then by source key */
export function findRecord(store: RecordStore, ref: string): TestRecord | undefined {
  return store.get(ref) ?? store.byKey(ref);
}

/**
 * Apply a selection to the store. Filters narrow in order: range, keyword,
 * explicit refs. Explicit refs keep the order they were given in;
 * otherwise load order is kept.
 */
export function selectRecords(store: RecordStore, selection: RecordSelection): SelectionResult {
  let records = selection.range
    ? store.byIndexRange(selection.range[0], selection.range[1])
    : store.all();

  if (selection.keyword) {
    const matching = new Set(store.search(selection.keyword).map((r) => r.id));
    records = records.filter((r) => matching.has(r.id));
  }

  if (!selection.allKinds) {
    records = records.filter((r) => r.kind === 'test');
  }

  const unknownRefs: string[] = [];
  if (selection.refs && selection.refs.length > 0) {
    const candidates = new Set(records.map((r) => r.id));
    const picked: TestRecord[] = [];
    for (const ref of selection.refs) {
      const record = findRecord(store, ref);
      if (record && candidates.has(record.id)) {
        picked.push(record);
      } else {
        unknownRefs.push(ref);
      }
    }
    records = picked;
  }

  return { records, unknownRefs };
}

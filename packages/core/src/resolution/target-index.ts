/**
 * Read-only snapshot of the issues already present on the target instance.
 *
 * The snapshot is fetched by the caller (JQL search against the target
 * Jira) and handed in once per session. The index never re-fetches; a
 * stale snapshot is the caller's concern.
 */

import * as fs from 'node:fs';
import type { TargetAttachment, TargetIssue } from './types.js';
import { normalizeKey, normalizeSummary } from './normalize.js';
import { isJsonObject } from '../records/json.js';

export class TargetIndex {
  private readonly byKey: ReadonlyMap<string, TargetIssue>;
  private readonly bySummary: ReadonlyMap<string, readonly TargetIssue[]>;

  private constructor(issues: readonly TargetIssue[]) {
    const byKey = new Map<string, TargetIssue>();
    const bySummary = new Map<string, TargetIssue[]>();

    for (const issue of issues) {
      const key = normalizeKey(issue.key);
      if (byKey.has(key)) continue;
      const frozen: TargetIssue = Object.freeze({
        key,
        summary: issue.summary,
        attachments: Object.freeze([...issue.attachments]),
      });
      byKey.set(key, frozen);

      const summaryKey = normalizeSummary(issue.summary);
      if (!summaryKey) continue;
      const bucket = bySummary.get(summaryKey);
      if (bucket) {
        bucket.push(frozen);
      } else {
        bySummary.set(summaryKey, [frozen]);
      }
    }

    this.byKey = byKey;
    this.bySummary = bySummary;
  }

  static fromIssues(issues: readonly TargetIssue[]): TargetIndex {
    return new TargetIndex(issues);
  }

  static empty(): TargetIndex {
    return new TargetIndex([]);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(key: string): boolean {
    return this.byKey.has(normalizeKey(key));
  }

  get(key: string): TargetIssue | undefined {
    return this.byKey.get(normalizeKey(key));
  }

  /** Issues whose normalized summary equals the given one, in snapshot order */
  findBySummary(summary: string): readonly TargetIssue[] {
    return this.bySummary.get(normalizeSummary(summary)) ?? [];
  }

  /** Attachments known for a key; empty for unknown keys */
  attachmentsFor(key: string): readonly TargetAttachment[] {
    return this.byKey.get(normalizeKey(key))?.attachments ?? [];
  }
}

/** Problem found in a target snapshot file */
export interface TargetSnapshotError {
  /** Index of the offending issue, null for the whole file */
  index: number | null;
  message: string;
}

export type TargetSnapshotResult =
  | { success: true; index: TargetIndex }
  | { success: false; errors: TargetSnapshotError[] };

/**
 * Parse a target snapshot: a JSON array of issues, or an object with an
 * `issues` array. Each issue needs a `key` and a `summary`; `attachments`
 * is an optional list of `{ filename, size }`.
 */
export function parseTargetSnapshot(content: string): TargetSnapshotResult {
  let doc: unknown;
  try {
    doc = JSON.parse(content);
  } catch (err) {
    return { success: false, errors: [{ index: null, message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` }] };
  }

  const list = Array.isArray(doc) ? doc : isJsonObject(doc) ? doc['issues'] : undefined;
  if (!Array.isArray(list)) {
    return {
      success: false,
      errors: [{ index: null, message: 'Snapshot must be an array of issues or an object with an "issues" array' }],
    };
  }

  const errors: TargetSnapshotError[] = [];
  const issues: TargetIssue[] = [];

  list.forEach((item: unknown, index) => {
    if (!isJsonObject(item)) {
      errors.push({ index, message: 'Issue is not an object' });
      return;
    }
    const key = item['key'];
    const summary = item['summary'];
    if (typeof key !== 'string' || key.trim() === '') {
      errors.push({ index, message: 'Issue has no key' });
      return;
    }
    if (typeof summary !== 'string') {
      errors.push({ index, message: `Issue ${key} has no summary` });
      return;
    }

    const attachments: TargetAttachment[] = [];
    const rawAttachments = item['attachments'];
    if (Array.isArray(rawAttachments)) {
      for (const att of rawAttachments) {
        if (!isJsonObject(att)) continue;
        const filename = att['filename'];
        const size = att['size'];
        if (typeof filename === 'string') {
          attachments.push({ filename, size: typeof size === 'number' ? size : 0 });
        }
      }
    }

    issues.push({ key, summary, attachments });
  });

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, index: TargetIndex.fromIssues(issues) };
}

export function loadTargetSnapshot(filePath: string): TargetSnapshotResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      errors: [{ index: null, message: `Failed to read snapshot: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }
  return parseTargetSnapshot(content);
}

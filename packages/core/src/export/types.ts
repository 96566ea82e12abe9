/**
 * Types for export planning.
 *
 * Payloads follow the Xray Cloud bulk test import format
 * (POST /api/v2/import/test/bulk): one object per test, `steps` as an
 * ordered array, `update_key` for existing issues and `fields.project`
 * for issues to be created.
 */

import type { TestRecord, TestType } from '../records/types.js';
import type { AttachmentDiff } from '../attachments/types.js';

/** Target value of an entry that creates a new issue */
export const NEW_ISSUE_SENTINEL = 'new';

export interface PayloadStep {
  action: string;
  data: string;
  result: string;
}

export interface PayloadFields {
  summary: string;
  description?: string;
  project: { key: string };
}

/** One test in the bulk import request */
export interface ExportPayload {
  testtype: TestType;
  update_key?: string;
  fields: PayloadFields;
  steps: PayloadStep[];
  xray_preconditions?: string[];
  xray_test_sets?: string[];
}

export type ExportAction = 'update' | 'create';

export interface ExportEntry {
  /** Resolved key, or `new:<recordId>` for records to be created */
  entryKey: string;

  /** Resolved key, or NEW_ISSUE_SENTINEL */
  target: string;

  action: ExportAction;

  recordId: string;

  /** Whether the resolved key still awaits an existence check */
  unverified: boolean;

  payload: ExportPayload;

  attachments: AttachmentDiff;

  /** Non-fatal notes, e.g. links that fell back to source keys */
  warnings: string[];
}

/** Ordered batch of entries ready for upload */
export interface ExportBatch {
  entries: readonly ExportEntry[];
  byEntryKey: ReadonlyMap<string, ExportEntry>;
}

export type SkipReason =
  | 'Unresolved'
  | 'MissingRequiredField'
  | 'DuplicateTargetKey'
  | 'NotImportable';

/** A selected record left out of the batch */
export interface SkippedRecord {
  recordId: string;
  reason: SkipReason;
  message: string;
}

export interface PlanResult {
  batch: ExportBatch;
  skipped: SkippedRecord[];
}

/** Lookups the planner needs to turn record links into keys */
export interface RecordLookup {
  get(id: string): TestRecord | undefined;
  setsContaining(recordId: string): TestRecord[];
}

/**
 * Export planner.
 *
 * Turns selected records, their resolution outcomes and attachment diffs
 * into an ordered ExportBatch. Entries keep the selection order and carry
 * no timestamps or random ids, so identical inputs always serialize to
 * identical bytes and an interrupted upload can be re-planned and resumed.
 *
 * Every selected record ends up either in the batch or in the skip list
 * with a reason.
 */

import type { Logger } from 'pino';
import type { TestRecord } from '../records/types.js';
import type { AttachmentDiff } from '../attachments/types.js';
import { dedupeAttachments } from '../attachments/attachment-reconciler.js';
import type { ResolutionOutcome, SettledOutcome } from '../resolution/types.js';
import { isSettled, resolvedKeyOf } from '../resolution/types.js';
import { projectOfKey } from '../resolution/normalize.js';
import type {
  ExportBatch,
  ExportEntry,
  ExportPayload,
  PlanResult,
  RecordLookup,
  SkippedRecord,
} from './types.js';
import { NEW_ISSUE_SENTINEL } from './types.js';

export class ExportPlanner {
  private readonly lookup: RecordLookup;
  private readonly logger: Logger;

  constructor(lookup: RecordLookup, logger: Logger) {
    this.lookup = lookup;
    this.logger = logger.child({ component: 'export-planner' });
  }

  plan(
    selectedRecords: readonly TestRecord[],
    resolutions: ReadonlyMap<string, ResolutionOutcome>,
    attachmentDiffs: ReadonlyMap<string, AttachmentDiff>
  ): PlanResult {
    const entries: ExportEntry[] = [];
    const byEntryKey = new Map<string, ExportEntry>();
    const skipped: SkippedRecord[] = [];
    const seen = new Set<string>();

    for (const record of selectedRecords) {
      // A record selected twice is planned once
      if (seen.has(record.id)) continue;
      seen.add(record.id);

      const skip = this.checkEligibility(record, resolutions.get(record.id));
      if (skip) {
        skipped.push(skip);
        continue;
      }

      const outcome = resolutions.get(record.id);
      if (!outcome || !isSettled(outcome)) continue;

      const entry = this.buildEntry(record, outcome, attachmentDiffs.get(record.id), resolutions);
      const existing = byEntryKey.get(entry.entryKey);
      if (existing) {
        skipped.push({
          recordId: record.id,
          reason: 'DuplicateTargetKey',
          message: `Target key ${entry.target} is already used by record ${existing.recordId} in this batch`,
        });
        continue;
      }

      entries.push(entry);
      byEntryKey.set(entry.entryKey, entry);
    }

    for (const skip of skipped) {
      this.logger.warn({ recordId: skip.recordId, reason: skip.reason }, skip.message);
    }

    this.logger.info(
      {
        selected: selectedRecords.length,
        planned: entries.length,
        creates: entries.filter((e) => e.action === 'create').length,
        skipped: skipped.length,
      },
      'Export batch planned'
    );

    return { batch: { entries, byEntryKey }, skipped };
  }

  private checkEligibility(
    record: TestRecord,
    outcome: ResolutionOutcome | undefined
  ): SkippedRecord | null {
    if (record.kind !== 'test') {
      return {
        recordId: record.id,
        reason: 'NotImportable',
        message: `Record ${record.id} is a ${record.kind}; the bulk import only accepts tests`,
      };
    }

    const missingField = record.flags.find((flag) => flag.code === 'MissingRequiredField');
    if (missingField) {
      return {
        recordId: record.id,
        reason: 'MissingRequiredField',
        message: `${missingField.message}; it cannot be exported`,
      };
    }

    if (!outcome || !isSettled(outcome)) {
      const detail =
        outcome?.state === 'Unresolved' || outcome?.state === 'PendingManual'
          ? outcome.reason
          : 'no resolution decision was made';
      return {
        recordId: record.id,
        reason: 'Unresolved',
        message: `Record ${record.id} has no target key and is not marked for creation (${detail})`,
      };
    }

    return null;
  }

  private buildEntry(
    record: TestRecord,
    outcome: SettledOutcome,
    diff: AttachmentDiff | undefined,
    resolutions: ReadonlyMap<string, ResolutionOutcome>
  ): ExportEntry {
    const warnings: string[] = [];
    const key = resolvedKeyOf(outcome);
    const projectKey =
      outcome.state === 'CreateNew' ? outcome.projectKey : projectOfKey(key ?? '') ?? '';

    const payload: ExportPayload = {
      testtype: record.testType,
      ...(key ? { update_key: key } : {}),
      fields: {
        summary: record.summary,
        ...(record.description ? { description: record.description } : {}),
        project: { key: projectKey },
      },
      steps: record.steps.map((step) => ({
        action: step.action,
        data: step.data,
        result: step.expected,
      })),
    };

    const preconditions = this.linkedKeys(record.preconditionIds, resolutions, 'precondition', warnings);
    if (preconditions.length > 0) {
      payload.xray_preconditions = preconditions;
    }

    const setIds = this.lookup.setsContaining(record.id).map((set) => set.id);
    const testSets = this.linkedKeys(setIds, resolutions, 'test set', warnings);
    if (testSets.length > 0) {
      payload.xray_test_sets = testSets;
    }

    return {
      entryKey: key ?? `${NEW_ISSUE_SENTINEL}:${record.id}`,
      target: key ?? NEW_ISSUE_SENTINEL,
      action: key ? 'update' : 'create',
      recordId: record.id,
      unverified: outcome.state === 'ResolvedUnverified',
      payload,
      attachments: diff ?? fallbackDiff(record, outcome),
      warnings,
    };
  }

  /**
   * Map linked record ids to target keys. A linked record resolved in this
   * session contributes its resolved key; otherwise its source key is used
   * and a warning is noted. Unknown ids are dropped with a warning.
   */
  private linkedKeys(
    ids: readonly string[],
    resolutions: ReadonlyMap<string, ResolutionOutcome>,
    label: string,
    warnings: string[]
  ): string[] {
    const keys: string[] = [];
    for (const id of ids) {
      const resolved = resolutions.get(id);
      const resolvedKey = resolved ? resolvedKeyOf(resolved) : null;
      if (resolvedKey) {
        keys.push(resolvedKey);
        continue;
      }

      const linked = this.lookup.get(id);
      if (linked?.sourceKey) {
        keys.push(linked.sourceKey);
        warnings.push(`${label} ${id} is not resolved on the target; using source key ${linked.sourceKey}`);
      } else {
        warnings.push(`${label} ${id} has no known key and was left out`);
      }
    }
    return [...new Set(keys)];
  }
}

/** Without a diff nothing is known about the target, so everything is missing */
function fallbackDiff(record: TestRecord, outcome: SettledOutcome): AttachmentDiff {
  const unique = dedupeAttachments(record.attachments);
  return {
    recordId: record.id,
    targetKey: resolvedKeyOf(outcome),
    missing: unique,
    present: [],
    duplicatesDropped: record.attachments.length - unique.length,
    uploadTiming: outcome.state === 'CreateNew' ? 'after-create' : 'before-import',
  };
}

/**
 * Attachment reconciler.
 *
 * Compares a record's attachments with what the target issue already
 * holds, by (filename, size). Nothing is transferred here; the diff is
 * handed to the uploader by the caller.
 */

import type { Logger } from 'pino';
import type { AttachmentRef, TestRecord } from '../records/types.js';
import type { ResolutionOutcome } from '../resolution/types.js';
import { resolvedKeyOf } from '../resolution/types.js';
import type { AttachmentDiff, TargetAttachmentIndex } from './types.js';

function identity(filename: string, size: number): string {
  return `${filename}\u0000${size}`;
}

/**
 * Drop refs that repeat an earlier (filename, size) pair, keeping the
 * first occurrence. A step image referenced twice is uploaded once.
 */
export function dedupeAttachments(refs: readonly AttachmentRef[]): AttachmentRef[] {
  const seen = new Set<string>();
  const unique: AttachmentRef[] = [];
  for (const ref of refs) {
    const id = identity(ref.filename, ref.size);
    if (seen.has(id)) continue;
    seen.add(id);
    unique.push(ref);
  }
  return unique;
}

export class AttachmentReconciler {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'attachment-reconciler' });
  }

  /**
   * Compute the attachments a record still needs on the target.
   * Without a resolved key nothing can be assumed present, so every
   * attachment is missing.
   */
  missing(
    record: TestRecord,
    targetIndex: TargetAttachmentIndex,
    resolution: ResolutionOutcome
  ): AttachmentDiff {
    const unique = dedupeAttachments(record.attachments);
    const duplicatesDropped = record.attachments.length - unique.length;
    const targetKey = resolvedKeyOf(resolution);
    const uploadTiming = resolution.state === 'CreateNew' ? 'after-create' : 'before-import';

    if (!targetKey) {
      return {
        recordId: record.id,
        targetKey: null,
        missing: unique,
        present: [],
        duplicatesDropped,
        uploadTiming,
      };
    }

    const known = new Set(
      targetIndex.attachmentsFor(targetKey).map((att) => identity(att.filename, att.size))
    );
    const missing: AttachmentRef[] = [];
    const present: AttachmentRef[] = [];
    for (const ref of unique) {
      if (known.has(identity(ref.filename, ref.size))) {
        present.push(ref);
      } else {
        missing.push(ref);
      }
    }

    this.logger.debug(
      {
        recordId: record.id,
        targetKey,
        missing: missing.length,
        present: present.length,
        duplicatesDropped,
      },
      'Attachments reconciled'
    );

    return { recordId: record.id, targetKey, missing, present, duplicatesDropped, uploadTiming };
  }

  /** Reconcile many records; the result is keyed by record id */
  missingForAll(
    records: readonly TestRecord[],
    targetIndex: TargetAttachmentIndex,
    resolutions: ReadonlyMap<string, ResolutionOutcome>
  ): Map<string, AttachmentDiff> {
    const diffs = new Map<string, AttachmentDiff>();
    for (const record of records) {
      const resolution: ResolutionOutcome = resolutions.get(record.id) ?? {
        state: 'Unresolved',
        reason: 'Not resolved yet',
        candidates: [],
      };
      diffs.set(record.id, this.missing(record, targetIndex, resolution));
    }

    let missingCount = 0;
    for (const diff of diffs.values()) missingCount += diff.missing.length;
    this.logger.info({ records: records.length, missing: missingCount }, 'Attachment reconciliation complete');

    return diffs;
  }
}

/**
 * Serialization and post-upload rewriting of export batches.
 */

import { ATTACHMENT_LINK_SCHEME } from '../records/attachment-links.js';
import type { AttachmentRef } from '../records/types.js';
import type {
  ExportBatch,
  ExportEntry,
  ExportPayload,
  PayloadStep,
  SkippedRecord,
} from './types.js';

/** Request body for the bulk import: the payloads, in batch order */
export function serializeBatch(batch: ExportBatch): string {
  return JSON.stringify(
    batch.entries.map((entry) => entry.payload),
    null,
    2
  );
}

/** Per-record summary of missing attachments, for the uploader */
export interface MissingAttachmentReport {
  recordId: string;
  target: string;
  uploadTiming: string;
  files: Array<Pick<AttachmentRef, 'filename' | 'size' | 'localPath' | 'attachmentId'>>;
}

export function buildMissingAttachmentReport(batch: ExportBatch): MissingAttachmentReport[] {
  return batch.entries
    .filter((entry) => entry.attachments.missing.length > 0)
    .map((entry) => ({
      recordId: entry.recordId,
      target: entry.target,
      uploadTiming: entry.attachments.uploadTiming,
      files: entry.attachments.missing.map((ref) => ({
        filename: ref.filename,
        size: ref.size,
        localPath: ref.localPath,
        attachmentId: ref.attachmentId,
      })),
    }));
}

export function serializeSkipReport(skipped: readonly SkippedRecord[]): string {
  return JSON.stringify(skipped, null, 2);
}

/**
 * Replace source attachment ids in step text with the ids the target
 * returned on upload. Ids without a mapping are left alone. Returns a new
 * batch; the input is not modified.
 */
export function rewriteAttachmentIds(
  batch: ExportBatch,
  uploaded: ReadonlyMap<string, string>
): ExportBatch {
  if (uploaded.size === 0) return batch;

  const rewrite = (text: string): string => {
    let result = text;
    for (const [oldId, newId] of uploaded) {
      result = result
        .split(`${ATTACHMENT_LINK_SCHEME}${oldId}`)
        .join(`${ATTACHMENT_LINK_SCHEME}${newId}`);
    }
    return result;
  };

  const rewriteStep = (step: PayloadStep): PayloadStep => ({
    action: rewrite(step.action),
    data: rewrite(step.data),
    result: rewrite(step.result),
  });

  const entries: ExportEntry[] = batch.entries.map((entry) => {
    const payload: ExportPayload = { ...entry.payload, steps: entry.payload.steps.map(rewriteStep) };
    return { ...entry, payload };
  });

  return {
    entries,
    byEntryKey: new Map(entries.map((entry) => [entry.entryKey, entry])),
  };
}

import type { AttachmentRef } from '../records/types.js';
import type { TargetAttachment } from '../resolution/types.js';

/**
 * When the uploader may send a record's missing attachments.
 *
 * An existing issue can receive attachments before the bulk import runs.
 * A record that will be created has no key until the import returns one,
 * so its attachments can only follow the create.
 */
export type UploadTiming = 'before-import' | 'after-create';

/** Attachment difference between a record and its target issue */
export interface AttachmentDiff {
  recordId: string;

  /** Key the attachments were compared against, null when the record has none */
  targetKey: string | null;

  /** Attachments the target does not hold yet */
  missing: AttachmentRef[];

  /** Attachments already present on the target */
  present: AttachmentRef[];

  /** Number of duplicate (filename, size) refs dropped before comparing */
  duplicatesDropped: number;

  uploadTiming: UploadTiming;
}

/** Source of already-known target attachments, keyed by issue key */
export interface TargetAttachmentIndex {
  attachmentsFor(key: string): readonly TargetAttachment[];
}

export { AttachmentReconciler, dedupeAttachments } from './attachment-reconciler.js';
export type { AttachmentDiff, TargetAttachmentIndex, UploadTiming } from './types.js';

export { ExportPlanner } from './export-planner.js';
export {
  serializeBatch,
  serializeSkipReport,
  buildMissingAttachmentReport,
  rewriteAttachmentIds,
} from './batch-output.js';
export { NEW_ISSUE_SENTINEL } from './types.js';
export type { MissingAttachmentReport } from './batch-output.js';
export type {
  PayloadStep,
  PayloadFields,
  ExportPayload,
  ExportAction,
  ExportEntry,
  ExportBatch,
  SkipReason,
  SkippedRecord,
  PlanResult,
  RecordLookup,
} from './types.js';

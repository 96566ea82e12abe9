// Records module (backup loading and queries)
export {
  RecordStore,
  discoverSourceFiles,
  extractAttachmentIds,
  SOURCE_FILE_PATTERNS,
  ATTACHMENT_LINK_SCHEME,
} from './records/index.js';

export type {
  RecordKind,
  TestType,
  TestStep,
  AttachmentRef,
  RecordFlag,
  TestRecord,
  DatasetColumn,
  Dataset,
  IssueMetadata,
  AttachmentMetadata,
  MalformedInput,
  LoadResult,
  LoadOptions,
} from './records/index.js';

// Resolution module (target key matching)
export {
  KeyResolver,
  ResolutionSession,
  TargetIndex,
  parseTargetSnapshot,
  loadTargetSnapshot,
  normalizeSummary,
  normalizeKey,
  projectOfKey,
  isSettled,
  resolvedKeyOf,
  DEFAULT_KEY_PATTERN,
} from './resolution/index.js';

export type {
  TargetSnapshotError,
  TargetSnapshotResult,
  ResolutionMode,
  ResolutionState,
  MatchSource,
  ResolutionOutcome,
  SettledOutcome,
  ResolutionErrorCode,
  ResolutionError,
  ResolutionResult,
  ResolveOptions,
  KeyResolverConfig,
  TargetAttachment,
  TargetIssue,
} from './resolution/index.js';

// Attachments module
export { AttachmentReconciler, dedupeAttachments } from './attachments/index.js';

export type { AttachmentDiff, TargetAttachmentIndex, UploadTiming } from './attachments/index.js';

// Export module (batch planning)
export {
  ExportPlanner,
  serializeBatch,
  serializeSkipReport,
  buildMissingAttachmentReport,
  rewriteAttachmentIds,
  NEW_ISSUE_SENTINEL,
} from './export/index.js';

export type {
  MissingAttachmentReport,
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
} from './export/index.js';

// Datasets module (CSV packaging)
export {
  packageDatasets,
  datasetToCsv,
  columnTitle,
  placeholderName,
  toCsv,
  DEFAULT_DATASET_EXTENSION,
} from './datasets/index.js';

export type {
  DatasetLookup,
  DatasetPackage,
  DatasetSkip,
  DatasetSkipReason,
  PackageOptions,
} from './datasets/index.js';

// Config module
export {
  buildMigrationConfig,
  validateMigrationConfig,
  resolverConfigFrom,
  loadConfigFile,
  loadConfigFromString,
  DEFAULT_MIGRATION_CONFIG,
  LOG_LEVELS,
} from './config/index.js';

export type {
  LogLevel,
  MigrationConfig,
  ConfigValidationError,
  ConfigLoadResult,
} from './config/index.js';

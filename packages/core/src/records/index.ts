export { RecordStore } from './record-store.js';
export { discoverSourceFiles, SOURCE_FILE_PATTERNS } from './source-files.js';
export { extractAttachmentIds, ATTACHMENT_LINK_SCHEME } from './attachment-links.js';
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
} from './types.js';

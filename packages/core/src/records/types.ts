/**
 * Types for the record store.
 *
 * Records are loaded from an Xray backup (tests, preconditions, test plans,
 * test sets) and enriched with issue metadata exported from the source Jira
 * instance. Loaded records are never mutated; resolution outcomes live in
 * the resolution session.
 */

/** Kind of test-management record */
export type RecordKind =
  | 'test'
  | 'precondition'
  | 'test-plan'
  | 'test-set';

/** Xray test type, derived from the backup entry */
export type TestType = 'Manual' | 'Cucumber' | 'Generic';

/** A single manual test step. Order within a record is significant. */
export interface TestStep {
  action: string;
  data: string;
  expected: string;
}

/** A file attached to a record (directly or via a step reference) */
export interface AttachmentRef {
  /** Id of the owning record */
  recordId: string;

  /** File name as it should appear on the target */
  filename: string;

  /** Size in bytes */
  size: number;

  /** Path of the file in the local attachment backup */
  localPath: string;

  /** Source-side attachment id, when the file is referenced from step text */
  attachmentId: string | null;

  /** Optional content checksum from the backup metadata */
  checksum: string | null;
}

/** A record-level problem found at load time */
export interface RecordFlag {
  code: 'MissingRequiredField';
  field: string;
  message: string;
}

/** A test-management record loaded from the source backup */
export interface TestRecord {
  /** Source-side internal id (stable across reloads) */
  id: string;

  kind: RecordKind;

  /** Issue key on the source instance, from the metadata cache */
  sourceKey: string | null;

  summary: string;

  description: string | null;

  steps: TestStep[];

  /** Ids of precondition records this record depends on */
  preconditionIds: string[];

  /** Ids of tests contained in a plan or set */
  memberIds: string[];

  /** Id of the dataset owner, if the record is parameterized */
  datasetRef: string | null;

  attachments: AttachmentRef[];

  testType: TestType;

  testVersionId: string | null;

  /** Problems that disqualify the record from export */
  flags: RecordFlag[];
}

/** A dataset column (Xray "parameter") */
export interface DatasetColumn {
  /** Parameter id used by rows */
  id: string;

  name: string;

  /** Whether the parameter takes part in combinations */
  combinations: boolean;
}

/** Tabular parameterization data owned by a record */
export interface Dataset {
  /** Id of the owning record */
  recordId: string;

  columns: DatasetColumn[];

  /** Each row maps column id to value */
  rows: Array<Record<string, string>>;
}

/** Issue metadata exported from the source Jira instance */
export interface IssueMetadata {
  key: string;
  summary: string;
  description: string | null;
}

/** Attachment metadata from the backup's metadata files */
export interface AttachmentMetadata {
  filename: string;
  size: number;
  checksum: string | null;
}

/** A problem with a source file or entry. Loading continues past it. */
export interface MalformedInput {
  code: 'MalformedInput';

  /** Path of the offending file */
  file: string;

  /** Index of the offending entry within its collection, null for the whole file */
  entryIndex: number | null;

  message: string;
}

/** Result of loading source files */
export interface LoadResult {
  /** Records in load order, keyed by id */
  records: Map<string, TestRecord>;

  /** Datasets keyed by owning record id */
  datasets: Map<string, Dataset>;

  /** Problems encountered while loading */
  errors: MalformedInput[];
}

/** Options for loading source files */
export interface LoadOptions {
  /** Directory holding attachment files named by their source id */
  attachmentsDir: string;
}

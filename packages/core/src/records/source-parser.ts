/**
 * Parser for Xray backup documents.
 *
 * A backup is split across several JSON files. Each file holds one
 * collection (`tests`, `preconditions`, `testPlans`, `testSets`,
 * `datasets`), attachment metadata (`attachment_metadata`), or the issue
 * metadata cache exported from Jira (issue id -> key, summary, ...).
 * A bare object with an `id` is read as a single test.
 *
 * Parsing only sorts raw entries into a SourceBundle. Records are built
 * once every file has been read, since metadata may arrive after the
 * collections that need it.
 */

import type {
  AttachmentMetadata,
  IssueMetadata,
  MalformedInput,
  RecordKind,
} from './types.js';
import { isJsonObject, readNumber, readString } from './json.js';
import type { JsonObject } from './json.js';

/** A raw collection entry awaiting validation */
export interface RawEntry {
  kind: RecordKind;
  file: string;
  index: number;
  value: unknown;
}

/** A raw dataset entry awaiting validation */
export interface RawDataset {
  file: string;
  index: number;
  value: unknown;
}

/** Everything read from the backup files, before validation */
export interface SourceBundle {
  entries: RawEntry[];
  datasets: RawDataset[];
  issueMetadata: Map<string, IssueMetadata>;
  attachmentMetadata: Map<string, AttachmentMetadata>;
  errors: MalformedInput[];
}

const COLLECTION_FIELDS: ReadonlyArray<[string, RecordKind]> = [
  ['tests', 'test'],
  ['preconditions', 'precondition'],
  ['testPlans', 'test-plan'],
  ['testSets', 'test-set'],
];

export function createSourceBundle(): SourceBundle {
  return {
    entries: [],
    datasets: [],
    issueMetadata: new Map(),
    attachmentMetadata: new Map(),
    errors: [],
  };
}

/**
 * Parse file content into the bundle. Problems are appended to
 * `bundle.errors`; nothing is thrown.
 */
export function parseSourceDocument(bundle: SourceBundle, file: string, content: string): void {
  let doc: unknown;
  try {
    doc = JSON.parse(content);
  } catch (err) {
    bundle.errors.push(malformed(file, null, `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`));
    return;
  }

  if (!isJsonObject(doc)) {
    bundle.errors.push(malformed(file, null, 'Expected a JSON object at the top level'));
    return;
  }

  let recognized = false;

  for (const [field, kind] of COLLECTION_FIELDS) {
    if (!(field in doc)) continue;
    recognized = true;
    const items = doc[field];
    if (!Array.isArray(items)) {
      bundle.errors.push(malformed(file, null, `"${field}" must be an array`));
      continue;
    }
    items.forEach((value: unknown, index) => {
      bundle.entries.push({ kind, file, index, value });
    });
  }

  if ('datasets' in doc) {
    recognized = true;
    const items = doc['datasets'];
    if (Array.isArray(items)) {
      items.forEach((value: unknown, index) => {
        bundle.datasets.push({ file, index, value });
      });
    } else {
      bundle.errors.push(malformed(file, null, '"datasets" must be an array'));
    }
  }

  if ('attachment_metadata' in doc) {
    recognized = true;
    parseAttachmentMetadata(bundle, file, doc['attachment_metadata']);
  }

  if (recognized) return;

  if ('id' in doc) {
    bundle.entries.push({ kind: 'test', file, index: 0, value: doc });
    return;
  }

  if (isIssueMetadataCache(doc)) {
    parseIssueMetadata(bundle, doc);
    return;
  }

  bundle.errors.push(malformed(file, null, 'Unrecognized document: no known collection found'));
}

/**
 * The Jira metadata cache maps issue ids to objects carrying at least a key.
 * An empty object is accepted as an empty cache.
 */
function isIssueMetadataCache(doc: JsonObject): boolean {
  return Object.values(doc).every(
    (value) => isJsonObject(value) && typeof value['key'] === 'string'
  );
}

function parseIssueMetadata(bundle: SourceBundle, doc: JsonObject): void {
  for (const [issueId, value] of Object.entries(doc)) {
    if (!isJsonObject(value)) continue;
    bundle.issueMetadata.set(issueId, {
      key: readString(value, 'key') ?? '',
      summary: readString(value, 'summary') ?? '',
      description: readString(value, 'description'),
    });
  }
}

function parseAttachmentMetadata(bundle: SourceBundle, file: string, value: unknown): void {
  if (!isJsonObject(value)) {
    bundle.errors.push(malformed(file, null, '"attachment_metadata" must be an object'));
    return;
  }

  for (const [attachmentId, meta] of Object.entries(value)) {
    if (!isJsonObject(meta)) {
      bundle.errors.push(malformed(file, null, `Attachment metadata for ${attachmentId} is not an object`));
      continue;
    }
    const filename = readString(meta, 'filename');
    if (!filename) {
      bundle.errors.push(malformed(file, null, `Attachment metadata for ${attachmentId} has no filename`));
      continue;
    }
    bundle.attachmentMetadata.set(attachmentId, {
      filename,
      size: readNumber(meta, 'size') ?? 0,
      checksum: readString(meta, 'checksum'),
    });
  }
}

export function malformed(file: string, entryIndex: number | null, message: string): MalformedInput {
  return { code: 'MalformedInput', file, entryIndex, message };
}

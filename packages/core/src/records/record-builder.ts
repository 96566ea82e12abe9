/**
 * Turns raw bundle entries into validated TestRecords and Datasets.
 */

import * as path from 'node:path';
import type {
  AttachmentRef,
  Dataset,
  DatasetColumn,
  MalformedInput,
  RecordFlag,
  TestRecord,
  TestStep,
  TestType,
} from './types.js';
import type { RawDataset, RawEntry, SourceBundle } from './source-parser.js';
import { malformed } from './source-parser.js';
import { extractAttachmentIds } from './attachment-links.js';
import {
  isJsonObject,
  isTruthyField,
  readId,
  readIdList,
  readNumber,
  readString,
} from './json.js';
import type { JsonObject } from './json.js';

const STEP_FIELDS = ['action', 'data', 'expected'] as const;

type BuildResult<T> =
  | { ok: true; value: T; warnings: MalformedInput[] }
  | { ok: false; error: MalformedInput };

export function buildDataset(raw: RawDataset): BuildResult<Dataset> {
  if (!isJsonObject(raw.value)) {
    return { ok: false, error: malformed(raw.file, raw.index, 'Dataset entry is not an object') };
  }
  const entry = raw.value;

  const recordId = readId(entry, 'testIssueId') ?? readId(entry, 'recordId');
  if (!recordId) {
    return { ok: false, error: malformed(raw.file, raw.index, 'Dataset has no testIssueId') };
  }

  const parameters = entry['parameters'];
  if (!Array.isArray(parameters)) {
    return { ok: false, error: malformed(raw.file, raw.index, 'Dataset "parameters" must be an array') };
  }

  const columns: DatasetColumn[] = [];
  for (const param of parameters) {
    if (!isJsonObject(param)) {
      return { ok: false, error: malformed(raw.file, raw.index, 'Dataset parameter is not an object') };
    }
    const name = readString(param, 'name');
    if (!name) {
      return { ok: false, error: malformed(raw.file, raw.index, 'Dataset parameter has no name') };
    }
    columns.push({
      id: readId(param, '_id') ?? readId(param, 'id') ?? name,
      name,
      combinations: isTruthyField(param, 'combinations'),
    });
  }

  const rawRows = entry['rows'] ?? [];
  if (!Array.isArray(rawRows)) {
    return { ok: false, error: malformed(raw.file, raw.index, 'Dataset "rows" must be an array') };
  }

  const rows: Array<Record<string, string>> = [];
  for (const rawRow of rawRows) {
    const values = isJsonObject(rawRow) ? rawRow['values'] : undefined;
    if (!isJsonObject(values)) {
      return { ok: false, error: malformed(raw.file, raw.index, 'Dataset row has no "values" object') };
    }
    const row: Record<string, string> = {};
    for (const [columnId, value] of Object.entries(values)) {
      row[columnId] = value === null || value === undefined ? '' : String(value);
    }
    rows.push(row);
  }

  return { ok: true, value: { recordId, columns, rows }, warnings: [] };
}

/**
 * Build a record from a raw entry.
 *
 * @param datasetOwners - maps a dataset's testIssueId to itself, so records
 *   can be linked through either their id or their test version id
 */
export function buildRecord(
  raw: RawEntry,
  bundle: SourceBundle,
  datasetOwners: ReadonlySet<string>,
  attachmentsDir: string
): BuildResult<TestRecord> {
  if (!isJsonObject(raw.value)) {
    return { ok: false, error: malformed(raw.file, raw.index, 'Entry is not an object') };
  }
  const entry = raw.value;

  const id = readId(entry, 'id');
  if (!id) {
    return { ok: false, error: malformed(raw.file, raw.index, 'Entry has no id') };
  }

  const steps = readSteps(entry);
  if (!steps) {
    return { ok: false, error: malformed(raw.file, raw.index, `Record ${id}: "steps" must be an array of objects`) };
  }

  const preconditionIds = readIdList(entry, 'preConditionTargetIssueIds');
  const explicitPreconditions = readIdList(entry, 'preconditionIds');
  if (preconditionIds === null || explicitPreconditions === null) {
    return { ok: false, error: malformed(raw.file, raw.index, `Record ${id}: precondition ids must be an array`) };
  }

  const memberIds = readIdList(entry, 'tests');
  if (memberIds === null) {
    return { ok: false, error: malformed(raw.file, raw.index, `Record ${id}: "tests" must be an array`) };
  }

  const meta = bundle.issueMetadata.get(id);
  const summary = (readString(entry, 'summary') ?? meta?.summary ?? '').trim();
  const description = readString(entry, 'description') ?? meta?.description ?? null;
  const testVersionId = readId(entry, 'testVersionId');

  const flags: RecordFlag[] = [];
  if (!summary) {
    flags.push({
      code: 'MissingRequiredField',
      field: 'summary',
      message: `Record ${id} has no summary`,
    });
  }

  const warnings: MalformedInput[] = [];
  const attachments = readAttachments(entry, id, steps, bundle, attachmentsDir, raw, warnings);

  return {
    ok: true,
    value: {
      id,
      kind: raw.kind,
      sourceKey: readString(entry, 'key') ?? (meta?.key || null),
      summary,
      description: description && description.trim() !== '' ? description : null,
      steps,
      preconditionIds: dedupe([...preconditionIds, ...explicitPreconditions]),
      memberIds,
      datasetRef: readDatasetRef(entry, id, testVersionId, datasetOwners),
      attachments,
      testType: readTestType(entry),
      testVersionId,
      flags,
    },
    warnings,
  };
}

function readSteps(entry: JsonObject): TestStep[] | null {
  const rawSteps = entry['steps'];
  if (rawSteps === undefined || rawSteps === null) return [];
  if (!Array.isArray(rawSteps)) return null;

  const steps: TestStep[] = [];
  for (const rawStep of rawSteps) {
    if (!isJsonObject(rawStep)) return null;
    steps.push({
      action: readString(rawStep, 'action') ?? '',
      data: readString(rawStep, 'data') ?? '',
      // Xray backups call the expected result "result"
      expected: readString(rawStep, 'expected') ?? readString(rawStep, 'result') ?? '',
    });
  }
  return steps;
}

function readTestType(entry: JsonObject): TestType {
  if (isTruthyField(entry, 'cucumber')) return 'Cucumber';
  if (isTruthyField(entry, 'generic')) return 'Generic';
  return 'Manual';
}

function readDatasetRef(
  entry: JsonObject,
  id: string,
  testVersionId: string | null,
  datasetOwners: ReadonlySet<string>
): string | null {
  const explicit = readId(entry, 'datasetRef');
  if (explicit) return explicit;
  if (datasetOwners.has(id)) return id;
  if (testVersionId && datasetOwners.has(testVersionId)) return testVersionId;
  return null;
}

function readAttachments(
  entry: JsonObject,
  recordId: string,
  steps: TestStep[],
  bundle: SourceBundle,
  attachmentsDir: string,
  raw: RawEntry,
  warnings: MalformedInput[]
): AttachmentRef[] {
  const refs: AttachmentRef[] = [];

  const declared = entry['attachments'];
  if (Array.isArray(declared)) {
    for (const item of declared) {
      if (!isJsonObject(item)) continue;
      const filename = readString(item, 'filename') ?? readString(item, 'name');
      if (!filename) {
        warnings.push(malformed(raw.file, raw.index, `Record ${recordId}: attachment without a filename`));
        continue;
      }
      refs.push({
        recordId,
        filename,
        size: readNumber(item, 'size') ?? 0,
        localPath: readString(item, 'path') ?? path.join(attachmentsDir, filename),
        attachmentId: readId(item, 'id'),
        checksum: readString(item, 'checksum'),
      });
    }
  }

  for (const step of steps) {
    for (const field of STEP_FIELDS) {
      for (const attachmentId of extractAttachmentIds(step[field])) {
        const meta = bundle.attachmentMetadata.get(attachmentId);
        if (!meta) {
          warnings.push(
            malformed(raw.file, raw.index, `Record ${recordId}: no metadata for attachment ${attachmentId}`)
          );
          continue;
        }
        refs.push({
          recordId,
          filename: meta.filename,
          size: meta.size,
          // The attachment backup stores files under their source id
          localPath: path.join(attachmentsDir, attachmentId),
          attachmentId,
          checksum: meta.checksum,
        });
      }
    }
  }

  return refs;
}

function dedupe(ids: string[]): string[] {
  return [...new Set(ids)];
}

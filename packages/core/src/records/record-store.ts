/**
 * In-memory index over records loaded from an Xray backup.
 *
 * Loading never throws on bad data: unreadable files and invalid entries
 * are collected as MalformedInput and the remaining files still load.
 * Records without a summary are kept and flagged so callers can report
 * them; the export planner refuses them.
 */

import * as fs from 'node:fs';
import type { Logger } from 'pino';
import type {
  Dataset,
  LoadOptions,
  LoadResult,
  MalformedInput,
  TestRecord,
} from './types.js';
import { createSourceBundle, malformed, parseSourceDocument } from './source-parser.js';
import { buildDataset, buildRecord } from './record-builder.js';

export class RecordStore {
  private records: Map<string, TestRecord> = new Map();
  private ordered: TestRecord[] = [];
  private datasets: Map<string, Dataset> = new Map();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'record-store' });
  }

  /** Number of loaded records */
  get size(): number {
    return this.records.size;
  }

  /**
   * Load records from the given backup files, replacing anything loaded
   * before. Record ids are the source ids, so reloading the same files
   * yields the same ids.
   */
  load(sourcePaths: string[], options: LoadOptions): LoadResult {
    const bundle = createSourceBundle();

    for (const file of sourcePaths) {
      let content: string;
      try {
        content = fs.readFileSync(file, 'utf-8');
      } catch (err) {
        bundle.errors.push(malformed(file, null, `Failed to read file: ${err instanceof Error ? err.message : String(err)}`));
        continue;
      }
      parseSourceDocument(bundle, file, content);
    }

    const datasets = new Map<string, Dataset>();
    for (const raw of bundle.datasets) {
      const result = buildDataset(raw);
      if (!result.ok) {
        bundle.errors.push(result.error);
        continue;
      }
      if (datasets.has(result.value.recordId)) {
        bundle.errors.push(
          malformed(raw.file, raw.index, `Duplicate dataset for record ${result.value.recordId}; keeping the first`)
        );
        continue;
      }
      datasets.set(result.value.recordId, result.value);
    }

    const owners = new Set(datasets.keys());
    const records = new Map<string, TestRecord>();
    const errors: MalformedInput[] = bundle.errors;

    for (const raw of bundle.entries) {
      const result = buildRecord(raw, bundle, owners, options.attachmentsDir);
      if (!result.ok) {
        errors.push(result.error);
        continue;
      }
      errors.push(...result.warnings);
      if (records.has(result.value.id)) {
        errors.push(malformed(raw.file, raw.index, `Duplicate record id ${result.value.id}; keeping the first`));
        continue;
      }
      records.set(result.value.id, result.value);
      const { datasetRef } = result.value;
      if (datasetRef && !datasets.has(datasetRef)) {
        errors.push(
          malformed(raw.file, raw.index, `Record ${result.value.id}: dataset ${datasetRef} not found in the backup`)
        );
      }
    }

    this.records = records;
    this.ordered = [...records.values()];
    this.datasets = datasets;

    for (const error of errors) {
      this.logger.warn(
        { file: error.file, entryIndex: error.entryIndex },
        error.message
      );
    }

    this.logger.info(
      {
        files: sourcePaths.length,
        records: records.size,
        datasets: datasets.size,
        flagged: this.flagged().length,
        errors: errors.length,
      },
      'Source records loaded'
    );

    return { records, datasets, errors };
  }

  get(id: string): TestRecord | undefined {
    return this.records.get(id);
  }

  /** All records in load order */
  all(): TestRecord[] {
    return [...this.ordered];
  }

  /** Records at positions start..end (inclusive), clamped to the loaded range */
  byIndexRange(start: number, end: number): TestRecord[] {
    const from = Math.max(0, start);
    const to = Math.min(this.ordered.length - 1, end);
    if (to < from) return [];
    return this.ordered.slice(from, to + 1);
  }

  /** Case-insensitive substring search over summary and description */
  search(keyword: string): TestRecord[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return this.all();
    return this.ordered.filter(
      (record) =>
        record.summary.toLowerCase().includes(needle) ||
        (record.description ?? '').toLowerCase().includes(needle)
    );
  }

  /** Look up a record by its source issue key (case-insensitive) */
  byKey(key: string): TestRecord | undefined {
    const wanted = key.trim().toUpperCase();
    return this.ordered.find((record) => record.sourceKey?.toUpperCase() === wanted);
  }

  /** Records flagged as not exportable */
  flagged(): TestRecord[] {
    return this.ordered.filter((record) => record.flags.length > 0);
  }

  datasetFor(recordId: string): Dataset | undefined {
    const record = this.records.get(recordId);
    if (!record?.datasetRef) return undefined;
    return this.datasets.get(record.datasetRef);
  }

  /** Test sets that list the given record as a member, in load order */
  setsContaining(recordId: string): TestRecord[] {
    return this.ordered.filter(
      (record) => record.kind === 'test-set' && record.memberIds.includes(recordId)
    );
  }
}

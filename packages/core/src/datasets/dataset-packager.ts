/**
 * Dataset packager.
 *
 * The target import API cannot receive datasets, so they are delivered as
 * one CSV file per parameterized test for the user to import by hand. File
 * names carry the resolved key so each CSV can be matched to its issue.
 */

import type { Dataset, TestRecord } from '../records/types.js';
import type { ResolutionOutcome } from '../resolution/types.js';
import { resolvedKeyOf } from '../resolution/types.js';
import { toCsv } from './csv.js';

export const DEFAULT_DATASET_EXTENSION = '.csv';

export interface DatasetLookup {
  datasetFor(recordId: string): Dataset | undefined;
}

export interface PackageOptions {
  /** File extension including the dot (default: .csv) */
  extension?: string;
}

/** Placeholder name for a record without a key */
export function placeholderName(recordId: string, outcome: ResolutionOutcome | undefined): string {
  return outcome?.state === 'CreateNew' ? `NEW_${recordId}` : `UNRESOLVED_${recordId}`;
}

/**
 * Column header for the target's dataset import. Parameters that take
 * part in combinations are marked with a trailing `*`.
 */
export function columnTitle(column: Dataset['columns'][number]): string {
  return column.combinations ? `${column.name}*` : column.name;
}

export function datasetToCsv(dataset: Dataset): string {
  const header = dataset.columns.map(columnTitle);
  const rows = dataset.rows.map((row) => dataset.columns.map((column) => row[column.id] ?? ''));
  return toCsv(header, rows);
}

export type DatasetSkipReason = 'MissingDataset' | 'DuplicateRecord' | 'DuplicateTargetKey';

/** A record whose dataset was not packaged */
export interface DatasetSkip {
  recordId: string;
  reason: DatasetSkipReason;
  message: string;
}

export interface DatasetPackage {
  /** CSV content keyed by file name, in input order */
  files: Map<string, string>;
  skipped: DatasetSkip[];
}

/**
 * Build one CSV per record that has a dataset, keyed by file name.
 * Records keep their input order and a repeated record is packaged once.
 * When two records resolve to the same key the first keeps the file and
 * the later one is skipped, as the export planner does.
 */
export function packageDatasets(
  records: readonly TestRecord[],
  resolutions: ReadonlyMap<string, ResolutionOutcome>,
  datasets: DatasetLookup,
  options: PackageOptions = {}
): DatasetPackage {
  const extension = options.extension ?? DEFAULT_DATASET_EXTENSION;
  const files = new Map<string, string>();
  const owners = new Map<string, string>();
  const seen = new Set<string>();
  const skipped: DatasetSkip[] = [];

  for (const record of records) {
    if (seen.has(record.id)) {
      skipped.push({
        recordId: record.id,
        reason: 'DuplicateRecord',
        message: `Record ${record.id} was selected more than once; packaged once`,
      });
      continue;
    }
    seen.add(record.id);

    const dataset = datasets.datasetFor(record.id);
    if (!dataset) {
      if (record.datasetRef) {
        skipped.push({
          recordId: record.id,
          reason: 'MissingDataset',
          message: `Dataset ${record.datasetRef} was not found in the backup`,
        });
      }
      continue;
    }

    const outcome = resolutions.get(record.id);
    const key = outcome ? resolvedKeyOf(outcome) : null;
    const filename = `${key ?? placeholderName(record.id, outcome)}${extension}`;

    const owner = owners.get(filename);
    if (owner !== undefined) {
      skipped.push({
        recordId: record.id,
        reason: 'DuplicateTargetKey',
        message: `${filename} already holds the dataset of record ${owner}`,
      });
      continue;
    }

    owners.set(filename, record.id);
    files.set(filename, datasetToCsv(dataset));
  }

  return { files, skipped };
}

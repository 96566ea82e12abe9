/**
 * Writes plan results to the output directory.
 *
 * - export-batch.json: bulk import request body
 * - skipped.json: records left out, with reasons
 * - attachments-missing.json: files the uploader still has to send
 * - load-errors.json: malformed input found while loading (only when any)
 * - datasets.zip: one CSV per parameterized test (only when any)
 * - datasets-skipped.json: datasets left out of the archive, with reasons (only when any)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { strToU8, zipSync } from 'fflate';
import type { Zippable } from 'fflate';
import {
  buildMissingAttachmentReport,
  serializeBatch,
  serializeSkipReport,
} from '@testbridge/core';
import type { PlanOutputs } from './pipeline.js';

export const OUTPUT_FILES = {
  batch: 'export-batch.json',
  skipped: 'skipped.json',
  attachments: 'attachments-missing.json',
  loadErrors: 'load-errors.json',
  datasets: 'datasets.zip',
  datasetSkips: 'datasets-skipped.json',
} as const;

/** Fixed entry time so the archive is identical across runs */
const ZIP_MTIME = new Date('2000-01-01T00:00:00Z');

/** Bundle dataset files into a ZIP archive, entries in name order */
export function zipDatasets(files: ReadonlyMap<string, string>): Uint8Array {
  const entries: Zippable = {};
  for (const name of [...files.keys()].sort()) {
    const content = files.get(name) ?? '';
    entries[name] = [strToU8(content), { mtime: ZIP_MTIME }];
  }
  return zipSync(entries, { level: 6 });
}

/** Write all outputs; returns the paths written */
export function writePlanOutputs(outputDir: string, outputs: PlanOutputs): string[] {
  fs.mkdirSync(outputDir, { recursive: true });
  const written: string[] = [];

  const write = (name: string, content: string | Uint8Array): void => {
    const target = path.join(outputDir, name);
    fs.writeFileSync(target, content);
    written.push(target);
  };

  write(OUTPUT_FILES.batch, `${serializeBatch(outputs.plan.batch)}\n`);
  write(OUTPUT_FILES.skipped, `${serializeSkipReport(outputs.plan.skipped)}\n`);
  write(
    OUTPUT_FILES.attachments,
    `${JSON.stringify(buildMissingAttachmentReport(outputs.plan.batch), null, 2)}\n`
  );

  if (outputs.load.errors.length > 0) {
    write(OUTPUT_FILES.loadErrors, `${JSON.stringify(outputs.load.errors, null, 2)}\n`);
  }

  if (outputs.datasets.size > 0) {
    write(OUTPUT_FILES.datasets, zipDatasets(outputs.datasets));
  }

  if (outputs.datasetSkips.length > 0) {
    write(OUTPUT_FILES.datasetSkips, `${JSON.stringify(outputs.datasetSkips, null, 2)}\n`);
  }

  return written;
}

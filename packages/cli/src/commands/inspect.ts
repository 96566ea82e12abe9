/**
 * testbridge inspect: list what a backup contains before planning an export.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { RecordStore, discoverSourceFiles, validateMigrationConfig } from '@testbridge/core';
import type { TestRecord } from '@testbridge/core';
import { createLogger } from '../utils/logger.js';
import { resolveCliConfig } from '../utils/config.js';
import type { SourceOptions } from '../utils/config.js';
import { parseRange, selectRecords } from '../utils/selection.js';
import type { RecordSelection } from '../utils/selection.js';

interface InspectOptions extends SourceOptions {
  range?: string;
  keyword?: string;
  allKinds?: boolean;
  flagged?: boolean;
  errors?: boolean;
}

export function formatRecordLine(index: number, record: TestRecord): string {
  const key = record.sourceKey ?? '-';
  const extras: string[] = [];
  if (record.steps.length > 0) extras.push(`${record.steps.length} steps`);
  if (record.attachments.length > 0) extras.push(`${record.attachments.length} attachments`);
  if (record.datasetRef) extras.push('dataset');
  if (record.flags.length > 0) extras.push(chalk.red(record.flags.map((f) => f.code).join(',')));
  const suffix = extras.length > 0 ? ` (${extras.join(', ')})` : '';
  return `${String(index).padStart(4)}  ${record.id.padEnd(10)} ${key.padEnd(12)} ${record.kind.padEnd(12)} ${record.summary}${suffix}`;
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('List records in a backup')
    .option('-c, --config <file>', 'YAML config file')
    .option('-s, --source <dir>', 'Extracted backup directory')
    .option('-a, --attachments <dir>', 'Attachment backup directory')
    .option('--range <start:end>', 'Inclusive index range over loaded records')
    .option('--keyword <text>', 'Only records whose summary or description contains the text')
    .option('--all-kinds', 'Include preconditions, test plans and test sets')
    .option('--flagged', 'Only records that cannot be exported')
    .option('--errors', 'Show malformed input found while loading')
    .option('-v, --verbose', 'Debug logging')
    .action((options: InspectOptions) => {
      try {
        const resolved = resolveCliConfig(options);
        if (!resolved.success) {
          for (const error of resolved.errors) console.error(chalk.red(`Config error: ${error}`));
          process.exit(1);
        }
        const config = resolved.config;
        const configErrors = validateMigrationConfig(config);
        if (configErrors.length > 0) {
          for (const error of configErrors) console.error(chalk.red(`Config error: ${error}`));
          process.exit(1);
        }

        const logger = createLogger(config.logLevel);
        const store = new RecordStore(logger);
        const files = discoverSourceFiles(...new Set([config.sourceDir, config.attachmentsDir]));
        if (files.length === 0) {
          console.error(chalk.red(`No backup files found in ${config.sourceDir}`));
          process.exit(1);
        }
        const load = store.load(files, { attachmentsDir: config.attachmentsDir });

        const selection: RecordSelection = {
          keyword: options.keyword,
          allKinds: options.allKinds,
        };
        if (options.range) {
          const range = parseRange(options.range);
          if (!range) {
            console.error(chalk.red(`Invalid range "${options.range}" (expected start:end)`));
            process.exit(1);
          }
          selection.range = range;
        }

        let records = selectRecords(store, selection).records;
        if (options.flagged) {
          records = records.filter((r) => r.flags.length > 0);
        }

        const positions = new Map(store.all().map((r, i) => [r.id, i]));
        console.log(chalk.bold(`${records.length} of ${store.size} records\n`));
        for (const record of records) {
          console.log(formatRecordLine(positions.get(record.id) ?? -1, record));
          if (options.flagged) {
            for (const flag of record.flags) console.log(chalk.yellow(`        ${flag.message}`));
          }
        }

        if (load.errors.length > 0) {
          console.log(chalk.yellow(`\n${load.errors.length} problem(s) while loading`));
          if (options.errors) {
            for (const error of load.errors) {
              const where = error.entryIndex === null ? error.file : `${error.file} #${error.entryIndex}`;
              console.log(`  ${where}: ${error.message}`);
            }
          }
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}

/**
 * testbridge plan: resolve selected records against the target snapshot
 * and write the export batch, skip report, attachment list and datasets.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger } from '../utils/logger.js';
import { resolveCliConfig } from '../utils/config.js';
import type { SourceOptions } from '../utils/config.js';
import { collectList, parseRange, readKeyOptions } from '../utils/selection.js';
import type { RecordSelection } from '../utils/selection.js';
import { runPlanPipeline } from '../utils/pipeline.js';
import type { PlanOutputs } from '../utils/pipeline.js';
import { writePlanOutputs } from '../utils/output.js';
import { createReadlinePrompt } from '../utils/prompt.js';

interface PlanOptions extends SourceOptions {
  select?: string[];
  range?: string;
  keyword?: string;
  key?: string[];
  createNew?: string[];
  interactive?: boolean;
}

export function printPlanSummary(outputs: PlanOutputs): void {
  const { batch, skipped } = outputs.plan;
  const creates = batch.entries.filter((e) => e.action === 'create');
  const unverified = batch.entries.filter((e) => e.unverified);

  console.log(chalk.bold('\nExport plan'));
  console.log(`  Selected:   ${outputs.selected.length}`);
  console.log(`  Planned:    ${batch.entries.length} (${creates.length} new)`);
  console.log(`  Skipped:    ${skipped.length}`);
  if (unverified.length > 0) {
    console.log(
      chalk.yellow(`  Unverified: ${unverified.map((e) => e.target).join(', ')} (check these keys exist on the target)`)
    );
  }

  for (const entry of batch.entries) {
    const missing = entry.attachments.missing.length;
    const attachmentNote = missing > 0 ? `, ${missing} attachment(s) to upload ${entry.attachments.uploadTiming}` : '';
    console.log(`  ${chalk.green('✓')} ${entry.recordId} -> ${entry.target}${attachmentNote}`);
    for (const warning of entry.warnings) {
      console.log(chalk.yellow(`      ${warning}`));
    }
  }

  for (const skip of skipped) {
    console.log(`  ${chalk.red('✗')} ${skip.recordId} [${skip.reason}] ${skip.message}`);
  }

  if (outputs.datasets.size > 0) {
    console.log(
      chalk.yellow(`\n${outputs.datasets.size} test(s) have datasets. Import the CSV files from datasets.zip manually.`)
    );
  }

  for (const skip of outputs.datasetSkips) {
    console.log(chalk.yellow(`  No dataset file for ${skip.recordId} [${skip.reason}] ${skip.message}`));
  }

  for (const notice of outputs.notices) {
    console.log(chalk.yellow(`Note: ${notice}`));
  }
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Resolve records against the target and write an export batch')
    .option('-c, --config <file>', 'YAML config file')
    .option('-s, --source <dir>', 'Extracted backup directory')
    .option('-a, --attachments <dir>', 'Attachment backup directory')
    .option('-o, --out <dir>', 'Output directory')
    .option('-t, --target <file>', 'Target issue snapshot (JSON)')
    .option('-p, --project <key>', 'Project key for new issues')
    .option('--select <refs>', 'Record ids or source keys to export (comma-separated, repeatable)', collectList)
    .option('--range <start:end>', 'Inclusive index range over loaded records')
    .option('--keyword <text>', 'Only records whose summary or description contains the text')
    .option('--key <ref=KEY>', 'Assign a target key to a record (repeatable)', collectList)
    .option('--create-new <refs>', 'Records to create as new issues (comma-separated, repeatable)', collectList)
    .option('-i, --interactive', 'Prompt for records that could not be matched')
    .option('-v, --verbose', 'Debug logging')
    .action(async (options: PlanOptions) => {
      try {
        const resolved = resolveCliConfig(options);
        if (!resolved.success) {
          for (const error of resolved.errors) console.error(chalk.red(`Config error: ${error}`));
          process.exit(1);
        }
        const config = resolved.config;
        const logger = createLogger(config.logLevel);

        const selection: RecordSelection = {
          refs: options.select,
          keyword: options.keyword,
        };
        if (options.range) {
          const range = parseRange(options.range);
          if (!range) {
            console.error(chalk.red(`Invalid range "${options.range}" (expected start:end)`));
            process.exit(1);
          }
          selection.range = range;
        }

        const assignments = readKeyOptions(options.key ?? [], (message) =>
          console.error(chalk.yellow(message))
        );

        const interactive = options.interactive ? createReadlinePrompt() : null;
        const result = await runPlanPipeline(
          config,
          selection,
          { keys: assignments, createNew: options.createNew ?? [], projectKey: options.project },
          logger,
          interactive?.prompt
        ).finally(() => interactive?.close());

        if (!result.success) {
          for (const error of result.errors) console.error(chalk.red(`Error: ${error}`));
          process.exit(1);
        }

        printPlanSummary(result.outputs);
        const written = writePlanOutputs(config.outputDir, result.outputs);
        console.log(chalk.bold('\nWritten:'));
        for (const file of written) console.log(`  ${file}`);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}

/**
 * testbridge datasets: package the datasets of selected tests as CSV files
 * in a ZIP archive, named after the keys the tests resolve to.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { createLogger } from '../utils/logger.js';
import { resolveCliConfig } from '../utils/config.js';
import type { SourceOptions } from '../utils/config.js';
import { collectList, readKeyOptions } from '../utils/selection.js';
import { runPlanPipeline } from '../utils/pipeline.js';
import { OUTPUT_FILES, zipDatasets } from '../utils/output.js';

interface DatasetsOptions extends SourceOptions {
  select?: string[];
  key?: string[];
  createNew?: string[];
}

export function registerDatasetsCommand(program: Command): void {
  program
    .command('datasets')
    .description('Package test datasets as CSV files for manual import')
    .option('-c, --config <file>', 'YAML config file')
    .option('-s, --source <dir>', 'Extracted backup directory')
    .option('-o, --out <dir>', 'Output directory')
    .option('-t, --target <file>', 'Target issue snapshot (JSON)')
    .option('-p, --project <key>', 'Project key for new issues')
    .option('--select <refs>', 'Record ids or source keys (comma-separated, repeatable)', collectList)
    .option('--key <ref=KEY>', 'Assign a target key to a record (repeatable)', collectList)
    .option('--create-new <refs>', 'Records that will be created as new issues', collectList)
    .option('-v, --verbose', 'Debug logging')
    .action(async (options: DatasetsOptions) => {
      try {
        const resolved = resolveCliConfig(options);
        if (!resolved.success) {
          for (const error of resolved.errors) console.error(chalk.red(`Config error: ${error}`));
          process.exit(1);
        }
        const config = resolved.config;
        const assignments = readKeyOptions(options.key ?? [], (message) =>
          console.error(chalk.yellow(message))
        );

        const result = await runPlanPipeline(
          config,
          { refs: options.select },
          { keys: assignments, createNew: options.createNew ?? [], projectKey: options.project },
          createLogger(config.logLevel)
        );
        if (!result.success) {
          for (const error of result.errors) console.error(chalk.red(`Error: ${error}`));
          process.exit(1);
        }

        const { datasets: files, datasetSkips } = result.outputs;
        for (const skip of datasetSkips) {
          console.error(chalk.yellow(`No dataset file for ${skip.recordId} [${skip.reason}] ${skip.message}`));
        }
        if (files.size === 0) {
          console.log('No selected test has a dataset.');
          return;
        }

        fs.mkdirSync(config.outputDir, { recursive: true });
        const target = path.join(config.outputDir, OUTPUT_FILES.datasets);
        fs.writeFileSync(target, zipDatasets(files));

        console.log(chalk.bold(`${files.size} dataset file(s) written to ${target}`));
        for (const name of [...files.keys()].sort()) {
          const marker = name.startsWith('UNRESOLVED_') ? chalk.yellow('?') : chalk.green('✓');
          console.log(`  ${marker} ${name}`);
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}

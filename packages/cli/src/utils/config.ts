/**
 * Builds the migration config for a CLI run: config file first, then
 * command-line flags, then environment variables and defaults.
 */

import * as path from 'node:path';
import { buildMigrationConfig, loadConfigFile } from '@testbridge/core';
import type { MigrationConfig } from '@testbridge/core';

/** Flags shared by every command that reads a backup */
export interface SourceOptions {
  config?: string;
  source?: string;
  attachments?: string;
  out?: string;
  target?: string;
  project?: string;
  verbose?: boolean;
}

export type CliConfigResult =
  | { success: true; config: MigrationConfig }
  | { success: false; errors: string[] };

export function resolveCliConfig(options: SourceOptions): CliConfigResult {
  let fileOverrides: Partial<MigrationConfig> = {};

  const configPath = options.config ?? process.env['TESTBRIDGE_CONFIG_PATH'];
  if (configPath) {
    const loaded = loadConfigFile(configPath);
    if (!loaded.success) {
      return {
        success: false,
        errors: loaded.errors.map((e) => `${e.field}: ${e.message}`),
      };
    }
    fileOverrides = loaded.overrides;
  }

  const flagOverrides: Partial<MigrationConfig> = {};
  if (options.source) flagOverrides.sourceDir = path.resolve(options.source);
  if (options.attachments) flagOverrides.attachmentsDir = path.resolve(options.attachments);
  if (options.out) flagOverrides.outputDir = path.resolve(options.out);
  if (options.target) flagOverrides.targetSnapshotPath = path.resolve(options.target);
  if (options.project) flagOverrides.defaultProjectKey = options.project.trim().toUpperCase();
  if (options.verbose) flagOverrides.logLevel = 'debug';

  return {
    success: true,
    config: buildMigrationConfig({ ...fileOverrides, ...flagOverrides }),
  };
}

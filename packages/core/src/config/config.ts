/**
 * Migration configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically (CLI flags, config file).
 */

import * as path from 'node:path';
import type { KeyResolverConfig } from '../resolution/types.js';
import type { LogLevel, MigrationConfig } from './types.js';
import { DEFAULT_MIGRATION_CONFIG, LOG_LEVELS } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const PROJECT_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;

/**
 * Build migration config from environment variables and optional overrides.
 *
 * Environment variables:
 * - TESTBRIDGE_SOURCE_DIR: extracted backup directory (required unless overridden)
 * - TESTBRIDGE_ATTACHMENTS_DIR: attachment backup directory (default: source dir)
 * - TESTBRIDGE_OUTPUT_DIR: output directory (default: <source dir>/export)
 * - TESTBRIDGE_TARGET_SNAPSHOT: target issue snapshot JSON (default: none)
 * - TESTBRIDGE_KEY_PATTERN: issue key regular expression
 * - TESTBRIDGE_DEFAULT_PROJECT: project key for new issues
 * - TESTBRIDGE_DATASET_EXTENSION: dataset file extension (default: .csv)
 * - TESTBRIDGE_LOG_LEVEL: pino level (default: info)
 */
export function buildMigrationConfig(overrides?: Partial<MigrationConfig>): MigrationConfig {
  const sourceDir = overrides?.sourceDir ?? getEnv('TESTBRIDGE_SOURCE_DIR', '');

  const envProject = process.env['TESTBRIDGE_DEFAULT_PROJECT'];
  const defaultProjectKey =
    overrides?.defaultProjectKey !== undefined
      ? overrides.defaultProjectKey
      : envProject
        ? envProject.trim().toUpperCase()
        : DEFAULT_MIGRATION_CONFIG.defaultProjectKey;

  const envLevel = getEnv('TESTBRIDGE_LOG_LEVEL', DEFAULT_MIGRATION_CONFIG.logLevel);
  const logLevel =
    overrides?.logLevel ?? (isLogLevel(envLevel) ? envLevel : DEFAULT_MIGRATION_CONFIG.logLevel);

  return {
    sourceDir,
    attachmentsDir: overrides?.attachmentsDir ?? getEnv('TESTBRIDGE_ATTACHMENTS_DIR', sourceDir),
    outputDir:
      overrides?.outputDir ??
      getEnv('TESTBRIDGE_OUTPUT_DIR', sourceDir ? path.join(sourceDir, 'export') : ''),
    targetSnapshotPath: overrides?.targetSnapshotPath ?? getEnv('TESTBRIDGE_TARGET_SNAPSHOT', ''),
    keyPattern:
      overrides?.keyPattern ?? getEnv('TESTBRIDGE_KEY_PATTERN', DEFAULT_MIGRATION_CONFIG.keyPattern),
    defaultProjectKey,
    datasetExtension:
      overrides?.datasetExtension ??
      getEnv('TESTBRIDGE_DATASET_EXTENSION', DEFAULT_MIGRATION_CONFIG.datasetExtension),
    logLevel,
  };
}

/**
 * Validate a migration configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateMigrationConfig(config: MigrationConfig): string[] {
  const errors: string[] = [];

  if (!config.sourceDir) {
    errors.push('sourceDir is required');
  }

  if (!config.attachmentsDir) {
    errors.push('attachmentsDir is required');
  }

  if (!config.outputDir) {
    errors.push('outputDir is required');
  }

  if (!config.keyPattern) {
    errors.push('keyPattern is required');
  } else {
    try {
      new RegExp(config.keyPattern);
    } catch (err) {
      errors.push(`keyPattern is not a valid regular expression: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (config.defaultProjectKey !== null && !PROJECT_KEY_PATTERN.test(config.defaultProjectKey)) {
    errors.push(`defaultProjectKey "${config.defaultProjectKey}" is not a valid project key`);
  }

  if (!config.datasetExtension.startsWith('.') || config.datasetExtension.length < 2) {
    errors.push('datasetExtension must start with "." and name an extension');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return errors;
}

/** Resolver settings for a validated config */
export function resolverConfigFrom(config: MigrationConfig): KeyResolverConfig {
  return {
    keyPattern: new RegExp(config.keyPattern),
    defaultProjectKey: config.defaultProjectKey,
  };
}

/**
 * Migration config file loader.
 *
 * Reads a YAML file with kebab-case keys and turns it into overrides for
 * buildMigrationConfig. Relative paths are resolved against the file's
 * directory.
 *
 * ```yaml
 * source-dir: ./backup
 * attachments-dir: ./backup-attachments
 * output-dir: ./out
 * target-snapshot: ./target-issues.json
 * key-pattern: "^[A-Z]+-[0-9]+$"
 * default-project: PROJ
 * dataset-extension: .csv
 * log-level: debug
 * ```
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import type {
  ConfigLoadResult,
  ConfigValidationError,
  LogLevel,
  MigrationConfig,
} from './types.js';
import { LOG_LEVELS } from './types.js';

const PATH_FIELDS = {
  'source-dir': 'sourceDir',
  'attachments-dir': 'attachmentsDir',
  'output-dir': 'outputDir',
  'target-snapshot': 'targetSnapshotPath',
} as const;

const KNOWN_FIELDS = new Set<string>([
  ...Object.keys(PATH_FIELDS),
  'key-pattern',
  'default-project',
  'dataset-extension',
  'log-level',
]);

/**
 * Parse YAML content into config overrides.
 *
 * @param baseDir - directory relative paths are resolved against
 */
export function loadConfigFromString(yamlContent: string, baseDir: string = process.cwd()): ConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: 'YAML content is empty or not a valid object' }],
    };
  }

  const errors: ConfigValidationError[] = [];
  const overrides: Partial<MigrationConfig> = {};
  const raw = new Map<string, unknown>(Object.entries(parsed));

  for (const field of raw.keys()) {
    if (!KNOWN_FIELDS.has(field)) {
      errors.push({ field, message: `Unknown config field "${field}"` });
    }
  }

  for (const [field, target] of Object.entries(PATH_FIELDS)) {
    const value = raw.get(field);
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      errors.push({ field, message: `${field} must be a non-empty string` });
      continue;
    }
    overrides[target] = path.resolve(baseDir, value);
  }

  const keyPattern = raw.get('key-pattern');
  if (keyPattern !== undefined) {
    if (typeof keyPattern === 'string' && keyPattern !== '') {
      overrides.keyPattern = keyPattern;
    } else {
      errors.push({ field: 'key-pattern', message: 'key-pattern must be a non-empty string' });
    }
  }

  const project = raw.get('default-project');
  if (project !== undefined) {
    if (typeof project === 'string' && project.trim() !== '') {
      overrides.defaultProjectKey = project.trim().toUpperCase();
    } else {
      errors.push({ field: 'default-project', message: 'default-project must be a non-empty string' });
    }
  }

  const extension = raw.get('dataset-extension');
  if (extension !== undefined) {
    if (typeof extension === 'string') {
      overrides.datasetExtension = extension;
    } else {
      errors.push({ field: 'dataset-extension', message: 'dataset-extension must be a string' });
    }
  }

  const level = raw.get('log-level');
  if (level !== undefined) {
    const match = LOG_LEVELS.find((candidate: LogLevel) => candidate === level);
    if (match) {
      overrides.logLevel = match;
    } else {
      errors.push({ field: 'log-level', message: `log-level must be one of: ${LOG_LEVELS.join(', ')}` });
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, overrides };
}

/**
 * Load config overrides from a YAML file.
 * Falls back to TESTBRIDGE_CONFIG_PATH when no path is given.
 */
export function loadConfigFile(filePath?: string): ConfigLoadResult {
  const resolvedPath = filePath ?? process.env['TESTBRIDGE_CONFIG_PATH'];
  if (!resolvedPath) {
    return {
      success: false,
      errors: [{ field: 'filePath', message: 'No config file path provided and TESTBRIDGE_CONFIG_PATH is not set' }],
    };
  }

  let content: string;
  try {
    content = readFileSync(resolvedPath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'filePath', message: `Failed to read config file: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  return loadConfigFromString(content, path.dirname(path.resolve(resolvedPath)));
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  buildMigrationConfig,
  resolverConfigFrom,
  validateMigrationConfig,
} from '../config/config.js';
import { loadConfigFile, loadConfigFromString } from '../config/config-file.js';
import type { MigrationConfig } from '../config/types.js';

const ENV_KEYS = [
  'TESTBRIDGE_SOURCE_DIR',
  'TESTBRIDGE_ATTACHMENTS_DIR',
  'TESTBRIDGE_OUTPUT_DIR',
  'TESTBRIDGE_TARGET_SNAPSHOT',
  'TESTBRIDGE_KEY_PATTERN',
  'TESTBRIDGE_DEFAULT_PROJECT',
  'TESTBRIDGE_DATASET_EXTENSION',
  'TESTBRIDGE_LOG_LEVEL',
  'TESTBRIDGE_CONFIG_PATH',
];

describe('migration config', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('buildMigrationConfig', () => {
    it('derives directories from the source directory', () => {
      process.env['TESTBRIDGE_SOURCE_DIR'] = '/data/backup';

      expect(buildMigrationConfig()).toEqual({
        sourceDir: '/data/backup',
        attachmentsDir: '/data/backup',
        outputDir: path.join('/data/backup', 'export'),
        targetSnapshotPath: '',
        keyPattern: '^[A-Z][A-Z0-9_]*-[1-9][0-9]*$',
        defaultProjectKey: null,
        datasetExtension: '.csv',
        logLevel: 'info',
      });
    });

    it('reads every setting from the environment', () => {
      process.env['TESTBRIDGE_SOURCE_DIR'] = '/data/backup';
      process.env['TESTBRIDGE_ATTACHMENTS_DIR'] = '/data/files';
      process.env['TESTBRIDGE_OUTPUT_DIR'] = '/data/out';
      process.env['TESTBRIDGE_TARGET_SNAPSHOT'] = '/data/target.json';
      process.env['TESTBRIDGE_KEY_PATTERN'] = '^[A-Z]+-\\d+$';
      process.env['TESTBRIDGE_DEFAULT_PROJECT'] = ' proj ';
      process.env['TESTBRIDGE_DATASET_EXTENSION'] = '.txt';
      process.env['TESTBRIDGE_LOG_LEVEL'] = 'debug';

      expect(buildMigrationConfig()).toEqual({
        sourceDir: '/data/backup',
        attachmentsDir: '/data/files',
        outputDir: '/data/out',
        targetSnapshotPath: '/data/target.json',
        keyPattern: '^[A-Z]+-\\d+$',
        defaultProjectKey: 'PROJ',
        datasetExtension: '.txt',
        logLevel: 'debug',
      });
    });

    it('falls back to info for an unknown log level', () => {
      process.env['TESTBRIDGE_LOG_LEVEL'] = 'verbose';

      expect(buildMigrationConfig().logLevel).toBe('info');
    });

    it('lets overrides win over the environment', () => {
      process.env['TESTBRIDGE_SOURCE_DIR'] = '/data/backup';
      process.env['TESTBRIDGE_DEFAULT_PROJECT'] = 'ENV';

      const config = buildMigrationConfig({ sourceDir: '/other', defaultProjectKey: null });

      expect(config.sourceDir).toBe('/other');
      expect(config.outputDir).toBe(path.join('/other', 'export'));
      expect(config.defaultProjectKey).toBeNull();
    });
  });

  describe('validateMigrationConfig', () => {
    function validConfig(overrides?: Partial<MigrationConfig>): MigrationConfig {
      return buildMigrationConfig({ sourceDir: '/data/backup', ...overrides });
    }

    it('accepts a complete config', () => {
      expect(validateMigrationConfig(validConfig())).toEqual([]);
    });

    it('requires the directories', () => {
      expect(validateMigrationConfig(buildMigrationConfig())).toEqual([
        'sourceDir is required',
        'attachmentsDir is required',
        'outputDir is required',
      ]);
    });

    it('rejects a key pattern that does not compile', () => {
      const errors = validateMigrationConfig(validConfig({ keyPattern: '[' }));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^keyPattern is not a valid regular expression: /);
    });

    it('rejects a malformed default project and extension', () => {
      expect(validateMigrationConfig(validConfig({ defaultProjectKey: 'PROJ-1', datasetExtension: 'csv' }))).toEqual([
        'defaultProjectKey "PROJ-1" is not a valid project key',
        'datasetExtension must start with "." and name an extension',
      ]);
    });
  });

  describe('resolverConfigFrom', () => {
    it('compiles the key pattern', () => {
      const resolver = resolverConfigFrom(buildMigrationConfig({ keyPattern: '^X-\\d+$', defaultProjectKey: 'X' }));

      expect(resolver.keyPattern.test('X-0')).toBe(true);
      expect(resolver.defaultProjectKey).toBe('X');
    });
  });

  describe('loadConfigFromString', () => {
    it('maps kebab-case keys and resolves paths against the base directory', () => {
      const result = loadConfigFromString(
        [
          'source-dir: ./backup',
          'attachments-dir: /abs/files',
          'target-snapshot: target.json',
          'default-project: abc',
          'log-level: debug',
        ].join('\n'),
        '/work'
      );

      expect(result).toEqual({
        success: true,
        overrides: {
          sourceDir: path.resolve('/work', './backup'),
          attachmentsDir: '/abs/files',
          targetSnapshotPath: path.resolve('/work', 'target.json'),
          defaultProjectKey: 'ABC',
          logLevel: 'debug',
        },
      });
    });

    it('rejects unknown fields and bad values', () => {
      const result = loadConfigFromString('colour: blue\nlog-level: loud\nsource-dir: 3\n', '/work');

      expect(result).toEqual({
        success: false,
        errors: [
          { field: 'colour', message: 'Unknown config field "colour"' },
          { field: 'source-dir', message: 'source-dir must be a non-empty string' },
          { field: 'log-level', message: 'log-level must be one of: fatal, error, warn, info, debug, trace, silent' },
        ],
      });
    });

    it('rejects empty content', () => {
      expect(loadConfigFromString('', '/work')).toEqual({
        success: false,
        errors: [{ field: 'yaml', message: 'YAML content is empty or not a valid object' }],
      });
    });

    it('reports YAML syntax errors', () => {
      const result = loadConfigFromString('source-dir: [unclosed', '/work');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0].field).toBe('yaml');
        expect(result.errors[0].message).toMatch(/^Failed to parse YAML: /);
      }
    });
  });

  describe('loadConfigFile', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('resolves paths against the directory of the file', () => {
      const file = path.join(tmpDir, 'testbridge.yaml');
      fs.writeFileSync(file, 'source-dir: backup\n');

      const result = loadConfigFile(file);

      expect(result).toEqual({ success: true, overrides: { sourceDir: path.join(tmpDir, 'backup') } });
    });

    it('uses TESTBRIDGE_CONFIG_PATH when no path is given', () => {
      const file = path.join(tmpDir, 'env.yaml');
      fs.writeFileSync(file, 'dataset-extension: .tsv\n');
      process.env['TESTBRIDGE_CONFIG_PATH'] = file;

      expect(loadConfigFile()).toEqual({ success: true, overrides: { datasetExtension: '.tsv' } });
    });

    it('reports a missing path', () => {
      expect(loadConfigFile()).toEqual({
        success: false,
        errors: [
          { field: 'filePath', message: 'No config file path provided and TESTBRIDGE_CONFIG_PATH is not set' },
        ],
      });
    });

    it('reports a file that cannot be read', () => {
      const result = loadConfigFile(path.join(tmpDir, 'missing.yaml'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0].message).toMatch(/^Failed to read config file: /);
      }
    });
  });
});

/** pino log levels accepted in configuration */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/** Settings for one migration session, passed explicitly to each entry point */
export interface MigrationConfig {
  /** Directory holding the extracted backup JSON files */
  sourceDir: string;

  /** Directory holding attachment files and their metadata_*.json files */
  attachmentsDir: string;

  /** Directory the export batch, reports and dataset archive are written to */
  outputDir: string;

  /** JSON snapshot of the issues already on the target (empty = none known) */
  targetSnapshotPath: string;

  /** Regular expression (source) a target issue key must match */
  keyPattern: string;

  /** Project for new issues when none can be derived from the source key */
  defaultProjectKey: string | null;

  /** Extension of packaged dataset files (default: .csv) */
  datasetExtension: string;

  logLevel: LogLevel;
}

export const DEFAULT_MIGRATION_CONFIG: Omit<
  MigrationConfig,
  'sourceDir' | 'attachmentsDir' | 'outputDir' | 'targetSnapshotPath'
> = {
  keyPattern: '^[A-Z][A-Z0-9_]*-[1-9][0-9]*$',
  defaultProjectKey: null,
  datasetExtension: '.csv',
  logLevel: 'info',
};

/** Validation error from config file loading */
export interface ConfigValidationError {
  field: string;
  message: string;
}

export type ConfigLoadResult =
  | { success: true; overrides: Partial<MigrationConfig> }
  | { success: false; errors: ConfigValidationError[] };

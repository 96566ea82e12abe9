export { buildMigrationConfig, validateMigrationConfig, resolverConfigFrom } from './config.js';
export { loadConfigFile, loadConfigFromString } from './config-file.js';
export { DEFAULT_MIGRATION_CONFIG, LOG_LEVELS } from './types.js';
export type {
  LogLevel,
  MigrationConfig,
  ConfigValidationError,
  ConfigLoadResult,
} from './types.js';

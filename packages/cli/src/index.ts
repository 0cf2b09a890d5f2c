/**
 * @catalog-sync/cli
 *
 * `catalog-sync` command and its config layer
 */

export { main, runSync, parseArgs, usage, EXIT_OK, EXIT_FATAL, EXIT_CONFIG } from './main.js';
export type { MainOptions, CliArgs } from './main.js';
export {
  ConfigError,
  configFileSchema,
  sourceSchema,
  catalogSchema,
  mappingSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, SourceConfig, CatalogConfig, MappingConfig, EnvExpansionOptions } from './config.js';
export { createReader, createMappingStore, createAccessor } from './wiring.js';

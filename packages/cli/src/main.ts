/**
 * Command implementation: load config, run one sync, write the report
 *
 * Exit codes: 0 when the run finished (warnings included), 1 when it was
 * aborted by a fatal error, 2 when the config could not be used.
 */

import { Logger, wrapError, type ICatalogAccessor, type RunReport } from '@catalog-sync/core';
import { SyncRun, formatRunReport, getEntityProfile, writeRunReport } from '@catalog-sync/sync-engine';
import { loadConfig, type ConfigFile } from './config.js';
import { createAccessor, createMappingStore, createReader } from './wiring.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CONFIG = 2;

export interface MainOptions {
  /** Catalog to use instead of the configured REST endpoint */
  accessor?: ICatalogAccessor;
  /** Receives the plain-text report (default: stdout) */
  print?: (text: string) => void;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface CliArgs {
  configPath?: string;
  dryRun: boolean;
  help: boolean;
}

export function parseArgs(args: readonly string[]): CliArgs {
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;
  return {
    configPath: configPath && !configPath.startsWith('--') ? configPath : undefined,
    dryRun: args.includes('--dry-run'),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export function usage(): string {
  return [
    'Usage: catalog-sync --config <config.json> [--dry-run]',
    '',
    'Families: org-units, datasets, dataset-compositions, legal-references',
    '',
    'Example config.json:',
    JSON.stringify(
      {
        family: 'org-units',
        source: { type: 'portal', baseUrl: 'https://data.example.org', datasetId: '100349' },
        catalog: {
          baseUrl: 'https://catalog.example.org',
          database: 'prod',
          accessToken: '${CATALOG_TOKEN}',
          rootId: 'collection-uuid',
        },
        mapping: { format: 'csv', filePath: './mappings/org-units.csv' },
        pacing: { mutationDelayMs: 200 },
      },
      null,
      2
    ),
  ].join('\n');
}

/**
 * Run one sync as configured
 * @returns the finished report and the path it was written to
 */
export async function runSync(
  config: ConfigFile,
  options: { logger: Logger; accessor?: ICatalogAccessor }
): Promise<{ report: RunReport; reportPath: string }> {
  const { logger } = options;

  const run = new SyncRun({
    profile: getEntityProfile(config.family),
    reader: createReader(config, logger),
    accessor: options.accessor ?? createAccessor(config.catalog, logger),
    mapping: createMappingStore(config.mapping, logger),
    rootId: config.catalog.rootId,
    writeStatus: config.writeStatus,
    adoptUnmapped: config.adoptUnmapped,
    pacing: config.pacing,
    dryRun: config.dryRun,
    logger,
  });

  const report = await run.execute();
  const reportPath = await writeRunReport(report, config.reportDir);
  logger.info('Report written', { reportPath });
  return { report, reportPath };
}

export async function main(args: readonly string[], options: MainOptions = {}): Promise<number> {
  const print = options.print ?? ((text: string) => process.stdout.write(`${text}\n`));
  let logger = options.logger ?? new Logger();
  const cli = parseArgs(args);

  if (cli.help || !cli.configPath) {
    print(usage());
    return cli.help ? EXIT_OK : EXIT_CONFIG;
  }

  let config: ConfigFile;
  try {
    config = await loadConfig(cli.configPath, { env: options.env });
  } catch (error) {
    const syncError = wrapError(error, 'CONFIGURATION_ERROR');
    logger.error('Invalid configuration', { error: syncError.message });
    print(syncError.toActionableMessage());
    return EXIT_CONFIG;
  }

  if (cli.dryRun) {
    config = { ...config, dryRun: true };
  }
  logger = options.logger ?? new Logger({ level: config.logging?.level, format: config.logging?.format });

  try {
    const { report } = await runSync(config, { logger, accessor: options.accessor });
    print(formatRunReport(report));
    return report.status === 'error' ? EXIT_FATAL : EXIT_OK;
  } catch (error) {
    // Wiring or report writing failed; SyncRun records its own failures
    const syncError = wrapError(error);
    logger.error('Sync failed', { code: syncError.code, error: syncError.message });
    print(syncError.toActionableMessage());
    return EXIT_FATAL;
  }
}

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SyncError } from '@catalog-sync/core';
import { ENTITY_FAMILIES } from '@catalog-sync/sync-engine';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends SyncError {
  constructor(message: string, cause?: Error) {
    super({
      code: 'CONFIGURATION_ERROR',
      message,
      suggestion: 'Fix the config file and run again; nothing was changed.',
      cause,
    });
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const portalSource = z
  .object({
    type: z.literal('portal'),
    baseUrl: z.string().url(),
    apiKey: z.string().min(1).optional(),
    /** Dataset holding the rows (org units, laws) */
    datasetId: z.string().min(1).optional(),
    /** Datasets to describe; all of the portal's when omitted */
    datasetIds: z.array(z.string().min(1)).optional(),
    /** Portal filter expression (laws) */
    where: z.string().min(1).optional(),
    /** Public portal URL used for dataset links */
    portalUrl: z.string().url().optional(),
    pageSize: z.number().int().min(1).max(100).optional(),
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
  })
  .strict();

const jsonSource = z
  .object({
    type: z.literal('json'),
    filePath: z.string().min(1),
  })
  .strict();

export const sourceSchema = z.discriminatedUnion('type', [portalSource, jsonSource]);

export type SourceConfig = z.infer<typeof sourceSchema>;

export const catalogSchema = z
  .object({
    baseUrl: z.string().url(),
    database: z.string().min(1),
    accessToken: z.string().min(1).optional(),
    /** Collection that scopes the run */
    rootId: z.string().min(1),
    /** Catalog status code used for assets marked for review */
    reviewStatus: z.string().min(1).optional(),
    topLevelFields: z.array(z.string().min(1)).optional(),
    timeoutMs: z.number().int().min(1).max(300_000).optional(),
  })
  .strict();

export type CatalogConfig = z.infer<typeof catalogSchema>;

export const mappingSchema = z
  .object({
    format: z.enum(['csv', 'json']).default('csv'),
    filePath: z.string().min(1),
    delimiter: z.string().length(1).optional(),
  })
  .strict();

export type MappingConfig = z.infer<typeof mappingSchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    family: z.enum(ENTITY_FAMILIES),
    source: sourceSchema,
    catalog: catalogSchema,
    mapping: mappingSchema,
    writeStatus: z.enum(['WORKING', 'PUBLISHED']).default('WORKING'),
    adoptUnmapped: z.boolean().default(true),
    pacing: z
      .object({
        mutationDelayMs: z.number().int().min(0).max(60_000).optional(),
      })
      .strict()
      .optional(),
    dryRun: z.boolean().default(false),
    reportDir: z.string().min(1).default('./reports'),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const { source, family } = value;
    if (source.type !== 'portal') return;

    const readsDatasets = family === 'datasets' || family === 'dataset-compositions';
    if (!readsDatasets && !source.datasetId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `datasetId is required for ${family} portal sources`,
        path: ['source', 'datasetId'],
      });
    }
    if (!readsDatasets && source.datasetIds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `datasetIds only applies to datasets and dataset-compositions`,
        path: ['source', 'datasetIds'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Validate an already parsed config object
 * @throws ConfigError listing every issue
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const expanded = expandEnvVars(raw, options);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Read, expand and validate a config file. Relative file paths inside the
 * config stay relative to the working directory.
 */
export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${absolutePath}`,
      error instanceof Error ? error : undefined
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${absolutePath}`,
      error instanceof Error ? error : undefined
    );
  }

  return parseConfig(parsed, options);
}

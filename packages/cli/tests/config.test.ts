import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { ConfigError, expandEnvVars, loadConfig, parseConfig } from '../src/index.js';

function validConfig() {
  return {
    family: 'org-units',
    source: { type: 'portal', baseUrl: 'https://data.example.org', datasetId: '100349' },
    catalog: { baseUrl: 'https://catalog.example.org', database: 'prod', rootId: 'root-collection' },
    mapping: { filePath: './mappings/org-units.csv' },
  };
}

function configError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('expandEnvVars', () => {
  const env = { CATALOG_TOKEN: 'test-secret', EMPTY: '' };

  it('should replace variables in nested strings', () => {
    expect(
      expandEnvVars({ catalog: { accessToken: 'Bearer ${CATALOG_TOKEN}' }, list: ['${CATALOG_TOKEN}', 3] }, { env })
    ).toEqual({ catalog: { accessToken: 'Bearer test-secret' }, list: ['test-secret', 3] });
  });

  it('should fall back to defaults for missing or empty variables', () => {
    expect(expandEnvVars('${MISSING:-fallback}/${EMPTY:-x}', { env })).toBe('fallback/x');
  });

  it('should fail on a missing variable without default', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow('Missing required environment variable: MISSING');
  });

  it('should keep placeholders when missing variables are allowed', () => {
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig(validConfig());

    expect(config.writeStatus).toBe('WORKING');
    expect(config.adoptUnmapped).toBe(true);
    expect(config.dryRun).toBe(false);
    expect(config.reportDir).toBe('./reports');
    expect(config.mapping.format).toBe('csv');
  });

  it('should list every issue with its path', () => {
    const raw = { ...validConfig(), family: 'buildings', catalog: { baseUrl: 'not a url', database: 'prod' } };

    const error = configError(() => parseConfig(raw));

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message.split('\n')[0]).toBe('Invalid config file:');
    expect(error.message).toContain('- catalog.baseUrl: Invalid url');
    expect(error.message).toContain('- catalog.rootId: Required');
  });

  it('should reject unknown keys', () => {
    const error = configError(() => parseConfig({ ...validConfig(), verbose: true }));

    expect(error.message).toContain("- (root): Unrecognized key(s) in object: 'verbose'");
  });

  it('should require a dataset id for org-unit portal sources', () => {
    const raw = { ...validConfig(), source: { type: 'portal', baseUrl: 'https://data.example.org' } };

    const error = configError(() => parseConfig(raw));

    expect(error.message).toBe(
      'Invalid config file:\n- source.datasetId: datasetId is required for org-units portal sources'
    );
  });

  it('should accept portal datasets listed by id', () => {
    const raw = {
      ...validConfig(),
      family: 'datasets',
      source: { type: 'portal', baseUrl: 'https://data.example.org', datasetIds: ['100042', '100043'] },
    };

    expect(parseConfig(raw).source).toMatchObject({ datasetIds: ['100042', '100043'] });
  });

  it('should accept dataset compositions without a dataset id', () => {
    const raw = {
      ...validConfig(),
      family: 'dataset-compositions',
      source: { type: 'portal', baseUrl: 'https://data.example.org', datasetIds: ['100354'] },
    };

    expect(parseConfig(raw).family).toBe('dataset-compositions');
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should read a file with a byte order mark', async () => {
    dir = mkdtempSync(path.join(tmpdir(), 'sync-config-'));
    const file = path.join(dir, 'config.json');
    const raw = { ...validConfig(), catalog: { ...validConfig().catalog, accessToken: '${TOKEN}' } };
    writeFileSync(file, `\uFEFF${JSON.stringify(raw)}`, 'utf-8');

    const config = await loadConfig(file, { env: { TOKEN: 'test-secret' } });

    expect(config.catalog.accessToken).toBe('test-secret');
  });

  it('should report invalid JSON', async () => {
    dir = mkdtempSync(path.join(tmpdir(), 'sync-config-'));
    const file = path.join(dir, 'config.json');
    writeFileSync(file, '{ "family": ', 'utf-8');

    await expect(loadConfig(file)).rejects.toThrow(`Config file is not valid JSON: ${file}`);
  });

  it('should report a missing file', async () => {
    dir = mkdtempSync(path.join(tmpdir(), 'sync-config-'));
    const file = path.join(dir, 'absent.json');

    await expect(loadConfig(file)).rejects.toBeInstanceOf(ConfigError);
  });
});

import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { OdsDataset, OdsDatasetSource, OdsRecordQuery, OdsRecordSource } from '../src/ods/client.js';
import { OrgUnitReader } from '../src/org-units/org-unit-reader.js';
import { LegalReferenceReader, DEFAULT_LAW_FILTER } from '../src/legal/legal-reference-reader.js';
import { DatasetCompositionReader } from '../src/datasets/dataset-composition-reader.js';
import { DatasetReader } from '../src/datasets/dataset-reader.js';
import { JsonSourceReader } from '../src/json/json-source-reader.js';

class StubRecordSource implements OdsRecordSource {
  readonly queries: Array<{ datasetId: string; query?: OdsRecordQuery }> = [];

  constructor(private readonly rows: Record<string, unknown>[]) {}

  async fetchAllRecords(datasetId: string, query?: OdsRecordQuery): Promise<Record<string, unknown>[]> {
    this.queries.push({ datasetId, query });
    return this.rows;
  }
}

class StubDatasetSource implements OdsDatasetSource {
  constructor(private readonly datasets: OdsDataset[]) {}

  async getDataset(datasetId: string): Promise<OdsDataset> {
    const dataset = this.datasets.find((d) => d.dataset_id === datasetId);
    if (!dataset) throw new Error(`no dataset ${datasetId}`);
    return dataset;
  }

  async listDatasetIds(): Promise<string[]> {
    return this.datasets.map((d) => d.dataset_id);
  }
}

describe('OrgUnitReader', () => {
  const rows: Record<string, unknown>[] = [
    { id: 1, title: 'Department', parent_id: null, url_website: 'https://example.org/dep' },
    { id: '2', title: 'Office A/B', parent_id: '1' },
    { id: '3', title: 'Team', parent_id: '2' },
    { id: '4', title: 'Orphan', parent_id: '99' },
    { id: '5', title: 'Loop one', parent_id: '6' },
    { id: '6', title: 'Loop two', parent_id: '5' },
    { id: '7' },
  ];

  it('builds parent paths from the ancestor chain', async () => {
    const reader = new OrgUnitReader({ client: new StubRecordSource(rows), datasetId: '100349' });

    const records = await reader.read();

    expect(records).toEqual([
      {
        key: '1',
        label: 'Department',
        fields: { directory_id: '1', website: 'https://example.org/dep' },
        parentPath: '',
      },
      { key: '2', label: 'Office A/B', fields: { directory_id: '2' }, parentPath: 'Department' },
      { key: '3', label: 'Team', fields: { directory_id: '3' }, parentPath: 'Department/"Office A/B"' },
    ]);
    expect(Object.isFrozen(records)).toBe(true);
  });

  it('reports invalid rows, missing parents and cycles', async () => {
    const reader = new OrgUnitReader({ client: new StubRecordSource(rows), datasetId: '100349' });

    await reader.read();

    expect(reader.issues).toEqual([
      { key: '7', code: 'INVALID_RECORD', message: 'Unit row #6 has no id or title' },
      { key: '4', code: 'PARENT_NOT_FOUND', message: "Parent unit '99' of unit '4' not found" },
      { key: '5', code: 'INVALID_RECORD', message: "Unit '5' is part of a cycle in the unit hierarchy" },
      { key: '6', code: 'INVALID_RECORD', message: "Unit '6' is part of a cycle in the unit hierarchy" },
    ]);
  });
});

describe('LegalReferenceReader', () => {
  const html =
    '<div class="article"><div class="article_number"><span class="article_symbol">§</span> ' +
    '<span class="number">1</span></div><div class="article_title"><span class="title_text">Zweck</span></div></div>';

  it('builds one record per law with paragraphs as children', async () => {
    const client = new StubRecordSource([
      {
        systematic_number: '"153.100"',
        title_de: 'Schulgesetz',
        original_url_de: 'https://laws.example.org/153.100',
        gesetzestext_html: html,
      },
    ]);
    const reader = new LegalReferenceReader({ client, datasetId: '100354' });

    const records = await reader.read();

    expect(records).toEqual([
      {
        key: '153.100',
        label: 'SG 153.100 - Schulgesetz',
        fields: { systematic_number: '153.100', description: 'https://laws.example.org/153.100' },
        children: [{ name: '1', fields: { shortText: 'Zweck' } }],
      },
    ]);
    expect(client.queries).toEqual([
      { datasetId: '100354', query: { where: DEFAULT_LAW_FILTER, orderBy: 'systematic_number' } },
    ]);
  });

  it('skips laws without number or title', async () => {
    const client = new StubRecordSource([
      { systematic_number: '', title_de: 'No number' },
      { systematic_number: '200.1', title_de: '   ' },
    ]);
    const reader = new LegalReferenceReader({ client, datasetId: '100354' });

    expect(await reader.read()).toEqual([]);
    expect(reader.issues).toEqual([
      { key: 'No number', code: 'INVALID_RECORD', message: "Law 'No number' has no systematic number" },
      { key: '200.1', code: 'INVALID_RECORD', message: 'Law 200.1 has no title' },
    ]);
  });
});

describe('DatasetCompositionReader', () => {
  const datasets: OdsDataset[] = [
    {
      dataset_id: '100001',
      metas: { default: { title: 'Population' } },
      fields: [
        { name: 'year', label: 'Year', type: 'int' },
        { name: 'district', label: null, type: 'text', description: ' District name ' },
      ],
    },
    { dataset_id: '100002', fields: [] },
  ];

  it('maps columns to child items keyed by technical name', async () => {
    const reader = new DatasetCompositionReader({
      client: new StubDatasetSource(datasets),
      datasetIds: ['100001'],
      portalUrl: 'https://data.example.org/',
    });

    expect(await reader.read()).toEqual([
      {
        key: '100001',
        label: 'Population',
        fields: {
          dataset_id: '100001',
          dataset_link: 'https://data.example.org/explore/dataset/100001/',
        },
        children: [
          { name: 'year', type: 'int', fields: { label: 'Year' } },
          { name: 'district', type: 'text', fields: { label: 'district', description: 'District name' } },
        ],
      },
    ]);
  });

  it('reads every listed dataset when no ids are configured', async () => {
    const reader = new DatasetCompositionReader({ client: new StubDatasetSource(datasets) });

    const records = await reader.read();

    expect(records.map((r) => [r.key, r.label])).toEqual([
      ['100001', 'Population'],
      ['100002', '100002'],
    ]);
  });
});

describe('DatasetReader', () => {
  const datasets: OdsDataset[] = [
    {
      dataset_id: '100042',
      metas: {
        default: {
          title: ' Street trees ',
          description: 'Trees along public streets',
          keyword: ['trees', ' urban green '],
          publisher: 'Parks Department',
          territory: ['Riverside', 'Old Town'],
          license: 'CC BY 4.0',
          license_url: 'https://licenses.example.org/by-4.0',
        },
        dcat: { accrualperiodicity: 'weekly', issued: '2023-04-01T08:30:00+02:00' },
      },
      fields: [{ name: 'species', type: 'text' }],
    },
    { dataset_id: '100043', metas: { default: { title: 'Bridges', license: 'CC0' } }, fields: [] },
    { dataset_id: '100044', metas: { default: { title: '  ' } }, fields: [] },
  ];

  it('maps portal metadata to dataset fields', async () => {
    const reader = new DatasetReader({
      client: new StubDatasetSource(datasets),
      datasetIds: ['100042'],
      portalUrl: 'https://data.example.org/',
    });

    expect(await reader.read()).toEqual([
      {
        key: '100042',
        label: 'Street trees (OGD)',
        fields: {
          portal_id: '100042',
          description: 'Trees along public streets',
          keywords: ['trees', 'urban green'],
          publisher: 'Parks Department',
          geographic_dimension: 'Old Town, Riverside',
          license: 'https://licenses.example.org/by-4.0',
          accrual_periodicity: 'weekly',
          publication_date: '2023-04-01',
          portal_link: 'https://data.example.org/explore/dataset/100042/',
        },
      },
    ]);
  });

  it('writes absent metadata as null and skips datasets without title', async () => {
    const reader = new DatasetReader({ client: new StubDatasetSource(datasets), labelSuffix: '' });

    const records = await reader.read();

    expect(records.map((r) => r.key)).toEqual(['100042', '100043']);
    expect(records[1]).toEqual({
      key: '100043',
      label: 'Bridges',
      fields: {
        portal_id: '100043',
        description: null,
        keywords: null,
        publisher: null,
        geographic_dimension: null,
        license: 'CC0',
        accrual_periodicity: null,
        publication_date: null,
        portal_link: null,
      },
    });
    expect(reader.issues).toEqual([
      { key: '100044', code: 'INVALID_RECORD', message: "Dataset '100044' has no title" },
    ]);
  });
});

describe('JsonSourceReader', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads records and reports invalid rows', async () => {
    dir = mkdtempSync(join(tmpdir(), 'catalog-sync-json-'));
    const filePath = join(dir, 'records.json');
    writeFileSync(
      filePath,
      '\uFEFF' +
        JSON.stringify({
          records: [
            { key: ' A ', label: 'Alpha', fields: { x: '1' } },
            { key: '', label: 'Broken' },
          ],
        })
    );
    const reader = new JsonSourceReader({ family: 'custom', filePath });

    const records = await reader.read();

    expect(reader.family).toBe('custom');
    expect(records).toEqual([{ key: 'A', label: 'Alpha', fields: { x: '1' } }]);
    expect(reader.issues).toEqual([
      { code: 'INVALID_RECORD', message: 'Record #1: key: String must contain at least 1 character(s)' },
    ]);
  });

  it('fails with a configuration error for a missing file', async () => {
    const reader = new JsonSourceReader({ family: 'custom', filePath: join(tmpdir(), 'missing-catalog-sync.json') });

    await expect(reader.read()).rejects.toMatchObject({ code: 'CONFIGURATION_ERROR' });
  });
});

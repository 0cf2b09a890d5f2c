import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RemoteError } from '@catalog-sync/core';
import { OdsClient } from '../src/ods/client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('OdsClient', () => {
  const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('follows limit/offset pages until a short page', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ total_count: 3, results: [{ n: 1 }, { n: 2 }] }))
      .mockResolvedValueOnce(jsonResponse({ total_count: 3, results: [{ n: 3 }] }));
    const client = new OdsClient({ baseUrl: 'https://data.example.org/', pageSize: 2, apiKey: 'test-key' });

    const records = await client.fetchAllRecords('100354', { where: 'is_active=true', orderBy: 'id' });

    expect(records).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }]);
    expect(fetchMock.mock.calls.map((call) => String(call[0]))).toEqual([
      'https://data.example.org/api/explore/v2.1/catalog/datasets/100354/records?where=is_active%3Dtrue&order_by=id&limit=2&offset=0',
      'https://data.example.org/api/explore/v2.1/catalog/datasets/100354/records?where=is_active%3Dtrue&order_by=id&limit=2&offset=2',
    ]);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: 'Apikey test-key' });
  });

  it('stops on an empty page', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ results: [{ n: 1 }, { n: 2 }] }))
      .mockResolvedValueOnce(jsonResponse({ results: [] }));
    const client = new OdsClient({ baseUrl: 'https://data.example.org', pageSize: 2 });

    expect(await client.fetchAllRecords('1')).toHaveLength(2);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reads dataset metadata with its columns', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        dataset_id: '100001',
        metas: { default: { title: 'Population', modified: '2024-01-01' } },
        fields: [{ name: 'year', label: 'Year', type: 'int' }],
      })
    );
    const client = new OdsClient({ baseUrl: 'https://data.example.org' });

    const dataset = await client.getDataset('100001');

    expect(dataset.metas?.default?.title).toBe('Population');
    expect(dataset.fields).toEqual([{ name: 'year', label: 'Year', type: 'int' }]);
  });

  it('lists dataset ids across pages', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ results: [{ dataset_id: 'a' }, { dataset_id: 'b' }] }))
      .mockResolvedValueOnce(jsonResponse({ results: [{ dataset_id: 'c' }] }));
    const client = new OdsClient({ baseUrl: 'https://data.example.org', pageSize: 2 });

    expect(await client.listDatasetIds()).toEqual(['a', 'b', 'c']);
  });

  it('raises RemoteError on HTTP errors', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}, 503));
    const client = new OdsClient({ baseUrl: 'https://data.example.org' });

    const error = await client.fetchAllRecords('1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({ status: 503 });
  });
});

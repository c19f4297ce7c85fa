import { describe, expect, it } from 'vitest';
import { HBaseRestClient } from '../src/clients/hbase-rest-client.js';
import { HBaseRestError } from '../src/errors.js';
import { queuedFetch, requestBody, silentLogger } from './helpers.js';

const BASE = 'http://hbase.test:8080';

function client(fetch: ReturnType<typeof queuedFetch>) {
  return new HBaseRestClient({ url: `${BASE}/`, fetch, logger: silentLogger() });
}

describe('HBaseRestClient.createTable', () => {
  it('does not recreate a table that already exists', async () => {
    const fetch = queuedFetch([new Response('{"name":"sensor_info"}', { status: 200 })]);

    await expect(client(fetch).createSensorTable()).resolves.toBe(false);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE}/default:sensor_info/schema`);
    expect(fetch.mock.calls[0]?.[1].method).toBe('GET');
  });

  it('posts a schema with one descriptor per column family', async () => {
    const fetch = queuedFetch([new Response('Not found', { status: 404 }), new Response('', { status: 201 })]);

    await expect(client(fetch).createSensorTable('sensors', 'iot')).resolves.toBe(true);

    const [url, init] = fetch.mock.calls[1] ?? [];
    expect(url).toBe(`${BASE}/iot:sensors/schema`);
    expect(init?.method).toBe('POST');
    const body = init ? requestBody(init) : undefined;
    expect(body).toEqual({
      ColumnSchema: ['metadata', 'readings', 'status'].map((name) => ({
        name,
        maxVersions: 1,
        compression: 'NONE',
        bloomFilter: 'NONE',
        inMemory: false,
        timeToLive: 2147483647,
        blockCache: true,
        blocksize: 65536,
      })),
    });
  });

  it('throws with the server response when creation is rejected', async () => {
    const fetch = queuedFetch([new Response('', { status: 404 }), new Response('namespace missing', { status: 500 })]);

    await expect(client(fetch).createTable('t', ['cf'], 'nope')).rejects.toThrow(
      new HBaseRestError('Failed to create table nope:t. Status: 500, Response: namespace missing', 500)
    );
  });
});

describe('HBaseRestClient.tableExists', () => {
  it('maps 404 to false and 200 to true', async () => {
    const fetch = queuedFetch([new Response('', { status: 404 }), new Response('{}', { status: 200 })]);
    const hbase = client(fetch);

    await expect(hbase.tableExists('a')).resolves.toBe(false);
    await expect(hbase.tableExists('b')).resolves.toBe(true);
  });

  it('treats any other status as an error rather than a missing table', async () => {
    const fetch = queuedFetch([new Response('', { status: 503 })]);

    await expect(client(fetch).tableExists('a')).rejects.toMatchObject({ name: 'HBaseRestError', status: 503 });
  });

  it('wraps a network failure', async () => {
    const fetch = queuedFetch([new Error('connect ECONNREFUSED')]);

    await expect(client(fetch).tableExists('a')).rejects.toThrow(
      `Could not reach HBase REST server at ${BASE}/default:a/schema: connect ECONNREFUSED`
    );
  });
});

describe('HBaseRestClient.putCell', () => {
  it('puts a base64-encoded cell under the row key path', async () => {
    const fetch = queuedFetch([new Response('', { status: 200 })]);

    await client(fetch).putCell({
      table: 'sensor_info',
      rowKey: 'row 1',
      family: 'readings',
      column: 'temp',
      value: '21.5',
    });

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE}/default:sensor_info/row%201`);
    expect(init?.method).toBe('PUT');
    expect(init ? requestBody(init) : undefined).toEqual({
      Row: [
        {
          key: 'cm93IDE=',
          Cell: [{ column: 'cmVhZGluZ3M6dGVtcA==', $: 'MjEuNQ==' }],
        },
      ],
    });
  });
});

describe('HBaseRestClient.getTableSchema', () => {
  it('returns the schema document as text', async () => {
    const fetch = queuedFetch([new Response('{"name":"t","ColumnSchema":[]}', { status: 200 })]);

    await expect(client(fetch).getTableSchema('t')).resolves.toBe('{"name":"t","ColumnSchema":[]}');
  });
});

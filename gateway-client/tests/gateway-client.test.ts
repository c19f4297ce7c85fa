import { describe, expect, it, vi } from 'vitest';
import { loadClientConfig } from '../src/config.js';
import { GatewayClient, type FetchLike } from '../src/gateway-client.js';

function replyWith(status: number, body: unknown) {
  return vi.fn<FetchLike>(async () => new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
}

function sentBody(init: RequestInit | undefined): unknown {
  return init && typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('GatewayClient', () => {
  it('posts queries and returns the parsed envelope with its row count', async () => {
    const fetch = replyWith(200, { columns: [{ name: 'C1', type: 'INTEGER' }], rows: [{ C1: 1 }], rowCount: 1 });
    const client = new GatewayClient({ baseUrl: 'http://gateway.test:8099/', fetch });

    const result = await client.query('SELECT 1');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ columns: [{ name: 'C1', type: 'INTEGER' }], rows: [{ C1: 1 }], rowCount: 1 });
    expect(result.metadata).toMatchObject({ status: 200, rowCount: 1 });

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe('http://gateway.test:8099/api/phoenix/query');
    expect(init?.method).toBe('POST');
    expect(sentBody(init)).toEqual({ sql: 'SELECT 1' });
  });

  it('surfaces the error and suggestion from a failed request', async () => {
    const fetch = replyWith(500, { error: 'Table undefined', suggestion: 'Create it first' });
    const client = new GatewayClient({ fetch });

    const result = await client.query('SELECT * FROM NOPE');

    expect(result).toMatchObject({
      success: false,
      error: 'Table undefined',
      suggestion: 'Create it first',
      metadata: { status: 500 },
    });
  });

  it('uses the message of a conflict response as its error', async () => {
    const fetch = replyWith(409, {
      message: "Sensor table 'default:sensor_info' already exists",
      tableName: 'sensor_info',
      namespace: 'default',
    });
    const client = new GatewayClient({ fetch });

    const result = await client.createSensorTable();

    expect(result).toMatchObject({
      success: false,
      error: "Sensor table 'default:sensor_info' already exists",
      metadata: { status: 409 },
    });
  });

  it('falls back to the status and text for a non-JSON error body', async () => {
    const client = new GatewayClient({ fetch: replyWith(502, 'Bad Gateway') });

    const result = await client.health();

    expect(result.error).toBe('HTTP 502: Bad Gateway');
  });

  it('reports an unreachable gateway with status 0', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const client = new GatewayClient({ baseUrl: 'http://gateway.test:8099', fetch });

    const result = await client.listTables();

    expect(result).toMatchObject({
      success: false,
      error: 'Could not reach gateway at http://gateway.test:8099: connect ECONNREFUSED',
      metadata: { status: 0 },
    });
  });

  it('rejects a body that does not match the expected shape', async () => {
    const client = new GatewayClient({ fetch: replyWith(200, { tableName: 't', namespace: 'default' }) });

    const result = await client.hbaseTableExists('t');

    expect(result.success).toBe(false);
    expect(result.error).toBe('Unexpected response from gateway: exists: Required');
  });

  it('encodes path segments and the namespace query', async () => {
    const fetch = replyWith(200, { tableName: 'my table', namespace: 'iot', exists: true });
    const client = new GatewayClient({ baseUrl: 'http://gateway.test:8099', fetch });

    await client.hbaseTableExists('my table', 'iot');

    expect(fetch.mock.calls[0]?.[0]).toBe('http://gateway.test:8099/api/phoenix/hbase/tables/my%20table/exists?namespace=iot');
  });

  it('sends put requests to the table data route', async () => {
    const echo = { message: 'Data inserted successfully into default:t', rowKey: 'r1', columnFamily: 'cf', column: 'c', value: 'v' };
    const fetch = replyWith(200, echo);
    const client = new GatewayClient({ fetch });

    const result = await client.hbasePutData('t', { rowKey: 'r1', columnFamily: 'cf', column: 'c', value: 'v' });

    expect(result.data).toEqual(echo);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe('http://localhost:8099/api/phoenix/hbase/tables/t/data');
    expect(init?.method).toBe('PUT');
    expect(sentBody(init)).toEqual({ rowKey: 'r1', columnFamily: 'cf', column: 'c', value: 'v' });
  });
});

describe('loadClientConfig', () => {
  it('uses defaults for unset or blank variables', () => {
    expect(loadClientConfig({ GATEWAY_URL: '' })).toEqual({ baseUrl: 'http://localhost:8099', timeoutMs: 300000 });
  });

  it('reads the gateway URL and timeout', () => {
    expect(loadClientConfig({ GATEWAY_URL: 'http://gw.test:9000', GATEWAY_TIMEOUT_MS: '5000' })).toEqual({
      baseUrl: 'http://gw.test:9000',
      timeoutMs: 5000,
    });
  });

  it('rejects an invalid URL', () => {
    expect(() => loadClientConfig({ GATEWAY_URL: 'not a url' })).toThrow(/^Invalid client configuration: GATEWAY_URL/);
  });
});

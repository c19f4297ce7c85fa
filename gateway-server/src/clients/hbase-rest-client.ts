import { HBaseRestError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { preview } from '../utils/statement.js';
import type { FetchLike } from './protocol-transport.js';

export interface HBaseRestClientOptions {
  url: string;
  fetch?: FetchLike;
  logger?: Logger;
  requestTimeoutMs?: number;
}

export interface PutCellRequest {
  table: string;
  rowKey: string;
  family: string;
  column: string;
  value: string;
  namespace?: string;
}

export const SENSOR_COLUMN_FAMILIES = ['metadata', 'readings', 'status'] as const;

function toBase64(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

function columnFamilyDescriptor(name: string) {
  return {
    name,
    maxVersions: 1,
    compression: 'NONE',
    bloomFilter: 'NONE',
    inMemory: false,
    timeToLive: 2147483647,
    blockCache: true,
    blocksize: 65536,
  };
}

/**
 * Client for the HBase REST server: table DDL and single-cell writes. It shares
 * nothing with the Phoenix connection.
 */
export class HBaseRestClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;

  constructor(options: HBaseRestClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? console;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
  }

  /**
   * Create a table with the given column families.
   * @returns `false` when the table already exists
   */
  async createTable(table: string, columnFamilies: readonly string[], namespace: string = 'default'): Promise<boolean> {
    if (await this.tableExists(table, namespace)) {
      this.logger.log(`Table ${namespace}:${table} already exists`);
      return false;
    }

    const body = { ColumnSchema: columnFamilies.map(columnFamilyDescriptor) };
    const response = await this.request('POST', this.schemaPath(table, namespace), body);
    if (!response.ok) {
      throw new HBaseRestError(
        `Failed to create table ${namespace}:${table}. Status: ${response.status}, Response: ${preview(await response.text(), 500)}`,
        response.status
      );
    }

    this.logger.log(`Table ${namespace}:${table} created with column families: ${columnFamilies.join(', ')}`);
    return true;
  }

  async createSensorTable(table: string = 'sensor_info', namespace: string = 'default'): Promise<boolean> {
    return this.createTable(table, SENSOR_COLUMN_FAMILIES, namespace);
  }

  async tableExists(table: string, namespace: string = 'default'): Promise<boolean> {
    const response = await this.request('GET', this.schemaPath(table, namespace));
    if (response.status === 404) {
      return false;
    }
    if (!response.ok) {
      throw new HBaseRestError(
        `Could not check table ${namespace}:${table}. Status: ${response.status}`,
        response.status
      );
    }
    return true;
  }

  async getTableSchema(table: string, namespace: string = 'default'): Promise<string> {
    const response = await this.request('GET', this.schemaPath(table, namespace));
    const text = await response.text();
    if (!response.ok) {
      throw new HBaseRestError(
        `Error getting schema for table ${namespace}:${table}. Status: ${response.status}, Response: ${preview(text, 500)}`,
        response.status
      );
    }
    return text;
  }

  /**
   * Write one cell. Row key, column and value travel base64-encoded.
   */
  async putCell(cell: PutCellRequest): Promise<void> {
    const namespace = cell.namespace ?? 'default';
    const body = {
      Row: [
        {
          key: toBase64(cell.rowKey),
          Cell: [{ column: toBase64(`${cell.family}:${cell.column}`), $: toBase64(cell.value) }],
        },
      ],
    };

    const path = `/${namespace}:${cell.table}/${encodeURIComponent(cell.rowKey)}`;
    const response = await this.request('PUT', path, body);
    if (!response.ok) {
      throw new HBaseRestError(
        `Error inserting data into ${namespace}:${cell.table}. Status: ${response.status}, Response: ${preview(await response.text(), 500)}`,
        response.status
      );
    }
  }

  private schemaPath(table: string, namespace: string): string {
    return `/${namespace}:${table}/schema`;
  }

  private async request(method: 'GET' | 'POST' | 'PUT', path: string, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await this.fetchImpl(url, {
        method,
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new HBaseRestError(`Could not reach HBase REST server at ${url}: ${errorMessage(error)}`, undefined, error);
    }
  }
}

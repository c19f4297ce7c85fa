/**
 * Typed client for the Phoenix gateway's HTTP endpoints.
 *
 * Every call resolves to a `GatewayResult`; failures (HTTP errors, an
 * unreachable gateway, an unexpected body) are reported in it rather than
 * thrown.
 */

import { z } from 'zod';
import type { GatewayResult, PutDataRequest, TabularData, ViewDefinition } from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface GatewayClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ColumnInfoSchema = z.object({ name: z.string(), type: z.string() });

const TabularSchema = z.object({
  columns: z.array(ColumnInfoSchema),
  rows: z.array(z.record(CellValueSchema)),
  rowCount: z.number(),
  message: z.string().optional(),
});

const HealthSchema = z.object({
  status: z.string(),
  timestamp: z.string(),
  connection: z
    .object({ state: z.string(), transport: z.string(), driverEligible: z.boolean() })
    .optional(),
});

const MessageSchema = z.object({ message: z.string() }).passthrough();

const ExecuteSchema = z.object({ message: z.string(), updateCount: z.number().optional() });

const ViewDetailSchema = z.object({
  viewName: z.string(),
  columns: z.array(ColumnInfoSchema),
  rows: z.array(z.record(CellValueSchema)),
  rowCount: z.number(),
});

const CreateViewSchema = z.object({
  message: z.string(),
  viewName: z.string(),
  hbaseTableName: z.string(),
  namespace: z.string(),
  sql: z.string(),
});

const SensorTableSchema = z.object({
  message: z.string(),
  tableName: z.string(),
  namespace: z.string(),
  columnFamilies: z.array(z.string()).optional(),
});

const TableExistsSchema = z.object({ tableName: z.string(), namespace: z.string(), exists: z.boolean() });

const TableSchemaSchema = z.object({ tableName: z.string(), namespace: z.string(), schema: z.string() });

const PutDataSchema = z.object({
  message: z.string(),
  rowKey: z.string(),
  columnFamily: z.string(),
  column: z.string(),
  value: z.string(),
});

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  suggestion: z.string().nullish(),
});

export type HealthData = z.infer<typeof HealthSchema>;
export type ExecuteData = z.infer<typeof ExecuteSchema>;
export type ViewDetail = z.infer<typeof ViewDetailSchema>;
export type CreateViewData = z.infer<typeof CreateViewSchema>;
export type SensorTableData = z.infer<typeof SensorTableSchema>;
export type TableExistsData = z.infer<typeof TableExistsSchema>;
export type TableSchemaData = z.infer<typeof TableSchemaSchema>;
export type PutData = z.infer<typeof PutDataSchema>;

function namespaceQuery(namespace?: string): string {
  return namespace ? `?namespace=${encodeURIComponent(namespace)}` : '';
}

function rowCountOf(data: unknown): number | undefined {
  if (typeof data === 'object' && data !== null && 'rowCount' in data && typeof data.rowCount === 'number') {
    return data.rowCount;
  }
  return undefined;
}

export class GatewayClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GatewayClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'http://localhost:8099').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 300000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get url(): string {
    return this.baseUrl;
  }

  health(): Promise<GatewayResult<HealthData>> {
    return this.request('GET', '/health', HealthSchema);
  }

  listTables(): Promise<GatewayResult<TabularData>> {
    return this.request('GET', '/tables', TabularSchema);
  }

  tableColumns(tableName: string): Promise<GatewayResult<TabularData>> {
    return this.request('GET', `/tables/${encodeURIComponent(tableName)}/columns`, TabularSchema);
  }

  query(sql: string): Promise<GatewayResult<TabularData>> {
    return this.request('POST', '/query', TabularSchema, { sql });
  }

  execute(sql: string): Promise<GatewayResult<ExecuteData>> {
    return this.request('POST', '/execute', ExecuteSchema, { sql });
  }

  listViews(): Promise<GatewayResult<TabularData>> {
    return this.request('GET', '/views', TabularSchema);
  }

  getView(viewName: string): Promise<GatewayResult<ViewDetail>> {
    return this.request('GET', `/views/${encodeURIComponent(viewName)}`, ViewDetailSchema);
  }

  viewColumns(viewName: string): Promise<GatewayResult<TabularData>> {
    return this.request('GET', `/views/${encodeURIComponent(viewName)}/columns`, TabularSchema);
  }

  createView(definition: ViewDefinition): Promise<GatewayResult<CreateViewData>> {
    return this.request('POST', '/views', CreateViewSchema, definition);
  }

  dropView(viewName: string): Promise<GatewayResult<z.infer<typeof MessageSchema>>> {
    return this.request('DELETE', `/views/${encodeURIComponent(viewName)}`, MessageSchema);
  }

  /**
   * A 409 (table already exists) comes back as `success: false` with the
   * server's message in `error`.
   */
  createSensorTable(options: { tableName?: string; namespace?: string } = {}): Promise<GatewayResult<SensorTableData>> {
    return this.request('POST', '/hbase/tables/sensor', SensorTableSchema, options);
  }

  hbaseTableExists(tableName: string, namespace?: string): Promise<GatewayResult<TableExistsData>> {
    return this.request(
      'GET',
      `/hbase/tables/${encodeURIComponent(tableName)}/exists${namespaceQuery(namespace)}`,
      TableExistsSchema
    );
  }

  hbaseTableSchema(tableName: string, namespace?: string): Promise<GatewayResult<TableSchemaData>> {
    return this.request(
      'GET',
      `/hbase/tables/${encodeURIComponent(tableName)}/schema${namespaceQuery(namespace)}`,
      TableSchemaSchema
    );
  }

  hbasePutData(tableName: string, data: PutDataRequest): Promise<GatewayResult<PutData>> {
    return this.request('PUT', `/hbase/tables/${encodeURIComponent(tableName)}/data`, PutDataSchema, data);
  }

  private async request<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<GatewayResult<T>> {
    const url = `${this.baseUrl}/api/phoenix${path}`;
    const startTime = Date.now();
    const elapsed = () => Date.now() - startTime;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? { Accept: 'application/json' } : { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      return {
        success: false,
        error: `Could not reach gateway at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
        metadata: { executionTimeMs: elapsed(), status: 0 },
      };
    }

    let payload: unknown = undefined;
    try {
      payload = text.length > 0 ? JSON.parse(text) : undefined;
    } catch {
      payload = undefined;
    }

    if (!response.ok) {
      const parsedError = ErrorBodySchema.safeParse(payload);
      const details: z.infer<typeof ErrorBodySchema> = parsedError.success ? parsedError.data : {};
      return {
        success: false,
        error: details.error ?? details.message ?? `HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
        suggestion: details.suggestion ?? undefined,
        metadata: { executionTimeMs: elapsed(), status: response.status },
      };
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      return {
        success: false,
        error: `Unexpected response from gateway: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
        metadata: { executionTimeMs: elapsed(), status: response.status },
      };
    }

    return {
      success: true,
      data: parsed.data,
      metadata: { executionTimeMs: elapsed(), status: response.status, rowCount: rowCountOf(parsed.data) },
    };
  }
}

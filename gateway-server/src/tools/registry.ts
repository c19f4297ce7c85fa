import type { z } from 'zod';
import { ValidationError } from '../errors.js';
import { healthTool, listTablesTool, tableColumnsTool } from './catalog-tools.js';
import { createSensorTableTool, hbasePutDataTool, hbaseTableExistsTool, hbaseTableSchemaTool } from './hbase-tools.js';
import { executeTool, queryTool } from './sql-tools.js';
import type { GatewayServices, GatewayTool, ToolResponse } from './tool.js';
import { createViewTool, dropViewTool, getViewTool, listViewsTool, viewColumnsTool } from './view-tools.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * A tool bound to the HTTP route that serves it. `run` validates the raw
 * input against the tool's schema before executing it.
 */
export interface RegisteredTool {
  name: string;
  method: HttpMethod;
  path: string;
  description: string;
  run(input: unknown, services: GatewayServices): Promise<ToolResponse>;
}

function register<S extends z.ZodTypeAny>(
  name: string,
  method: HttpMethod,
  path: string,
  tool: GatewayTool<S>
): RegisteredTool {
  return {
    name,
    method,
    path,
    description: tool.description,
    async run(input, services) {
      const parsed = tool.inputSchema.safeParse(input);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message));
      }
      return tool.execute(parsed.data, services);
    },
  };
}

export const API_PREFIX = '/api/phoenix';

// Tool registry, in the order the endpoints are listed at startup
export const tools: RegisteredTool[] = [
  register('health', 'GET', '/health', healthTool),
  register('list_tables', 'GET', '/tables', listTablesTool),
  register('table_columns', 'GET', '/tables/:tableName/columns', tableColumnsTool),
  register('query', 'POST', '/query', queryTool),
  register('execute', 'POST', '/execute', executeTool),
  register('list_views', 'GET', '/views', listViewsTool),
  register('get_view', 'GET', '/views/:viewName', getViewTool),
  register('view_columns', 'GET', '/views/:viewName/columns', viewColumnsTool),
  register('create_view', 'POST', '/views', createViewTool),
  register('drop_view', 'DELETE', '/views/:viewName', dropViewTool),
  register('create_sensor_table', 'POST', '/hbase/tables/sensor', createSensorTableTool),
  register('hbase_table_exists', 'GET', '/hbase/tables/:tableName/exists', hbaseTableExistsTool),
  register('hbase_table_schema', 'GET', '/hbase/tables/:tableName/schema', hbaseTableSchemaTool),
  register('hbase_put_data', 'PUT', '/hbase/tables/:tableName/data', hbasePutDataTool),
];

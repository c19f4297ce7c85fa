import type { TabularResult } from '../types.js';
import type { GatewayServices } from './tool.js';

// Every SQL endpoint opens on demand; open() returns at once when already open
export async function runQuery(services: GatewayServices, sql: string): Promise<TabularResult> {
  await services.connection.open();
  return services.connection.execute({ sql, kind: 'Query' });
}

export async function runExecute(services: GatewayServices, sql: string): Promise<TabularResult> {
  await services.connection.open();
  return services.connection.execute({ sql, kind: 'Execute' });
}

export async function viewExists(services: GatewayServices, viewName: string): Promise<boolean> {
  const result = await runQuery(services, services.renderer.viewExists(viewName));
  return result.rows.length > 0;
}

export function viewNotFound(viewName: string) {
  return {
    status: 404 as const,
    body: {
      error: `View '${viewName}' not found`,
      suggestion: 'List all views using: GET /api/phoenix/views',
    },
  };
}

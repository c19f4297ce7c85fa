import { Hono, type Context } from 'hono';
import { DriverTransport, type ModuleImporter } from './clients/driver-transport.js';
import { HBaseRestClient } from './clients/hbase-rest-client.js';
import { type FetchLike, ProtocolTransport } from './clients/protocol-transport.js';
import { ConnectionManager } from './connection/connection-manager.js';
import { PhoenixSqlRenderer } from './renderers/phoenix-sql-renderer.js';
import { API_PREFIX, type RegisteredTool, tools } from './tools/registry.js';
import type { GatewayServices } from './tools/tool.js';
import type { GatewayConfig } from './utils/config.js';
import { toErrorResponse } from './utils/error-response.js';
import type { Logger } from './utils/logger.js';
import type { Sleep } from './utils/retry.js';
import { IdentifierValidator } from './validators/identifier-validator.js';

export interface ServiceOverrides {
  fetch?: FetchLike;
  hbaseFetch?: FetchLike;
  importer?: ModuleImporter;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Wire up the process-wide services from configuration.
 */
export function createServices(config: GatewayConfig, overrides: ServiceOverrides = {}): GatewayServices {
  const logger = overrides.logger ?? console;

  const driver = new DriverTransport({
    connectionString: config.phoenix.odbcConnectionString,
    moduleName: config.phoenix.driverModule,
    importer: overrides.importer,
    logger,
  });

  const protocol = new ProtocolTransport({
    url: config.phoenix.url,
    statementMode: config.phoenix.statementMode,
    maxRowCount: config.phoenix.maxRowCount,
    requestTimeoutMs: config.phoenix.requestTimeoutMs,
    openAttempts: config.phoenix.openAttempts,
    openRetryDelayMs: config.phoenix.openRetryDelayMs,
    fetch: overrides.fetch,
    sleep: overrides.sleep,
    logger,
  });

  return {
    connection: new ConnectionManager({ driver, protocol, logger }),
    hbase: new HBaseRestClient({ url: config.hbase.url, fetch: overrides.hbaseFetch ?? overrides.fetch, logger }),
    renderer: new PhoenixSqlRenderer(),
    validator: new IdentifierValidator(),
    logger,
  };
}

class InvalidJsonBodyError extends Error {
  constructor() {
    super('Invalid JSON body');
    this.name = 'InvalidJsonBodyError';
  }
}

async function readBody(c: Context): Promise<Record<string, unknown>> {
  const text = await c.req.text();
  if (text.trim().length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InvalidJsonBodyError();
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidJsonBodyError();
  }
  return Object.fromEntries(Object.entries(parsed));
}

async function readInput(c: Context, tool: RegisteredTool): Promise<Record<string, unknown>> {
  const fromUrl: Record<string, unknown> = { ...c.req.query() };
  for (const [, name] of tool.path.matchAll(/:(\w+)/g)) {
    const value = c.req.param(name);
    if (value !== undefined) {
      fromUrl[name] = value;
    }
  }
  if (tool.method === 'GET' || tool.method === 'DELETE') {
    return fromUrl;
  }
  // A body field wins over the path parameter of the same name
  return { ...fromUrl, ...(await readBody(c)) };
}

/**
 * Build the HTTP application: one route per registered tool under
 * `/api/phoenix`.
 */
export function createApp(services: GatewayServices) {
  const app = new Hono();

  for (const tool of tools) {
    app.on(tool.method, `${API_PREFIX}${tool.path}`, async (c) => {
      let input: Record<string, unknown>;
      try {
        input = await readInput(c, tool);
      } catch (error) {
        if (error instanceof InvalidJsonBodyError) {
          return c.json({ error: error.message }, 400);
        }
        throw error;
      }

      try {
        const response = await tool.run(input, services);
        return c.json(response.body, response.status);
      } catch (error) {
        const response = toErrorResponse(error);
        if (response.status >= 500) {
          services.logger.error(`Tool ${tool.name} error:`, error);
        }
        return c.json(response.body, response.status);
      }
    });
  }

  app.notFound((c) => c.json({ error: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.onError((error, c) => {
    services.logger.error('Unhandled request error:', error);
    const response = toErrorResponse(error);
    return c.json(response.body, response.status);
  });

  return app;
}

export { tools, API_PREFIX } from './tools/registry.js';
export { loadConfig, type GatewayConfig } from './utils/config.js';
export { ConnectionManager } from './connection/connection-manager.js';
export { WarmupInitializer } from './connection/warmup-initializer.js';
export { ProtocolTransport } from './clients/protocol-transport.js';
export { DriverTransport } from './clients/driver-transport.js';
export { HBaseRestClient } from './clients/hbase-rest-client.js';
export { normalizeResult } from './results/result-normalizer.js';
export { toJsonEnvelope } from './results/json-envelope.js';
export * from './errors.js';
export type * from './types.js';

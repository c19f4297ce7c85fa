import { z } from 'zod';
import type { HBaseRestClient } from '../clients/hbase-rest-client.js';
import type { ConnectionManager } from '../connection/connection-manager.js';
import type { PhoenixSqlRenderer } from '../renderers/phoenix-sql-renderer.js';
import type { Logger } from '../utils/logger.js';
import type { IdentifierValidator } from '../validators/identifier-validator.js';

export interface GatewayServices {
  connection: ConnectionManager;
  hbase: HBaseRestClient;
  renderer: PhoenixSqlRenderer;
  validator: IdentifierValidator;
  logger: Logger;
}

export type ToolStatus = 200 | 400 | 404 | 409 | 500 | 503;

export interface ToolResponse {
  status: ToolStatus;
  body: Record<string, unknown>;
}

export interface GatewayTool<S extends z.ZodTypeAny> {
  description: string;
  inputSchema: S;
  execute(args: z.infer<S>, services: GatewayServices): Promise<ToolResponse>;
}

export function ok(body: Record<string, unknown>): ToolResponse {
  return { status: 200, body };
}

/**
 * A string field that reports `message` when missing, mistyped or blank.
 */
export function requiredString(message: string) {
  return z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message);
}

export const NamespaceSchema = z.string().trim().min(1).optional();

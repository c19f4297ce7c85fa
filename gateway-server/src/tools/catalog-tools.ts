import { z } from 'zod';
import { toJsonEnvelope } from '../results/json-envelope.js';
import type { TabularResult } from '../types.js';
import { assertValid } from '../validators/identifier-validator.js';
import { runQuery } from './statements.js';
import { type GatewayTool, ok, requiredString } from './tool.js';

const NO_TABLES_MESSAGE = 'No tables found in Phoenix. Create a table using: POST /api/phoenix/execute with SQL: CREATE TABLE ...';

const HealthInputSchema = z.object({});
const ListTablesInputSchema = z.object({});
const TableColumnsInputSchema = z.object({
  tableName: requiredString('Table name is required'),
});

export const healthTool: GatewayTool<typeof HealthInputSchema> = {
  description: 'Report that the gateway is up, with the state of its Phoenix connection',
  inputSchema: HealthInputSchema,

  async execute(_args, services) {
    const snapshot = services.connection.snapshot();
    return ok({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      connection: {
        state: snapshot.state,
        transport: snapshot.activeTransportKind,
        driverEligible: services.connection.isDriverEligible(),
      },
    });
  },
};

export const listTablesTool: GatewayTool<typeof ListTablesInputSchema> = {
  description: 'List Phoenix tables from SYSTEM.CATALOG',
  inputSchema: ListTablesInputSchema,

  async execute(_args, services) {
    let result: TabularResult = { columns: [], rows: [] };
    for (const sql of services.renderer.listTables()) {
      result = await runQuery(services, sql);
      if (result.rows.length > 0) {
        break;
      }
    }

    if (result.rows.length === 0 && result.columns.length === 0) {
      return ok({ columns: [], rows: [], rowCount: 0, message: NO_TABLES_MESSAGE });
    }
    return ok(toJsonEnvelope(result, NO_TABLES_MESSAGE));
  },
};

export const tableColumnsTool: GatewayTool<typeof TableColumnsInputSchema> = {
  description: 'Describe the columns of a table (names are case-sensitive)',
  inputSchema: TableColumnsInputSchema,

  async execute(args, services) {
    assertValid(services.validator.validateTableName(args.tableName));
    const result = await runQuery(services, services.renderer.listColumns(args.tableName));
    return ok(toJsonEnvelope(result));
  },
};

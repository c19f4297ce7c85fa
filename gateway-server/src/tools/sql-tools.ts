import { z } from 'zod';
import { toJsonEnvelope } from '../results/json-envelope.js';
import { trimStatement } from '../utils/statement.js';
import { runExecute, runQuery } from './statements.js';
import { type GatewayTool, ok } from './tool.js';

function sqlField(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .refine((sql) => trimStatement(sql).length > 0, message);
}

const QueryInputSchema = z.object({
  sql: sqlField('SQL query is required'),
});

const ExecuteInputSchema = z.object({
  sql: sqlField('SQL statement is required'),
});

export const queryTool: GatewayTool<typeof QueryInputSchema> = {
  description: 'Run a SELECT statement and return its rows. Trailing semicolons are removed.',
  inputSchema: QueryInputSchema,

  async execute(args, services) {
    const result = await runQuery(services, args.sql);
    return ok(toJsonEnvelope(result));
  },
};

export const executeTool: GatewayTool<typeof ExecuteInputSchema> = {
  description: 'Run a DDL or DML statement (CREATE, UPSERT, DELETE, DROP, ALTER)',
  inputSchema: ExecuteInputSchema,

  async execute(args, services) {
    const result = await runExecute(services, args.sql);
    const body: Record<string, unknown> = { message: 'Command executed successfully' };
    if (result.updateCount !== undefined) {
      body.updateCount = result.updateCount;
    }
    return ok(body);
  },
};

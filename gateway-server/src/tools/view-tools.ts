import { z } from 'zod';
import { toJsonEnvelope } from '../results/json-envelope.js';
import { assertValid } from '../validators/identifier-validator.js';
import { runExecute, runQuery, viewExists, viewNotFound } from './statements.js';
import { type GatewayTool, NamespaceSchema, ok, requiredString } from './tool.js';

const NO_VIEWS_MESSAGE = 'No views found in Phoenix. Create a view using: POST /api/phoenix/views';

const ListViewsInputSchema = z.object({});

const ViewNameInputSchema = z.object({
  viewName: requiredString('View name is required'),
});

const CreateViewInputSchema = z.object({
  viewName: requiredString('ViewName is required'),
  hbaseTableName: requiredString('HBaseTableName is required'),
  namespace: NamespaceSchema,
  columns: z
    .array(
      z.object({
        name: requiredString('Column name is required'),
        type: z.string().trim().min(1).default('VARCHAR'),
        isPrimaryKey: z.boolean().optional(),
      }),
      { required_error: 'At least one column definition is required' }
    )
    .min(1, 'At least one column definition is required'),
});

export const listViewsTool: GatewayTool<typeof ListViewsInputSchema> = {
  description: 'List Phoenix views',
  inputSchema: ListViewsInputSchema,

  async execute(_args, services) {
    const result = await runQuery(services, services.renderer.listViews());
    const envelope = toJsonEnvelope(result, NO_VIEWS_MESSAGE);
    if (result.rows.length === 0) {
      envelope.message = NO_VIEWS_MESSAGE;
    }
    return ok(envelope);
  },
};

export const getViewTool: GatewayTool<typeof ViewNameInputSchema> = {
  description: 'Show a view and the columns it declares',
  inputSchema: ViewNameInputSchema,

  async execute(args, services) {
    assertValid(services.validator.validateTableName(args.viewName, 'view name'));
    if (!(await viewExists(services, args.viewName))) {
      return viewNotFound(args.viewName);
    }

    const envelope = toJsonEnvelope(await runQuery(services, services.renderer.listColumns(args.viewName)));
    return ok({
      viewName: args.viewName,
      columns: envelope.columns,
      rows: envelope.rows,
      rowCount: envelope.rowCount,
    });
  },
};

export const viewColumnsTool: GatewayTool<typeof ViewNameInputSchema> = {
  description: 'Describe the columns of a view',
  inputSchema: ViewNameInputSchema,

  async execute(args, services) {
    assertValid(services.validator.validateTableName(args.viewName, 'view name'));
    if (!(await viewExists(services, args.viewName))) {
      return viewNotFound(args.viewName);
    }
    return ok(toJsonEnvelope(await runQuery(services, services.renderer.listColumns(args.viewName))));
  },
};

export const createViewTool: GatewayTool<typeof CreateViewInputSchema> = {
  description: 'Create a Phoenix view over an existing HBase table',
  inputSchema: CreateViewInputSchema,

  async execute(args, services) {
    assertValid(services.validator.validateViewDefinition(args));

    const namespace = args.namespace ?? 'default';
    if (!(await services.hbase.tableExists(args.hbaseTableName, namespace))) {
      return {
        status: 400,
        body: {
          error: `HBase table '${namespace}:${args.hbaseTableName}' does not exist`,
          suggestion: `Create the table first using: POST /api/phoenix/hbase/tables/sensor or POST /api/phoenix/hbase/tables/${args.hbaseTableName}`,
        },
      };
    }

    const sql = services.renderer.createView({ ...args, namespace });
    await runExecute(services, sql);

    return ok({
      message: `Phoenix view '${args.viewName}' created successfully on HBase table '${namespace}:${args.hbaseTableName}'`,
      viewName: args.viewName,
      hbaseTableName: args.hbaseTableName,
      namespace,
      sql,
    });
  },
};

export const dropViewTool: GatewayTool<typeof ViewNameInputSchema> = {
  description: 'Drop a Phoenix view. The underlying HBase table is left alone.',
  inputSchema: ViewNameInputSchema,

  async execute(args, services) {
    assertValid(services.validator.validateTableName(args.viewName, 'view name'));
    if (!(await viewExists(services, args.viewName))) {
      return viewNotFound(args.viewName);
    }

    await runExecute(services, services.renderer.dropView(args.viewName));
    return ok({ message: `View '${args.viewName}' dropped successfully`, viewName: args.viewName });
  },
};

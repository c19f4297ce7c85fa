import { z } from 'zod';
import { SENSOR_COLUMN_FAMILIES } from '../clients/hbase-rest-client.js';
import { assertValid } from '../validators/identifier-validator.js';
import { type GatewayTool, NamespaceSchema, ok, requiredString } from './tool.js';

const CreateSensorTableInputSchema = z.object({
  tableName: z.string().trim().min(1).default('sensor_info'),
  namespace: NamespaceSchema,
});

const HBaseTableInputSchema = z.object({
  tableName: requiredString('Table name is required'),
  namespace: NamespaceSchema,
});

const PutDataInputSchema = z.object({
  tableName: requiredString('Table name is required'),
  namespace: NamespaceSchema,
  rowKey: requiredString('RowKey is required'),
  columnFamily: requiredString('ColumnFamily is required'),
  column: requiredString('Column is required'),
  value: z.string({ required_error: 'Value is required', invalid_type_error: 'Value must be a string' }),
});

export const createSensorTableTool: GatewayTool<typeof CreateSensorTableInputSchema> = {
  description: 'Create an HBase table with the metadata, readings and status column families',
  inputSchema: CreateSensorTableInputSchema,

  async execute(args, services) {
    const namespace = args.namespace ?? 'default';
    assertValid(services.validator.validateHBaseName(args.tableName, 'table name'));
    assertValid(services.validator.validateHBaseName(namespace, 'namespace'));

    const created = await services.hbase.createSensorTable(args.tableName, namespace);
    if (!created) {
      return {
        status: 409,
        body: {
          message: `Sensor table '${namespace}:${args.tableName}' already exists`,
          tableName: args.tableName,
          namespace,
        },
      };
    }

    return ok({
      message: `Sensor table '${namespace}:${args.tableName}' created successfully`,
      tableName: args.tableName,
      namespace,
      columnFamilies: [...SENSOR_COLUMN_FAMILIES],
    });
  },
};

export const hbaseTableExistsTool: GatewayTool<typeof HBaseTableInputSchema> = {
  description: 'Check whether an HBase table exists',
  inputSchema: HBaseTableInputSchema,

  async execute(args, services) {
    const namespace = args.namespace ?? 'default';
    assertValid(services.validator.validateHBaseName(args.tableName, 'table name'));
    assertValid(services.validator.validateHBaseName(namespace, 'namespace'));

    const exists = await services.hbase.tableExists(args.tableName, namespace);
    return ok({ tableName: args.tableName, namespace, exists });
  },
};

export const hbaseTableSchemaTool: GatewayTool<typeof HBaseTableInputSchema> = {
  description: 'Fetch the HBase schema of a table',
  inputSchema: HBaseTableInputSchema,

  async execute(args, services) {
    const namespace = args.namespace ?? 'default';
    assertValid(services.validator.validateHBaseName(args.tableName, 'table name'));
    assertValid(services.validator.validateHBaseName(namespace, 'namespace'));

    const schema = await services.hbase.getTableSchema(args.tableName, namespace);
    return ok({ tableName: args.tableName, namespace, schema });
  },
};

export const hbasePutDataTool: GatewayTool<typeof PutDataInputSchema> = {
  description: 'Write a single cell to an HBase table',
  inputSchema: PutDataInputSchema,

  async execute(args, services) {
    const namespace = args.namespace ?? 'default';
    assertValid(services.validator.validateHBaseName(args.tableName, 'table name'));
    assertValid(services.validator.validateHBaseName(namespace, 'namespace'));

    await services.hbase.putCell({
      table: args.tableName,
      rowKey: args.rowKey,
      family: args.columnFamily,
      column: args.column,
      value: args.value,
      namespace,
    });

    return ok({
      message: `Data inserted successfully into ${namespace}:${args.tableName}`,
      rowKey: args.rowKey,
      columnFamily: args.columnFamily,
      column: args.column,
      value: args.value,
    });
  },
};

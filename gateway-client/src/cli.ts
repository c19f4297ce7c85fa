#!/usr/bin/env node

/**
 * Command-line client for the Phoenix gateway.
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { loadClientConfig } from './config.js';
import { GatewayClient } from './gateway-client.js';
import { isQueryStatement, splitStatements } from './helpers/split-statements.js';
import type { GatewayResult, TabularData } from './types.js';

dotenv.config();

const ViewDefinitionFileSchema = z.object({
  viewName: z.string().min(1),
  hbaseTableName: z.string().min(1),
  namespace: z.string().min(1).optional(),
  columns: z
    .array(z.object({ name: z.string().min(1), type: z.string().optional(), isPrimaryKey: z.boolean().optional() }))
    .min(1),
});

const program = new Command();

program
  .name('phoenix-gateway')
  .description('Command-line client for the Phoenix HTTP gateway')
  .version('1.0.0')
  .option('-u, --url <url>', 'Gateway base URL (defaults to GATEWAY_URL or http://localhost:8099)');

function createClient(): GatewayClient {
  const config = loadClientConfig();
  const opts = program.opts<{ url?: string }>();
  return new GatewayClient({ baseUrl: opts.url ?? config.baseUrl, timeoutMs: config.timeoutMs });
}

function fail(result: GatewayResult<unknown>): never {
  console.error(`❌ ${result.error ?? 'Request failed'} (HTTP ${result.metadata.status})`);
  if (result.suggestion) {
    console.error(`💡 ${result.suggestion}`);
  }
  process.exit(1);
}

function printTable(data: TabularData): void {
  if (data.rows.length > 0) {
    console.table(data.rows);
  }
  console.log(`📊 Rows: ${data.rowCount}`);
  if (data.message) {
    console.log(`ℹ️  ${data.message}`);
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Run a command action, turning unexpected exceptions into exit code 1.
 */
function action<A extends unknown[]>(handler: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await handler(...args);
    } catch (error) {
      console.error('❌ Error:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  };
}

program
  .command('health')
  .description('Check that the gateway is up and show its Phoenix connection state')
  .action(
    action(async () => {
      const client = createClient();
      console.log(`🔍 Checking gateway at ${client.url}...\n`);
      const result = await client.health();
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`✅ ${result.data.status} (${result.metadata.executionTimeMs}ms)`);
      if (result.data.connection) {
        console.log(`   Connection: ${result.data.connection.state} via ${result.data.connection.transport}`);
        console.log(`   ODBC eligible: ${result.data.connection.driverEligible ? '✅' : '❌'}`);
      }
    })
  );

program
  .command('tables')
  .description('List Phoenix tables')
  .action(
    action(async () => {
      const result = await createClient().listTables();
      if (!result.success || !result.data) {
        fail(result);
      }
      printTable(result.data);
    })
  );

program
  .command('columns <table>')
  .description('Show the columns of a table')
  .action(
    action(async (table: string) => {
      const result = await createClient().tableColumns(table);
      if (!result.success || !result.data) {
        fail(result);
      }
      printTable(result.data);
    })
  );

program
  .command('query <sql>')
  .description('Run a SELECT statement')
  .option('--json', 'Print the raw JSON response')
  .action(
    action(async (sql: string, options: { json?: boolean }) => {
      const result = await createClient().query(sql);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`✅ Query executed in ${result.metadata.executionTimeMs}ms`);
      if (options.json) {
        printJson(result.data);
      } else {
        printTable(result.data);
      }
    })
  );

program
  .command('exec <sql>')
  .description('Run a DDL/DML statement (CREATE, UPSERT, DELETE, DROP, ALTER)')
  .action(
    action(async (sql: string) => {
      const result = await createClient().execute(sql);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`✅ ${result.data.message}`);
      if (result.data.updateCount !== undefined) {
        console.log(`   Rows affected: ${result.data.updateCount}`);
      }
    })
  );

program
  .command('exec-file <filepath>')
  .description('Run every statement in a SQL file, stopping at the first failure')
  .action(
    action(async (filepath: string) => {
      const client = createClient();
      const sql = await fs.readFile(filepath, 'utf8');
      const statements = splitStatements(sql);

      console.log(`📄 Executing ${statements.length} statements from ${path.basename(filepath)}\n`);

      for (const [index, statement] of statements.entries()) {
        console.log(`▶️  Statement ${index + 1}/${statements.length}...`);
        const preview = statement.substring(0, 80).replace(/\n/g, ' ');
        console.log(`   ${preview}${statement.length > 80 ? '...' : ''}`);

        if (isQueryStatement(statement)) {
          const result = await client.query(statement);
          if (!result.success) {
            fail(result);
          }
          console.log(`   ✅ Success (${result.metadata.rowCount ?? 0} rows)`);
        } else {
          const result = await client.execute(statement);
          if (!result.success) {
            fail(result);
          }
          console.log('   ✅ Success');
        }
      }

      console.log(`\n✅ All ${statements.length} statements executed successfully`);
    })
  );

program
  .command('views')
  .description('List Phoenix views')
  .action(
    action(async () => {
      const result = await createClient().listViews();
      if (!result.success || !result.data) {
        fail(result);
      }
      printTable(result.data);
    })
  );

program
  .command('view <name>')
  .description('Show a view and its columns')
  .action(
    action(async (name: string) => {
      const result = await createClient().getView(name);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`👁️  View ${result.data.viewName}`);
      console.table(result.data.rows);
    })
  );

program
  .command('create-view <definitionFile>')
  .description('Create a view over an HBase table from a JSON definition file')
  .action(
    action(async (definitionFile: string) => {
      const parsed = ViewDefinitionFileSchema.safeParse(JSON.parse(await fs.readFile(definitionFile, 'utf8')));
      if (!parsed.success) {
        throw new Error(
          `Invalid view definition: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
        );
      }

      const result = await createClient().createView(parsed.data);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`✅ ${result.data.message}`);
      console.log(`   ${result.data.sql}`);
    })
  );

program
  .command('drop-view <name>')
  .description('Drop a view (the HBase table is kept)')
  .action(
    action(async (name: string) => {
      const result = await createClient().dropView(name);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`✅ ${result.data.message}`);
    })
  );

program
  .command('hbase:create-sensor')
  .description('Create the sensor table (metadata, readings, status column families)')
  .option('-t, --table <name>', 'Table name', 'sensor_info')
  .option('-n, --namespace <namespace>', 'HBase namespace', 'default')
  .action(
    action(async (options: { table: string; namespace: string }) => {
      const result = await createClient().createSensorTable({ tableName: options.table, namespace: options.namespace });
      if (result.metadata.status === 409) {
        console.log(`ℹ️  ${result.error}`);
        return;
      }
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`✅ ${result.data.message}`);
    })
  );

program
  .command('hbase:exists <table>')
  .description('Check whether an HBase table exists')
  .option('-n, --namespace <namespace>', 'HBase namespace', 'default')
  .action(
    action(async (table: string, options: { namespace: string }) => {
      const result = await createClient().hbaseTableExists(table, options.namespace);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(`${result.data.exists ? '✅' : '❌'} ${result.data.namespace}:${result.data.tableName}`);
    })
  );

program
  .command('hbase:schema <table>')
  .description('Show the HBase schema of a table')
  .option('-n, --namespace <namespace>', 'HBase namespace', 'default')
  .action(
    action(async (table: string, options: { namespace: string }) => {
      const result = await createClient().hbaseTableSchema(table, options.namespace);
      if (!result.success || !result.data) {
        fail(result);
      }
      console.log(result.data.schema);
    })
  );

program
  .command('hbase:put <table>')
  .description('Write a single cell to an HBase table')
  .requiredOption('-r, --row <rowKey>', 'Row key')
  .requiredOption('-f, --family <columnFamily>', 'Column family')
  .requiredOption('-c, --column <column>', 'Column qualifier')
  .requiredOption('-v, --value <value>', 'Cell value')
  .option('-n, --namespace <namespace>', 'HBase namespace', 'default')
  .action(
    action(
      async (
        table: string,
        options: { row: string; family: string; column: string; value: string; namespace: string }
      ) => {
        const result = await createClient().hbasePutData(table, {
          rowKey: options.row,
          columnFamily: options.family,
          column: options.column,
          value: options.value,
          namespace: options.namespace,
        });
        if (!result.success || !result.data) {
          fail(result);
        }
        console.log(`✅ ${result.data.message}`);
      }
    )
  );

program
  .command('config')
  .description('Show the client configuration in effect')
  .action(
    action(async () => {
      const config = loadClientConfig();
      const opts = program.opts<{ url?: string }>();
      printJson({ gatewayUrl: opts.url ?? config.baseUrl, timeoutMs: config.timeoutMs });
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});

#!/usr/bin/env node
import { serve } from '@hono/node-server';
import * as dotenv from 'dotenv';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { WarmupInitializer } from './connection/warmup-initializer.js';
import { API_PREFIX, createApp, createServices, tools } from './gateway.js';
import { loadConfig } from './utils/config.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Load environment variables from the repository root, then the working directory
dotenv.config({ path: [path.resolve(__dirname, '../../.env'), path.resolve(process.cwd(), '.env')] });

async function main() {
  const config = loadConfig();
  const services = createServices(config);
  const app = createApp(services);

  const warmup = new WarmupInitializer({ connection: services.connection, delayMs: config.warmup.delayMs });
  if (config.warmup.enabled) {
    // Runs in the background and never rejects
    void warmup.start();
  }

  const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    console.log(`🚀 Phoenix gateway listening on http://${config.server.host}:${info.port}`);
    console.log(`   Phoenix Query Server: ${config.phoenix.url}`);
    console.log(`   HBase REST:           ${config.hbase.url}`);
    console.log('Endpoints:');
    for (const tool of tools) {
      console.log(`   ${tool.method.padEnd(6)} ${API_PREFIX}${tool.path}`);
    }
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`\n${signal} received, shutting down...`);

    warmup.stop();
    await services.connection.close();
    server.close((error) => {
      if (error) {
        console.error('Error closing HTTP server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Server error:', error);
  process.exit(1);
});

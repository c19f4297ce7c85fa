import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const ConfigSchema = z.object({
  PHOENIX_SERVER: z.string().min(1).default('localhost'),
  PHOENIX_PORT: z.coerce.number().int().positive().default(8765),
  PHOENIX_URL: z.string().url().optional(),
  PHOENIX_ODBC_CONNECTION_STRING: z.string().min(1).optional(),
  PHOENIX_DRIVER_MODULE: z.string().min(1).default('odbc'),
  PHOENIX_STATEMENT_MODE: z.enum(['prepareAndExecute', 'prepareThenExecute']).default('prepareAndExecute'),
  PHOENIX_OPEN_ATTEMPTS: z.coerce.number().int().min(1).default(10),
  PHOENIX_OPEN_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(15000),
  PHOENIX_MAX_ROW_COUNT: z.coerce.number().int().positive().default(10000),
  PHOENIX_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  WARMUP_ENABLED: booleanFlag.default('true'),
  WARMUP_DELAY_MS: z.coerce.number().int().min(0).default(30000),
  HBASE_SERVER: z.string().min(1).default('localhost'),
  HBASE_PORT: z.coerce.number().int().positive().default(8080),
  GATEWAY_HOST: z.string().min(1).default('0.0.0.0'),
  GATEWAY_PORT: z.coerce.number().int().positive().default(8099),
});

export type StatementMode = 'prepareAndExecute' | 'prepareThenExecute';

export interface GatewayConfig {
  phoenix: {
    url: string;
    odbcConnectionString?: string;
    driverModule: string;
    statementMode: StatementMode;
    openAttempts: number;
    openRetryDelayMs: number;
    maxRowCount: number;
    requestTimeoutMs: number;
  };
  warmup: {
    enabled: boolean;
    delayMs: number;
  };
  hbase: {
    url: string;
  };
  server: {
    host: string;
    port: number;
  };
}

/**
 * Query server JSON endpoints live under `/json`; accept a base URL with or
 * without it.
 */
export function normalizePhoenixUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  return trimmed.endsWith('/json') ? trimmed : `${trimmed}/json`;
}

/**
 * Build the gateway configuration from environment variables. Empty strings
 * count as unset so a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid gateway configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    phoenix: {
      url: normalizePhoenixUrl(vars.PHOENIX_URL ?? `http://${vars.PHOENIX_SERVER}:${vars.PHOENIX_PORT}`),
      odbcConnectionString: vars.PHOENIX_ODBC_CONNECTION_STRING,
      driverModule: vars.PHOENIX_DRIVER_MODULE,
      statementMode: vars.PHOENIX_STATEMENT_MODE,
      openAttempts: vars.PHOENIX_OPEN_ATTEMPTS,
      openRetryDelayMs: vars.PHOENIX_OPEN_RETRY_DELAY_MS,
      maxRowCount: vars.PHOENIX_MAX_ROW_COUNT,
      requestTimeoutMs: vars.PHOENIX_REQUEST_TIMEOUT_MS,
    },
    warmup: {
      enabled: vars.WARMUP_ENABLED,
      delayMs: vars.WARMUP_DELAY_MS,
    },
    hbase: {
      url: `http://${vars.HBASE_SERVER}:${vars.HBASE_PORT}`,
    },
    server: {
      host: vars.GATEWAY_HOST,
      port: vars.GATEWAY_PORT,
    },
  };
}

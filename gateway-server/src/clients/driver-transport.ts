import { ConnectionStateError, TransportError, errorMessage } from '../errors.js';
import type { RawColumn, RawResultSet, StatementRequest } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { requireStatement } from '../utils/statement.js';

/**
 * The call-level interface the driver transport needs. The `odbc` package
 * satisfies it, but it is loaded at run time and checked structurally since it
 * may not be installed at all.
 */
export interface DriverConnection {
  query(sql: string): Promise<unknown>;
  close(): Promise<void>;
}

export interface DriverModule {
  connect(connectionString: string): Promise<unknown>;
}

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export type DriverProbeResult = { ok: true; driver: DriverModule } | { ok: false; failure: TransportError };

export type DriverOpenResult = { ok: true } | { ok: false; failure: TransportError };

export interface DriverTransportOptions {
  connectionString?: string;
  moduleName?: string;
  importer?: ModuleImporter;
  logger?: Logger;
}

// Messages the ODBC driver manager emits when the Phoenix driver library is absent
const MISSING_DRIVER_PATTERNS = [
  /can't open lib/i,
  /file not found/i,
  /data source name not found/i,
  /no default driver specified/i,
];

// ODBC SQL type codes, for naming columns the driver reports numerically
const ODBC_TYPE_NAMES: Record<number, string> = {
  [-9]: 'VARCHAR',
  [-8]: 'CHAR',
  [-7]: 'BOOLEAN',
  [-6]: 'TINYINT',
  [-5]: 'BIGINT',
  [-4]: 'VARBINARY',
  [-3]: 'VARBINARY',
  [-2]: 'BINARY',
  [-1]: 'VARCHAR',
  1: 'CHAR',
  2: 'DECIMAL',
  3: 'DECIMAL',
  4: 'INTEGER',
  5: 'SMALLINT',
  6: 'FLOAT',
  7: 'FLOAT',
  8: 'DOUBLE',
  9: 'DATE',
  10: 'TIME',
  11: 'TIMESTAMP',
  12: 'VARCHAR',
  16: 'BOOLEAN',
  91: 'DATE',
  92: 'TIME',
  93: 'TIMESTAMP',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDriverModule(value: unknown): value is DriverModule {
  return typeof value === 'object' && value !== null && 'connect' in value && typeof value.connect === 'function';
}

function isDriverConnection(value: unknown): value is DriverConnection {
  return (
    typeof value === 'object' &&
    value !== null &&
    'query' in value &&
    typeof value.query === 'function' &&
    'close' in value &&
    typeof value.close === 'function'
  );
}

// CommonJS drivers arrive under `default` when imported from ESM
function resolveDriverModule(loaded: unknown): DriverModule | null {
  if (isDriverModule(loaded)) {
    return loaded;
  }
  if (isRecord(loaded) && isDriverModule(loaded.default)) {
    return loaded.default;
  }
  return null;
}

interface OdbcErrorDetail {
  state?: string;
  code?: number;
}

function firstOdbcError(error: unknown): OdbcErrorDetail {
  if (!isRecord(error) || !Array.isArray(error.odbcErrors)) {
    return {};
  }
  const first: unknown = error.odbcErrors[0];
  if (!isRecord(first)) {
    return {};
  }
  return {
    state: typeof first.state === 'string' ? first.state : undefined,
    code: typeof first.code === 'number' ? first.code : undefined,
  };
}

function toRawColumns(result: unknown[], reported: unknown): RawColumn[] {
  if (Array.isArray(reported)) {
    return reported.filter(isRecord).map((column) => ({
      name: typeof column.name === 'string' ? column.name : undefined,
      typeName:
        typeof column.dataTypeName === 'string'
          ? column.dataTypeName
          : typeof column.dataType === 'number'
            ? ODBC_TYPE_NAMES[column.dataType]
            : undefined,
    }));
  }

  const first = result.find(isRecord);
  return first ? Object.keys(first).map((name) => ({ name })) : [];
}

/**
 * Driver-based transport: talks to the query server through a native
 * call-level driver when one is installed and configured.
 *
 * `open()` never throws. It reports `Unavailable` when this deployment has no
 * usable driver and `ConnectFailed` when the driver is present but the server
 * refused the handshake; the connection manager treats both as a reason to
 * stop using this transport.
 */
export class DriverTransport {
  readonly kind = 'Driver' as const;

  private readonly connectionString?: string;
  private readonly moduleName: string;
  private readonly importer: ModuleImporter;
  private readonly logger: Logger;
  private connection: DriverConnection | null = null;

  constructor(options: DriverTransportOptions = {}) {
    this.connectionString = options.connectionString;
    this.moduleName = options.moduleName ?? 'odbc';
    this.importer = options.importer ?? ((specifier) => import(specifier));
    this.logger = options.logger ?? console;
  }

  async probe(): Promise<DriverProbeResult> {
    if (!this.connectionString) {
      return {
        ok: false,
        failure: new TransportError('Unavailable', 'No ODBC connection string configured', { transport: 'Driver' }),
      };
    }

    let loaded: unknown;
    try {
      loaded = await this.importer(this.moduleName);
    } catch (error) {
      return {
        ok: false,
        failure: new TransportError('Unavailable', `Driver module "${this.moduleName}" could not be loaded: ${errorMessage(error)}`, {
          transport: 'Driver',
          cause: error,
        }),
      };
    }

    const driver = resolveDriverModule(loaded);
    if (!driver) {
      return {
        ok: false,
        failure: new TransportError('Unavailable', `Driver module "${this.moduleName}" does not expose connect()`, {
          transport: 'Driver',
        }),
      };
    }
    return { ok: true, driver };
  }

  async open(): Promise<DriverOpenResult> {
    if (this.connection) {
      return { ok: true };
    }

    const probe = await this.probe();
    if (!probe.ok) {
      return probe;
    }

    // probe() only succeeds with a connection string present
    const connectionString = this.connectionString ?? '';
    try {
      const connection = await probe.driver.connect(connectionString);
      if (!isDriverConnection(connection)) {
        return {
          ok: false,
          failure: new TransportError('Unavailable', 'Driver returned a connection without query()/close()', {
            transport: 'Driver',
          }),
        };
      }
      this.connection = connection;
      this.logger.log('✅ Connected to Phoenix Query Server through the ODBC driver');
      return { ok: true };
    } catch (error) {
      const message = errorMessage(error);
      const kind = MISSING_DRIVER_PATTERNS.some((pattern) => pattern.test(message)) ? 'Unavailable' : 'ConnectFailed';
      const detail = firstOdbcError(error);
      return {
        ok: false,
        failure: new TransportError(
          kind,
          kind === 'Unavailable'
            ? `Phoenix ODBC driver not found: ${message}. Install the driver library and register it in odbcinst.ini.`
            : `ODBC connection to Phoenix failed: ${message}`,
          { transport: 'Driver', cause: error, sqlState: detail.state, errorCode: detail.code }
        ),
      };
    }
  }

  async execute(request: StatementRequest): Promise<RawResultSet> {
    if (!this.connection) {
      throw new ConnectionStateError('Driver connection is not open. Call open() first.');
    }

    const sql = requireStatement(request.sql);
    let result: unknown;
    try {
      result = await this.connection.query(sql);
    } catch (error) {
      const detail = firstOdbcError(error);
      // SQLSTATE class 08 is a connection exception
      const kind = detail.state?.startsWith('08') ? 'ConnectFailed' : 'RemoteError';
      throw new TransportError(kind, errorMessage(error), {
        transport: 'Driver',
        cause: error,
        sqlState: detail.state,
        errorCode: detail.code,
      });
    }

    if (!Array.isArray(result)) {
      throw new TransportError('ProtocolError', 'Driver returned a result that is not a row array', {
        transport: 'Driver',
      });
    }

    const reportedColumns: unknown = 'columns' in result ? result.columns : undefined;
    const count: unknown = 'count' in result ? result.count : undefined;

    return {
      shape: 'keyed',
      columns: toRawColumns(result, reportedColumns),
      rows: result.filter(isRecord),
      updateCount: request.kind === 'Execute' && typeof count === 'number' && count >= 0 ? count : undefined,
    };
  }

  async close(): Promise<void> {
    if (!this.connection) {
      return;
    }

    try {
      await this.connection.close();
      this.logger.log('🔌 Disconnected from Phoenix Query Server (ODBC)');
    } catch (error) {
      this.logger.warn(`Ignoring ODBC close failure: ${errorMessage(error)}`);
    } finally {
      this.connection = null;
    }
  }
}

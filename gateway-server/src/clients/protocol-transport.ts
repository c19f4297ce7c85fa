import { v4 as uuidv4 } from 'uuid';
import { TransportError, errorMessage } from '../errors.js';
import type { RawResultSet, StatementRequest } from '../types.js';
import type { StatementMode } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import { RetryExhaustedError, retryWithFixedDelay, type Sleep } from '../utils/retry.js';
import { preview, requireStatement } from '../utils/statement.js';
import {
  DEFAULT_MAX_ROW_COUNT,
  type ProtocolRequest,
  type ResponseBody,
  assertNotRemoteError,
  decodeExecuteResults,
  decodeOpenConnection,
  decodePrepare,
  encodeCloseConnection,
  encodeCloseStatement,
  encodeExecute,
  encodeOpenConnection,
  encodePrepare,
  encodePrepareAndExecute,
  parseResponseBody,
} from './protocol-codec.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ProtocolTransportOptions {
  url: string;
  statementMode?: StatementMode;
  maxRowCount?: number;
  requestTimeoutMs?: number;
  openAttempts?: number;
  openRetryDelayMs?: number;
  fetch?: FetchLike;
  sleep?: Sleep;
  logger?: Logger;
  generateConnectionId?: () => string;
}

const PROTOBUF_MISMATCH_HINT =
  'The query server appears to be parsing JSON as Protobuf. Check that its serialization is set to JSON, ' +
  'or give HBase/Phoenix more time to finish starting (60+ seconds is common).';

function tryParseBody(text: string): ResponseBody | null {
  try {
    return parseResponseBody(text);
  } catch {
    return null;
  }
}

/**
 * HTTP transport to the query server's JSON endpoint.
 *
 * The transport itself holds no connection state: the connection token is
 * issued by `openSequence()` and handed back on every later call by the
 * connection manager that owns it.
 */
export class ProtocolTransport {
  readonly kind = 'Protocol' as const;

  private readonly url: string;
  private readonly statementMode: StatementMode;
  private readonly maxRowCount: number;
  private readonly requestTimeoutMs: number;
  private readonly openAttempts: number;
  private readonly openRetryDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: Sleep;
  private readonly logger: Logger;
  private readonly generateConnectionId: () => string;

  constructor(options: ProtocolTransportOptions) {
    this.url = options.url;
    this.statementMode = options.statementMode ?? 'prepareAndExecute';
    this.maxRowCount = options.maxRowCount ?? DEFAULT_MAX_ROW_COUNT;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 300000;
    this.openAttempts = options.openAttempts ?? 10;
    this.openRetryDelayMs = options.openRetryDelayMs ?? 15000;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep;
    this.logger = options.logger ?? console;
    this.generateConnectionId = options.generateConnectionId ?? (() => uuidv4());
  }

  get endpoint(): string {
    return this.url;
  }

  /**
   * One open-connection round trip. Resolves with the connection token.
   */
  async openConnection(): Promise<string> {
    const requestedId = this.generateConnectionId();
    const text = await this.post(encodeOpenConnection(requestedId));
    return decodeOpenConnection(text, requestedId);
  }

  /**
   * Open with the configured attempt budget and fixed delay. Connection
   * failures and engine errors are retried (both happen while the cluster is
   * still starting); a response we cannot parse is surfaced at once.
   */
  async openSequence(): Promise<string> {
    const delaySeconds = this.openRetryDelayMs / 1000;

    try {
      const token = await retryWithFixedDelay(() => this.openConnection(), {
        attempts: this.openAttempts,
        delayMs: this.openRetryDelayMs,
        sleep: this.sleep,
        shouldRetry: (error) => !(error instanceof TransportError && error.kind === 'ProtocolError'),
        onAttemptFailed: (attempt, attempts, error) => {
          if (attempt < attempts) {
            this.logger.warn(
              `Connection attempt ${attempt}/${attempts} failed. Retrying in ${delaySeconds} seconds... (${errorMessage(error)})`
            );
          }
        },
      });

      this.logger.log(`✅ Connected to Phoenix Query Server at ${this.url}`);
      return token;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new TransportError(
          'ConnectFailed',
          `Failed to connect to Phoenix Query Server at ${this.url} after ${error.attempts} attempts: ${errorMessage(error.cause)}`,
          { transport: 'Protocol', cause: error.cause }
        );
      }
      throw error;
    }
  }

  async execute(connectionId: string, request: StatementRequest): Promise<RawResultSet> {
    const sql = requireStatement(request.sql);

    if (this.statementMode === 'prepareThenExecute') {
      return this.prepareThenExecute(connectionId, sql);
    }

    const text = await this.post(encodePrepareAndExecute(connectionId, sql, this.maxRowCount));
    return decodeExecuteResults(text);
  }

  /**
   * Best-effort: failures are logged and otherwise ignored.
   */
  async closeConnection(connectionId: string): Promise<void> {
    try {
      await this.post(encodeCloseConnection(connectionId));
      this.logger.log('🔌 Disconnected from Phoenix Query Server');
    } catch (error) {
      this.logger.warn(`Ignoring closeConnection failure: ${errorMessage(error)}`);
    }
  }

  private async prepareThenExecute(connectionId: string, sql: string): Promise<RawResultSet> {
    const statementId = decodePrepare(await this.post(encodePrepare(connectionId, sql)));

    try {
      const text = await this.post(encodeExecute(connectionId, statementId, this.maxRowCount));
      return decodeExecuteResults(text);
    } finally {
      await this.closeStatement(connectionId, statementId);
    }
  }

  private async closeStatement(connectionId: string, statementId: number): Promise<void> {
    try {
      await this.post(encodeCloseStatement(connectionId, statementId));
    } catch (error) {
      this.logger.debug(`Ignoring closeStatement failure for statement ${statementId}: ${errorMessage(error)}`);
    }
  }

  private async post(payload: ProtocolRequest): Promise<string> {
    let response: Response;
    let text: string;

    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new TransportError(
        'ConnectFailed',
        `Could not reach Phoenix Query Server at ${this.url} (${payload.request}): ${errorMessage(error)}`,
        { transport: 'Protocol', cause: error }
      );
    }

    if (!response.ok) {
      // Engine failures arrive as HTTP 500 with an error body
      const body = tryParseBody(text);
      if (body) {
        assertNotRemoteError(body, response.status);
      }

      let message = `Phoenix Query Server returned HTTP ${response.status} during ${payload.request}: ${preview(text, 500)}`;
      if (text.includes('InvalidProtocolBufferException') || text.includes('InvalidWireTypeException')) {
        message += ` ${PROTOBUF_MISMATCH_HINT}`;
      }
      throw new TransportError('ConnectFailed', message, { transport: 'Protocol', httpStatus: response.status });
    }

    return text;
  }
}

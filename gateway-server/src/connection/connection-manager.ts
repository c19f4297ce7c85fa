import type { DriverTransport } from '../clients/driver-transport.js';
import type { ProtocolTransport } from '../clients/protocol-transport.js';
import { ConnectionStateError, TransportError, errorMessage } from '../errors.js';
import { normalizeResult } from '../results/result-normalizer.js';
import type { ConnectionState, LogicalConnection, RawResultSet, StatementRequest, TabularResult } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { requireStatement } from '../utils/statement.js';

/**
 * Structural views of the two transports, so tests can hand in fakes.
 */
export type DriverTransportLike = Pick<DriverTransport, 'kind' | 'open' | 'execute' | 'close'>;
export type ProtocolTransportLike = Pick<ProtocolTransport, 'kind' | 'endpoint' | 'openSequence' | 'execute' | 'closeConnection'>;

type ActiveTransport = { kind: 'Driver' } | { kind: 'Protocol'; connectionToken: string };

export interface ConnectionManagerOptions {
  driver: DriverTransportLike;
  protocol: ProtocolTransportLike;
  logger?: Logger;
}

/**
 * Owns the process's single logical connection to the query server.
 *
 * The driver transport gets one chance per process: the first failed attempt
 * makes it ineligible for good, and every later open goes straight to the
 * protocol transport's retrying sequence.
 */
export class ConnectionManager {
  private readonly driver: DriverTransportLike;
  private readonly protocol: ProtocolTransportLike;
  private readonly logger: Logger;

  private state: ConnectionState = 'Closed';
  private active: ActiveTransport | null = null;
  private driverEligible = true;
  private opening: Promise<void> | null = null;
  // Bumped by close(); an open sequence started under an older value must not commit
  private generation = 0;

  constructor(options: ConnectionManagerOptions) {
    this.driver = options.driver;
    this.protocol = options.protocol;
    this.logger = options.logger ?? console;
  }

  snapshot(): LogicalConnection {
    if (this.state === 'Open' && this.active?.kind === 'Protocol') {
      return { state: this.state, activeTransportKind: 'Protocol', connectionToken: this.active.connectionToken };
    }
    return { state: this.state, activeTransportKind: this.active?.kind ?? 'None' };
  }

  isDriverEligible(): boolean {
    return this.driverEligible;
  }

  isOpen(): boolean {
    return this.state === 'Open';
  }

  /**
   * Open the logical connection. Returns at once when already open; callers
   * arriving during an open share the sequence already in flight.
   */
  async open(): Promise<void> {
    if (this.state === 'Open') {
      return;
    }
    if (!this.opening) {
      const opening = this.runOpenSequence(this.generation).finally(() => {
        if (this.opening === opening) {
          this.opening = null;
        }
      });
      this.opening = opening;
    }
    return this.opening;
  }

  async execute(request: StatementRequest): Promise<TabularResult> {
    if (this.state !== 'Open' || !this.active) {
      throw new ConnectionStateError(
        `Connection not open (state: ${this.state}). Call open() before executing statements.`
      );
    }

    const statement: StatementRequest = { sql: requireStatement(request.sql), kind: request.kind };
    let raw: RawResultSet;
    if (this.active.kind === 'Driver') {
      raw = await this.driver.execute(statement);
    } else {
      raw = await this.protocol.execute(this.active.connectionToken, statement);
    }
    return normalizeResult(raw);
  }

  async close(): Promise<void> {
    this.generation += 1;
    this.opening = null;
    const active = this.active;
    this.active = null;
    this.state = 'Closed';

    if (!active) {
      return;
    }
    if (active.kind === 'Driver') {
      await this.driver.close();
    } else {
      await this.protocol.closeConnection(active.connectionToken);
    }
  }

  private async runOpenSequence(generation: number): Promise<void> {
    this.state = 'Opening';
    this.active = null;

    if (this.driverEligible) {
      const result = await this.driver.open();
      if (generation !== this.generation) {
        if (result.ok) {
          await this.driver.close();
        }
        throw closedWhileOpening();
      }
      if (result.ok) {
        this.active = { kind: 'Driver' };
        this.state = 'Open';
        return;
      }

      this.driverEligible = false;
      this.logger.warn(
        `ODBC driver transport ${result.failure.kind === 'Unavailable' ? 'unavailable' : 'failed'}: ${result.failure.message}`
      );
      this.logger.log('Falling back to the Phoenix Query Server JSON protocol...');
    }

    let connectionToken: string;
    try {
      connectionToken = await this.protocol.openSequence();
    } catch (error) {
      if (generation === this.generation) {
        this.state = 'Failed';
        this.active = null;
      }
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError('ConnectFailed', `Could not open a connection to ${this.protocol.endpoint}: ${errorMessage(error)}`, {
        transport: 'Protocol',
        cause: error,
      });
    }

    if (generation !== this.generation) {
      // close() ran while the sequence was in flight; release what it produced
      await this.protocol.closeConnection(connectionToken);
      throw closedWhileOpening();
    }
    this.active = { kind: 'Protocol', connectionToken };
    this.state = 'Open';
  }
}

function closedWhileOpening(): ConnectionStateError {
  return new ConnectionStateError('Connection was closed while it was opening');
}

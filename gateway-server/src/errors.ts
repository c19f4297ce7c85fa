import type { TransportKind } from './types.js';

export type TransportFailureKind = 'Unavailable' | 'ConnectFailed' | 'ProtocolError' | 'RemoteError';

export interface TransportErrorOptions {
  transport?: TransportKind;
  cause?: unknown;
  sqlState?: string;
  errorCode?: number;
  httpStatus?: number;
}

/**
 * Why a transport could not complete a call.
 *
 * - `Unavailable`: the driver library is missing in this environment
 * - `ConnectFailed`: network failure or a rejected handshake
 * - `ProtocolError`: the response body could not be understood
 * - `RemoteError`: the engine answered with a structured SQL/engine error
 */
export class TransportError extends Error {
  readonly kind: TransportFailureKind;
  readonly transport?: TransportKind;
  readonly sqlState?: string;
  readonly errorCode?: number;
  readonly httpStatus?: number;

  constructor(kind: TransportFailureKind, message: string, options: TransportErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.transport = options.transport;
    this.sqlState = options.sqlState;
    this.errorCode = options.errorCode;
    this.httpStatus = options.httpStatus;
  }
}

export class ConnectionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionStateError';
  }
}

export class StatementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StatementError';
  }
}

export class ValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join(', '));
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export class HBaseRestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HBaseRestError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { vi } from 'vitest';
import type { DriverTransportLike, ProtocolTransportLike } from '../src/connection/connection-manager.js';
import { TransportError } from '../src/errors.js';
import type { RawResultSet, StatementRequest } from '../src/types.js';

export function silentLogger() {
  return {
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * A fetch stand-in that answers each call with the next queued reply. A reply
 * that is an Error makes the call reject, the way a refused connection does.
 */
export function queuedFetch(replies: Array<Response | Error>) {
  const queue = [...replies];
  return vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('No more queued replies');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

export function requestBody(init: RequestInit): unknown {
  return typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
}

export function fakeSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {});
}

export const EMPTY_RESULT: RawResultSet = { shape: 'positional', columns: [], rows: [] };

export function unavailableDriver() {
  return {
    kind: 'Driver' as const,
    open: vi.fn(async () => ({
      ok: false as const,
      failure: new TransportError('Unavailable', 'No ODBC connection string configured', { transport: 'Driver' }),
    })),
    execute: vi.fn(async (_request: StatementRequest): Promise<RawResultSet> => EMPTY_RESULT),
    close: vi.fn(async (): Promise<void> => {}),
  } satisfies DriverTransportLike;
}

export function workingDriver() {
  return {
    kind: 'Driver' as const,
    open: vi.fn(async () => ({ ok: true as const })),
    execute: vi.fn(async (_request: StatementRequest): Promise<RawResultSet> => EMPTY_RESULT),
    close: vi.fn(async (): Promise<void> => {}),
  } satisfies DriverTransportLike;
}

export function fakeProtocol(token: string = 'conn-1') {
  return {
    kind: 'Protocol' as const,
    endpoint: 'http://pqs.test:8765/json',
    openSequence: vi.fn(async (): Promise<string> => token),
    execute: vi.fn(async (_connectionId: string, _request: StatementRequest): Promise<RawResultSet> => EMPTY_RESULT),
    closeConnection: vi.fn(async (_connectionId: string): Promise<void> => {}),
  } satisfies ProtocolTransportLike;
}

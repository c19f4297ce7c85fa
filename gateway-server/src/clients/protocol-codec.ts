/**
 * JSON wire format of the Phoenix query server (Avatica JSON over HTTP POST).
 *
 * Encoders build the request envelopes; decoders take the raw response text
 * and either return a normalized value or throw a `TransportError` classified
 * as `ProtocolError` (the body could not be understood) or `RemoteError` (the
 * engine reported a failure).
 */

import { isInteger, isSafeNumber, parse } from 'lossless-json';
import { z } from 'zod';
import { TransportError } from '../errors.js';
import type { RawColumn, RawResultSet } from '../types.js';
import { preview, trimStatement } from '../utils/statement.js';

export const DEFAULT_MAX_ROW_COUNT = 10000;

export interface OpenConnectionRequest {
  request: 'openConnection';
  connectionId: string;
  info: Record<string, string>;
}

export interface PrepareAndExecuteRequest {
  request: 'prepareAndExecute';
  connectionId: string;
  sql: string;
  maxRowCount: number;
}

export interface PrepareRequest {
  request: 'prepare';
  connectionId: string;
  sql: string;
}

export interface StatementHandle {
  connectionId: string;
  id: number;
}

export interface ExecuteRequest {
  request: 'execute';
  statementHandle: StatementHandle;
  parameterValues: unknown[];
  maxRowCount: number;
}

export interface CloseStatementRequest {
  request: 'closeStatement';
  statementHandle: StatementHandle;
}

export interface CloseConnectionRequest {
  request: 'closeConnection';
  connectionId: string;
}

export type ProtocolRequest =
  | OpenConnectionRequest
  | PrepareAndExecuteRequest
  | PrepareRequest
  | ExecuteRequest
  | CloseStatementRequest
  | CloseConnectionRequest;

export function encodeOpenConnection(connectionId: string): OpenConnectionRequest {
  return { request: 'openConnection', connectionId, info: {} };
}

export function encodePrepareAndExecute(
  connectionId: string,
  sql: string,
  maxRowCount: number = DEFAULT_MAX_ROW_COUNT
): PrepareAndExecuteRequest {
  return { request: 'prepareAndExecute', connectionId, sql: trimStatement(sql), maxRowCount };
}

export function encodePrepare(connectionId: string, sql: string): PrepareRequest {
  return { request: 'prepare', connectionId, sql: trimStatement(sql) };
}

export function encodeExecute(
  connectionId: string,
  statementId: number,
  maxRowCount: number = DEFAULT_MAX_ROW_COUNT
): ExecuteRequest {
  return {
    request: 'execute',
    statementHandle: { connectionId, id: statementId },
    // The server insists on the field even without bind parameters
    parameterValues: [],
    maxRowCount,
  };
}

export function encodeCloseStatement(connectionId: string, statementId: number): CloseStatementRequest {
  return { request: 'closeStatement', statementHandle: { connectionId, id: statementId } };
}

export function encodeCloseConnection(connectionId: string): CloseConnectionRequest {
  return { request: 'closeConnection', connectionId };
}

// ---------------------------------------------------------------------------
// Response decoding
// ---------------------------------------------------------------------------

const WireColumnSchema = z
  .object({
    name: z.string().nullish(),
    columnName: z.string().nullish(),
    label: z.string().nullish(),
    typeName: z.string().nullish(),
    type: z.union([z.string(), z.object({ name: z.string().nullish() }).passthrough()]).nullish(),
  })
  .passthrough();

const WireRowsSchema = z.array(z.array(z.unknown()));

const WireResultSchema = z
  .object({
    columns: z.array(WireColumnSchema).nullish(),
    rows: WireRowsSchema.nullish(),
    signature: z.object({ columns: z.array(WireColumnSchema).nullish() }).passthrough().nullish(),
    firstFrame: z.object({ rows: WireRowsSchema.nullish() }).passthrough().nullish(),
    updateCount: z.number().nullish(),
  })
  .passthrough();

const ExecuteResponseSchema = z
  .object({
    results: z.array(WireResultSchema),
  })
  .passthrough();

const PrepareResponseSchema = z
  .object({
    statement: z.object({ id: z.number().int() }).passthrough(),
  })
  .passthrough();

type WireColumn = z.infer<typeof WireColumnSchema>;

export type ResponseBody = Record<string, unknown>;

export interface RemoteErrorDetails {
  message: string;
  sqlState?: string;
  errorCode?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstLine(text: string): string {
  return text.split(/\r?\n/)[0]?.trim() ?? text;
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function messageOf(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim().length > 0) {
    return firstLine(value);
  }
  if (isRecord(value) && typeof value.message === 'string') {
    return value.message;
  }
  return undefined;
}

/**
 * Numbers a double can hold exactly stay numbers. Larger integers become
 * bigints and other inexact numbers keep their digits as a string.
 */
export function parseWireNumber(text: string): number | bigint | string {
  if (isSafeNumber(text)) {
    return Number(text);
  }
  return isInteger(text) ? BigInt(text) : text;
}

/**
 * Parse a response body into a JSON object.
 */
export function parseResponseBody(text: string): ResponseBody {
  let parsed: unknown;
  try {
    parsed = parse(text, null, parseWireNumber);
  } catch (error) {
    throw new TransportError('ProtocolError', `Query server returned a non-JSON response: ${preview(text)}`, {
      transport: 'Protocol',
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new TransportError('ProtocolError', `Query server returned an unexpected response: ${preview(text)}`, {
      transport: 'Protocol',
    });
  }
  return parsed;
}

/**
 * Pull the engine's error out of a well-formed response, or `null` when the
 * response is not an error.
 */
export function extractRemoteError(body: ResponseBody): RemoteErrorDetails | null {
  const exceptions: unknown[] = Array.isArray(body.exceptions) ? body.exceptions : [];
  const isError =
    body.response === 'error' ||
    present(body.error) ||
    present(body.exception) ||
    present(body.errorMessage) ||
    exceptions.length > 0;

  if (!isError) {
    return null;
  }

  const message =
    messageOf(body.errorMessage) ??
    messageOf(body.error) ??
    messageOf(body.exception) ??
    messageOf(exceptions[0]) ??
    'Query server reported an error';

  return {
    message,
    sqlState: typeof body.sqlState === 'string' ? body.sqlState : undefined,
    errorCode: typeof body.errorCode === 'number' ? body.errorCode : undefined,
  };
}

export function assertNotRemoteError(body: ResponseBody, httpStatus?: number): void {
  const remote = extractRemoteError(body);
  if (remote) {
    throw new TransportError('RemoteError', remote.message, {
      transport: 'Protocol',
      sqlState: remote.sqlState,
      errorCode: remote.errorCode,
      httpStatus,
    });
  }
}

/**
 * The server may echo or replace the id we proposed; use its answer when it
 * gives one.
 */
export function decodeOpenConnection(text: string, requestedId: string): string {
  const body = parseResponseBody(text);
  assertNotRemoteError(body);
  return typeof body.connectionId === 'string' && body.connectionId.length > 0 ? body.connectionId : requestedId;
}

export function decodePrepare(text: string): number {
  const body = parseResponseBody(text);
  assertNotRemoteError(body);

  const parsed = PrepareResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(
      'ProtocolError',
      `Query server did not return a statement handle in prepare response: ${preview(text, 500)}`,
      { transport: 'Protocol' }
    );
  }
  return parsed.data.statement.id;
}

function toRawColumn(column: WireColumn): RawColumn {
  const typeName =
    typeof column.type === 'string' ? column.type : column.type?.name ?? column.typeName ?? undefined;

  return {
    name: column.name ?? undefined,
    columnName: column.columnName ?? undefined,
    label: column.label ?? undefined,
    typeName: typeName ?? undefined,
  };
}

/**
 * Decode an execute/prepareAndExecute response into positional rows.
 *
 * Both the flat form (`results[0].columns` / `results[0].rows`) and the
 * Avatica form (`signature.columns` / `firstFrame.rows`) are accepted. An
 * empty `results` array is a successful statement with nothing to report.
 */
export function decodeExecuteResults(text: string): RawResultSet {
  const body = parseResponseBody(text);
  assertNotRemoteError(body);

  if (body.missingStatement === true) {
    throw new TransportError('ProtocolError', 'Query server lost track of the statement (missingStatement)', {
      transport: 'Protocol',
    });
  }

  const parsed = ExecuteResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new TransportError('ProtocolError', `Malformed execute response (${issues}): ${preview(text)}`, {
      transport: 'Protocol',
    });
  }

  const [first] = parsed.data.results;
  if (!first) {
    return { shape: 'positional', columns: [], rows: [] };
  }

  const columns = (first.columns ?? first.signature?.columns ?? []).map(toRawColumn);
  const rows = first.rows ?? first.firstFrame?.rows ?? [];
  // -1 marks a result set rather than an update
  const updateCount =
    typeof first.updateCount === 'number' && first.updateCount >= 0 ? first.updateCount : undefined;

  return { shape: 'positional', columns, rows, updateCount };
}

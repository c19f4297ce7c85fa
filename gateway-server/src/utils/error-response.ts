import { ConnectionStateError, StatementError, TransportError, ValidationError, errorMessage } from '../errors.js';
import type { ToolResponse } from '../tools/tool.js';

const TABLE_NOT_FOUND_MARKERS = ['Table undefined', 'TableNotFoundException', 'Table not found'];

export const CREATE_TABLE_SUGGESTION =
  'The table does not exist. Create it first using: POST /api/phoenix/execute with SQL: CREATE TABLE ... ' +
  'Example: CREATE TABLE IF NOT EXISTS users (id INTEGER PRIMARY KEY, username VARCHAR(50), email VARCHAR(100))';

export function suggestionFor(message: string): string | undefined {
  return TABLE_NOT_FOUND_MARKERS.some((marker) => message.includes(marker)) ? CREATE_TABLE_SUGGESTION : undefined;
}

/**
 * Map any error raised while running a tool onto the HTTP response for it.
 */
export function toErrorResponse(error: unknown): ToolResponse {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: error.message, errors: error.errors } };
  }
  if (error instanceof StatementError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof ConnectionStateError) {
    return { status: 503, body: { error: error.message } };
  }

  const message = errorMessage(error);
  const body: Record<string, unknown> = { error: message };
  const suggestion = suggestionFor(message);
  if (suggestion) {
    body.suggestion = suggestion;
  }

  if (error instanceof TransportError) {
    if (error.sqlState) {
      body.sqlState = error.sqlState;
    }
    if (error.kind === 'ConnectFailed' || error.kind === 'Unavailable') {
      return { status: 503, body };
    }
  }
  return { status: 500, body };
}

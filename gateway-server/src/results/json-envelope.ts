import type { Cell, TabularResult } from '../types.js';

export const NO_RESULTS_MESSAGE =
  'Query executed successfully but returned no results. This may indicate no data exists matching the query criteria.';

export type JsonCellValue = string | number | boolean | null;

export type JsonEnvelope = {
  columns: Array<{ name: string; type: string }>;
  rows: Array<Record<string, JsonCellValue>>;
  rowCount: number;
  message?: string;
};

export function cellToJson(cell: Cell): JsonCellValue {
  switch (cell.kind) {
    case 'null':
      return null;
    case 'bytes':
      return Buffer.from(cell.value).toString('base64');
    default:
      return cell.value;
  }
}

/**
 * Shape a result the way every SQL endpoint returns it. `emptyMessage` is
 * attached when the statement produced columns but no rows.
 */
export function toJsonEnvelope(result: TabularResult, emptyMessage: string = NO_RESULTS_MESSAGE): JsonEnvelope {
  const envelope: JsonEnvelope = {
    columns: result.columns.map((column) => ({ name: column.name, type: column.logicalType })),
    rows: result.rows.map((row) =>
      Object.fromEntries(Object.entries(row.cells).map(([name, cell]) => [name, cellToJson(cell)]))
    ),
    rowCount: result.rows.length,
  };

  if (result.columns.length > 0 && result.rows.length === 0) {
    envelope.message = emptyMessage;
  }
  return envelope;
}

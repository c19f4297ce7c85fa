import { stringify } from 'lossless-json';
import type { Cell, ColumnDescriptor, RawColumn, RawResultSet, Row, TabularResult } from '../types.js';

type CellKind = 'integer' | 'float' | 'boolean' | 'date' | 'time' | 'timestamp' | 'bytes' | 'string' | 'inferred';

const MS_PER_DAY = 86_400_000;

const INTEGER_TYPES = new Set(['INTEGER', 'INT', 'BIGINT', 'SMALLINT', 'TINYINT', 'LONG']);
const FLOAT_TYPES = new Set(['FLOAT', 'DOUBLE', 'REAL', 'DECIMAL', 'NUMERIC']);
const BOOLEAN_TYPES = new Set(['BOOLEAN', 'BIT']);
const BINARY_TYPES = new Set(['BINARY', 'VARBINARY']);

export const UNTYPED_COLUMN = 'UNKNOWN';

/**
 * Map a Phoenix/ODBC type name onto the cell kind its values decode to.
 * `UNSIGNED_` variants and precision suffixes such as `DECIMAL(10,2)` collapse
 * onto the base type.
 */
export function cellKindFor(typeName: string | undefined): CellKind {
  if (!typeName) {
    return 'inferred';
  }

  const base = typeName
    .toUpperCase()
    .replace(/\(.*\)$/, '')
    .trim()
    .replace(/^UNSIGNED_/, '');

  if (base.endsWith(' ARRAY')) {
    return 'string';
  }
  if (INTEGER_TYPES.has(base)) {
    return 'integer';
  }
  if (FLOAT_TYPES.has(base)) {
    return 'float';
  }
  if (BOOLEAN_TYPES.has(base)) {
    return 'boolean';
  }
  if (BINARY_TYPES.has(base)) {
    return 'bytes';
  }
  if (base === 'DATE') {
    return 'date';
  }
  if (base === 'TIME') {
    return 'time';
  }
  if (base === 'TIMESTAMP') {
    return 'timestamp';
  }
  return 'string';
}

function toIsoString(epochMs: number): string | null {
  const date = new Date(epochMs);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function stringCell(value: unknown): Cell {
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (value instanceof Date) {
    return { kind: 'string', value: value.toISOString() };
  }
  if (typeof value === 'object') {
    // Array columns may hold bigints
    return { kind: 'string', value: stringify(value) ?? String(value) };
  }
  return { kind: 'string', value: String(value) };
}

function integerCell(value: unknown): Cell {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return { kind: 'integer', value };
  }
  if (typeof value === 'bigint' && value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return { kind: 'integer', value: Number(value) };
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isSafeInteger(parsed)) {
      return { kind: 'integer', value: parsed };
    }
  }
  // Out of safe range: keep every digit
  return stringCell(value);
}

function floatCell(value: unknown): Cell {
  if (typeof value === 'number') {
    return { kind: 'float', value };
  }
  // Wider than a double: keep the digits
  return stringCell(value);
}

function booleanCell(value: unknown): Cell {
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'number') {
    return { kind: 'boolean', value: value !== 0 };
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true' || lowered === '1') {
      return { kind: 'boolean', value: true };
    }
    if (lowered === 'false' || lowered === '0') {
      return { kind: 'boolean', value: false };
    }
  }
  return stringCell(value);
}

function bytesCell(value: unknown): Cell {
  if (value instanceof Uint8Array) {
    return { kind: 'bytes', value };
  }
  if (value instanceof ArrayBuffer) {
    return { kind: 'bytes', value: new Uint8Array(value) };
  }
  if (typeof value === 'string') {
    // The JSON wire carries binary columns base64-encoded
    return { kind: 'bytes', value: new Uint8Array(Buffer.from(value, 'base64')) };
  }
  return stringCell(value);
}

function temporalCell(value: unknown, kind: 'date' | 'time' | 'timestamp'): Cell {
  let iso: string | null = null;

  if (value instanceof Date) {
    iso = toIsoString(value.getTime());
  } else if (typeof value === 'number') {
    // DATE arrives as days since epoch, TIME as millis of day, TIMESTAMP as epoch millis
    iso = toIsoString(kind === 'date' ? value * MS_PER_DAY : value);
  }

  if (iso === null) {
    return stringCell(value);
  }

  switch (kind) {
    case 'date':
      return { kind: 'string', value: iso.slice(0, 10) };
    case 'time':
      return { kind: 'string', value: iso.slice(11, 19) };
    case 'timestamp':
      return { kind: 'string', value: `${iso.slice(0, 10)} ${iso.slice(11, 23)}` };
  }
}

function inferredCell(value: unknown): Cell {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? integerCell(value) : { kind: 'float', value };
  }
  if (typeof value === 'bigint') {
    return integerCell(value);
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
    return bytesCell(value);
  }
  return stringCell(value);
}

export function toCell(value: unknown, kind: CellKind): Cell {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  switch (kind) {
    case 'integer':
      return integerCell(value);
    case 'float':
      return floatCell(value);
    case 'boolean':
      return booleanCell(value);
    case 'bytes':
      return bytesCell(value);
    case 'date':
    case 'time':
    case 'timestamp':
      return temporalCell(value, kind);
    case 'inferred':
      return inferredCell(value);
    case 'string':
      return stringCell(value);
  }
}

interface ResolvedColumn {
  descriptor: ColumnDescriptor;
  // Name the transport used, for looking values up in keyed rows
  sourceName: string;
  kind: CellKind;
}

/**
 * Resolve display names: `columnName`, then `label`, then `name`, then a
 * positional `Column{n}`. A name already taken gets a `_{n}` suffix, where
 * `n` is the column's 1-based position, repeated until the name is free.
 */
function resolveColumns(columns: RawColumn[]): ResolvedColumn[] {
  const taken = new Set<string>();

  return columns.map((column, index) => {
    const position = index + 1;
    const sourceName = column.columnName ?? column.label ?? column.name ?? `Column${position}`;
    let name = sourceName;
    while (taken.has(name)) {
      name = `${name}_${position}`;
    }
    taken.add(name);

    return {
      descriptor: { name, logicalType: column.typeName ?? UNTYPED_COLUMN },
      sourceName,
      kind: cellKindFor(column.typeName),
    };
  });
}

/**
 * Convert whatever a transport produced into a `TabularResult`. Every row has
 * one cell per column, in column order; missing values become null cells.
 */
export function normalizeResult(raw: RawResultSet): TabularResult {
  const columns = resolveColumns(raw.columns);

  const rows: Row[] =
    raw.shape === 'positional'
      ? raw.rows.map((values) => ({
          cells: Object.fromEntries(
            columns.map((column, index) => [column.descriptor.name, toCell(values[index], column.kind)])
          ),
        }))
      : raw.rows.map((record) => ({
          cells: Object.fromEntries(
            columns.map((column) => [column.descriptor.name, toCell(record[column.sourceName], column.kind)])
          ),
        }));

  const result: TabularResult = { columns: columns.map((column) => column.descriptor), rows };
  if (raw.updateCount !== undefined) {
    result.updateCount = raw.updateCount;
  }
  return result;
}

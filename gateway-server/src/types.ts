export type ConnectionState = 'Closed' | 'Opening' | 'Open' | 'Failed';

export type TransportKind = 'Driver' | 'Protocol';

export type ActiveTransportKind = TransportKind | 'None';

/**
 * The single process-wide connection to the query server, as seen from outside
 * the connection manager.
 */
export interface LogicalConnection {
  state: ConnectionState;
  activeTransportKind: ActiveTransportKind;
  // Only present while a protocol connection is open
  connectionToken?: string;
}

export type StatementKind = 'Query' | 'Execute';

export interface StatementRequest {
  sql: string;
  kind: StatementKind;
}

export type Cell =
  | { kind: 'null' }
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'bytes'; value: Uint8Array };

export interface ColumnDescriptor {
  name: string;
  logicalType: string;
}

export interface Row {
  cells: Record<string, Cell>;
}

export interface TabularResult {
  columns: ColumnDescriptor[];
  rows: Row[];
  // Affected-row count reported for Execute statements
  updateCount?: number;
}

/**
 * Column metadata as either transport reports it, before normalization.
 */
export interface RawColumn {
  name?: string;
  columnName?: string;
  label?: string;
  typeName?: string;
}

/**
 * What a transport hands to the normalizer. The protocol transport produces
 * rows positionally aligned to the columns; the driver produces rows keyed by
 * column name.
 */
export type RawResultSet =
  | { shape: 'positional'; columns: RawColumn[]; rows: unknown[][]; updateCount?: number }
  | { shape: 'keyed'; columns: RawColumn[]; rows: Record<string, unknown>[]; updateCount?: number };

export interface GatewayResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  suggestion?: string;
  metadata: {
    executionTimeMs: number;
    // HTTP status, or 0 when the gateway could not be reached
    status: number;
    rowCount?: number;
  };
}

export type CellValue = string | number | boolean | null;

export interface ColumnInfo {
  name: string;
  type: string;
}

export interface TabularData {
  columns: ColumnInfo[];
  rows: Array<Record<string, CellValue>>;
  rowCount: number;
  message?: string;
}

export interface ViewColumnDefinition {
  name: string;
  type?: string;
  isPrimaryKey?: boolean;
}

export interface ViewDefinition {
  viewName: string;
  hbaseTableName: string;
  namespace?: string;
  columns: ViewColumnDefinition[];
}

export interface PutDataRequest {
  rowKey: string;
  columnFamily: string;
  column: string;
  value: string;
  namespace?: string;
}

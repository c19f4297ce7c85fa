export interface ViewColumnDefinition {
  name: string;
  type: string;
  isPrimaryKey?: boolean;
}

export interface ViewDefinition {
  viewName: string;
  hbaseTableName: string;
  namespace?: string;
  columns: ViewColumnDefinition[];
}

const CATALOG_COLUMNS = 'TABLE_NAME, TABLE_TYPE, TABLE_SCHEM';

/**
 * Escape a value for use inside a single-quoted SQL literal.
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Renders the catalog queries and view DDL the gateway issues on the caller's
 * behalf. Names are expected to be validated before they get here.
 */
export class PhoenixSqlRenderer {
  /**
   * Catalog queries for listing tables, tried in order until one returns
   * rows: user tables, then unschema'd tables, then the first 100 entries.
   */
  listTables(): string[] {
    return [
      `SELECT ${CATALOG_COLUMNS} FROM SYSTEM.CATALOG WHERE TABLE_TYPE = 'u' ORDER BY TABLE_NAME`,
      `SELECT ${CATALOG_COLUMNS} FROM SYSTEM.CATALOG WHERE TABLE_SCHEM IS NULL ORDER BY TABLE_NAME`,
      `SELECT ${CATALOG_COLUMNS} FROM SYSTEM.CATALOG ORDER BY TABLE_NAME LIMIT 100`,
    ];
  }

  listColumns(tableName: string): string {
    const dot = tableName.indexOf('.');
    const schemaFilter = dot >= 0 ? ` AND TABLE_SCHEM = ${quoteLiteral(tableName.slice(0, dot))}` : '';
    const table = dot >= 0 ? tableName.slice(dot + 1) : tableName;

    return (
      'SELECT COLUMN_NAME, DATA_TYPE, COLUMN_SIZE, IS_NULLABLE FROM SYSTEM.CATALOG ' +
      `WHERE TABLE_NAME = ${quoteLiteral(table)}${schemaFilter} ORDER BY ORDINAL_POSITION`
    );
  }

  listViews(): string {
    return `SELECT TABLE_NAME, TABLE_SCHEM, TABLE_TYPE FROM SYSTEM.CATALOG WHERE TABLE_TYPE = 'v' ORDER BY TABLE_NAME`;
  }

  // Unquoted view names are stored upper-cased in the catalog
  viewExists(viewName: string): string {
    return `SELECT TABLE_NAME FROM SYSTEM.CATALOG WHERE TABLE_TYPE = 'v' AND TABLE_NAME = ${quoteLiteral(viewName.toUpperCase())}`;
  }

  dropView(viewName: string): string {
    return `DROP VIEW IF EXISTS ${viewName}`;
  }

  /**
   * The primary key is the column flagged `isPrimaryKey`, or the first column
   * when none is.
   */
  createView(definition: ViewDefinition): string {
    const namespace = definition.namespace ?? 'default';
    const primaryIndex = Math.max(
      0,
      definition.columns.findIndex((column) => column.isPrimaryKey === true)
    );

    const columns = definition.columns
      .map((column, index) => `${column.name} ${column.type}${index === primaryIndex ? ' PRIMARY KEY' : ''}`)
      .join(', ');

    return `CREATE VIEW IF NOT EXISTS ${definition.viewName} (${columns}) AS SELECT * FROM "${namespace}:${definition.hbaseTableName}"`;
  }
}

import { ValidationError } from '../errors.js';
import type { ViewDefinition } from '../renderers/phoenix-sql-renderer.js';

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// HBase also allows `.` and `-` in namespace and table names
export const HBASE_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export const PHOENIX_COLUMN_TYPES = [
  'INTEGER',
  'UNSIGNED_INT',
  'BIGINT',
  'UNSIGNED_LONG',
  'TINYINT',
  'UNSIGNED_TINYINT',
  'SMALLINT',
  'UNSIGNED_SMALLINT',
  'FLOAT',
  'UNSIGNED_FLOAT',
  'DOUBLE',
  'UNSIGNED_DOUBLE',
  'DECIMAL',
  'BOOLEAN',
  'TIME',
  'DATE',
  'TIMESTAMP',
  'UNSIGNED_TIME',
  'UNSIGNED_DATE',
  'UNSIGNED_TIMESTAMP',
  'VARCHAR',
  'CHAR',
  'BINARY',
  'VARBINARY',
] as const;

const COLUMN_TYPE_PATTERN = /^([A-Z_]+)(\s*\(\s*\d+\s*(,\s*\d+\s*)?\))?(\s+ARRAY(\[\d*\])?)?$/;

function result(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors: errors.length > 0 ? errors : undefined };
}

/**
 * Checks every name the gateway interpolates into SQL or an HBase REST path.
 * Statements sent through the query/execute endpoints are passed through
 * untouched; only generated SQL is guarded here.
 */
export class IdentifierValidator {
  validateIdentifier(value: string, label: string): ValidationResult {
    const errors: string[] = [];
    if (!IDENTIFIER_PATTERN.test(value)) {
      errors.push(`Invalid ${label} '${value}': use letters, digits and underscores, not starting with a digit`);
    }
    return result(errors);
  }

  /**
   * A table or view name, optionally prefixed by its schema (`SCHEMA.TABLE`).
   */
  validateTableName(value: string, label: string = 'table name'): ValidationResult {
    const parts = value.split('.');
    if (parts.length > 2) {
      return result([`Invalid ${label} '${value}': expected TABLE or SCHEMA.TABLE`]);
    }
    const errors = parts.flatMap((part) => this.validateIdentifier(part, label).errors ?? []);
    return result(errors);
  }

  validateHBaseName(value: string, label: string): ValidationResult {
    return result(HBASE_NAME_PATTERN.test(value) ? [] : [`Invalid ${label} '${value}'`]);
  }

  validateColumnType(type: string): ValidationResult {
    const match = COLUMN_TYPE_PATTERN.exec(type.trim().toUpperCase());
    const base = match?.[1];
    const known: readonly string[] = PHOENIX_COLUMN_TYPES;
    if (!base || !known.includes(base)) {
      return result([`Unsupported column type '${type}'. Supported types: ${PHOENIX_COLUMN_TYPES.join(', ')}`]);
    }
    return result([]);
  }

  validateViewDefinition(definition: ViewDefinition): ValidationResult {
    const errors: string[] = [];

    errors.push(...(this.validateTableName(definition.viewName, 'view name').errors ?? []));
    errors.push(...(this.validateHBaseName(definition.hbaseTableName, 'HBase table name').errors ?? []));
    if (definition.namespace !== undefined) {
      errors.push(...(this.validateHBaseName(definition.namespace, 'namespace').errors ?? []));
    }

    if (definition.columns.length === 0) {
      errors.push('At least one column definition is required');
    }

    const seen = new Set<string>();
    for (const column of definition.columns) {
      // Column names may carry a column family: `family.qualifier`
      errors.push(...(this.validateTableName(column.name, 'column name').errors ?? []));
      errors.push(...(this.validateColumnType(column.type).errors ?? []));

      const key = column.name.toUpperCase();
      if (seen.has(key)) {
        errors.push(`Duplicate column '${column.name}'`);
      }
      seen.add(key);
    }

    if (definition.columns.filter((column) => column.isPrimaryKey).length > 1) {
      errors.push('Only one column can be the primary key');
    }

    return result(errors);
  }
}

export function assertValid(validation: ValidationResult): void {
  if (!validation.valid) {
    throw new ValidationError(validation.errors ?? ['Invalid input']);
  }
}

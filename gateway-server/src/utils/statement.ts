import { StatementError } from '../errors.js';

/**
 * Strip surrounding whitespace and any trailing `;` terminators. The query
 * server rejects statements that end in a semicolon.
 */
export function trimStatement(sql: string): string {
  return sql.trim().replace(/[\s;]+$/, '');
}

export function requireStatement(sql: string): string {
  const trimmed = trimStatement(sql);
  if (trimmed.length === 0) {
    throw new StatementError('SQL statement is empty');
  }
  return trimmed;
}

export function preview(text: string, max: number = 200): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

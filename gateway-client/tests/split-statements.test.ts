import { describe, expect, it } from 'vitest';
import { isQueryStatement, splitStatements } from '../src/helpers/split-statements.js';

describe('splitStatements', () => {
  it('splits on semicolons and drops the terminators', () => {
    expect(splitStatements('CREATE TABLE t (id INTEGER PRIMARY KEY);\nUPSERT INTO t VALUES (1);\n')).toEqual([
      'CREATE TABLE t (id INTEGER PRIMARY KEY)',
      'UPSERT INTO t VALUES (1)',
    ]);
  });

  it('keeps semicolons inside string literals and quoted identifiers', () => {
    expect(splitStatements(`UPSERT INTO t VALUES ('a;b', 'it''s');SELECT "x;y" FROM t`)).toEqual([
      "UPSERT INTO t VALUES ('a;b', 'it''s')",
      'SELECT "x;y" FROM t',
    ]);
  });

  it('drops comments and comment-only statements', () => {
    const sql = ['-- seed data', 'UPSERT INTO t VALUES (1); -- first', '/* block; with a semicolon */', ';'].join('\n');

    expect(splitStatements(sql)).toEqual(['UPSERT INTO t VALUES (1)']);
  });

  it('splits on statement markers only when the script uses them', () => {
    const sql = [
      'CREATE TABLE t (id INTEGER PRIMARY KEY, note VARCHAR);',
      '-- @statement',
      "UPSERT INTO t VALUES (1, 'a;b;c');",
      '-- @statement',
      '',
    ].join('\n');

    expect(splitStatements(sql)).toEqual([
      'CREATE TABLE t (id INTEGER PRIMARY KEY, note VARCHAR)',
      "UPSERT INTO t VALUES (1, 'a;b;c')",
    ]);
  });

  it('returns nothing for an empty script', () => {
    expect(splitStatements('  \n -- nothing here\n')).toEqual([]);
  });
});

describe('isQueryStatement', () => {
  it('recognises statements that return rows', () => {
    expect(isQueryStatement('select * from t')).toBe(true);
    expect(isQueryStatement('EXPLAIN SELECT 1')).toBe(true);
    expect(isQueryStatement('-- count rows\nSELECT COUNT(*) FROM t')).toBe(true);
  });

  it('treats everything else as a command', () => {
    expect(isQueryStatement('UPSERT INTO t VALUES (1)')).toBe(false);
    expect(isQueryStatement('SELECTED_TABLES')).toBe(false);
  });
});

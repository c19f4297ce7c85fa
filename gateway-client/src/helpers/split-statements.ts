const STATEMENT_MARKER = '-- @statement';

function isCommentOnly(statement: string): boolean {
  const withoutComments = statement.replace(/\/\*[\s\S]*?\*\//g, '').replace(/--[^\n]*/g, '');
  return withoutComments.trim().length === 0;
}

/**
 * Split a SQL script into statements.
 *
 * When any line is exactly `-- @statement`, the script is split on those
 * markers only. Otherwise statements end at a `;` outside string literals,
 * quoted identifiers and comments. Comments between statements are dropped;
 * terminators are not kept.
 */
export function splitStatements(sql: string): string[] {
  const lines = sql.split(/\r?\n/);
  if (lines.some((line) => line.trim() === STATEMENT_MARKER)) {
    return splitOnMarkers(lines);
  }

  const out: string[] = [];
  let buf = '';
  let i = 0;

  const push = () => {
    const statement = buf.trim();
    if (statement && !isCommentOnly(statement)) {
      out.push(statement);
    }
    buf = '';
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    // Line comment: skip to end of line
    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end;
      continue;
    }

    // Block comment
    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
      buf += ' ';
      continue;
    }

    // String literal or quoted identifier; a doubled quote is an escaped quote
    if (ch === "'" || ch === '"') {
      let j = i + 1;
      while (j < sql.length) {
        if (sql[j] === ch) {
          if (sql[j + 1] === ch) {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      buf += sql.slice(i, j + 1);
      i = j + 1;
      continue;
    }

    if (ch === ';') {
      push();
      i++;
      continue;
    }

    buf += ch;
    i++;
  }

  push();
  return out;
}

function splitOnMarkers(lines: string[]): string[] {
  const out: string[] = [];
  let buf: string[] = [];

  const push = () => {
    const statement = buf.join('\n').trim().replace(/[\s;]+$/, '');
    if (statement && !isCommentOnly(statement)) {
      out.push(statement);
    }
    buf = [];
  };

  for (const line of lines) {
    if (line.trim() === STATEMENT_MARKER) {
      push();
      continue;
    }
    buf.push(line);
  }
  push();

  return out;
}

/**
 * Statements that return rows go to the query endpoint; everything else is a
 * command.
 */
export function isQueryStatement(sql: string): boolean {
  const body = sql.replace(/^(\s*(--[^\n]*(\n|$)|\/\*[\s\S]*?\*\/))*/, '');
  return /^\s*(SELECT|EXPLAIN|WITH)\b/i.test(body);
}

import { describe, expect, it } from 'vitest';
import { decodeExecuteResults } from '../src/clients/protocol-codec.js';
import { NO_RESULTS_MESSAGE, toJsonEnvelope } from '../src/results/json-envelope.js';
import { cellKindFor, normalizeResult, toCell } from '../src/results/result-normalizer.js';

describe('cellKindFor', () => {
  it('collapses unsigned variants and precision suffixes', () => {
    expect(cellKindFor('UNSIGNED_LONG')).toBe('integer');
    expect(cellKindFor('decimal(10,2)')).toBe('float');
    expect(cellKindFor('VARCHAR(64)')).toBe('string');
    expect(cellKindFor('INTEGER ARRAY')).toBe('string');
    expect(cellKindFor(undefined)).toBe('inferred');
  });
});

describe('toCell', () => {
  it('decodes temporal values from their wire representation', () => {
    expect(toCell(19000, 'date')).toEqual({ kind: 'string', value: '2022-01-08' });
    expect(toCell(3723000, 'time')).toEqual({ kind: 'string', value: '01:02:03' });
    expect(toCell(1640995200123, 'timestamp')).toEqual({ kind: 'string', value: '2022-01-01 00:00:00.123' });
  });

  it('keeps integers beyond the safe range as digit strings', () => {
    expect(toCell('9007199254740993', 'integer')).toEqual({ kind: 'string', value: '9007199254740993' });
    expect(toCell('42', 'integer')).toEqual({ kind: 'integer', value: 42 });
  });

  it('keeps decimal strings exact', () => {
    expect(toCell('12.50', 'float')).toEqual({ kind: 'string', value: '12.50' });
    expect(toCell(1.5, 'float')).toEqual({ kind: 'float', value: 1.5 });
  });

  it('decodes base64 binary values', () => {
    expect(toCell('AQID', 'bytes')).toEqual({ kind: 'bytes', value: new Uint8Array([1, 2, 3]) });
  });

  it('turns null and undefined into null cells regardless of type', () => {
    expect(toCell(null, 'integer')).toEqual({ kind: 'null' });
    expect(toCell(undefined, 'string')).toEqual({ kind: 'null' });
  });
});

describe('normalizeResult', () => {
  it('infers cell kinds for untyped columns', () => {
    const result = normalizeResult({ shape: 'positional', columns: [{ name: 'C1' }], rows: [[1]] });

    expect(result).toEqual({
      columns: [{ name: 'C1', logicalType: 'UNKNOWN' }],
      rows: [{ cells: { C1: { kind: 'integer', value: 1 } } }],
    });
  });

  it('resolves column names by preference and de-duplicates by position', () => {
    const result = normalizeResult({
      shape: 'positional',
      columns: [{ columnName: 'ID', label: 'ignored' }, { label: 'ID' }, { name: 'X' }, {}],
      rows: [],
    });

    expect(result.columns.map((column) => column.name)).toEqual(['ID', 'ID_2', 'X', 'Column4']);
    expect(result.rows).toEqual([]);
  });

  it('keeps suffixing until a duplicate name is free', () => {
    const result = normalizeResult({
      shape: 'positional',
      columns: [{ name: 'X_3' }, { name: 'X' }, { name: 'X' }],
      rows: [[1, 2, 3]],
    });

    expect(result.columns.map((column) => column.name)).toEqual(['X_3', 'X', 'X_3_3']);
    expect(result.rows).toEqual([
      {
        cells: {
          X_3: { kind: 'integer', value: 1 },
          X: { kind: 'integer', value: 2 },
          X_3_3: { kind: 'integer', value: 3 },
        },
      },
    ]);
  });

  it('keeps every digit of wide numbers read off the wire', () => {
    const raw = decodeExecuteResults(
      '{"results":[{"columns":[' +
        '{"columnName":"ID","typeName":"BIGINT"},' +
        '{"columnName":"AMOUNT","typeName":"DECIMAL(38,9)"},' +
        '{"columnName":"RATIO","typeName":"DOUBLE"}' +
        '],"rows":[[9223372036854775807,12345678901234567890.123456789,1.5]]}]}'
    );

    expect(normalizeResult(raw).rows).toEqual([
      {
        cells: {
          ID: { kind: 'string', value: '9223372036854775807' },
          AMOUNT: { kind: 'string', value: '12345678901234567890.123456789' },
          RATIO: { kind: 'float', value: 1.5 },
        },
      },
    ]);
  });

  it('aligns keyed rows to the column list and fills gaps with null', () => {
    const result = normalizeResult({
      shape: 'keyed',
      columns: [
        { name: 'ID', typeName: 'INTEGER' },
        { name: 'ACTIVE', typeName: 'BOOLEAN' },
      ],
      rows: [{ ID: '7', ACTIVE: 1 }, { ID: 8 }],
    });

    expect(result.rows).toEqual([
      { cells: { ID: { kind: 'integer', value: 7 }, ACTIVE: { kind: 'boolean', value: true } } },
      { cells: { ID: { kind: 'integer', value: 8 }, ACTIVE: { kind: 'null' } } },
    ]);
  });

  it('carries the update count through', () => {
    expect(normalizeResult({ shape: 'positional', columns: [], rows: [], updateCount: 3 })).toEqual({
      columns: [],
      rows: [],
      updateCount: 3,
    });
  });
});

describe('toJsonEnvelope', () => {
  it('flattens cells and encodes bytes as base64', () => {
    const envelope = toJsonEnvelope(
      normalizeResult({
        shape: 'positional',
        columns: [
          { name: 'K', typeName: 'VARBINARY' },
          { name: 'V', typeName: 'VARCHAR' },
        ],
        rows: [['AQID', null]],
      })
    );

    expect(envelope).toEqual({
      columns: [
        { name: 'K', type: 'VARBINARY' },
        { name: 'V', type: 'VARCHAR' },
      ],
      rows: [{ K: 'AQID', V: null }],
      rowCount: 1,
    });
  });

  it('explains an empty result that still has columns', () => {
    const envelope = toJsonEnvelope({ columns: [{ name: 'ID', logicalType: 'INTEGER' }], rows: [] });

    expect(envelope).toEqual({ columns: [{ name: 'ID', type: 'INTEGER' }], rows: [], rowCount: 0, message: NO_RESULTS_MESSAGE });
  });

  it('leaves the message off when nothing was selected', () => {
    expect(toJsonEnvelope({ columns: [], rows: [] })).toEqual({ columns: [], rows: [], rowCount: 0 });
  });
});

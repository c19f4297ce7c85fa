import { describe, expect, it } from 'vitest';
import {
  decodeExecuteResults,
  decodeOpenConnection,
  decodePrepare,
  encodeCloseConnection,
  encodeExecute,
  encodeOpenConnection,
  encodePrepareAndExecute,
  extractRemoteError,
} from '../src/clients/protocol-codec.js';
import { TransportError } from '../src/errors.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('protocol codec encoders', () => {
  it('encodes openConnection with an empty info map', () => {
    expect(encodeOpenConnection('conn-1')).toEqual({ request: 'openConnection', connectionId: 'conn-1', info: {} });
  });

  it('strips terminators so both spellings produce the same sql field', () => {
    const withTerminator = encodePrepareAndExecute('conn-1', 'SELECT * FROM t;   ');
    const without = encodePrepareAndExecute('conn-1', 'SELECT * FROM t');

    expect(withTerminator.sql).toBe('SELECT * FROM t');
    expect(JSON.stringify(withTerminator)).toBe(JSON.stringify(without));
    expect(withTerminator.maxRowCount).toBe(10000);
  });

  it('encodes execute with a statement handle and empty parameter list', () => {
    expect(encodeExecute('conn-1', 4, 50)).toEqual({
      request: 'execute',
      statementHandle: { connectionId: 'conn-1', id: 4 },
      parameterValues: [],
      maxRowCount: 50,
    });
  });

  it('encodes closeConnection', () => {
    expect(encodeCloseConnection('conn-1')).toEqual({ request: 'closeConnection', connectionId: 'conn-1' });
  });
});

describe('decodeExecuteResults', () => {
  it('reads the Avatica signature and first frame', () => {
    const text = JSON.stringify({
      response: 'executeResults',
      results: [
        {
          signature: {
            columns: [
              { columnName: 'ID', label: 'ID', type: { id: 4, name: 'INTEGER', rep: 'PRIMITIVE_INT' } },
              { columnName: 'NAME', label: 'NAME', type: { id: 12, name: 'VARCHAR', rep: 'STRING' } },
            ],
          },
          firstFrame: { offset: 0, done: true, rows: [[1, 'alice']] },
          updateCount: -1,
        },
      ],
    });

    expect(decodeExecuteResults(text)).toEqual({
      shape: 'positional',
      columns: [
        { columnName: 'ID', label: 'ID', typeName: 'INTEGER' },
        { columnName: 'NAME', label: 'NAME', typeName: 'VARCHAR' },
      ],
      rows: [[1, 'alice']],
    });
  });

  it('reads the flat columns/rows form and keeps a real update count', () => {
    const text = JSON.stringify({ results: [{ columns: [{ name: 'C1', typeName: 'BIGINT' }], rows: [], updateCount: 3 }] });

    expect(decodeExecuteResults(text)).toEqual({
      shape: 'positional',
      columns: [{ name: 'C1', typeName: 'BIGINT' }],
      rows: [],
      updateCount: 3,
    });
  });

  it('treats an empty results array as a successful empty result', () => {
    expect(decodeExecuteResults('{"results":[]}')).toEqual({ shape: 'positional', columns: [], rows: [] });
  });

  it('ignores an error field that is null', () => {
    expect(decodeExecuteResults('{"error":null,"exception":null,"results":[]}')).toEqual({
      shape: 'positional',
      columns: [],
      rows: [],
    });
  });

  it('parses integers wider than a double as bigints', () => {
    const decoded = decodeExecuteResults(
      '{"results":[{"columns":[{"columnName":"ID","typeName":"BIGINT"}],"rows":[[9223372036854775807],[42]]}]}'
    );

    expect(decoded.rows).toEqual([[BigInt('9223372036854775807')], [42]]);
  });

  it('classifies a body with an error field as RemoteError, never as data', () => {
    const error = catchError(() => decodeExecuteResults(JSON.stringify({ error: 'boom', results: [] })));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'RemoteError', message: 'boom' });
  });

  it('keeps only the first line of the engine message and its SQL state', () => {
    const error = catchError(() =>
      decodeExecuteResults(
        JSON.stringify({
          response: 'error',
          errorMessage: 'ERROR 1012 (42M03): Table undefined. tableName=FOO\n\tat org.apache.phoenix...',
          sqlState: '42M03',
          errorCode: 1012,
        })
      )
    );

    expect(error).toMatchObject({
      kind: 'RemoteError',
      message: 'ERROR 1012 (42M03): Table undefined. tableName=FOO',
      sqlState: '42M03',
      errorCode: 1012,
    });
  });

  it('rejects a body without results as ProtocolError', () => {
    expect(catchError(() => decodeExecuteResults('{}'))).toMatchObject({ kind: 'ProtocolError' });
  });

  it('rejects non-JSON as ProtocolError', () => {
    expect(catchError(() => decodeExecuteResults('<html>502</html>'))).toMatchObject({ kind: 'ProtocolError' });
  });

  it('rejects a missingStatement response as ProtocolError', () => {
    expect(catchError(() => decodeExecuteResults('{"missingStatement":true,"results":[]}'))).toMatchObject({
      kind: 'ProtocolError',
    });
  });
});

describe('open and prepare decoding', () => {
  it('prefers the connection id the server returns', () => {
    expect(decodeOpenConnection('{"connectionId":"server-id"}', 'client-id')).toBe('server-id');
    expect(decodeOpenConnection('{"response":"openConnection"}', 'client-id')).toBe('client-id');
  });

  it('reads the statement id from a prepare response', () => {
    expect(decodePrepare('{"statement":{"connectionId":"c","id":7}}')).toBe(7);
  });

  it('reports no remote error for a normal body', () => {
    expect(extractRemoteError({ results: [] })).toBeNull();
  });
});

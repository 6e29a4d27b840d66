import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteConnection, connectSqlite } from '../sqlite-connection.js';
import { StatementError } from '../../core/errors.js';
import { createTestDatabase } from './helpers.js';

let connection: SqliteConnection;

beforeEach(() => {
  connection = new SqliteConnection(createTestDatabase());
});

afterEach(async () => {
  await connection.close();
});

describe('SqliteConnection.query', () => {
  it('returns columns in select-list order with positional rows', async () => {
    const result = await connection.query(
      'SELECT typeName, typeID FROM invTypes WHERE typeID IN (?, ?) ORDER BY typeID',
      [9001, 9002]
    );

    expect(result).toEqual({
      columns: ['typeName', 'typeID'],
      rows: [['Test Frigate', 9001], ['Test Hauler', 9002]]
    });
  });

  it('keeps the columns of an empty result', async () => {
    const result = await connection.query('SELECT typeID FROM invTypes WHERE typeID = ?', [1]);

    expect(result).toEqual({ columns: ['typeID'], rows: [] });
  });

  it('binds booleans as integers and dates as ISO strings', async () => {
    const result = await connection.query('SELECT ? AS flag, ? AS at', [
      true,
      new Date('2026-01-02T03:04:05.000Z')
    ]);

    expect(result.rows).toEqual([[1, '2026-01-02T03:04:05.000Z']]);
  });

  it('binds byte arrays as blobs', async () => {
    const result = await connection.query('SELECT ? AS data', [new Uint8Array([1, 2])]);

    expect(result.rows[0][0]).toEqual(Buffer.from([1, 2]));
  });

  it('refuses statements without a result set', async () => {
    await expect(connection.query('DELETE FROM invTypes', [])).rejects.toBeInstanceOf(StatementError);
  });
});

describe('SqliteConnection.execute', () => {
  it('reports affected rows and the inserted key', async () => {
    const result = await connection.execute(
      'INSERT INTO corporations (evecorporationid, lastkillid, lastlossid) VALUES (?, ?, ?)',
      [98765, 0, 0]
    );

    expect(result).toEqual({ affectedRows: 1, lastInsertId: 1 });
  });

  it('reports no key when nothing changed', async () => {
    const result = await connection.execute('UPDATE corporations SET lastkillid = ? WHERE id = ?', [1, 999]);

    expect(result).toEqual({ affectedRows: 0, lastInsertId: null });
  });
});

describe('connectSqlite', () => {
  it('opens an in-memory database', async () => {
    const opened = await connectSqlite({ driver: 'sqlite', path: ':memory:' });

    expect(opened.driver).toBe('sqlite');
    await expect(opened.query('SELECT 1 AS one', [])).resolves.toEqual({ columns: ['one'], rows: [[1]] });
    await opened.close();
  });

  it('refuses to create a database file that does not exist', async () => {
    await expect(
      connectSqlite({ driver: 'sqlite', path: '/nonexistent-killfeed-dir/killfeed.db' })
    ).rejects.toThrow();
  });
});

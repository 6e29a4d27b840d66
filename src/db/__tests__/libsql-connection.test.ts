import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { connectLibsql } from '../libsql-connection.js';
import { StatementError } from '../../core/errors.js';
import type { RelationalConnection } from '../connection.js';

let connection: RelationalConnection;

beforeEach(async () => {
  connection = await connectLibsql({ driver: 'libsql', url: ':memory:' });
  await connection.execute('CREATE TABLE invTypes (typeID INTEGER PRIMARY KEY, typeName TEXT NOT NULL)', []);
});

afterEach(async () => {
  await connection.close();
});

describe('LibsqlConnection', () => {
  it('identifies its driver', () => {
    expect(connection.driver).toBe('libsql');
  });

  it('reports the inserted key of an INSERT', async () => {
    const result = await connection.execute(
      'INSERT INTO invTypes (typeID, typeName) VALUES (?, ?)',
      [9001, 'Test Frigate']
    );

    expect(result).toEqual({ affectedRows: 1, lastInsertId: 9001 });
  });

  it('returns columns and positional rows', async () => {
    await connection.execute('INSERT INTO invTypes (typeID, typeName) VALUES (?, ?)', [9001, 'Test Frigate']);

    const result = await connection.query('SELECT typeID, typeName FROM invTypes WHERE typeID = ?', [9001]);

    expect(result).toEqual({ columns: ['typeID', 'typeName'], rows: [[9001, 'Test Frigate']] });
  });

  it('refuses a write in query without running it', async () => {
    await expect(
      connection.query('INSERT INTO invTypes (typeID, typeName) VALUES (?, ?)', [9001, 'Test Frigate'])
    ).rejects.toBeInstanceOf(StatementError);

    const count = await connection.query('SELECT COUNT(*) AS n FROM invTypes', []);
    expect(count.rows).toEqual([[0]]);
  });
});

/**
 * SqlGateway Tests — end-to-end requests against in-memory databases
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { SqlGateway } from '../src/gateway.js';
import type { GatewayOptions } from '../src/gateway.js';
import { hashPassword } from '../src/auth.js';
import type { DatabaseConfig, GatewayConfig } from '../src/types.js';

let gateway: SqlGateway | undefined;

// Replaced by a custom verifier wherever it is used.
const unused = [{ user: 'nobody', password: 'test-secret' }];

async function open(
  db: Partial<DatabaseConfig> = {},
  extra: Omit<GatewayConfig, 'databases'> = {},
  options?: GatewayOptions,
): Promise<SqlGateway> {
  gateway = await SqlGateway.create(
    {
      databases: [{ name: 'main', path: ':memory:', initStatements: ['CREATE TABLE t (v INT)'], ...db }],
      ...extra,
    },
    options,
  );
  return gateway;
}

afterEach(async () => {
  await gateway?.close();
  gateway = undefined;
});

describe('SqlGateway.execute', () => {
  it('inserts a row and reports rowsUpdated', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [{ statement: 'insert into t values(:v)', values: { v: 1 } }],
    });
    expect(result).toEqual({ status: 200, body: { success: true, results: [{ success: true, rowsUpdated: 1 }] } });

    const check = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(check.body).toEqual({ success: true, results: [{ success: true, resultSet: [{ v: 1 }] }] });
  });

  it('aborts on a failing item and persists nothing', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'insert into nowhere values(1)' },
        { statement: 'insert into t values(2)' },
      ],
    });
    expect(result).toEqual({
      status: 400,
      body: { success: false, errorCode: 0, message: 'no such table: nowhere' },
    });

    const check = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(check.body).toEqual({ success: true, results: [{ success: true, resultSet: [] }] });
  });

  it('continues past a noFail item', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'insert into nowhere values(1)', noFail: true },
        { statement: 'insert into t values(2)' },
      ],
    });
    expect(result).toEqual({
      status: 200,
      body: {
        success: true,
        results: [
          { success: false, error: 'no such table: nowhere' },
          { success: true, rowsUpdated: 1 },
        ],
      },
    });

    const check = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(check.body).toEqual({ success: true, results: [{ success: true, resultSet: [{ v: 2 }] }] });
  });

  it('returns an empty resultSet for an empty table', async () => {
    const gw = await open();
    const result = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(result.body).toEqual({ success: true, results: [{ success: true, resultSet: [] }] });
  });

  it('reports the index of the failing item', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'insert into t values(1)' },
        { statement: 'insert into t values(2)' },
        { query: 'select * from t', statement: 'select * from t' },
      ],
    });
    expect(result).toEqual({
      status: 400,
      body: { success: false, errorCode: 2, message: "exactly one of 'query' and 'statement' must be provided" },
    });
  });

  it('translates scalar values both ways', async () => {
    const gw = await open({ initStatements: ['CREATE TABLE s (i INT, r REAL, x TEXT, n TEXT, b INT)'] });
    await gw.execute('main', {
      transaction: [{
        statement: 'insert into s values(:i, :r, :x, :n, :b)',
        values: { i: 42, r: 1.5, x: 'hello', n: null, b: true },
      }],
    });
    const result = await gw.execute('main', { transaction: [{ query: 'select * from s' }] });
    expect(result.body).toEqual({
      success: true,
      results: [{ success: true, resultSet: [{ i: 42, r: 1.5, x: 'hello', n: null, b: 1 }] }],
    });
  });

  it('returns blobs as base64 and large integers as strings', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [{ query: "select x'68690a' as blob, 9007199254740993 as big, -9007199254740991 as edge" }],
    });
    expect(result.body).toEqual({
      success: true,
      results: [{ success: true, resultSet: [{ blob: 'aGkK', big: '9007199254740993', edge: -9007199254740991 }] }],
    });
  });

  it('returns one count per batch entry', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'insert into t values(:v)', valuesBatch: [{ v: 1 }, { v: 2 }, { v: 3 }] },
        { statement: 'update t set v = v * 10 where v >= :min', values: { min: 2 } },
      ],
    });
    expect(result.body).toEqual({
      success: true,
      results: [
        { success: true, rowsUpdatedBatch: [1, 1, 1] },
        { success: true, rowsUpdated: 2 },
      ],
    });
  });

  it('rejects a malformed envelope with errorCode -1', async () => {
    const gw = await open();
    const result = await gw.execute('main', { items: [] });
    expect(result).toEqual({
      status: 400,
      body: { success: false, errorCode: -1, message: 'malformed request: transaction: Required' },
    });
  });

  it('answers 404 for an unknown database', async () => {
    const gw = await open();
    const result = await gw.execute('other', { transaction: [] });
    expect(result).toEqual({
      status: 404,
      body: { success: false, errorCode: -1, message: 'database "other" is not configured' },
    });
  });

  it('fails a translation error at the item', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [{ statement: 'insert into t values(:v)', values: { v: { nested: 1 } } }],
    });
    expect(result).toEqual({
      status: 400,
      body: { success: false, errorCode: 0, message: 'parameter "v" is an object' },
    });
  });

  it('refuses a client COMMIT and keeps the batch atomic', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'insert into t values(1)' },
        { statement: 'COMMIT' },
        { statement: 'insert into t values(2)' },
        { statement: 'insert into nowhere values(3)' },
      ],
    });
    expect(result).toEqual({
      status: 400,
      body: { success: false, errorCode: 1, message: 'transaction control statement COMMIT is not allowed' },
    });

    const check = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(check.body).toEqual({ success: true, results: [{ success: true, resultSet: [] }] });
  });

  it('records a noFail ROLLBACK as a failed item and stays in the transaction', async () => {
    const gw = await open();
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'insert into t values(1)' },
        { statement: 'ROLLBACK', noFail: true },
        { statement: 'insert into nowhere values(2)' },
      ],
    });
    expect(result.body).toEqual({ success: false, errorCode: 2, message: 'no such table: nowhere' });

    const check = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(check.body).toEqual({ success: true, results: [{ success: true, resultSet: [] }] });
  });

  it('maps engine failures to engineErrorStatus', async () => {
    const gw = await open({}, { engineErrorStatus: 500 });
    const engine = await gw.execute('main', { transaction: [{ statement: 'insert into nowhere values(1)' }] });
    expect(engine.status).toBe(500);

    const client = await gw.execute('main', { transaction: [{ statement: 'insert into t values(:v)', values: { v: [] } }] });
    expect(client.status).toBe(400);
  });
});

describe('stored statements', () => {
  const stored = {
    storedStatements: [
      { id: 'ADD', sql: 'insert into t values(:v)' },
      { id: 'ALL', sql: 'select v from t order by v' },
    ],
  };

  it('runs stored statements by exact name and ^name', async () => {
    const gw = await open({ ...stored, useOnlyStoredStatements: true });
    const result = await gw.execute('main', {
      transaction: [
        { statement: 'ADD', values: { v: 1 } },
        { statement: '^ADD', values: { v: 2 } },
        { query: 'ALL' },
      ],
    });
    expect(result.body).toEqual({
      success: true,
      results: [
        { success: true, rowsUpdated: 1 },
        { success: true, rowsUpdated: 1 },
        { success: true, resultSet: [{ v: 1 }, { v: 2 }] },
      ],
    });
  });

  it('refuses raw SQL in stored-only mode', async () => {
    const gw = await open({ ...stored, useOnlyStoredStatements: true });
    const result = await gw.execute('main', { transaction: [{ query: 'select * from t' }] });
    expect(result).toEqual({
      status: 400,
      body: { success: false, errorCode: 0, message: 'this database accepts only stored statements' },
    });
  });

  it('refuses an unknown ^name even when raw SQL is allowed', async () => {
    const gw = await open(stored);
    const result = await gw.execute('main', { transaction: [{ query: '^NOPE' }] });
    expect(result.body).toEqual({
      success: false,
      errorCode: 0,
      message: 'stored statement "NOPE" does not exist',
    });
  });
});

describe('authorization', () => {
  const transaction = [{ query: 'select count(*) as n from t' }];
  const ok = { success: true, results: [{ success: true, resultSet: [{ n: 0 }] }] };
  const denied = { success: false, errorCode: -1, message: 'Authorization failed' };

  it('checks inline credentials against a plain password list', async () => {
    const gw = await open({ auth: { mode: 'INLINE', byCredentials: [{ user: 'alice', password: 'test-secret' }] } });

    const good = await gw.execute('main', { credentials: { user: 'alice', password: 'test-secret' }, transaction });
    expect(good).toEqual({ status: 200, body: ok });

    const bad = await gw.execute('main', { credentials: { user: 'alice', password: 'wrong' }, transaction });
    expect(bad).toEqual({ status: 401, body: denied });

    const missing = await gw.execute('main', { transaction });
    expect(missing).toEqual({ status: 401, body: denied });
  });

  it('accepts hashed passwords', async () => {
    const gw = await open({
      auth: { mode: 'INLINE', byCredentials: [{ user: 'bob', hashedPassword: hashPassword('test-secret') }] },
    });
    const result = await gw.execute('main', { credentials: { user: 'bob', password: 'test-secret' }, transaction });
    expect(result.status).toBe(200);
  });

  it('takes credentials from the transport in HTTP_BASIC mode', async () => {
    const gw = await open({ auth: { mode: 'HTTP_BASIC', byCredentials: [{ user: 'alice', password: 'test-secret' }] } });

    const inBody = await gw.execute('main', { credentials: { user: 'alice', password: 'test-secret' }, transaction });
    expect(inBody.status).toBe(401);

    const basic = await gw.execute('main', { transaction }, { basicAuth: { user: 'alice', password: 'test-secret' } });
    expect(basic).toEqual({ status: 200, body: ok });
  });

  it('authorizes through a query on the database', async () => {
    const gw = await open({
      initStatements: [
        'CREATE TABLE t (v INT)',
        'CREATE TABLE users (name TEXT, pass TEXT)',
        "INSERT INTO users VALUES ('alice', 'test-secret')",
      ],
      auth: { mode: 'INLINE', byQuery: 'select 1 from users where name = :user and pass = :password' },
    });

    const good = await gw.execute('main', { credentials: { user: 'alice', password: 'test-secret' }, transaction });
    expect(good.status).toBe(200);

    const bad = await gw.execute('main', { credentials: { user: 'alice', password: 'nope' }, transaction });
    expect(bad.status).toBe(401);
  });

  it('uses a custom verifier and a custom error status', async () => {
    const verifier = vi.fn(async (user: string) => user === 'service');
    const gw = await open(
      { auth: { mode: 'INLINE', customErrorCode: 499, byCredentials: unused } },
      {},
      { verifiers: { main: verifier } },
    );

    const good = await gw.execute('main', { credentials: { user: 'service', password: 'test-secret' }, transaction });
    expect(good.status).toBe(200);
    expect(verifier).toHaveBeenCalledWith('service', 'test-secret');

    const bad = await gw.execute('main', { credentials: { user: 'other', password: 'test-secret' }, transaction });
    expect(bad).toEqual({ status: 499, body: denied });
  });

  it('runs nothing for a denied request', async () => {
    const gw = await open({ auth: { mode: 'INLINE', byCredentials: [{ user: 'alice', password: 'test-secret' }] } });
    const transactions = vi.fn();
    gw.on('transaction', transactions);
    const insert = [{ statement: 'insert into t values(1)' }];

    const bad = await gw.execute('main', { credentials: { user: 'alice', password: 'wrong' }, transaction: insert });
    expect(bad).toEqual({ status: 401, body: denied });
    const missing = await gw.execute('main', { transaction: insert });
    expect(missing).toEqual({ status: 401, body: denied });
    expect(transactions).not.toHaveBeenCalled();

    const check = await gw.execute('main', { credentials: { user: 'alice', password: 'test-secret' }, transaction });
    expect(check).toEqual({ status: 200, body: ok });
  });

  it('emits auth-failed with the user name', async () => {
    const gw = await open({ auth: { mode: 'INLINE', byCredentials: [{ user: 'alice', password: 'test-secret' }] } });
    const handler = vi.fn();
    gw.on('auth-failed', handler);
    await gw.execute('main', { credentials: { user: 'mallory', password: 'x' }, transaction });
    expect(handler).toHaveBeenCalledWith({ database: 'main', user: 'mallory' });
  });
});

describe('events', () => {
  it('emits a transaction summary', async () => {
    const gw = await open();
    const handler = vi.fn();
    gw.on('transaction', handler);

    await gw.execute('main', { transaction: [{ statement: 'insert into nowhere values(1)' }] });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ database: 'main', items: 1, committed: false, failedIndex: 0 });
  });

  it('emits nothing when logging is off', async () => {
    const gw = await open({}, { logging: false });
    const handler = vi.fn();
    gw.on('transaction', handler);
    await gw.execute('main', { transaction: [] });
    expect(handler).not.toHaveBeenCalled();
  });

  it('emits error for request-level failures when listened to', async () => {
    const gw = await open();
    const handler = vi.fn();
    gw.on('error', handler);
    await gw.execute('other', { transaction: [] });
    expect(handler).toHaveBeenCalledWith({
      code: 'DATABASE_NOT_FOUND',
      message: 'database "other" is not configured',
      database: 'other',
    });
  });

  it('stops delivering after off()', async () => {
    const gw = await open();
    const handler = vi.fn();
    gw.on('transaction', handler);
    gw.off('transaction', handler);
    await gw.execute('main', { transaction: [] });
    expect(handler).not.toHaveBeenCalled();
  });
});

describe('concurrency', () => {
  it('serializes requests on one database', async () => {
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const verifier = vi.fn(async (user: string) => {
      order.push(`start ${user}`);
      if (user === 'first') await gate;
      order.push(`end ${user}`);
      return true;
    });
    const gw = await open({ auth: { mode: 'INLINE', byCredentials: unused } }, {}, { verifiers: { main: verifier } });

    const first = gw.execute('main', { credentials: { user: 'first', password: 'p' }, transaction: [] });
    const second = gw.execute('main', { credentials: { user: 'second', password: 'p' }, transaction: [] });
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(order).toEqual(['start first']);

    release();
    await Promise.all([first, second]);
    expect(order).toEqual(['start first', 'end first', 'start second', 'end second']);
  });

  it('lets different databases proceed independently', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    gateway = await SqlGateway.create(
      {
        databases: [
          { name: 'slow', path: ':memory:', auth: { mode: 'INLINE', byCredentials: unused } },
          { name: 'fast', path: ':memory:' },
        ],
      },
      { verifiers: { slow: async () => { await gate; return true; } } },
    );

    const slow = gateway.execute('slow', { credentials: { user: 'u', password: 'p' }, transaction: [] });
    const fast = await gateway.execute('fast', { transaction: [{ query: 'select 1 as one' }] });
    expect(fast.body).toEqual({ success: true, results: [{ success: true, resultSet: [{ one: 1 }] }] });

    release();
    expect((await slow).status).toBe(200);
  });
});

describe('lifecycle', () => {
  it('lists databases and their status', async () => {
    const gw = await open({ storedStatements: [{ id: 'ALL', sql: 'select * from t' }] });
    expect(gw.databases()).toEqual(['main']);
    expect(gw.status()).toEqual([
      expect.objectContaining({ name: 'main', path: ':memory:', state: 'connected', readOnly: false, storedStatements: 1 }),
    ]);
  });

  it('rejects an invalid configuration', async () => {
    await expect(SqlGateway.create({ databases: [] })).rejects.toMatchObject({ code: 'CONFIG_ERROR' });
  });

  it('closes every database', async () => {
    const gw = await open();
    const closed = vi.fn();
    gw.on('closed', closed);
    await gw.close();
    expect(closed).toHaveBeenCalledWith({ database: 'main' });
    expect(gw.databases()).toEqual([]);
  });
});

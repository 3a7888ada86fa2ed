// test/sqlite.test.ts
import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { parse } from '../src/parser/index.ts';
import { QueryBuilder as q } from '../src/query/builder.ts';
import { queryToSql, selectMatching, wildcardToLike } from '../src/adapters/sqlite/index.ts';
import type { SqliteClient, SqliteRow, SqlParam } from '../src/adapters/sqlite/index.ts';
import { createSqliteClient } from '../src/adapters/sqlite/client.ts';
import { filterRecords } from '../src/evaluator/evaluator.ts';
import { AdapterError } from '../src/errors/errors.ts';
import { rejected, thrown } from './helpers.ts';

function toSql(text: string, defaultColumns?: string[]) {
  return queryToSql(parse(text).query, defaultColumns ? { table: 'samples', defaultColumns } : { table: 'samples' });
}

describe('queryToSql', () => {
  it('compares named text case-insensitively', () => {
    expect(toSql('site:"Station B"')).toEqual({
      sql: 'SELECT * FROM "samples" WHERE LOWER("site") = LOWER(?);',
      params: ['Station B'],
    });
  });

  it('binds numbers, booleans and None', () => {
    expect(toSql('verified:true AND depth:None')).toEqual({
      sql: 'SELECT * FROM "samples" WHERE ("verified" = ? AND "depth" IS NULL);',
      params: [1],
    });
    expect(toSql('depth:40 OR verified:false').params).toEqual([40, 0]);
  });

  it('writes ranges as bound comparisons', () => {
    expect(toSql('depth:[10 TO 20]')).toEqual({
      sql: 'SELECT * FROM "samples" WHERE ("depth" >= ? AND "depth" <= ?);',
      params: [10, 20],
    });
    expect(toSql('depth:{* TO 20}')).toEqual({
      sql: 'SELECT * FROM "samples" WHERE "depth" < ?;',
      params: [20],
    });
  });

  it('translates wildcards to LIKE patterns', () => {
    expect(toSql('title:ri?ge*')).toEqual({
      sql: `SELECT * FROM "samples" WHERE "title" LIKE ? ESCAPE '\\';`,
      params: ['ri_ge%'],
    });
  });

  it('spreads unnamed terms over the default columns', () => {
    expect(toSql('+tags:ocean -status:retired basalt', ['title', 'site'])).toEqual({
      sql:
        'SELECT * FROM "samples" WHERE (LOWER("tags") = LOWER(?) AND (NOT COALESCE(LOWER("status") = LOWER(?), 0)) AND ' +
        `(LOWER("title") LIKE LOWER(?) ESCAPE '\\' OR LOWER("site") LIKE LOWER(?) ESCAPE '\\'));`,
      params: ['ocean', 'retired', '%basalt%', '%basalt%'],
    });
    expect(toSql('"50%"', ['title']).params).toEqual(['%50\\%%']);
  });

  it('matches everything with an empty query', () => {
    expect(toSql('')).toEqual({ sql: 'SELECT * FROM "samples" WHERE 1 = 1;', params: [] });
  });

  it('quotes identifiers', () => {
    expect(queryToSql(q.value(1, 'a'), { table: 'odd"name' }).sql).toBe('SELECT * FROM "odd""name" WHERE "a" = ?;');
  });

  it('rejects unnamed terms without default columns', () => {
    const e = thrown(() => toSql('basalt'));
    expect(e).toBeInstanceOf(AdapterError);
    expect(e).toMatchObject({
      code: 'E_ADAPTER_UNSUPPORTED_FEATURE',
      target: 'sqlite',
      feature: 'defaultColumns',
      message: "[sqlite] Unsupported feature 'defaultColumns': unnamed predicates need at least one default column",
    });
  });

  it('rejects columns outside the allowed list', () => {
    expect(thrown(() => queryToSql(parse('site:a depth:1').query, { table: 'samples', columns: ['site'] }))).toMatchObject({
      code: 'E_ADAPTER_UNSUPPORTED_FEATURE',
      feature: 'column',
      message: "[sqlite] Unsupported feature 'column': unknown column 'depth'",
    });
  });
});

describe('wildcardToLike', () => {
  it('escapes LIKE metacharacters and keeps escaped wildcards literal', () => {
    expect(wildcardToLike('100%_\\*x*')).toBe('100\\%\\_*x%');
    expect(wildcardToLike('a?\\?')).toBe('a_?');
  });
});

describe('selectMatching', () => {
  it('runs the statement through the client', async () => {
    const seen: { sql: string; params: SqlParam[] }[] = [];
    const client: SqliteClient = {
      async query(sql, params) {
        seen.push({ sql, params });
        return [{ id: 7 }];
      },
    };
    const rows = await selectMatching(client, q.value('x', 'site'), { table: 'samples' });
    expect(rows).toEqual([{ id: 7 }]);
    expect(seen).toEqual([{ sql: 'SELECT * FROM "samples" WHERE LOWER("site") = LOWER(?);', params: ['x'] }]);
  });

  it('wraps client failures in an adapter error', async () => {
    const client: SqliteClient = {
      async query(): Promise<SqliteRow[]> {
        throw new Error('boom');
      },
    };
    const e = await rejected(selectMatching(client, q.value('x', 'site'), { table: 'samples' }));
    expect(e).toBeInstanceOf(AdapterError);
    expect(e).toMatchObject({ code: 'E_ADAPTER_GENERIC', message: 'Query failed: boom' });
  });

  const records = [
    { id: 1, title: 'Ridge basalt', site: 'Station B', depth: 120, verified: true },
    { id: 2, title: 'Shelf sediment', site: 'Station A', depth: 40, verified: false },
    { id: 3, title: 'Core 50% split', site: 'Lab', depth: null, verified: true },
    { id: 4, title: 'Loose grab', site: null, depth: 10, verified: false },
  ];

  function openSamples() {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE samples (id INTEGER PRIMARY KEY, title TEXT, site TEXT, depth REAL, verified INTEGER)');
    const insert = db.prepare('INSERT INTO samples VALUES (?, ?, ?, ?, ?)');
    for (const r of records) insert.run(r.id, r.title, r.site, r.depth, r.verified ? 1 : 0);
    const client = createSqliteClient(db);
    const run = async (text: string, defaultColumns: string[] = ['title']) =>
      (await selectMatching(client, parse(text).query, { table: 'samples', defaultColumns })).map((r) => r['id']);
    return { db, run };
  }

  it('filters rows of an in-memory database', async () => {
    const { db, run } = openSamples();
    try {
      expect(await run('depth:[50 TO *] OR site:"station a"')).toEqual([1, 2]);
      expect(await run('title:ridge*')).toEqual([1]);
      expect(await run('verified:true -depth:None')).toEqual([1]);
      expect(await run('"50%"')).toEqual([3]);
      expect(await run('+verified:true sediment basalt')).toEqual([1]);
    } finally {
      db.close();
    }
  });

  it('keeps NULL columns under NOT and exclusion', async () => {
    const { db, run } = openSamples();
    try {
      expect(await run('NOT site:"Station B"')).toEqual([2, 3, 4]);
      expect(await run('-site:Lab')).toEqual([1, 2, 4]);
      expect(await run('NOT depth:[50 TO *]')).toEqual([2, 3, 4]);
    } finally {
      db.close();
    }
  });

  it('agrees with the case-insensitive record matcher', async () => {
    const { db, run } = openSamples();
    const queries = [
      'NOT site:"Station B"',
      '-site:Lab',
      'title:ridge*',
      'depth:[50 TO *] OR site:"station a"',
      'NOT depth:[50 TO *]',
      'verified:true',
      '"50%"',
    ];
    try {
      for (const text of queries) {
        const expected = filterRecords(records, parse(text).query, { ignoreCase: true, defaultFields: ['title'] }).map((r) => r.id);
        expect(await run(text)).toEqual(expected);
      }
      // 既定の照合器は大文字小文字を区別する。SQL は常に区別しない
      expect(filterRecords(records, parse('title:ridge*').query).map((r) => r.id)).toEqual([]);
      expect(await run('title:ridge*')).toEqual([1]);
    } finally {
      db.close();
    }
  });
});

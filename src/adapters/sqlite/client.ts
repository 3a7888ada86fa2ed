// src/adapters/sqlite/client.ts
// better-sqlite3 の Database を SqliteClient として使うための薄いラッパー。
import type Database from 'better-sqlite3';
import type { SqliteClient, SqliteRow, SqlParam } from './index.ts';

export function createSqliteClient(db: Database.Database): SqliteClient {
  return {
    async query(sql: string, params: SqlParam[]): Promise<SqliteRow[]> {
      return db.prepare<SqlParam[], SqliteRow>(sql).all(...params);
    },
  };
}

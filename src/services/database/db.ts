import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { describeError } from '../../utils/errors';

export type SqlParam = string | number | bigint | Buffer | null;

/**
 * plain: DDL, UPDATE, DELETE -> success flag
 * insert: new row id
 * one / all: first row / every row
 * changes: number of affected rows
 */
export type QueryMode = 'plain' | 'insert' | 'one' | 'all' | 'changes';

export interface StorageGatewayOptions {
  busyTimeoutMs?: number;
}

/**
 * Runs one parameterized statement per call against a SQLite file.
 *
 * Every call opens its own connection, runs the statement inside a
 * single-statement transaction and closes the connection before returning.
 * Storage errors are logged and reported as sentinels: `false` for plain
 * statements, `null` for every other mode.
 *
 * Only file paths are accepted: an in-memory database would not outlive the
 * connection of a single call.
 */
export class StorageGateway {
  readonly dbPath: string;
  private readonly busyTimeoutMs: number;

  constructor(dbPath: string, options: StorageGatewayOptions = {}) {
    if (dbPath.trim() === '' || dbPath === ':memory:') {
      throw new Error(`A database file path is required, got "${dbPath}"`);
    }
    this.dbPath = path.resolve(dbPath);
    this.busyTimeoutMs = options.busyTimeoutMs ?? 5000;
  }

  execute(sql: string, params: SqlParam[], mode: 'plain'): boolean;
  execute(sql: string, params: SqlParam[], mode: 'insert'): number | null;
  execute(sql: string, params: SqlParam[], mode: 'changes'): number | null;
  execute<T>(sql: string, params: SqlParam[], mode: 'one'): T | undefined | null;
  execute<T>(sql: string, params: SqlParam[], mode: 'all'): T[] | null;
  execute<T>(sql: string, params: SqlParam[], mode: QueryMode): boolean | number | T | T[] | undefined | null {
    let conn: Database.Database | undefined;
    try {
      conn = this.open();
      const stmt = conn.prepare<SqlParam[], T>(sql);

      const run = conn.transaction(() => {
        switch (mode) {
          case 'one':
            return stmt.get(...params);
          case 'all':
            return stmt.all(...params);
          case 'insert':
            return Number(stmt.run(...params).lastInsertRowid);
          case 'changes':
            return stmt.run(...params).changes;
          case 'plain':
            stmt.run(...params);
            return true;
        }
      });

      return run();
    } catch (error) {
      console.error('[Database] Statement failed:', describeError(error));
      return mode === 'plain' ? false : null;
    } finally {
      if (conn?.open) {
        conn.close();
      }
    }
  }

  /**
   * Probe used by the health endpoint
   */
  isReachable(): boolean {
    const row = this.execute<{ ok: number }>('SELECT 1 AS ok', [], 'one');
    return row?.ok === 1;
  }

  private open(): Database.Database {
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });

    const conn = new Database(this.dbPath, { timeout: this.busyTimeoutMs });
    conn.pragma('journal_mode = WAL');
    return conn;
  }
}

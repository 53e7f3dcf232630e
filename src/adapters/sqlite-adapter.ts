/**
 * RuleDB SQLite Adapter — better-sqlite3
 *
 * One synchronous connection per database. Sessions are handed out one at a
 * time; a second acquire() waits until the first session is released, since
 * SQLite transactions cannot nest on one connection.
 *
 * Reads run in safe integer mode so 64-bit values come back exact; the
 * context narrows them to numbers where that loses nothing.
 */

import Database from 'better-sqlite3';
import type { StoreAdapter, StoreSession } from './adapter.js';
import { toRowArray } from './adapter.js';
import { mapNativeError } from '../errors.js';
import type { StoreErrorContext } from '../errors.js';
import { quoteIdentifier } from '../compiler.js';
import type { CompiledStatement, Driver, SqlDialect, SqlValue } from '../types.js';

type BindValue = number | bigint | string | Buffer;

/** better-sqlite3 binds neither booleans nor plain Uint8Arrays. */
export function toSqliteParam(value: SqlValue): BindValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Uint8Array) {
    return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  return value;
}

export class SqliteAdapter implements StoreAdapter {
  readonly dialect: SqlDialect = 'sqlite';
  readonly driver: Driver = 'better-sqlite3';

  private filename: string;
  private db: Database.Database | null = null;
  private busy = false;
  private waiters: Array<() => void> = [];

  constructor(filename: string) {
    this.filename = filename;
  }

  async connect(): Promise<void> {
    try {
      this.db = new Database(this.filename);
    } catch (err) {
      throw mapNativeError('sqlite', err, { operation: 'connect' });
    }
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  isConnected(): boolean {
    return this.db?.open ?? false;
  }

  async acquire(): Promise<StoreSession> {
    const db = this.requireDb();

    if (this.busy) {
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }
    this.busy = true;

    return new SqliteSession(db, () => this.handOff());
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.busy = false;
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw mapNativeError('sqlite', new Error('Database is not open.'), { operation: 'acquire' });
    }
    return this.db;
  }
}

class SqliteSession implements StoreSession {
  private db: Database.Database;
  private onRelease: () => void;
  private released = false;

  constructor(db: Database.Database, onRelease: () => void) {
    this.db = db;
    this.onRelease = onRelease;
  }

  async execute(statement: CompiledStatement, ctx: StoreErrorContext = {}): Promise<number> {
    try {
      const result = this.db.prepare(statement.sql).run(...statement.params.map(toSqliteParam));
      return result.changes;
    } catch (err) {
      throw mapNativeError('sqlite', err, { ...ctx, statement: statement.sql });
    }
  }

  async query(statement: CompiledStatement, ctx: StoreErrorContext = {}): Promise<unknown[][]> {
    try {
      const rows: unknown[] = this.db.prepare(statement.sql).raw(true).safeIntegers(true).all(...statement.params.map(toSqliteParam));
      return rows.map(toRowArray);
    } catch (err) {
      throw mapNativeError('sqlite', err, { ...ctx, statement: statement.sql });
    }
  }

  async *iterate(statement: CompiledStatement, ctx: StoreErrorContext = {}): AsyncIterable<unknown[]> {
    let rows: IterableIterator<unknown>;
    try {
      rows = this.db.prepare(statement.sql).raw(true).safeIntegers(true).iterate(...statement.params.map(toSqliteParam));
    } catch (err) {
      throw mapNativeError('sqlite', err, { ...ctx, statement: statement.sql });
    }

    // The connection stays busy until the iterator is exhausted or returned.
    for (const row of rows) {
      yield toRowArray(row);
    }
  }

  async begin(): Promise<void> {
    this.exec('BEGIN');
  }

  async commit(): Promise<void> {
    this.exec('COMMIT');
  }

  async rollback(): Promise<void> {
    this.exec('ROLLBACK');
  }

  async savepoint(name: string): Promise<void> {
    this.exec(`SAVEPOINT ${quoteIdentifier(name)}`);
  }

  async releaseSavepoint(name: string): Promise<void> {
    this.exec(`RELEASE SAVEPOINT ${quoteIdentifier(name)}`);
  }

  async rollbackToSavepoint(name: string): Promise<void> {
    this.exec(`ROLLBACK TO SAVEPOINT ${quoteIdentifier(name)}`);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }

  private exec(sql: string): void {
    try {
      this.db.exec(sql);
    } catch (err) {
      throw mapNativeError('sqlite', err, { operation: 'transaction', statement: sql });
    }
  }
}

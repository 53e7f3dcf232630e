/**
 * RuleDB Abstract Store Interface
 *
 * Every backing SQL engine implements this interface. The compiler produces
 * statements, the store runs them. Driver errors are mapped to RuleDBError
 * inside the adapter, with the failing SQL attached.
 */

import type { StoreErrorContext } from '../errors.js';
import type { CompiledStatement, Driver, SqlDialect } from '../types.js';

export interface StoreAdapter {
  readonly dialect: SqlDialect;
  readonly driver: Driver;

  // ─── Lifecycle ────────────────────────────────────────────────────
  connect(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;

  /** Exclusive session on one connection. Must be released. */
  acquire(): Promise<StoreSession>;
}

export interface StoreSession {
  // ─── Statements ───────────────────────────────────────────────────
  /** Run a write statement and return the number of rows it changed. */
  execute(statement: CompiledStatement, ctx?: StoreErrorContext): Promise<number>;
  /** Run a read statement and return every row as an array of column values. */
  query(statement: CompiledStatement, ctx?: StoreErrorContext): Promise<unknown[][]>;
  /** Run a read statement and yield rows one at a time. */
  iterate(statement: CompiledStatement, ctx?: StoreErrorContext): AsyncIterable<unknown[]>;

  // ─── Transactions ─────────────────────────────────────────────────
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  savepoint(name: string): Promise<void>;
  releaseSavepoint(name: string): Promise<void>;
  rollbackToSavepoint(name: string): Promise<void>;

  /** Give the connection back. The session is unusable afterwards. */
  release(): Promise<void>;
}

/** Rows come back as arrays because statements run in raw/array row mode. */
export function toRowArray(row: unknown): unknown[] {
  if (!Array.isArray(row)) {
    throw new TypeError(`Expected an array row from the store, got ${typeof row}.`);
  }
  return row;
}

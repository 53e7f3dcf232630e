/**
 * RuleDB PostgreSQL Adapter — pg
 *
 * A pg.Pool behind a narrow interface. Each session checks out one pooled
 * client and keeps it until release(), so a session's transaction and
 * savepoints all run on the same connection.
 */

import pg from 'pg';
import type { StoreAdapter, StoreSession } from './adapter.js';
import { toRowArray } from './adapter.js';
import { mapNativeError } from '../errors.js';
import type { StoreErrorContext } from '../errors.js';
import { quoteIdentifier } from '../compiler.js';
import type { CompiledStatement, Driver, SqlDialect, SqlValue } from '../types.js';

// ─── Pool Interface ──────────────────────────────────────────────────────────

export interface PgQuery {
  text: string;
  values: unknown[];
  rowMode: 'array';
}

export interface PgClientLike {
  query(query: PgQuery): Promise<{ rows: unknown[]; rowCount: number | null }>;
  release(): void;
}

export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

/** Wrap a real pg.Pool in the narrow interface above. */
export function wrapPgPool(pool: pg.Pool): PgPoolLike {
  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async query => {
          const result = await client.query(query);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

/** pg serializes Buffers as bytea; a plain Uint8Array would go out as JSON. */
export function toPgParam(value: SqlValue): unknown {
  if (value instanceof Uint8Array) {
    return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  if (typeof value === 'bigint') return value.toString();
  return value;
}

// ─── Adapter ─────────────────────────────────────────────────────────────────

export class PgAdapter implements StoreAdapter {
  readonly dialect: SqlDialect = 'pg';
  readonly driver: Driver = 'pg';

  private uri: string;
  private poolFactory: (uri: string) => PgPoolLike;
  private pool: PgPoolLike | null = null;

  /**
   * @param poolFactory - builds the pool on connect(). Defaults to a real
   *   pg.Pool on the connection string.
   */
  constructor(uri: string, poolFactory?: (uri: string) => PgPoolLike) {
    this.uri = uri;
    this.poolFactory = poolFactory ?? (connectionString => wrapPgPool(new pg.Pool({ connectionString })));
  }

  async connect(): Promise<void> {
    const pool = this.poolFactory(this.uri);
    try {
      // Fail fast on bad credentials or an unreachable server.
      const client = await pool.connect();
      client.release();
    } catch (err) {
      await pool.end();
      throw mapNativeError('pg', err, { operation: 'connect' });
    }
    this.pool = pool;
  }

  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (pool) await pool.end();
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  async acquire(): Promise<StoreSession> {
    if (!this.pool) {
      throw mapNativeError('pg', new Error('Pool is not connected.'), { operation: 'acquire' });
    }
    try {
      return new PgSession(await this.pool.connect());
    } catch (err) {
      throw mapNativeError('pg', err, { operation: 'acquire' });
    }
  }
}

class PgSession implements StoreSession {
  private client: PgClientLike;
  private released = false;

  constructor(client: PgClientLike) {
    this.client = client;
  }

  async execute(statement: CompiledStatement, ctx: StoreErrorContext = {}): Promise<number> {
    const result = await this.run(statement, ctx);
    return result.rowCount ?? 0;
  }

  async query(statement: CompiledStatement, ctx: StoreErrorContext = {}): Promise<unknown[][]> {
    const result = await this.run(statement, ctx);
    return result.rows.map(toRowArray);
  }

  /** pg has no server-side cursor without pg-cursor: fetch, then yield. */
  async *iterate(statement: CompiledStatement, ctx: StoreErrorContext = {}): AsyncIterable<unknown[]> {
    yield* await this.query(statement, ctx);
  }

  async begin(): Promise<void> {
    await this.control('BEGIN');
  }

  async commit(): Promise<void> {
    await this.control('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.control('ROLLBACK');
  }

  async savepoint(name: string): Promise<void> {
    await this.control(`SAVEPOINT ${quoteIdentifier(name)}`);
  }

  async releaseSavepoint(name: string): Promise<void> {
    await this.control(`RELEASE SAVEPOINT ${quoteIdentifier(name)}`);
  }

  async rollbackToSavepoint(name: string): Promise<void> {
    await this.control(`ROLLBACK TO SAVEPOINT ${quoteIdentifier(name)}`);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.client.release();
  }

  private async run(statement: CompiledStatement, ctx: StoreErrorContext): Promise<{ rows: unknown[]; rowCount: number | null }> {
    try {
      return await this.client.query({
        text: statement.sql,
        values: statement.params.map(toPgParam),
        rowMode: 'array',
      });
    } catch (err) {
      throw mapNativeError('pg', err, { ...ctx, statement: statement.sql });
    }
  }

  private async control(sql: string): Promise<void> {
    await this.run({ sql, params: [] }, { operation: 'transaction' });
  }
}

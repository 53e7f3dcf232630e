/**
 * RuleDB — Datalog-style rules evaluated by a SQL engine
 *
 * Declares relations, opens scoped sessions and reports on what it holds.
 * Every write goes through the same pipeline:
 *
 *   caller → RuleContext (resolve relations, validate rows)
 *     → compiler (algebra → SQL)
 *     → fixpoint driver (passes until nothing new)
 *     → adapter (better-sqlite3 / pg)
 *     → receipts → logger (emit event)
 *     → return to caller
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Query, Rule } from './algebra.js';
import type { StoreAdapter, StoreSession } from './adapters/adapter.js';
import { PgAdapter } from './adapters/pg-adapter.js';
import { SqliteAdapter } from './adapters/sqlite-adapter.js';
import { compile, compileRule } from './compiler.js';
import { redactUri, resolveConfig, sqliteFilename } from './config.js';
import type { ResolvedConfig } from './config.js';
import { RuleContext } from './context.js';
import { RuleDBError, nestedSessionError } from './errors.js';
import { RuleDBEventEmitter } from './events.js';
import { RuleDBLogger } from './logger.js';
import { SchemaRegistry } from './schema.js';
import type { Relation } from './schema.js';
import type {
  ColumnSpec,
  ConnectionStatus,
  ExplainResult,
  RelationDescription,
  RuleDBConfig,
  RuleDBEvents,
  SqlDialect,
} from './types.js';

export class RuleDB {
  readonly dialect: SqlDialect;

  private config: ResolvedConfig;
  private adapter: StoreAdapter;
  private emitter: RuleDBEventEmitter;
  private logger: RuleDBLogger;
  private registry = new SchemaRegistry();
  private createdTables = new Set<string>();
  /** The context of the session the current async call chain runs in. */
  private activeContext = new AsyncLocalStorage<RuleContext>();
  private connectedAt: Date | null;

  private constructor(
    config: ResolvedConfig,
    adapter: StoreAdapter,
    emitter: RuleDBEventEmitter,
    logger: RuleDBLogger,
  ) {
    this.config = config;
    this.adapter = adapter;
    this.emitter = emitter;
    this.logger = logger;
    this.dialect = adapter.dialect;
    this.connectedAt = new Date();
  }

  /**
   * Open a database. The dialect is detected from the URI.
   *
   *   const db = await RuleDB.open({ uri: 'sqlite::memory:' });
   *
   * @param adapter - store to use instead of the one the URI selects
   */
  static async open(config: RuleDBConfig, adapter?: StoreAdapter): Promise<RuleDB> {
    const resolved = resolveConfig(config);
    const emitter = new RuleDBEventEmitter();
    const logger = new RuleDBLogger(resolved.logger, emitter);

    if (adapter && adapter.dialect !== resolved.dialect) {
      throw new RuleDBError({
        code: 'INVALID_CONFIG',
        message: `The ${adapter.dialect} adapter does not match the ${resolved.dialect} URI.`,
        fix: `Pass a URI of the adapter's dialect, or leave the adapter out.`,
      });
    }

    const store = adapter ?? createAdapter(resolved);
    await store.connect();

    const db = new RuleDB(resolved, store, emitter, logger);
    emitter.emit('connected', { dialect: resolved.dialect, label: resolved.label });
    return db;
  }

  // ─── Schema ────────────────────────────────────────────────────────────────

  /**
   * Declare a base relation, filled with ctx.insert().
   *
   *   const edge = db.relation('edge', { src: 'INTEGER', dst: 'INTEGER' });
   */
  relation(name: string, columns: ColumnSpec): Relation {
    return this.registry.declare(name, columns, 'base');
  }

  /**
   * Declare a derived relation set, filled by rules.
   */
  relationSet(name: string, columns: ColumnSpec): Relation {
    return this.registry.declare(name, columns, 'derived');
  }

  relations(): Relation[] {
    return this.registry.all();
  }

  getRelation(name: string): Relation {
    return this.registry.require(name);
  }

  // ─── Sessions ──────────────────────────────────────────────────────────────

  /**
   * Run `fn` inside one transaction. Commits when it resolves, rolls back
   * when it throws, and always gives the connection back. The context
   * cannot be used after `fn` returns. Sessions do not nest: calling
   * session() from inside `fn` fails with SESSION_BUSY.
   */
  async session<T>(fn: (ctx: RuleContext) => Promise<T>): Promise<T> {
    if (!this.connectedAt) {
      throw new RuleDBError({
        code: 'SESSION_CLOSED',
        message: `Cannot call session() after close().`,
        fix: `Open a new database with RuleDB.open().`,
        operation: 'session',
      });
    }
    if (this.activeContext.getStore()?.isOpen) throw nestedSessionError();

    const session = await this.adapter.acquire();
    const ctx = new RuleContext({
      session,
      dialect: this.dialect,
      registry: this.registry,
      emitter: this.emitter,
      logger: this.logger,
      maxPasses: this.config.maxPasses,
      createdTables: this.createdTables,
    });

    try {
      return await this.activeContext.run(ctx, () => this.transact(session, ctx, fn));
    } catch (err) {
      this.reportError(err);
      throw err;
    } finally {
      await session.release();
    }
  }

  private async transact<T>(session: StoreSession, ctx: RuleContext, fn: (ctx: RuleContext) => Promise<T>): Promise<T> {
    await session.begin();

    let result: T;
    try {
      result = await fn(ctx);
    } catch (err) {
      ctx.end();
      await this.rollback(session, err);
      throw err;
    }

    const created = ctx.end();
    await session.commit();
    for (const table of created) this.createdTables.add(table);
    return result;
  }

  /**
   * Roll back after `fn` failed. A failing rollback is reported as an error
   * event and attached to the original error, which is what the caller sees.
   */
  private async rollback(session: StoreSession, cause: unknown): Promise<void> {
    try {
      await session.rollback();
    } catch (rollbackError) {
      if (cause instanceof RuleDBError) cause.rollbackError = rollbackError;
      this.reportError(rollbackError);
    }
  }

  // ─── Discovery ─────────────────────────────────────────────────────────────

  /**
   * Columns, kind and current row count of a relation. Inside a session the
   * count is read through that session, so it sees uncommitted rows.
   */
  async describe(name: string): Promise<RelationDescription> {
    const relation = this.registry.require(name);
    const current = this.activeContext.getStore();
    const rowCount = current?.isOpen
      ? await current.count(relation)
      : await this.session(ctx => ctx.count(relation));

    return {
      name: relation.name,
      kind: relation.kind,
      columns: relation.columns.map(c => ({ ...c })),
      rowCount,
    };
  }

  /**
   * The SQL a rule, a rule set or a query compiles to, without running it.
   */
  explain(target: Rule | Query | readonly Rule[]): ExplainResult {
    const statements = isRuleList(target)
      ? target.map(rule => compileRule(rule, this.dialect))
      : [compile(target, this.dialect)];

    return { dialect: this.dialect, statements };
  }

  status(): ConnectionStatus {
    return {
      state: this.connectedAt ? 'connected' : 'closed',
      dialect: this.dialect,
      driver: this.adapter.driver,
      label: this.config.label,
      uri: redactUri(this.config.uri),
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
      relations: this.registry.names().length,
    };
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends keyof RuleDBEvents>(event: E, listener: (payload: RuleDBEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof RuleDBEvents>(event: E, listener: (payload: RuleDBEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof RuleDBEvents>(event: E, listener: (payload: RuleDBEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  private reportError(err: unknown): void {
    // An 'error' event without a listener would throw from emit().
    if (!(err instanceof RuleDBError) || this.emitter.listenerCount('error') === 0) return;

    this.emitter.emit('error', {
      code: err.code,
      message: err.message,
      fix: err.fix,
      statement: err.statement,
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  async close(): Promise<void> {
    if (!this.connectedAt) return;
    await this.adapter.close();
    this.connectedAt = null;
    this.createdTables.clear();
    this.emitter.emit('closed', { dialect: this.dialect, label: this.config.label });
  }
}

// ─── Adapter Selection ───────────────────────────────────────────────────────

function createAdapter(config: ResolvedConfig): StoreAdapter {
  switch (config.dialect) {
    case 'sqlite':
      return new SqliteAdapter(sqliteFilename(config.uri));
    case 'pg':
      return new PgAdapter(config.uri);
  }
}

function isRuleList(target: Rule | Query | readonly Rule[]): target is readonly Rule[] {
  return Array.isArray(target);
}

/**
 * RuleDB Execution Context — insert, run and select inside one session
 *
 * A context wraps one store session inside one transaction. It owns no
 * algebra logic: it resolves relations, makes sure their tables exist,
 * hands compiled statements to the store and turns results into receipts.
 * Contexts are not safe for concurrent use, and no statement may run while
 * a result set is being read.
 */

import { Query } from './algebra.js';
import type { Formula, Rule } from './algebra.js';
import { compileCount, compileCreateTable, compileInsertRows, compileQuery } from './compiler.js';
import { CompileError, SchemaError, readInProgressError, sessionClosedError } from './errors.js';
import type { StoreErrorContext } from './errors.js';
import type { RuleDBEventEmitter } from './events.js';
import { compileRules, runPass, runToFixpoint, validateRunOptions } from './fixpoint.js';
import type { PassExecutor } from './fixpoint.js';
import type { RuleDBLogger } from './logger.js';
import { createInsertReceipt } from './receipts.js';
import type { Relation, SchemaRegistry } from './schema.js';
import { decodeValue } from './sql-types.js';
import type { TermInput } from './terms.js';
import type { StoreSession } from './adapters/adapter.js';
import type {
  CompiledQuery,
  CompiledStatement,
  InsertReceipt,
  RowInput,
  RunOptions,
  RunReceipt,
  SqlDialect,
  SqlValue,
} from './types.js';

// ─── Result Set ──────────────────────────────────────────────────────────────

/**
 * Rows of a selection. Nothing runs until iteration starts, and every
 * iteration runs the query again, so the set can be read more than once.
 * Row order is unspecified.
 */
export class ResultSet implements AsyncIterable<SqlValue[]> {
  readonly statement: CompiledQuery;
  private open: () => AsyncIterable<unknown[]>;

  constructor(statement: CompiledQuery, open: () => AsyncIterable<unknown[]>) {
    this.statement = statement;
    this.open = open;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<SqlValue[]> {
    const types = this.statement.columnTypes;
    for await (const raw of this.open()) {
      yield types.map((type, i) => decodeValue(type, raw[i]));
    }
  }

  async toArray(): Promise<SqlValue[][]> {
    const rows: SqlValue[][] = [];
    for await (const row of this) rows.push(row);
    return rows;
  }
}

// ─── Context ─────────────────────────────────────────────────────────────────

export interface ContextOptions {
  session: StoreSession;
  dialect: SqlDialect;
  registry: SchemaRegistry;
  emitter: RuleDBEventEmitter;
  logger: RuleDBLogger;
  maxPasses: number;
  /** Tables already committed by earlier sessions (lower-cased names). */
  createdTables: ReadonlySet<string>;
}

export class RuleContext {
  readonly dialect: SqlDialect;

  private session: StoreSession;
  private registry: SchemaRegistry;
  private emitter: RuleDBEventEmitter;
  private logger: RuleDBLogger;
  private maxPasses: number;
  private createdTables: ReadonlySet<string>;
  private pendingTables = new Set<string>();
  private executor: PassExecutor;
  private closed = false;
  private openReads = 0;

  constructor(opts: ContextOptions) {
    this.session = opts.session;
    this.dialect = opts.dialect;
    this.registry = opts.registry;
    this.emitter = opts.emitter;
    this.logger = opts.logger;
    this.maxPasses = opts.maxPasses;
    this.createdTables = opts.createdTables;
    this.executor = {
      execute: (statement, ctx) => this.execute(statement, ctx),
      savepoint: name => this.session.savepoint(name),
      releaseSavepoint: name => this.session.releaseSavepoint(name),
      rollbackToSavepoint: name => this.session.rollbackToSavepoint(name),
    };
  }

  // ─── Writes ────────────────────────────────────────────────────────────────

  /**
   * Insert literal rows into a base relation. Rows are tuples in column
   * order or objects keyed by column name. Rows already stored are skipped.
   */
  async insert(target: Relation | string, rows: readonly RowInput[]): Promise<InsertReceipt> {
    this.assertOpen('insert');
    this.assertIdle('insert');
    const startTime = Date.now();
    const relation = this.resolve(target);

    if (relation.isDerived) {
      throw new SchemaError({
        message: `Cannot insert into "${relation.name}": it is a derived relation.`,
        fix: `Relation sets are filled by rules only. Insert into a base relation declared with db.relation().`,
        relation: relation.name,
        operation: 'insert',
      });
    }

    const tuples = rows.map(row => relation.validateRow(row));
    await this.ensureTables([relation]);

    let insertedCount = 0;
    const statements = compileInsertRows(relation, tuples, this.dialect);
    if (statements.length > 0) {
      await this.atomically('ruledb_insert', async () => {
        for (const statement of statements) {
          insertedCount += await this.execute(statement, { relation: relation.name, operation: 'insert' });
        }
      });
    }

    const receipt = createInsertReceipt({
      relation: relation.name,
      startTime,
      rowCount: tuples.length,
      insertedCount,
    });
    this.logger.logOperation(receipt);
    return receipt;
  }

  /**
   * Run the rules to their least fixpoint, or until the pass bound.
   */
  async run(rules: Rule | readonly Rule[], options: RunOptions = {}): Promise<RunReceipt> {
    this.assertOpen('run');
    this.assertIdle('run');
    validateRunOptions(options);
    const list = this.checkRules(rules);
    const compiled = compileRules(list, this.dialect);
    await this.ensureTables(list.flatMap(rule => relationsOf(rule)));

    const receipt = await runToFixpoint(compiled, this.executor, {
      ...options,
      defaultMaxPasses: this.maxPasses,
      emitter: this.emitter,
    });
    this.logger.logOperation(receipt);
    return receipt;
  }

  /**
   * Run every rule exactly once. Returns the number of rows inserted.
   */
  async pass(rules: Rule | readonly Rule[]): Promise<number> {
    this.assertOpen('pass');
    this.assertIdle('pass');
    const list = this.checkRules(rules);
    const compiled = compileRules(list, this.dialect);
    await this.ensureTables(list.flatMap(rule => relationsOf(rule)));

    return runPass(compiled, this.executor, 1);
  }

  // ─── Reads ─────────────────────────────────────────────────────────────────

  /**
   * Project `terms` out of every solution of `body`.
   *
   *   for await (const [a, b] of ctx.select([x, y], path.atom(x, y))) { ... }
   */
  select(terms: readonly TermInput[], body: Formula): ResultSet;
  select(query: Query): ResultSet;
  select(termsOrQuery: readonly TermInput[] | Query, body?: Formula): ResultSet {
    this.assertOpen('select');

    let query: Query;
    if (termsOrQuery instanceof Query) {
      query = termsOrQuery;
    } else if (body === undefined) {
      throw new CompileError({
        message: `select() was given output terms but no body.`,
        fix: `Pass the body formula: ctx.select([x, y], edge.atom(x, y)).`,
      });
    } else {
      query = new Query(termsOrQuery, body);
    }

    const relations = query.body.branches.flatMap(b => b.atoms.map(a => a.relation));
    relations.forEach(r => this.checkOwned(r));
    const statement = compileQuery(query, this.dialect);

    return new ResultSet(statement, () => this.iterate(statement, relations));
  }

  /** Number of rows stored in a relation. */
  async count(target: Relation | string): Promise<number> {
    this.assertOpen('count');
    this.assertIdle('count');
    const relation = this.resolve(target);
    await this.ensureTables([relation]);

    const rows = await this.query(compileCount(relation), { relation: relation.name, operation: 'count' });
    return Number(rows[0]?.[0] ?? 0);
  }

  // ─── Scope ─────────────────────────────────────────────────────────────────

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Ends the scope. Returns the lower-cased names of the tables created
   * inside it, which the database records once the transaction commits.
   * @internal
   */
  end(): string[] {
    this.closed = true;
    return [...this.pendingTables];
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private assertOpen(operation: string): void {
    if (this.closed) throw sessionClosedError(operation);
  }

  private assertIdle(operation: string): void {
    if (this.openReads > 0) throw readInProgressError(operation);
  }

  private resolve(target: Relation | string): Relation {
    if (typeof target === 'string') return this.registry.require(target);
    this.checkOwned(target);
    return target;
  }

  private checkOwned(relation: Relation): void {
    if (!this.registry.owns(relation)) {
      throw new SchemaError({
        message: `Relation "${relation.name}" was not declared on this database.`,
        fix: `Declare relations with db.relation() or db.relationSet() on the database you open sessions on.`,
        relation: relation.name,
      });
    }
  }

  private checkRules(rules: Rule | readonly Rule[]): readonly Rule[] {
    const list = isRuleList(rules) ? rules : [rules];
    for (const rule of list) relationsOf(rule).forEach(r => this.checkOwned(r));
    return list;
  }

  private async ensureTables(relations: readonly Relation[]): Promise<void> {
    for (const relation of relations) {
      const key = relation.name.toLowerCase();
      if (this.createdTables.has(key) || this.pendingTables.has(key)) continue;

      await this.execute(compileCreateTable(relation, this.dialect), { relation: relation.name, operation: 'create' });
      this.pendingTables.add(key);
    }
  }

  private async atomically(savepoint: string, fn: () => Promise<void>): Promise<void> {
    await this.session.savepoint(savepoint);
    try {
      await fn();
    } catch (err) {
      await this.session.rollbackToSavepoint(savepoint);
      await this.session.releaseSavepoint(savepoint);
      throw err;
    }
    await this.session.releaseSavepoint(savepoint);
  }

  private async execute(statement: CompiledStatement, ctx: StoreErrorContext = {}): Promise<number> {
    this.assertOpen(ctx.operation ?? 'execute');
    const start = Date.now();
    const changed = await this.session.execute(statement, ctx);
    this.logger.logStatement(statement.sql, statement.params.length, changed, Date.now() - start);
    return changed;
  }

  private async query(statement: CompiledStatement, ctx: StoreErrorContext): Promise<unknown[][]> {
    const start = Date.now();
    const rows = await this.session.query(statement, ctx);
    this.logger.logStatement(statement.sql, statement.params.length, rows.length, Date.now() - start);
    return rows;
  }

  private async *iterate(statement: CompiledQuery, relations: readonly Relation[]): AsyncIterable<unknown[]> {
    this.assertOpen('select');
    this.assertIdle('select');
    await this.ensureTables(relations);

    const names = [...new Set(relations.map(r => r.name))].join(', ');
    const start = Date.now();
    let count = 0;
    this.openReads++;
    try {
      for await (const row of this.session.iterate(statement, { relation: names, operation: 'select' })) {
        count++;
        yield row;
      }
    } finally {
      this.openReads--;
    }
    this.logger.logStatement(statement.sql, statement.params.length, count, Date.now() - start);
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isRuleList(rules: Rule | readonly Rule[]): rules is readonly Rule[] {
  return Array.isArray(rules);
}

/** Head and body relations of a rule, each once. */
export function relationsOf(rule: Rule): Relation[] {
  const seen = new Set<Relation>([rule.target]);
  for (const branch of rule.body.branches) {
    for (const atom of branch.atoms) seen.add(atom.relation);
  }
  return [...seen];
}

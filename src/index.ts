/**
 * RuleDB — Public API Entry Point
 *
 * Datalog-style rules compiled to SQL and run to a fixpoint on SQLite or PostgreSQL.
 */

// Main class
export { RuleDB } from './ruledb.js';
export { RuleContext, ResultSet } from './context.js';

// Algebra
export { constant, variable, vars } from './terms.js';
export type { Constant, Term, TermInput, Variable } from './terms.js';
export { Relation, SchemaRegistry } from './schema.js';
export { Atom, Conjunction, Disjunction, Query, Rule, and, or, query, rule } from './algebra.js';
export type { Formula, SymbolTable } from './algebra.js';

// Compiler & fixpoint driver
export {
  compile,
  compileCount,
  compileCreateTable,
  compileInsertRows,
  compileQuery,
  compileRule,
  quoteIdentifier,
} from './compiler.js';
export { compileRules, runPass, runToFixpoint } from './fixpoint.js';
export type { CompiledRule, PassExecutor } from './fixpoint.js';

// Stores
export { SqliteAdapter } from './adapters/sqlite-adapter.js';
export { PgAdapter, wrapPgPool } from './adapters/pg-adapter.js';
export type { PgClientLike, PgPoolLike, PgQuery } from './adapters/pg-adapter.js';
export type { StoreAdapter, StoreSession } from './adapters/adapter.js';

// Errors
export {
  ArityError,
  CompileError,
  RangeRestrictionError,
  RuleDBError,
  SchemaError,
  TypeMismatchError,
} from './errors.js';

// Types
export type {
  ColumnDefinition,
  ColumnSpec,
  CompiledQuery,
  CompiledStatement,
  ConnectionStatus,
  Driver,
  ExplainResult,
  InsertReceipt,
  OperationReceipt,
  RelationDescription,
  RelationKind,
  Row,
  RowInput,
  RuleDBConfig,
  RuleDBErrorCode,
  RuleDBEvents,
  RunOptions,
  RunReceipt,
  SqlDialect,
  SqlType,
  SqlValue,
} from './types.js';

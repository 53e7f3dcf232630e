/**
 * RuleDB — All shared types and interfaces
 *
 * Plain data shapes only. Classes for terms, relations and rules live in
 * their own modules and import from here, never the other way round.
 */

// ─── Dialect & Driver ────────────────────────────────────────────────────────

export type SqlDialect = 'sqlite' | 'pg';
export type Driver = 'better-sqlite3' | 'pg';

// ─── Column Types & Values ───────────────────────────────────────────────────

/** Canonical column types. Aliases such as INT or VARCHAR normalize to these. */
export type SqlType = 'INTEGER' | 'REAL' | 'TEXT' | 'BOOLEAN' | 'BLOB';

export type SqlValue = number | bigint | string | boolean | Uint8Array;

export type Row = readonly SqlValue[];

export type RowInput = Row | Readonly<Record<string, SqlValue>>;

export interface ColumnDefinition {
  name: string;
  type: SqlType;
}

/** Column declaration as accepted from callers: ordered name → type, or types only. */
export type ColumnSpec = Readonly<Record<string, string>> | readonly string[];

export type RelationKind = 'base' | 'derived';

// ─── Compiled Statements ─────────────────────────────────────────────────────

export interface CompiledStatement {
  sql: string;
  params: SqlValue[];
}

export interface CompiledQuery extends CompiledStatement {
  /** Output column types, in projection order. */
  columnTypes: SqlType[];
}

// ─── Receipts ────────────────────────────────────────────────────────────────

export interface InsertReceipt {
  operation: 'insert';
  relation: string;
  rowCount: number;
  insertedCount: number;
  ignoredCount: number;
  duration: number;
}

export interface RunReceipt {
  operation: 'run';
  rules: string[];
  passes: number;
  insertedCount: number;
  insertedPerPass: number[];
  converged: boolean;
  duration: number;
}

export type OperationReceipt = InsertReceipt | RunReceipt;

// ─── Run Options ─────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Upper bound on passes when running to a fixpoint. Defaults to the database's `maxPasses`. */
  maxPasses?: number;
  /** Run exactly this many passes, without stopping early on convergence. */
  fixedPasses?: number;
}

// ─── Connection Config ───────────────────────────────────────────────────────

export interface RuleDBConfig {
  uri: string;
  label?: string;
  maxPasses?: number;
  logging?: boolean | 'verbose';
  slowStatementMs?: number;
}

// ─── Connection Status ───────────────────────────────────────────────────────

export interface ConnectionStatus {
  state: 'connected' | 'closed';
  dialect: SqlDialect;
  driver: Driver;
  label: string;
  uri: string;
  uptimeMs: number;
  relations: number;
}

// ─── Relation Description ────────────────────────────────────────────────────

export interface RelationDescription {
  name: string;
  kind: RelationKind;
  columns: ColumnDefinition[];
  rowCount: number;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type RuleDBErrorCode =
  | 'SCHEMA_ERROR'
  | 'ARITY_ERROR'
  | 'TYPE_MISMATCH'
  | 'RANGE_RESTRICTION'
  | 'COMPILE_ERROR'
  | 'INVALID_CONFIG'
  | 'SESSION_CLOSED'
  | 'SESSION_BUSY'
  | 'CONSTRAINT_VIOLATION'
  | 'TABLE_NOT_FOUND'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'STORE_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface RuleDBEvents {
  connected: { dialect: SqlDialect; label: string };
  closed: { dialect: SqlDialect; label: string };
  statement: { sql: string; paramCount: number; rowCount: number; durationMs: number };
  'slow-statement': { sql: string; durationMs: number; threshold: number };
  pass: { rules: string[]; pass: number; inserted: number };
  converged: { rules: string[]; passes: number; insertedCount: number };
  'pass-limit': { rules: string[]; passes: number; maxPasses: number };
  operation: { relation: string; operation: OperationReceipt['operation']; durationMs: number; receipt: OperationReceipt };
  error: { code: RuleDBErrorCode; message: string; fix: string; statement?: string };
}

// ─── Explain Result ──────────────────────────────────────────────────────────

export interface ExplainResult {
  dialect: SqlDialect;
  statements: CompiledStatement[];
}

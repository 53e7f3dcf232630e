/**
 * RuleDB Error System — Normalized errors with fix instructions
 *
 * Algebra errors (schema, arity, types, range restriction, compilation) are
 * raised before any statement reaches the store. Store errors are caught,
 * normalized into RuleDBError instances and keep the driver error plus the
 * compiled statement that triggered them.
 */

import type { RuleDBErrorCode, SqlDialect } from './types.js';

// ─── RuleDBError ─────────────────────────────────────────────────────────────

export interface RuleDBErrorOptions {
  code: RuleDBErrorCode;
  message: string;
  fix: string;
  originalError?: unknown;
  relation?: string;
  operation?: string;
  statement?: string;
  retryable?: boolean;
}

export class RuleDBError extends Error {
  readonly code: RuleDBErrorCode;
  readonly originalError: unknown;
  readonly relation?: string;
  readonly operation?: string;
  readonly statement?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;
  /** Set when rolling back the failed session failed as well. */
  rollbackError?: unknown;

  constructor(opts: RuleDBErrorOptions) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'RuleDBError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.relation = opts.relation;
    this.operation = opts.operation;
    this.statement = opts.statement;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

type AlgebraErrorOptions = Omit<RuleDBErrorOptions, 'code' | 'retryable'>;

export class SchemaError extends RuleDBError {
  constructor(opts: AlgebraErrorOptions) {
    super({ ...opts, code: 'SCHEMA_ERROR' });
    this.name = 'SchemaError';
  }
}

export class ArityError extends RuleDBError {
  constructor(opts: AlgebraErrorOptions) {
    super({ ...opts, code: 'ARITY_ERROR' });
    this.name = 'ArityError';
  }
}

export class TypeMismatchError extends RuleDBError {
  constructor(opts: AlgebraErrorOptions) {
    super({ ...opts, code: 'TYPE_MISMATCH' });
    this.name = 'TypeMismatchError';
  }
}

export class RangeRestrictionError extends RuleDBError {
  constructor(opts: AlgebraErrorOptions) {
    super({ ...opts, code: 'RANGE_RESTRICTION' });
    this.name = 'RangeRestrictionError';
  }
}

export class CompileError extends RuleDBError {
  constructor(opts: AlgebraErrorOptions) {
    super({ ...opts, code: 'COMPILE_ERROR' });
    this.name = 'CompileError';
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<RuleDBErrorCode, boolean> = {
  SCHEMA_ERROR: false,
  ARITY_ERROR: false,
  TYPE_MISMATCH: false,
  RANGE_RESTRICTION: false,
  COMPILE_ERROR: false,
  INVALID_CONFIG: false,
  SESSION_CLOSED: false,
  SESSION_BUSY: false,
  CONSTRAINT_VIOLATION: false,
  TABLE_NOT_FOUND: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  STORE_ERROR: false,
};

// ─── Native Error Mapping ────────────────────────────────────────────────────

export interface StoreErrorContext {
  relation?: string;
  operation?: string;
  statement?: string;
}

function readField(err: unknown, key: string): string {
  if (typeof err !== 'object' || err === null || !(key in err)) return '';
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : '';
}

function errorMessage(err: unknown): string {
  return readField(err, 'message') || String(err);
}

export function mapSqliteError(err: unknown, ctx: StoreErrorContext = {}): RuleDBError {
  const code = readField(err, 'code');
  const message = errorMessage(err);
  const base = { originalError: err, ...ctx };

  if (code.startsWith('SQLITE_CONSTRAINT')) {
    return new RuleDBError({
      ...base,
      code: 'CONSTRAINT_VIOLATION',
      message: `Constraint violation in "${ctx.relation ?? 'unknown'}": ${message}`,
      fix: `Relation tables only accept NOT NULL values of the declared column types. Check the inserted values.`,
    });
  }

  if (message.includes('no such table')) {
    return new RuleDBError({
      ...base,
      code: 'TABLE_NOT_FOUND',
      message: `Table for "${ctx.relation ?? 'unknown'}" not found.`,
      fix: `Declare the relation with db.relation() or db.relationSet() and use it inside db.session() so its table is created.`,
    });
  }

  if (code === 'SQLITE_CANTOPEN' || code === 'SQLITE_NOTADB') {
    return new RuleDBError({
      ...base,
      code: 'CONNECTION_FAILED',
      message: `Cannot open SQLite database.`,
      fix: `Check that the file path in the URI exists and is writable.`,
    });
  }

  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') {
    return new RuleDBError({
      ...base,
      code: 'TIMEOUT',
      message: `SQLite database is locked.`,
      fix: `Another connection holds a write lock. Retry once it is released.`,
    });
  }

  return new RuleDBError({
    ...base,
    code: 'STORE_ERROR',
    message: `SQLite error on "${ctx.relation ?? 'unknown'}": ${message}`,
    fix: `Check the original error and the failing statement for details.`,
  });
}

export function mapPgError(err: unknown, ctx: StoreErrorContext = {}): RuleDBError {
  const code = readField(err, 'code');
  const message = errorMessage(err);
  const base = { originalError: err, ...ctx };

  // 23xxx integrity constraint violations
  if (code.startsWith('23')) {
    return new RuleDBError({
      ...base,
      code: 'CONSTRAINT_VIOLATION',
      message: `Constraint violation in "${ctx.relation ?? 'unknown'}": ${message}`,
      fix: `Relation tables only accept NOT NULL values of the declared column types. Check the inserted values.`,
    });
  }

  if (code === '42P01') {
    return new RuleDBError({
      ...base,
      code: 'TABLE_NOT_FOUND',
      message: `Table for "${ctx.relation ?? 'unknown'}" not found.`,
      fix: `Declare the relation with db.relation() or db.relationSet() and use it inside db.session() so its table is created.`,
    });
  }

  if (code === 'ECONNREFUSED' || message.includes('ECONNREFUSED') || message.includes('ENOTFOUND')) {
    return new RuleDBError({
      ...base,
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to PostgreSQL.`,
      fix: `Verify the connection URI and that the server is running.`,
    });
  }

  if (code === '28P01' || code === '28000') {
    return new RuleDBError({
      ...base,
      code: 'AUTHENTICATION_FAILED',
      message: `PostgreSQL authentication failed.`,
      fix: `Check the username and password in the connection URI.`,
    });
  }

  if (code === '57014') {
    return new RuleDBError({
      ...base,
      code: 'TIMEOUT',
      message: `Statement timed out on "${ctx.relation ?? 'unknown'}".`,
      fix: `Lower maxPasses, narrow the rule bodies, or raise statement_timeout.`,
    });
  }

  return new RuleDBError({
    ...base,
    code: 'STORE_ERROR',
    message: `PostgreSQL error on "${ctx.relation ?? 'unknown'}": ${message}`,
    fix: `Check the original error and the failing statement for details.`,
  });
}

export function mapNativeError(
  dialect: SqlDialect,
  err: unknown,
  ctx: StoreErrorContext = {},
): RuleDBError {
  if (err instanceof RuleDBError) return err;

  switch (dialect) {
    case 'sqlite':
      return mapSqliteError(err, ctx);
    case 'pg':
      return mapPgError(err, ctx);
  }
}

// ─── Self-Correcting Error Helpers ───────────────────────────────────────────

export function unknownRelationError(name: string, registered: string[]): SchemaError {
  const suggestion = findClosestMatch(name, registered);
  const registeredList = registered.length > 0
    ? `Declared relations: ${registered.join(', ')}.`
    : 'No relations are declared.';

  return new SchemaError({
    message: `Relation "${name}" is not declared.`,
    fix: suggestion ? `Did you mean "${suggestion}"? ${registeredList}` : registeredList,
    relation: name,
  });
}

export function sessionClosedError(operation: string): RuleDBError {
  return new RuleDBError({
    code: 'SESSION_CLOSED',
    message: `Cannot call ${operation}() after the session scope ended.`,
    fix: `Run the operation inside the db.session(async (ctx) => { ... }) callback and read results before it returns.`,
    operation,
  });
}

export function nestedSessionError(): RuleDBError {
  return new RuleDBError({
    code: 'SESSION_BUSY',
    message: `Cannot open a session inside another session of the same database.`,
    fix: `Use the ctx you already have. Sessions run one at a time and a nested one would wait for its parent forever.`,
    operation: 'session',
  });
}

export function readInProgressError(operation: string): RuleDBError {
  return new RuleDBError({
    code: 'SESSION_BUSY',
    message: `Cannot call ${operation}() while a select() result set is being read.`,
    fix: `Finish or break out of the for await loop first, or read the rows with toArray() and write afterwards.`,
    operation,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function findClosestMatch(input: string, candidates: string[]): string | null {
  let bestMatch: string | null = null;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDistance && dist <= 2) {
      bestDistance = dist;
      bestMatch = candidate;
    }
  }

  return bestMatch;
}

function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr.push(Math.min((prev[j] ?? 0) + 1, (curr[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost));
    }
    prev = curr;
  }

  return prev[b.length] ?? 0;
}

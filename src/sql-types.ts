/**
 * RuleDB Column Types — normalization, literal inference, value validation
 *
 * Callers may spell column types the way their SQL dialect does (INT,
 * VARCHAR, DOUBLE PRECISION, ...). Everything is normalized to one of five
 * canonical types, which decide both the DDL per dialect and which literal
 * values a column accepts.
 */

import { z } from 'zod';
import { RuleDBError } from './errors.js';
import type { SqlDialect, SqlType, SqlValue } from './types.js';

// ─── Normalization ───────────────────────────────────────────────────────────

const TYPE_ALIASES: Record<string, SqlType> = {
  INTEGER: 'INTEGER',
  INT: 'INTEGER',
  BIGINT: 'INTEGER',
  SMALLINT: 'INTEGER',
  REAL: 'REAL',
  FLOAT: 'REAL',
  DOUBLE: 'REAL',
  'DOUBLE PRECISION': 'REAL',
  DECIMAL: 'REAL',
  NUMERIC: 'REAL',
  TEXT: 'TEXT',
  VARCHAR: 'TEXT',
  CHAR: 'TEXT',
  STRING: 'TEXT',
  BOOLEAN: 'BOOLEAN',
  BOOL: 'BOOLEAN',
  BLOB: 'BLOB',
  BYTEA: 'BLOB',
};

export const SUPPORTED_TYPE_NAMES = Object.keys(TYPE_ALIASES);

/** Returns the canonical type for a declared type name, or null if unsupported. */
export function normalizeSqlType(declared: string): SqlType | null {
  const key = declared.trim().replace(/\s+/g, ' ').toUpperCase();
  return TYPE_ALIASES[key] ?? null;
}

// ─── Literal Inference ───────────────────────────────────────────────────────

/** Type of a literal value, or null when the value cannot be stored. */
export function inferSqlType(value: unknown): SqlType | null {
  if (typeof value === 'bigint') return 'INTEGER';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return Number.isInteger(value) ? 'INTEGER' : 'REAL';
  }
  if (typeof value === 'string') return 'TEXT';
  if (typeof value === 'boolean') return 'BOOLEAN';
  if (value instanceof Uint8Array) return 'BLOB';
  return null;
}

export type TypeFamily = 'numeric' | 'text' | 'boolean' | 'blob';

export function typeFamily(type: SqlType): TypeFamily {
  switch (type) {
    case 'INTEGER':
    case 'REAL':
      return 'numeric';
    case 'TEXT':
      return 'text';
    case 'BOOLEAN':
      return 'boolean';
    case 'BLOB':
      return 'blob';
  }
}

/** Whether a value of type `value` may be stored in or compared with a column of type `column`. */
export function isAssignable(value: SqlType, column: SqlType): boolean {
  if (value === column) return true;
  // Integers widen into REAL columns; the reverse would lose the fraction.
  return value === 'INTEGER' && column === 'REAL';
}

// ─── Value Validation ────────────────────────────────────────────────────────

const integerValue = z.union([z.number().int(), z.bigint()]);

export const VALUE_SCHEMAS: Record<SqlType, z.ZodType<SqlValue>> = {
  INTEGER: integerValue,
  REAL: z.union([z.number().finite(), z.bigint()]),
  TEXT: z.string(),
  BOOLEAN: z.boolean(),
  BLOB: z.instanceof(Uint8Array),
};

// ─── Dialect Mapping ─────────────────────────────────────────────────────────

export function sqlTypeToDDL(type: SqlType, dialect: SqlDialect): string {
  switch (type) {
    case 'INTEGER':
      switch (dialect) {
        // SQLite integers are 64-bit already; pg's INTEGER is 32-bit.
        case 'pg': return 'BIGINT';
        case 'sqlite': return 'INTEGER';
      }
      break;
    case 'REAL':
      switch (dialect) {
        case 'pg': return 'DOUBLE PRECISION';
        case 'sqlite': return 'REAL';
      }
      break;
    case 'TEXT':
      return 'TEXT';
    case 'BOOLEAN':
      switch (dialect) {
        case 'pg': return 'BOOLEAN';
        case 'sqlite': return 'INTEGER';
      }
      break;
    case 'BLOB':
      switch (dialect) {
        case 'pg': return 'BYTEA';
        case 'sqlite': return 'BLOB';
      }
      break;
  }

  return 'TEXT';
}

/**
 * Convert a value read from the store back to its column type.
 * SQLite has no boolean storage class and returns 0/1. Integers arrive as
 * bigint from better-sqlite3 (safe integer mode) and as strings from pg's
 * int8; both come back as numbers when they fit and stay bigint otherwise.
 */
export function decodeValue(type: SqlType, raw: unknown): SqlValue {
  if (type === 'BOOLEAN' && (typeof raw === 'number' || typeof raw === 'bigint')) return Number(raw) !== 0;
  if (type === 'INTEGER' && typeof raw === 'string' && /^-?\d+$/.test(raw)) return narrowInteger(BigInt(raw));
  if (typeof raw === 'bigint') return narrowInteger(raw);
  if (
    typeof raw === 'number' ||
    typeof raw === 'string' ||
    typeof raw === 'boolean' ||
    raw instanceof Uint8Array
  ) {
    return raw;
  }

  throw new RuleDBError({
    code: 'STORE_ERROR',
    message: `The store returned ${raw === null ? 'NULL' : typeof raw} for a ${type} column.`,
    fix: `Relation tables are NOT NULL. Check that the table was created by this library.`,
  });
}

function narrowInteger(value: bigint): number | bigint {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}

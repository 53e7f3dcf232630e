/**
 * RuleDB Input Sanitization
 *
 * Relation and column names become SQL identifiers verbatim, so they are
 * checked against a strict whitelist before anything is registered. Rows
 * given as column-keyed objects are reordered into tuples here.
 */

import { ArityError, SchemaError } from './errors.js';
import type { ColumnDefinition, Row, RowInput, SqlValue } from './types.js';

// ─── Identifiers ─────────────────────────────────────────────────────────────

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** PostgreSQL truncates identifiers beyond this length. */
export const MAX_IDENTIFIER_LENGTH = 63;

/** Names under this prefix are kept free for the library's own objects. */
export const RESERVED_PREFIX = 'ruledb_';

/**
 * Validate a relation or column name.
 * Throws SchemaError if the name cannot be used as a plain identifier.
 */
export function validateIdentifier(name: string, what: 'relation' | 'column', relation?: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new SchemaError({
      message: `Invalid ${what} name "${name}".`,
      fix: `Use letters, digits and underscores only, starting with a letter or underscore.`,
      relation,
    });
  }

  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new SchemaError({
      message: `The ${what} name "${name}" is too long (${name.length} chars, max ${MAX_IDENTIFIER_LENGTH}).`,
      fix: `Shorten the name.`,
      relation,
    });
  }

  if (name.toLowerCase().startsWith(RESERVED_PREFIX)) {
    throw new SchemaError({
      message: `The ${what} name "${name}" uses the reserved prefix "${RESERVED_PREFIX}".`,
      fix: `Pick a name that does not start with "${RESERVED_PREFIX}".`,
      relation,
    });
  }
}

// ─── Rows ────────────────────────────────────────────────────────────────────

function isTuple(row: RowInput): row is Row {
  return Array.isArray(row);
}

/**
 * Turn a tuple or a column-keyed object into a tuple in column order.
 * Values are not type-checked here; see Relation.validateRow().
 */
export function toTuple(relation: string, columns: readonly ColumnDefinition[], row: RowInput): SqlValue[] {
  if (isTuple(row)) {
    if (row.length !== columns.length) {
      throw new ArityError({
        message: `Row for "${relation}" has ${row.length} values, expected ${columns.length}.`,
        fix: `Give one value per column: (${columns.map(c => c.name).join(', ')}).`,
        relation,
        operation: 'insert',
      });
    }
    return [...row];
  }

  const known = new Set(columns.map(c => c.name));
  const unknown = Object.keys(row).filter(key => !known.has(key));
  if (unknown.length > 0) {
    throw new SchemaError({
      message: `Unknown column${unknown.length > 1 ? 's' : ''} ${unknown.map(k => `"${k}"`).join(', ')} in row for "${relation}".`,
      fix: `Valid columns: ${columns.map(c => c.name).join(', ')}.`,
      relation,
      operation: 'insert',
    });
  }

  const missing = columns.filter(c => !(c.name in row));
  if (missing.length > 0) {
    throw new ArityError({
      message: `Row for "${relation}" is missing ${missing.map(c => `"${c.name}"`).join(', ')}.`,
      fix: `Give one value per column: (${columns.map(c => c.name).join(', ')}).`,
      relation,
      operation: 'insert',
    });
  }

  return columns.map(c => row[c.name]).filter((v): v is SqlValue => v !== undefined);
}

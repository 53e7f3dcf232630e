/**
 * RuleDB Terms — variables and constants used inside atoms
 *
 * A variable is identified by its name alone. Two occurrences with the same
 * name inside one rule or query denote the same value; nothing is shared
 * between rules. Variables get their SQL type from the first column they
 * bind to. Constants carry their type from the literal.
 */

import { CompileError, TypeMismatchError } from './errors.js';
import { VALUE_SCHEMAS, inferSqlType, normalizeSqlType } from './sql-types.js';
import type { SqlType, SqlValue } from './types.js';

export interface Variable {
  readonly kind: 'variable';
  readonly name: string;
}

export interface Constant {
  readonly kind: 'constant';
  readonly value: SqlValue;
  readonly type: SqlType;
}

export type Term = Variable | Constant;

/** A term, or a bare literal that becomes a constant. */
export type TermInput = Term | SqlValue;

export function variable(name: string): Variable {
  if (name.length === 0) {
    throw new CompileError({
      message: `Variable names cannot be empty.`,
      fix: `Give every variable a name: vars('x', 'y').`,
    });
  }
  const v: Variable = { kind: 'variable', name };
  return Object.freeze(v);
}

/**
 * One fresh variable per name.
 *
 *   const [x, y, z] = vars('x', 'y', 'z');
 */
export function vars(...names: string[]): Variable[] {
  return names.map(variable);
}

export function constant(value: SqlValue, type?: string): Constant {
  const inferred = inferSqlType(value);
  if (inferred === null) {
    throw new TypeMismatchError({
      message: `Cannot use ${String(value)} as a constant.`,
      fix: `Constants must be finite numbers, bigints, strings, booleans or Uint8Arrays.`,
    });
  }

  if (type === undefined) {
    const c: Constant = { kind: 'constant', value, type: inferred };
    return Object.freeze(c);
  }

  const declared = normalizeSqlType(type);
  if (declared === null || !VALUE_SCHEMAS[declared].safeParse(value).success) {
    throw new TypeMismatchError({
      message: `Constant ${String(value)} is not a valid ${type} value.`,
      fix: `Pass a ${inferred} type, or a value matching ${type}.`,
    });
  }

  const c: Constant = { kind: 'constant', value, type: declared };
  return Object.freeze(c);
}

export function isVariable(term: Term): term is Variable {
  return term.kind === 'variable';
}

export function isTerm(input: unknown): input is Term {
  if (typeof input !== 'object' || input === null || input instanceof Uint8Array) return false;
  const kind: unknown = Reflect.get(input, 'kind');
  return kind === 'variable' || kind === 'constant';
}

export function toTerm(input: TermInput): Term {
  return isTerm(input) ? input : constant(input);
}

export function formatTerm(term: Term): string {
  if (term.kind === 'variable') return term.name;
  return typeof term.value === 'string' ? JSON.stringify(term.value) : String(term.value);
}

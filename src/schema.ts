/**
 * RuleDB Schema Registry — base relations, derived relation sets, DDL
 *
 * Declaring a relation registers its ordered column schema under a name that
 * is unique within one database. Tables are not created here: the session
 * creates each table the first time the relation is used.
 *
 * Both kinds of table carry a full-row UNIQUE constraint. Inserts rely on it
 * to drop duplicates, and the fixpoint driver relies on it to detect
 * convergence (a pass that inserts nothing).
 */

import { Atom } from './algebra.js';
import { ArityError, SchemaError, TypeMismatchError, unknownRelationError } from './errors.js';
import { toTuple, validateIdentifier } from './sanitize.js';
import { SUPPORTED_TYPE_NAMES, VALUE_SCHEMAS, normalizeSqlType } from './sql-types.js';
import { toTerm } from './terms.js';
import type { TermInput } from './terms.js';
import type {
  ColumnDefinition,
  ColumnSpec,
  RelationKind,
  RowInput,
  SqlValue,
} from './types.js';

// ─── Relation ────────────────────────────────────────────────────────────────

export class Relation {
  readonly name: string;
  readonly kind: RelationKind;
  readonly columns: readonly ColumnDefinition[];

  constructor(name: string, columns: readonly ColumnDefinition[], kind: RelationKind) {
    this.name = name;
    this.kind = kind;
    this.columns = Object.freeze(columns.map(c => Object.freeze({ ...c })));
  }

  get arity(): number {
    return this.columns.length;
  }

  get isDerived(): boolean {
    return this.kind === 'derived';
  }

  /**
   * Apply the relation to terms. Bare literals become constants.
   *
   *   edge.atom(x, y)
   *   edge.atom(x, 3)
   */
  atom(...terms: TermInput[]): Atom {
    return new Atom(this, terms.map(toTerm));
  }

  /**
   * Apply the relation to terms bound by column name, in any order. Every
   * column takes exactly one term.
   *
   *   edge.atomOf({ dst: y, src: x })
   */
  atomOf(bindings: Readonly<Record<string, TermInput>>): Atom {
    const given = new Map(Object.entries(bindings));

    const unknown = [...given.keys()].filter(key => !this.columns.some(c => c.name === key));
    if (unknown.length > 0) {
      throw new SchemaError({
        message: `${this.name} has no column${unknown.length > 1 ? 's' : ''} ${unknown.map(k => `"${k}"`).join(', ')}.`,
        fix: `Bind terms to: ${this.columns.map(c => c.name).join(', ')}.`,
        relation: this.name,
      });
    }

    const terms: TermInput[] = [];
    for (const column of this.columns) {
      const term = given.get(column.name);
      if (term === undefined) {
        throw new ArityError({
          message: `${this.name}.atomOf() leaves column "${column.name}" unbound.`,
          fix: `Bind a term to every column: ${this.columns.map(c => c.name).join(', ')}.`,
          relation: this.name,
        });
      }
      terms.push(term);
    }

    return this.atom(...terms);
  }

  /**
   * Check a row against the column schema and return it as a tuple.
   */
  validateRow(row: RowInput): SqlValue[] {
    const tuple = toTuple(this.name, this.columns, row);

    this.columns.forEach((column, i) => {
      const value = tuple[i];
      if (!VALUE_SCHEMAS[column.type].safeParse(value).success) {
        throw new TypeMismatchError({
          message: `Value ${describeValue(value)} for column "${column.name}" of "${this.name}" is not a valid ${column.type}.`,
          fix: `Pass a ${column.type} value. Columns are NOT NULL.`,
          relation: this.name,
          operation: 'insert',
        });
      }
    });

    return tuple;
  }

  toString(): string {
    return `${this.name}(${this.columns.map(c => `${c.name} ${c.type}`).join(', ')})`;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  return String(value);
}

// ─── Column Parsing ──────────────────────────────────────────────────────────

export function parseColumns(relation: string, spec: ColumnSpec): ColumnDefinition[] {
  const entries: Array<[string, string]> = isTypeList(spec)
    ? spec.map((type, i): [string, string] => [`c${i}`, type])
    : Object.entries(spec);

  if (entries.length === 0) {
    throw new SchemaError({
      message: `Relation "${relation}" declares no columns.`,
      fix: `Declare at least one column: db.relation('${relation}', { x: 'INTEGER' }).`,
      relation,
    });
  }

  const seen = new Set<string>();
  return entries.map(([name, declared]) => {
    validateIdentifier(name, 'column', relation);

    const key = name.toLowerCase();
    if (seen.has(key)) {
      throw new SchemaError({
        message: `Column "${name}" is declared twice in "${relation}".`,
        fix: `Column names must be unique within a relation (case-insensitive).`,
        relation,
      });
    }
    seen.add(key);

    const type = normalizeSqlType(declared);
    if (type === null) {
      throw new SchemaError({
        message: `Unsupported type "${declared}" for column "${name}" of "${relation}".`,
        fix: `Supported types: ${SUPPORTED_TYPE_NAMES.join(', ')}.`,
        relation,
      });
    }

    return { name, type };
  });
}

function isTypeList(spec: ColumnSpec): spec is readonly string[] {
  return Array.isArray(spec);
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class SchemaRegistry {
  private relations = new Map<string, Relation>();

  /**
   * Register a relation. Names are compared case-insensitively, the way
   * SQLite resolves table names.
   */
  declare(name: string, columns: ColumnSpec, kind: RelationKind): Relation {
    validateIdentifier(name, 'relation');

    const existing = this.relations.get(name.toLowerCase());
    if (existing) {
      throw new SchemaError({
        message: `Relation "${name}" collides with the existing ${existing.kind} relation "${existing.name}".`,
        fix: `Relation names are unique within a database. Pick another name or reuse the existing relation.`,
        relation: name,
      });
    }

    const relation = new Relation(name, parseColumns(name, columns), kind);
    this.relations.set(name.toLowerCase(), relation);
    return relation;
  }

  get(name: string): Relation | undefined {
    return this.relations.get(name.toLowerCase());
  }

  require(name: string): Relation {
    const relation = this.get(name);
    if (!relation) throw unknownRelationError(name, this.names());
    return relation;
  }

  /** True if this exact relation object was declared here. */
  owns(relation: Relation): boolean {
    return this.relations.get(relation.name.toLowerCase()) === relation;
  }

  names(): string[] {
    return [...this.relations.values()].map(r => r.name);
  }

  all(): Relation[] {
    return [...this.relations.values()];
  }
}

/**
 * RuleDB SQL Compiler — rule algebra → parameterized SQL
 *
 * Pure and deterministic: the same rule and dialect always give the same SQL
 * text and parameter list. Identifiers are always double-quoted, literals are
 * always bound parameters.
 *
 *   path(x, z) :- edge(x, z); edge(x, y), path(y, z).
 *
 *   INSERT INTO "path" ("x", "z")
 *   SELECT "u"."x", "u"."z" FROM (
 *     SELECT DISTINCT "t0"."x" AS "x", "t0"."y" AS "z" FROM "edge" AS "t0" WHERE 1=1
 *     UNION
 *     SELECT DISTINCT "t0"."x" AS "x", "t1"."z" AS "z" FROM "edge" AS "t0", "path" AS "t1" WHERE "t1"."x" = "t0"."y"
 *   ) AS "u" WHERE 1=1 ON CONFLICT DO NOTHING
 */

import { CompileError } from './errors.js';
import { sqlTypeToDDL } from './sql-types.js';
import type { Conjunction, Disjunction, Query, Rule } from './algebra.js';
import type { Relation } from './schema.js';
import type { Term } from './terms.js';
import type { CompiledQuery, CompiledStatement, SqlDialect, SqlType, SqlValue } from './types.js';

/** Bound parameters allowed in one statement (SQLite's historical default). */
export const MAX_PARAMS_PER_STATEMENT = 999;

// ─── SQL Helper Functions ────────────────────────────────────────────────────

export function quoteIdentifier(name: string): string {
  // Prevent SQL injection through identifier names
  const sanitized = name.replace(/"/g, '""');
  return `"${sanitized}"`;
}

export function placeholder(dialect: SqlDialect, idx: number): string {
  switch (dialect) {
    case 'pg':
      return `$${idx}`;
    case 'sqlite':
      return '?';
  }
}

/** Collects bound values in the order their placeholders appear in the SQL text. */
class ParamList {
  readonly values: SqlValue[] = [];

  constructor(private readonly dialect: SqlDialect) {}

  add(value: SqlValue): string {
    this.values.push(value);
    return placeholder(this.dialect, this.values.length);
  }

  /** Typed placeholder, needed wherever the store cannot infer a parameter type (select lists). */
  cast(value: SqlValue, type: SqlType): string {
    return `CAST(${this.add(value)} AS ${sqlTypeToDDL(type, this.dialect)})`;
  }
}

// ─── Body Compilation ────────────────────────────────────────────────────────

interface Output {
  term: Term;
  alias: string;
  /** Type a projected constant is cast to. */
  type: SqlType;
}

type Condition = string | { column: string; value: SqlValue };

function compileConjunction(branch: Conjunction, outputs: readonly Output[], params: ParamList, what: string): string {
  if (branch.atoms.length === 0) {
    throw new CompileError({
      message: `Cannot compile an empty conjunction in ${what}.`,
      fix: `Every body alternative needs at least one atom.`,
    });
  }

  const from: string[] = [];
  const bindings = new Map<string, string>();
  const conditions: Condition[] = [];

  branch.atoms.forEach((atom, i) => {
    const alias = quoteIdentifier(`t${i}`);
    from.push(`${quoteIdentifier(atom.relation.name)} AS ${alias}`);

    atom.terms.forEach((term, j) => {
      const column = atom.relation.columns[j];
      if (!column) return;
      const ref = `${alias}.${quoteIdentifier(column.name)}`;

      if (term.kind === 'constant') {
        conditions.push({ column: ref, value: term.value });
        return;
      }

      const first = bindings.get(term.name);
      if (first === undefined) {
        bindings.set(term.name, ref);
      } else {
        conditions.push(`${ref} = ${first}`);
      }
    });
  });

  // Placeholders are numbered in text order: select list first, then WHERE.
  const select = outputs.map(({ term, alias, type }) => {
    if (term.kind === 'constant') return `${params.cast(term.value, type)} AS ${quoteIdentifier(alias)}`;

    const ref = bindings.get(term.name);
    if (ref === undefined) {
      throw new CompileError({
        message: `Variable ${term.name} is not bound in ${what}.`,
        fix: `Add an atom that binds ${term.name} to every body alternative.`,
      });
    }
    return `${ref} AS ${quoteIdentifier(alias)}`;
  });

  const where = conditions.map(c => (typeof c === 'string' ? c : `${c.column} = ${params.add(c.value)}`));

  return `SELECT DISTINCT ${select.join(', ')} FROM ${from.join(', ')} WHERE ${where.length > 0 ? where.join(' AND ') : '1=1'}`;
}

function compileDisjunction(body: Disjunction, outputs: readonly Output[], params: ParamList, what: string): string {
  if (body.branches.length === 0) {
    throw new CompileError({
      message: `Cannot compile an empty disjunction in ${what}.`,
      fix: `Give the body at least one alternative.`,
    });
  }

  const [only] = body.branches;
  if (only && body.branches.length === 1) {
    return compileConjunction(only, outputs, params, what);
  }

  const union = body.branches.map(branch => compileConjunction(branch, outputs, params, what)).join(' UNION ');
  const u = quoteIdentifier('u');
  const columns = outputs.map(o => `${u}.${quoteIdentifier(o.alias)}`).join(', ');

  return `SELECT ${columns} FROM (${union}) AS ${u} WHERE 1=1`;
}

// ─── Rules & Queries ─────────────────────────────────────────────────────────

/**
 * INSERT ... SELECT that adds the rows the rule body entails to the head
 * relation. Rows already present are skipped by the table's UNIQUE constraint.
 */
export function compileRule(rule: Rule, dialect: SqlDialect): CompiledStatement {
  const params = new ParamList(dialect);
  const columns = rule.target.columns;

  const outputs = rule.head.terms.map((term, i): Output => {
    const column = columns[i];
    if (!column) {
      throw new CompileError({
        message: `Head ${rule.head.toString()} has more terms than "${rule.target.name}" has columns.`,
        fix: `Match the head to the relation's columns.`,
      });
    }
    return { term, alias: column.name, type: column.type };
  });

  const body = compileDisjunction(rule.body, outputs, params, `rule ${rule.toString()}`);
  const target = quoteIdentifier(rule.target.name);
  const columnList = columns.map(c => quoteIdentifier(c.name)).join(', ');

  return {
    sql: `INSERT INTO ${target} (${columnList}) ${body} ON CONFLICT DO NOTHING`,
    params: params.values,
  };
}

export function compileQuery(query: Query, dialect: SqlDialect): CompiledQuery {
  const params = new ParamList(dialect);
  const columnTypes = query.columnTypes;

  if (query.terms.length === 0) {
    throw new CompileError({
      message: `Cannot compile a selection with no output terms.`,
      fix: `Select at least one variable or constant.`,
    });
  }

  const outputs = query.terms.map((term, i): Output => ({
    term,
    alias: `c${i}`,
    type: columnTypes[i] ?? 'TEXT',
  }));

  return {
    sql: compileDisjunction(query.body, outputs, params, `selection ${query.toString()}`),
    params: params.values,
    columnTypes,
  };
}

export function compile(target: Rule | Query, dialect: SqlDialect): CompiledStatement {
  return target.kind === 'rule' ? compileRule(target, dialect) : compileQuery(target, dialect);
}

// ─── Relations ───────────────────────────────────────────────────────────────

export function compileCreateTable(relation: Relation, dialect: SqlDialect): CompiledStatement {
  const columns = relation.columns.map(c => `  ${quoteIdentifier(c.name)} ${sqlTypeToDDL(c.type, dialect)} NOT NULL`);
  const unique = `  UNIQUE (${relation.columns.map(c => quoteIdentifier(c.name)).join(', ')})`;

  return {
    sql: `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(relation.name)} (\n${[...columns, unique].join(',\n')}\n)`,
    params: [],
  };
}

/**
 * Multi-row insert that skips rows already stored. Split into as many
 * statements as needed to stay under MAX_PARAMS_PER_STATEMENT.
 */
export function compileInsertRows(
  relation: Relation,
  rows: readonly (readonly SqlValue[])[],
  dialect: SqlDialect,
): CompiledStatement[] {
  if (rows.length === 0) return [];

  const target = quoteIdentifier(relation.name);
  const columnList = relation.columns.map(c => quoteIdentifier(c.name)).join(', ');
  const rowsPerStatement = Math.max(1, Math.floor(MAX_PARAMS_PER_STATEMENT / relation.arity));
  const statements: CompiledStatement[] = [];

  for (let start = 0; start < rows.length; start += rowsPerStatement) {
    const params = new ParamList(dialect);
    const tuples = rows
      .slice(start, start + rowsPerStatement)
      .map(row => `(${row.map(value => params.add(value)).join(', ')})`);

    statements.push({
      sql: `INSERT INTO ${target} (${columnList}) VALUES ${tuples.join(', ')} ON CONFLICT DO NOTHING`,
      params: params.values,
    });
  }

  return statements;
}

export function compileCount(relation: Relation): CompiledStatement {
  return {
    sql: `SELECT COUNT(*) AS "count" FROM ${quoteIdentifier(relation.name)}`,
    params: [],
  };
}

/**
 * RuleDB Rule Algebra — atoms, conjunctions, disjunctions, rules, queries
 *
 * Formulas are immutable and always kept in disjunctive normal form:
 * a Conjunction is a flat list of atoms, a Disjunction is a flat list of
 * conjunctions. Combining with and()/or() flattens instead of nesting, and
 * and() over a disjunction distributes, so the compiler only ever sees
 * "UNION of flat joins".
 *
 *   const closure = path.atom(x, z).when(
 *     edge.atom(x, z).or(edge.atom(x, y).and(path.atom(y, z))),
 *   );
 */

import { ArityError, RangeRestrictionError, SchemaError, TypeMismatchError } from './errors.js';
import { isAssignable, typeFamily } from './sql-types.js';
import { formatTerm, isVariable, toTerm } from './terms.js';
import type { Term, TermInput } from './terms.js';
import type { Relation } from './schema.js';
import type { SqlType } from './types.js';

export type Formula = Atom | Conjunction | Disjunction;

abstract class FormulaNode {
  and(this: Formula, ...others: Formula[]): Conjunction | Disjunction {
    return and(this, ...others);
  }

  or(this: Formula, ...others: Formula[]): Disjunction {
    return or(this, ...others);
  }
}

// ─── Atom ────────────────────────────────────────────────────────────────────

export class Atom extends FormulaNode {
  readonly kind = 'atom' as const;
  readonly relation: Relation;
  readonly terms: readonly Term[];

  constructor(relation: Relation, terms: readonly Term[]) {
    super();

    if (terms.length !== relation.arity) {
      throw new ArityError({
        message: `${relation.name} takes ${relation.arity} terms, got ${terms.length}.`,
        fix: `Apply it as ${relation.name}(${relation.columns.map(c => c.name).join(', ')}).`,
        relation: relation.name,
      });
    }

    terms.forEach((term, i) => {
      const column = relation.columns[i];
      if (column && term.kind === 'constant' && !isAssignable(term.type, column.type)) {
        throw new TypeMismatchError({
          message: `Constant ${formatTerm(term)} (${term.type}) does not fit column "${column.name}" (${column.type}) of "${relation.name}".`,
          fix: `Use a ${column.type} value in position ${i + 1}.`,
          relation: relation.name,
        });
      }
    });

    this.relation = relation;
    this.terms = Object.freeze([...terms]);
    Object.freeze(this);
  }

  /**
   * Make this atom the head of a rule.
   */
  when(body: Formula): Rule {
    return rule(this, body);
  }

  toString(): string {
    return `${this.relation.name}(${this.terms.map(formatTerm).join(', ')})`;
  }
}

// ─── Conjunction ─────────────────────────────────────────────────────────────

export class Conjunction extends FormulaNode {
  readonly kind = 'and' as const;
  readonly atoms: readonly Atom[];

  constructor(atoms: readonly Atom[]) {
    super();
    this.atoms = Object.freeze([...atoms]);
    Object.freeze(this);
  }

  toString(): string {
    return this.atoms.length === 0 ? 'true' : this.atoms.join(', ');
  }
}

// ─── Disjunction ─────────────────────────────────────────────────────────────

export class Disjunction extends FormulaNode {
  readonly kind = 'or' as const;
  readonly branches: readonly Conjunction[];

  constructor(branches: readonly Conjunction[]) {
    super();
    this.branches = Object.freeze([...branches]);
    Object.freeze(this);
  }

  toString(): string {
    return this.branches.length === 0 ? 'false' : this.branches.join('; ');
  }
}

// ─── Composition ─────────────────────────────────────────────────────────────

/** The alternative bodies of a formula, each a flat list of atoms. */
export function branchesOf(formula: Formula): readonly Conjunction[] {
  switch (formula.kind) {
    case 'atom':
      return [new Conjunction([formula])];
    case 'and':
      return [formula];
    case 'or':
      return formula.branches;
  }
}

export function and(...parts: Formula[]): Conjunction | Disjunction {
  if (!parts.some(p => p.kind === 'or')) {
    return new Conjunction(parts.flatMap(p => branchesOf(p).flatMap(b => b.atoms)));
  }

  // Distribute: (a | b) & (c | d) = ac | ad | bc | bd
  let product: Atom[][] = [[]];
  for (const part of parts) {
    const next: Atom[][] = [];
    for (const prefix of product) {
      for (const branch of branchesOf(part)) {
        next.push([...prefix, ...branch.atoms]);
      }
    }
    product = next;
  }

  return new Disjunction(product.map(atoms => new Conjunction(atoms)));
}

export function or(...parts: Formula[]): Disjunction {
  return new Disjunction(parts.flatMap(branchesOf));
}

// ─── Symbol Tables ───────────────────────────────────────────────────────────

/**
 * Variable name → SQL type, taken from the first column each variable binds
 * to. Later bindings must be of the same type family.
 */
export type SymbolTable = ReadonlyMap<string, SqlType>;

function buildSymbolTable(body: Disjunction): Map<string, SqlType> {
  const symbols = new Map<string, SqlType>();

  for (const branch of body.branches) {
    for (const atom of branch.atoms) {
      atom.terms.forEach((term, i) => {
        const column = atom.relation.columns[i];
        if (!column || !isVariable(term)) return;

        const known = symbols.get(term.name);
        if (known === undefined) {
          symbols.set(term.name, column.type);
        } else if (typeFamily(known) !== typeFamily(column.type)) {
          throw new TypeMismatchError({
            message: `Variable ${term.name} binds to ${known} and to ${column.type} (column "${column.name}" of "${atom.relation.name}").`,
            fix: `A variable can only join columns of compatible types. Rename one occurrence.`,
            relation: atom.relation.name,
          });
        }
      });
    }
  }

  return symbols;
}

function branchVariables(branch: Conjunction): Set<string> {
  const names = new Set<string>();
  for (const atom of branch.atoms) {
    for (const term of atom.terms) {
      if (isVariable(term)) names.add(term.name);
    }
  }
  return names;
}

/**
 * Every output variable must occur in every alternative body, otherwise the
 * projection has nothing to read the value from.
 */
function checkRangeRestriction(outputs: readonly Term[], body: Disjunction, what: string): void {
  body.branches.forEach((branch, index) => {
    const bound = branchVariables(branch);
    const unbound = outputs.filter(isVariable).map(v => v.name).filter(name => !bound.has(name));

    if (unbound.length > 0) {
      const where = body.branches.length > 1 ? `alternative ${index + 1} (${branch.toString()})` : `the body (${branch.toString()})`;
      throw new RangeRestrictionError({
        message: `Variable${unbound.length > 1 ? 's' : ''} ${unbound.join(', ')} of ${what} not bound in ${where}.`,
        fix: `Every variable in ${what} must appear in at least one atom of every alternative body.`,
      });
    }
  });
}

// ─── Rule ────────────────────────────────────────────────────────────────────

export class Rule {
  readonly kind = 'rule' as const;
  readonly head: Atom;
  readonly body: Disjunction;
  readonly symbols: SymbolTable;

  constructor(head: Atom, body: Formula) {
    const target = head.relation;

    if (!target.isDerived) {
      throw new SchemaError({
        message: `Rule head "${target.name}" is a base relation.`,
        fix: `Only relation sets can be rule targets. Declare it with db.relationSet('${target.name}', ...).`,
        relation: target.name,
      });
    }

    const normalized = or(body);
    checkRangeRestriction(head.terms, normalized, `the head ${head.toString()}`);
    const symbols = buildSymbolTable(normalized);

    head.terms.forEach((term, i) => {
      const column = target.columns[i];
      const type = isVariable(term) ? symbols.get(term.name) : undefined;
      if (column && type !== undefined && !isAssignable(type, column.type)) {
        throw new TypeMismatchError({
          message: `Head variable ${formatTerm(term)} is ${type} but column "${column.name}" of "${target.name}" is ${column.type}.`,
          fix: `Bind ${formatTerm(term)} to a ${column.type} column in the body, or change the head column type.`,
          relation: target.name,
        });
      }
    });

    this.head = head;
    this.body = normalized;
    this.symbols = symbols;
    Object.freeze(this);
  }

  get target(): Relation {
    return this.head.relation;
  }

  get name(): string {
    return this.head.relation.name;
  }

  toString(): string {
    return `${this.head.toString()} :- ${this.body.toString()}.`;
  }
}

/**
 * head :- body. The head must be a relation set and every head variable
 * must be bound by every alternative of the body.
 */
export function rule(head: Atom, body: Formula): Rule {
  return new Rule(head, body);
}

// ─── Query ───────────────────────────────────────────────────────────────────

export class Query {
  readonly kind = 'query' as const;
  readonly terms: readonly Term[];
  readonly body: Disjunction;
  readonly symbols: SymbolTable;

  constructor(terms: readonly TermInput[], body: Formula) {
    const outputs = terms.map(toTerm);
    const normalized = or(body);
    checkRangeRestriction(outputs, normalized, 'the selection');

    this.terms = Object.freeze(outputs);
    this.body = normalized;
    this.symbols = buildSymbolTable(normalized);
    Object.freeze(this);
  }

  /** Output types in projection order. */
  get columnTypes(): SqlType[] {
    return this.terms.map(term => (isVariable(term) ? this.symbols.get(term.name) : term.type) ?? 'TEXT');
  }

  toString(): string {
    return `?- [${this.terms.map(formatTerm).join(', ')}] ${this.body.toString()}.`;
  }
}

/**
 * Read-back query: project `terms` out of `body`.
 */
export function query(terms: readonly TermInput[], body: Formula): Query {
  return new Query(terms, body);
}

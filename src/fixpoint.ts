/**
 * RuleDB Fixpoint Driver — repeated passes until nothing new is derived
 *
 * A pass runs every rule's INSERT ... SELECT once. Target tables drop
 * duplicate rows, so a pass that inserts zero rows means every rule's
 * consequences are already stored: the least fixpoint has been reached.
 * Rule order inside a pass does not change the fixpoint, only how many
 * passes it takes.
 */

import { z } from 'zod';
import { compileRule } from './compiler.js';
import { RuleDBError } from './errors.js';
import { createRunReceipt } from './receipts.js';
import type { Rule } from './algebra.js';
import type { StoreSession } from './adapters/adapter.js';
import type { RuleDBEventEmitter } from './events.js';
import type { CompiledStatement, RunOptions, RunReceipt, SqlDialect } from './types.js';

/** The part of a store session the driver needs. */
export type PassExecutor = Pick<StoreSession, 'execute' | 'savepoint' | 'releaseSavepoint' | 'rollbackToSavepoint'>;

export interface CompiledRule {
  rule: Rule;
  statement: CompiledStatement;
}

/**
 * Compile every rule up front, so a rule that does not compile fails the
 * whole call before any statement runs.
 */
export function compileRules(rules: readonly Rule[], dialect: SqlDialect): CompiledRule[] {
  return rules.map(rule => ({ rule, statement: compileRule(rule, dialect) }));
}

export function ruleNames(rules: readonly Rule[]): string[] {
  return [...new Set(rules.map(r => r.name))];
}

// ─── Single Pass ─────────────────────────────────────────────────────────────

/**
 * Execute each compiled rule once inside a savepoint and return the number
 * of rows inserted. A failing statement rolls the whole pass back.
 */
export async function runPass(compiled: readonly CompiledRule[], executor: PassExecutor, pass: number): Promise<number> {
  const savepoint = `ruledb_pass_${pass}`;
  await executor.savepoint(savepoint);

  let inserted = 0;
  try {
    for (const { rule, statement } of compiled) {
      inserted += await executor.execute(statement, { relation: rule.name, operation: 'run' });
    }
  } catch (err) {
    await executor.rollbackToSavepoint(savepoint);
    await executor.releaseSavepoint(savepoint);
    throw err;
  }

  await executor.releaseSavepoint(savepoint);
  return inserted;
}

// ─── Run To Fixpoint ─────────────────────────────────────────────────────────

const runOptionsSchema = z
  .object({
    maxPasses: z.number().int().positive().optional(),
    fixedPasses: z.number().int().positive().optional(),
  })
  .strict()
  .refine(o => o.maxPasses === undefined || o.fixedPasses === undefined, {
    message: 'maxPasses and fixedPasses are mutually exclusive',
  });

export function validateRunOptions(options: RunOptions): RunOptions {
  const parsed = runOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new RuleDBError({
      code: 'INVALID_CONFIG',
      message: `Invalid run options: ${parsed.error.issues.map(i => i.message).join(', ')}`,
      fix: `Pass { maxPasses: n } to bound a run, or { fixedPasses: n } to run exactly n passes. n must be a positive integer.`,
      operation: 'run',
      originalError: parsed.error,
    });
  }
  return parsed.data;
}

export interface FixpointOptions extends RunOptions {
  /** Bound used when neither maxPasses nor fixedPasses is given. */
  defaultMaxPasses: number;
  emitter?: RuleDBEventEmitter;
}

/**
 * Run compiled rules until a pass inserts nothing, or until the pass bound
 * is hit.
 * With `fixedPasses`, run exactly that many passes; `converged` then says
 * whether the last one inserted nothing.
 */
export async function runToFixpoint(
  compiled: readonly CompiledRule[],
  executor: PassExecutor,
  options: FixpointOptions,
): Promise<RunReceipt> {
  const startTime = Date.now();
  const { maxPasses, fixedPasses } = validateRunOptions({ maxPasses: options.maxPasses, fixedPasses: options.fixedPasses });
  const names = ruleNames(compiled.map(c => c.rule));
  const limit = fixedPasses ?? maxPasses ?? options.defaultMaxPasses;

  const insertedPerPass: number[] = [];
  let converged = false;

  while (insertedPerPass.length < limit) {
    const pass = insertedPerPass.length + 1;
    const inserted = await runPass(compiled, executor, pass);
    insertedPerPass.push(inserted);
    options.emitter?.emit('pass', { rules: names, pass, inserted });

    converged = inserted === 0;
    if (converged && fixedPasses === undefined) break;
  }

  const receipt = createRunReceipt({ rules: names, startTime, insertedPerPass, converged });

  if (converged) {
    options.emitter?.emit('converged', { rules: names, passes: receipt.passes, insertedCount: receipt.insertedCount });
  } else if (fixedPasses === undefined) {
    options.emitter?.emit('pass-limit', { rules: names, passes: receipt.passes, maxPasses: limit });
  }

  return receipt;
}

/**
 * RuleDB Operation Receipts — Structured write results
 *
 * Every insert and run returns a receipt. Never void. Never driver-specific.
 */

import type { InsertReceipt, RunReceipt } from './types.js';

export function createInsertReceipt(opts: {
  relation: string;
  startTime: number;
  rowCount: number;
  insertedCount: number;
}): InsertReceipt {
  return {
    operation: 'insert',
    relation: opts.relation,
    rowCount: opts.rowCount,
    insertedCount: opts.insertedCount,
    ignoredCount: opts.rowCount - opts.insertedCount,
    duration: Date.now() - opts.startTime,
  };
}

export function createRunReceipt(opts: {
  rules: string[];
  startTime: number;
  insertedPerPass: number[];
  converged: boolean;
}): RunReceipt {
  return {
    operation: 'run',
    rules: opts.rules,
    passes: opts.insertedPerPass.length,
    insertedCount: opts.insertedPerPass.reduce((sum, n) => sum + n, 0),
    insertedPerPass: opts.insertedPerPass,
    converged: opts.converged,
    duration: Date.now() - opts.startTime,
  };
}

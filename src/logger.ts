/**
 * RuleDB Logger — Structured operation logging
 *
 * Emits operation events with timing and receipt, statement events in
 * verbose mode, and slow-statement warnings past the threshold.
 */

import type { OperationReceipt } from './types.js';
import type { RuleDBEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowStatementMs: number;
}

export class RuleDBLogger {
  private config: LoggerConfig;
  private emitter: RuleDBEventEmitter;

  constructor(config: LoggerConfig, emitter: RuleDBEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a completed insert or run.
   */
  logOperation(receipt: OperationReceipt): void {
    if (!this.config.enabled) return;

    this.emitter.emit('operation', {
      relation: receipt.operation === 'insert' ? receipt.relation : receipt.rules.join(','),
      operation: receipt.operation,
      durationMs: receipt.duration,
      receipt,
    });
  }

  /**
   * Log one executed statement.
   */
  logStatement(sql: string, paramCount: number, rowCount: number, durationMs: number): void {
    if (!this.config.enabled) return;

    if (this.config.verbose) {
      this.emitter.emit('statement', { sql, paramCount, rowCount, durationMs });
    }

    if (durationMs >= this.config.slowStatementMs) {
      this.emitter.emit('slow-statement', {
        sql,
        durationMs,
        threshold: this.config.slowStatementMs,
      });
    }
  }
}

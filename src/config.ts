/**
 * RuleDB Configuration — validation, defaults, dialect detection
 */

import { z } from 'zod';
import { RuleDBError } from './errors.js';
import type { LoggerConfig } from './logger.js';
import type { RuleDBConfig, SqlDialect } from './types.js';

export const DEFAULT_MAX_PASSES = 1000;
export const DEFAULT_SLOW_STATEMENT_MS = 1000;

export const configSchema = z
  .object({
    uri: z.string().min(1),
    label: z.string().min(1).optional(),
    maxPasses: z.number().int().positive().optional(),
    logging: z.union([z.boolean(), z.literal('verbose')]).optional(),
    slowStatementMs: z.number().nonnegative().optional(),
  })
  .strict();

export interface ResolvedConfig {
  uri: string;
  dialect: SqlDialect;
  label: string;
  maxPasses: number;
  logger: LoggerConfig;
}

export function resolveConfig(config: RuleDBConfig): ResolvedConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    throw new RuleDBError({
      code: 'INVALID_CONFIG',
      message: `Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ')}`,
      fix: `Pass { uri, label?, maxPasses?, logging?, slowStatementMs? } with maxPasses a positive integer.`,
      originalError: parsed.error,
    });
  }

  const { uri, label, maxPasses, logging, slowStatementMs } = parsed.data;
  const dialect = detectDialect(uri);

  return {
    uri,
    dialect,
    label: label ?? (dialect === 'pg' ? 'PostgreSQL' : 'SQLite'),
    maxPasses: maxPasses ?? DEFAULT_MAX_PASSES,
    logger: {
      enabled: logging !== false,
      verbose: logging === 'verbose',
      slowStatementMs: slowStatementMs ?? DEFAULT_SLOW_STATEMENT_MS,
    },
  };
}

// ─── URI Handling ────────────────────────────────────────────────────────────

export function detectDialect(uri: string): SqlDialect {
  if (uri.startsWith('postgresql://') || uri.startsWith('postgres://')) return 'pg';
  if (uri === ':memory:' || uri.startsWith('sqlite:') || uri.startsWith('file:')) return 'sqlite';

  throw new RuleDBError({
    code: 'INVALID_CONFIG',
    message: `Unsupported URI scheme in "${redactUri(uri).substring(0, 20)}..."`,
    fix: 'Use sqlite::memory:, sqlite:<path>, file:<path> or postgresql://.',
  });
}

/** File name better-sqlite3 should open for a SQLite URI. */
export function sqliteFilename(uri: string): string {
  if (uri === ':memory:' || uri === 'sqlite::memory:' || uri === 'file::memory:') return ':memory:';
  if (uri.startsWith('sqlite:')) return uri.slice('sqlite:'.length);
  if (uri.startsWith('file:')) return uri.slice('file:'.length);
  return uri;
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}

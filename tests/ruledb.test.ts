/**
 * RuleDB Integration Tests — sessions, rules and reads on in-memory SQLite
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RuleDB } from '../src/ruledb.js';
import { query } from '../src/algebra.js';
import { vars } from '../src/terms.js';
import { RuleDBError, SchemaError } from '../src/errors.js';
import type { Relation } from '../src/schema.js';
import type { RuleDBEvents, SqlValue } from '../src/types.js';

const [x, y, z, w, v] = vars('x', 'y', 'z', 'w', 'v');

const EDGES: Array<[number, number]> = [
  [1, 2],
  [2, 3],
  [3, 4],
  [4, 5],
  [5, 5],
];

/** Reachability by breadth-first search, as sorted "a,b" keys. */
function reachable(edges: ReadonlyArray<readonly [number, number]>): string[] {
  const pairs = new Set<string>();
  for (const [start] of edges) {
    const seen = new Set<number>();
    const queue = edges.filter(([a]) => a === start).map(([, b]) => b);
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined || seen.has(node)) continue;
      seen.add(node);
      pairs.add(`${start},${node}`);
      for (const [a, b] of edges) if (a === node) queue.push(b);
    }
  }
  return [...pairs].sort();
}

function keys(rows: SqlValue[][]): string[] {
  return rows.map(row => row.join(',')).sort();
}

describe('RuleDB on SQLite', () => {
  let db: RuleDB;
  let edge: Relation;
  let path: Relation;

  beforeEach(async () => {
    db = await RuleDB.open({ uri: 'sqlite::memory:' });
    edge = db.relation('edge', { src: 'INTEGER', dst: 'INTEGER' });
    path = db.relationSet('path', { src: 'INTEGER', dst: 'INTEGER' });
  });

  afterEach(async () => {
    await db.close();
  });

  // ─── Fixpoint Semantics ────────────────────────────────────────────────────

  describe('transitive closure', () => {
    it('derives exactly the reachable pairs', async () => {
      const closure = path.atom(x, z).when(edge.atom(x, z).or(edge.atom(x, y).and(path.atom(y, z))));

      const { receipt, rows } = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        const receipt = await ctx.run(closure);
        const rows = await ctx.select([x, z], path.atom(x, z)).toArray();
        return { receipt, rows };
      });

      expect(keys(rows)).toEqual(reachable(EDGES));
      expect(keys(rows)).toContain('3,5');
      expect(rows).toHaveLength(11);
      expect(receipt.converged).toBe(true);
      expect(receipt.insertedCount).toBe(11);
      expect(receipt.insertedPerPass).toHaveLength(receipt.passes);
      expect(receipt.insertedPerPass.at(-1)).toBe(0);
    });

    it('reaches the same fixpoint with non-linear recursion', async () => {
      const base = path.atom(x, z).when(edge.atom(x, z));
      const join = path.atom(x, z).when(path.atom(x, y).and(path.atom(y, z)));

      const rows = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        await ctx.run([base, join]);
        return ctx.select([x, z], path.atom(x, z)).toArray();
      });

      expect(keys(rows)).toEqual(reachable(EDGES));
    });

    it('evaluates constants in rule bodies', async () => {
      const reach = db.relationSet('reach', { node: 'INTEGER' });
      const rules = [reach.atom(x).when(edge.atom(1, x)), reach.atom(x).when(reach.atom(y).and(edge.atom(y, x)))];

      const rows = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        await ctx.run(rules);
        return ctx.select(query([x], reach.atom(x))).toArray();
      });

      expect(keys(rows)).toEqual(['2', '3', '4', '5']);
    });

    it('adds nothing when a pass runs after the fixpoint', async () => {
      const closure = path.atom(x, z).when(edge.atom(x, z).or(edge.atom(x, y).and(path.atom(y, z))));

      const inserted = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        await ctx.run(closure);
        return ctx.pass(closure);
      });

      expect(inserted).toBe(0);
    });

    it('only ever grows the target relation', async () => {
      const closure = path.atom(x, z).when(edge.atom(x, z).or(edge.atom(x, y).and(path.atom(y, z))));

      const snapshots = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        const out: string[][] = [];
        for (let i = 0; i < 4; i++) {
          await ctx.pass(closure);
          out.push(keys(await ctx.select([x, z], path.atom(x, z)).toArray()));
        }
        return out;
      });

      for (let i = 1; i < snapshots.length; i++) {
        const before = snapshots[i - 1] ?? [];
        const after = snapshots[i] ?? [];
        expect(after.length).toBeGreaterThanOrEqual(before.length);
        expect(after).toEqual(expect.arrayContaining(before));
      }
    });

    it('stops at maxPasses and reports it did not converge', async () => {
      const chain = Array.from({ length: 9 }, (_, i): [number, number] => [i + 1, i + 2]);
      const closure = path.atom(x, z).when(edge.atom(x, z).or(edge.atom(x, y).and(path.atom(y, z))));
      const limits: RuleDBEvents['pass-limit'][] = [];
      db.on('pass-limit', e => limits.push(e));

      const { bounded, full, count } = await db.session(async ctx => {
        await ctx.insert(edge, chain);
        const bounded = await ctx.run(closure, { maxPasses: 2 });
        const full = await ctx.run(closure);
        return { bounded, full, count: await ctx.count(path) };
      });

      expect(bounded.passes).toBe(2);
      expect(bounded.converged).toBe(false);
      expect(limits).toEqual([{ rules: ['path'], passes: 2, maxPasses: 2 }]);
      expect(full.converged).toBe(true);
      expect(count).toBe(45);
    });

    it('runs a fixed number of passes on request', async () => {
      const closure = path.atom(x, z).when(edge.atom(x, z).or(edge.atom(x, y).and(path.atom(y, z))));

      const receipt = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        return ctx.run(closure, { fixedPasses: 8 });
      });

      expect(receipt.passes).toBe(8);
      expect(receipt.converged).toBe(true);
      expect(receipt.insertedCount).toBe(11);
    });

    it('rejects conflicting run options', async () => {
      const closure = path.atom(x, z).when(edge.atom(x, z));
      await expect(db.session(ctx => ctx.run(closure, { maxPasses: 3, fixedPasses: 3 }))).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
      });
    });
  });

  // ─── Inserts ───────────────────────────────────────────────────────────────

  describe('insert', () => {
    it('skips duplicate rows', async () => {
      const [first, second] = await db.session(async ctx => [
        await ctx.insert(edge, [[1, 2], [1, 2], [2, 3]]),
        await ctx.insert(edge, [{ dst: 2, src: 1 }]),
      ]);

      expect(first).toMatchObject({ operation: 'insert', relation: 'edge', rowCount: 3, insertedCount: 2, ignoredCount: 1 });
      expect(second).toMatchObject({ rowCount: 1, insertedCount: 0, ignoredCount: 1 });
    });

    it('stores each derived row once when alternatives overlap', async () => {
      const a = db.relation('a', { n: 'INTEGER' });
      const b = db.relation('b', { n: 'INTEGER' });
      const both = db.relationSet('both', { n: 'INTEGER' });

      const rows = await db.session(async ctx => {
        await ctx.insert(a, [[1], [2]]);
        await ctx.insert(b, [[2], [3]]);
        await ctx.run(both.atom(x).when(a.atom(x).or(b.atom(x))));
        return ctx.select([x], both.atom(x)).toArray();
      });

      expect(keys(rows)).toEqual(['1', '2', '3']);
    });

    it('accepts relation names', async () => {
      const count = await db.session(async ctx => {
        await ctx.insert('edge', [[7, 8]]);
        return ctx.count('edge');
      });
      expect(count).toBe(1);
    });

    it('refuses derived relations', async () => {
      await expect(db.session(ctx => ctx.insert(path, [[1, 2]]))).rejects.toThrow(
        'Cannot insert into "path": it is a derived relation.',
      );
    });

    it('suggests a declared name for a misspelled relation', async () => {
      await expect(db.session(ctx => ctx.insert('edeg', [[1, 2]]))).rejects.toThrow('Did you mean "edge"?');
    });

    it('validates rows before touching the store', async () => {
      await expect(db.session(ctx => ctx.insert(edge, [[1, 'two']]))).rejects.toMatchObject({ code: 'TYPE_MISMATCH' });
    });

    it('round-trips integers beyond 2^53 exactly', async () => {
      const big = db.relation('big', { id: 'BIGINT' });

      const [receipt, rows] = await db.session(async ctx => {
        const receipt = await ctx.insert(big, [[2n ** 60n], [2n ** 60n + 1n], [7]]);
        return [receipt, await ctx.select([x], big.atom(x)).toArray()] as const;
      });

      expect(receipt.insertedCount).toBe(3);
      expect(rows).toHaveLength(3);
      expect(rows).toEqual(expect.arrayContaining([[1152921504606846976n], [1152921504606846977n], [7]]));
    });

    it('round-trips every column type', async () => {
      const item = db.relation('item', { id: 'INT', w: 'REAL', on: 'BOOL', tag: 'TEXT', raw: 'BLOB' });

      const rows = await db.session(async ctx => {
        await ctx.insert(item, [[1, 2.5, true, 'a', new Uint8Array([1, 2])], [2, 3, false, 'b', new Uint8Array([3])]]);
        return ctx.select([x, y, z, w, v], item.atom(x, y, z, w, v).and(item.atom(x, y, true, w, v))).toArray();
      });

      expect(rows).toHaveLength(1);
      const [row] = rows;
      expect(row?.slice(0, 4)).toEqual([1, 2.5, true, 'a']);
      const raw = row?.[4];
      expect(raw).toBeInstanceOf(Uint8Array);
      if (raw instanceof Uint8Array) expect([...raw]).toEqual([1, 2]);
    });
  });

  // ─── Reads ─────────────────────────────────────────────────────────────────

  describe('select', () => {
    it('filters on constants and projects constants', async () => {
      const rows = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        return ctx.select([y, 'out'], edge.atom(1, y)).toArray();
      });
      expect(rows).toEqual([[2, 'out']]);
    });

    it('can be iterated more than once', async () => {
      const [first, second] = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        const rs = ctx.select([x], edge.atom(x, x));
        const first: SqlValue[][] = [];
        for await (const row of rs) first.push(row);
        return [first, await rs.toArray()];
      });

      expect(first).toEqual([[5]]);
      expect(second).toEqual(first);
    });

    it('reads an empty relation before anything was inserted', async () => {
      const rows = await db.session(ctx => ctx.select([x, y], path.atom(x, y)).toArray());
      expect(rows).toEqual([]);
    });
  });

  // ─── Session Scope ─────────────────────────────────────────────────────────

  describe('sessions', () => {
    it('rolls everything back when the scope throws', async () => {
      await expect(
        db.session(async ctx => {
          await ctx.insert(edge, EDGES);
          throw new Error('abort');
        }),
      ).rejects.toThrow('abort');

      expect(await db.session(ctx => ctx.count(edge))).toBe(0);
    });

    it('keeps committed rows across sessions', async () => {
      await db.session(ctx => ctx.insert(edge, EDGES));
      expect(await db.session(ctx => ctx.count(edge))).toBe(5);
    });

    it('closes the context when the scope ends', async () => {
      const ctx = await db.session(async c => c);

      expect(ctx.isOpen).toBe(false);
      await expect(ctx.insert(edge, [[1, 2]])).rejects.toMatchObject({ code: 'SESSION_CLOSED', operation: 'insert' });
      await expect(ctx.count(edge)).rejects.toBeInstanceOf(RuleDBError);
      expect(() => ctx.select([x, y], edge.atom(x, y))).toThrow(/after the session scope ended/);
    });

    it('refuses to read a result set after the scope ends', async () => {
      const rs = await db.session(async ctx => ctx.select([x, y], edge.atom(x, y)));
      await expect(rs.toArray()).rejects.toMatchObject({ code: 'SESSION_CLOSED' });
    });

    it('fails fast on a nested session', async () => {
      await expect(db.session(async () => db.session(ctx => ctx.count(edge)))).rejects.toMatchObject({
        code: 'SESSION_BUSY',
        operation: 'session',
      });
      expect(await db.session(ctx => ctx.count(edge))).toBe(0);
    });

    it('refuses statements while a result set is being read', async () => {
      const copy = db.relation('copy', { src: 'INTEGER', dst: 'INTEGER' });

      const inserted = await db.session(async ctx => {
        await ctx.insert(edge, EDGES);
        for await (const row of ctx.select([x, y], edge.atom(x, y))) {
          await expect(ctx.insert(copy, [row])).rejects.toMatchObject({ code: 'SESSION_BUSY', operation: 'insert' });
          await expect(ctx.count(copy)).rejects.toThrow('Cannot call count() while a select() result set is being read.');
          break;
        }

        const rows = await ctx.select([x, y], edge.atom(x, y)).toArray();
        return (await ctx.insert(copy, rows)).insertedCount;
      });

      expect(inserted).toBe(5);
    });

    it('serializes concurrent sessions', async () => {
      await Promise.all([db.session(ctx => ctx.insert(edge, [[1, 2]])), db.session(ctx => ctx.insert(edge, [[2, 3]]))]);
      expect(await db.session(ctx => ctx.count(edge))).toBe(2);
    });

    it('rejects relations declared on another database', async () => {
      const other = await RuleDB.open({ uri: ':memory:' });
      try {
        const foreign = other.relation('edge', { src: 'INTEGER', dst: 'INTEGER' });
        await expect(db.session(ctx => ctx.insert(foreign, [[1, 2]]))).rejects.toThrow(SchemaError);
        await expect(db.session(ctx => ctx.run(path.atom(x, y).when(foreign.atom(x, y))))).rejects.toThrow(
          'Relation "edge" was not declared on this database.',
        );
      } finally {
        await other.close();
      }
    });
  });

  // ─── Discovery & Events ────────────────────────────────────────────────────

  describe('discovery', () => {
    it('describes a relation with its row count', async () => {
      await db.session(ctx => ctx.insert(edge, [[1, 2], [2, 3]]));
      expect(await db.describe('edge')).toEqual({
        name: 'edge',
        kind: 'base',
        columns: [
          { name: 'src', type: 'INTEGER' },
          { name: 'dst', type: 'INTEGER' },
        ],
        rowCount: 2,
      });
    });

    it('describes a relation from inside a session', async () => {
      const description = await db.session(async ctx => {
        await ctx.insert(edge, [[1, 2]]);
        return db.describe('edge');
      });
      expect(description.rowCount).toBe(1);
    });

    it('explains rules and queries without running them', () => {
      const copy = path.atom(x, z).when(edge.atom(x, z));
      expect(db.explain(copy)).toEqual({
        dialect: 'sqlite',
        statements: [
          {
            sql: 'INSERT INTO "path" ("src", "dst") SELECT DISTINCT "t0"."src" AS "src", "t0"."dst" AS "dst" FROM "edge" AS "t0" WHERE 1=1 ON CONFLICT DO NOTHING',
            params: [],
          },
        ],
      });
      expect(db.explain([copy, copy]).statements).toHaveLength(2);
      expect(db.explain(query([x], edge.atom(x, 3))).statements[0]?.params).toEqual([3]);
    });

    it('lists and looks up relations', () => {
      expect(db.relations().map(r => r.name)).toEqual(['edge', 'path']);
      expect(db.getRelation('PATH')).toBe(path);
    });

    it('reports connection status', async () => {
      expect(db.status()).toMatchObject({
        state: 'connected',
        dialect: 'sqlite',
        driver: 'better-sqlite3',
        label: 'SQLite',
        uri: 'sqlite::memory:',
        relations: 2,
      });

      await db.close();
      expect(db.status().state).toBe('closed');
      await expect(db.session(ctx => ctx.count(edge))).rejects.toThrow('Cannot call session() after close().');
    });
  });

  describe('events', () => {
    it('emits an operation event per insert and run', async () => {
      const ops: RuleDBEvents['operation'][] = [];
      db.on('operation', e => ops.push(e));

      await db.session(async ctx => {
        await ctx.insert(edge, [[1, 2]]);
        await ctx.run(path.atom(x, y).when(edge.atom(x, y)));
      });

      expect(ops.map(o => [o.operation, o.relation])).toEqual([
        ['insert', 'edge'],
        ['run', 'path'],
      ]);
    });

    it('emits error events for failed sessions', async () => {
      const errors: RuleDBEvents['error'][] = [];
      db.on('error', e => errors.push(e));

      await expect(db.session(ctx => ctx.insert(path, [[1, 2]]))).rejects.toThrow(SchemaError);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.code).toBe('SCHEMA_ERROR');
    });

    it('emits a closed event', async () => {
      const closed: RuleDBEvents['closed'][] = [];
      db.once('closed', e => closed.push(e));
      await db.close();
      await db.close();
      expect(closed).toEqual([{ dialect: 'sqlite', label: 'SQLite' }]);
    });
  });
});

describe('verbose logging', () => {
  it('emits one statement event per statement', async () => {
    const db = await RuleDB.open({ uri: 'sqlite::memory:', logging: 'verbose', label: 'graph' });
    try {
      const edge = db.relation('edge', { src: 'INTEGER', dst: 'INTEGER' });
      const statements: RuleDBEvents['statement'][] = [];
      db.on('statement', e => statements.push(e));

      await db.session(ctx => ctx.insert(edge, [[1, 2], [3, 4]]));

      expect(statements.map(s => s.sql.split(' (')[0])).toEqual([
        'CREATE TABLE IF NOT EXISTS "edge"',
        'INSERT INTO "edge"',
      ]);
      expect(statements[1]).toMatchObject({ paramCount: 4, rowCount: 2 });
      expect(db.status().label).toBe('graph');
    } finally {
      await db.close();
    }
  });

  it('stays silent when logging is off', async () => {
    const db = await RuleDB.open({ uri: 'sqlite::memory:', logging: false });
    try {
      const edge = db.relation('edge', { src: 'INTEGER', dst: 'INTEGER' });
      const ops: RuleDBEvents['operation'][] = [];
      db.on('operation', e => ops.push(e));

      await db.session(ctx => ctx.insert(edge, [[1, 2]]));
      expect(ops).toEqual([]);
    } finally {
      await db.close();
    }
  });
});

describe('RuleDB.open', () => {
  it('rejects invalid configuration', async () => {
    await expect(RuleDB.open({ uri: 'sqlite::memory:', maxPasses: 0 })).rejects.toMatchObject({ code: 'INVALID_CONFIG' });
    await expect(RuleDB.open({ uri: 'mysql://localhost/db' })).rejects.toThrow(/Unsupported URI scheme/);
  });

  it('uses maxPasses from the configuration as the default bound', async () => {
    const db = await RuleDB.open({ uri: 'sqlite::memory:', maxPasses: 1 });
    try {
      const edge = db.relation('edge', { src: 'INTEGER', dst: 'INTEGER' });
      const path = db.relationSet('path', { src: 'INTEGER', dst: 'INTEGER' });
      const receipt = await db.session(async ctx => {
        await ctx.insert(edge, [[1, 2]]);
        return ctx.run(path.atom(x, y).when(edge.atom(x, y)));
      });
      expect(receipt.passes).toBe(1);
      expect(receipt.converged).toBe(false);
    } finally {
      await db.close();
    }
  });
});

import { expect } from 'chai';
import { emptyConfig } from '../scripts/dataset-docs/config';
import { createContext } from '../scripts/dataset-docs/context';
import type { RunContext } from '../scripts/dataset-docs/context';
import { newTable } from '../scripts/dataset-docs/discover';
import {
  aggregateJoinStats,
  bucketJoinStats,
  computeJoin,
  enumeratePairs,
  expandJoinGroup,
  joinSql,
  pairKey,
  parseJoinRef,
  parseJoinStats,
  resolveJoins,
} from '../scripts/dataset-docs/joins';
import { flattenFields } from '../scripts/dataset-docs/schema';
import type { Dataset, JoinStat, Table } from '../scripts/dataset-docs/types';
import type { QueryRow } from '../scripts/dataset-docs/warehouse';
import { FakeWarehouse, field } from './helpers/fake-warehouse';

function makeTables(columnsByTable: Record<string, string[]>, dataset: Dataset): Table[] {
  return Object.entries(columnsByTable).map(([name, columns]) => {
    const table = newTable(name, dataset, '');
    table.fields = flattenFields(columns.map((c) => field(c)), table);
    dataset.tables.push(table);
    return table;
  });
}

function makeContext(columnsByTable: Record<string, string[]>, answer: (sql: string) => QueryRow[]): RunContext {
  const dataset: Dataset = { name: 'd', lastUpdated: null, tables: [] };
  makeTables(columnsByTable, dataset);
  const ctx = createContext(emptyConfig(), new FakeWarehouse({ datasets: {}, tables: {}, answer }), () => {});
  ctx.datasets.set('d', dataset);
  return ctx;
}

function stat(key: string | null, numRows: number, totalRows: number): JoinStat {
  return { key, numRows, totalRows, percent: numRows / totalRows, sampleValues: [] };
}

describe('join references', () => {
  it('strips the required marker', () => {
    expect(parseJoinRef('+ds.t|id')).to.deep.equal({ table: 'ds.t', column: 'id', required: true });
    expect(parseJoinRef('ds.t|id')).to.deep.equal({ table: 'ds.t', column: 'id', required: false });
  });

  it('rejects entries without exactly one separator', () => {
    expect(() => parseJoinRef('ds.t.id')).to.throw('Join entry "ds.t.id" is not of the form table|column');
  });
});

describe('wildcard expansion', () => {
  const dataset: Dataset = { name: 'd', lastUpdated: null, tables: [] };
  const tables = makeTables({ 'x.t': ['col1', 'col2', 'other'], 'y.t': ['col1'] }, dataset);

  it('expands table and column wildcards against loaded fields', () => {
    expect(expandJoinGroup(['x.*|col*'], tables)).to.deep.equal(['x.t|col1', 'x.t|col2']);
  });

  it('replaces the wildcard entry in place', () => {
    expect(expandJoinGroup(['y.t|col1', '+x*|col*', 'z.t|id'], tables)).to.deep.equal([
      'y.t|col1',
      '+x.t|col1',
      '+x.t|col2',
      'z.t|id',
    ]);
  });

  it('ignores old table versions', () => {
    const ds: Dataset = { name: 'e', lastUpdated: null, tables: [] };
    const [oldTable, current] = makeTables({ 'ds.t_1': ['id'], 'ds.t_2': ['id'] }, ds);
    oldTable.isOldVersion = true;
    expect(expandJoinGroup(['ds.t_*|id'], [oldTable, current])).to.deep.equal(['ds.t_2|id']);
  });

  it('yields nothing when nothing matches', () => {
    expect(expandJoinGroup(['nothing*|id'], tables)).to.deep.equal([]);
  });
});

describe('join pairing', () => {
  it('produces each pair of required references once', () => {
    const pairs = enumeratePairs(['+A|c1', '+B|c2', '+C|c3'], new Set());
    expect(pairs.map((p) => `${p.from.table}->${p.to.table}`)).to.deep.equal(['A->B', 'A->C', 'B->C']);
  });

  it('needs a required marker on at least one side', () => {
    const pairs = enumeratePairs(['A|c1', 'B|c2', '+C|c3'], new Set());
    expect(pairs.map((p) => `${p.from.table}->${p.to.table}`)).to.deep.equal(['A->C', 'B->C']);
  });

  it('skips a column joined with itself', () => {
    expect(enumeratePairs(['+A|c1', 'A|c1'], new Set())).to.deep.equal([]);
  });

  it('skips pairs already handled by an earlier group', () => {
    const done = new Set<string>();
    enumeratePairs(['+A|c1', 'B|c2'], done);
    expect(enumeratePairs(['+B|c2', 'A|c1', '+C|c3'], done).map((p) => `${p.from.table}->${p.to.table}`)).to.deep.equal([
      'B->C',
      'A->C',
    ]);
  });

  it('uses the same key for a pair and its mirror', () => {
    const a = parseJoinRef('+A|c1');
    const b = parseJoinRef('B|c2');
    expect(pairKey(a, b)).to.equal(pairKey(b, a));
  });
});

describe('join statistics', () => {
  it('sums counts across buckets instead of averaging percents', () => {
    const { percent, numRows } = aggregateJoinStats([stat('a', 5, 10), stat('b', 0, 20)]);
    expect(percent).to.be.closeTo(5 / 30, 1e-9);
    expect(numRows).to.equal(5);
  });

  it('reports no percent for an empty from table', () => {
    const stats = parseJoinStats([{ cnt: '0', second_cnt: '0', sample_value: [] }], false, 'sql');
    expect(stats).to.deep.equal([{ key: 'all', percent: null, numRows: 0, totalRows: 0, sampleValues: [] }]);
    expect(aggregateJoinStats(stats)).to.deep.equal({ percent: null, numRows: 0 });
  });

  it('keys grouped rows by value and keeps up to five distinct samples', () => {
    const stats = parseJoinStats(
      [
        { cnt: '4', second_cnt: '1', grouped: 'US', sample_value: ['a', null, 'b', 'a', 'c', 'd', 'e', 'f'] },
        { cnt: '2', second_cnt: '2', grouped: null, sample_value: [1, 2] },
      ],
      true,
      'sql',
    );
    expect(stats).to.deep.equal([
      { key: 'US', percent: 0.25, numRows: 1, totalRows: 4, sampleValues: ['a', 'b', 'c', 'd', 'e'] },
      { key: null, percent: 1, numRows: 2, totalRows: 2, sampleValues: ['1', '2'] },
    ]);
  });

  it('keeps a NULL group apart from a value spelled (null)', () => {
    const stats = parseJoinStats(
      [
        { cnt: '10', second_cnt: '5', grouped: null, sample_value: ['k1'] },
        { cnt: '10', second_cnt: '0', grouped: '(null)', sample_value: [] },
      ],
      true,
      'sql',
    );

    expect(aggregateJoinStats(stats)).to.deep.equal({ percent: 0.25, numRows: 5 });
    const buckets = bucketJoinStats(stats);
    expect(buckets.get(null)?.numRows).to.equal(5);
    expect(buckets.get('(null)')?.numRows).to.equal(0);
  });

  it('merges rows whose group values print alike', () => {
    const buckets = bucketJoinStats([
      { key: '2019', percent: 0.5, numRows: 1, totalRows: 2, sampleValues: ['a', 'b'] },
      { key: '2019', percent: 1, numRows: 2, totalRows: 2, sampleValues: ['b', 'c'] },
    ]);
    expect([...buckets.values()]).to.deep.equal([
      { key: '2019', percent: 0.75, numRows: 3, totalRows: 4, sampleValues: ['a', 'b', 'c'] },
    ]);
  });

  it('builds an ungrouped left-join query', () => {
    expect(joinSql(parseJoinRef('p:ds.a|id'), parseJoinRef('+ds.b|a_id'))).to.equal(
      [
        '#standardSQL',
        'SELECT',
        '  COUNT(*) AS cnt,',
        '  COUNT(second.second_column) AS second_cnt,',
        '  ARRAY_AGG(IF(second.second_column IS NOT NULL, first.id, NULL) IGNORE NULLS ORDER BY RAND() LIMIT 5) AS sample_value',
        'FROM `p.ds.a` AS first',
        'LEFT JOIN (',
        '  SELECT a_id AS second_column, COUNT(*) AS cnt',
        '  FROM `ds.b`',
        '  GROUP BY 1',
        ') AS second ON first.id = second.second_column',
      ].join('\n')
    );
  });

  it('buckets the query by the from table group-by column', () => {
    const sql = joinSql(parseJoinRef('ds.a|id'), parseJoinRef('ds.b|a_id'), 'country');
    const lines = sql.split('\n');
    expect(lines[4]).to.equal('  first.country AS grouped,');
    expect(lines.slice(-2)).to.deep.equal(['GROUP BY 3', 'ORDER BY 3']);
  });

  it('records the join on both fields and the from table', () => {
    const ctx = makeContext({ 'ds.a': ['id'], 'ds.b': ['a_id'] }, () => [
      { cnt: '8', second_cnt: '6', sample_value: ['x1', 'x2'] },
    ]);
    const join = computeJoin(ctx, 'ids', { from: parseJoinRef('ds.a|id'), to: parseJoinRef('+ds.b|a_id') });

    const [a, b] = ctx.datasets.get('d')?.tables ?? [];
    expect(join.name).to.equal('ids');
    expect(join.percent).to.equal(0.75);
    expect(join.numRows).to.equal(6);
    expect([...join.stats.keys()]).to.deep.equal(['all']);
    expect(join.fromField).to.equal(a.fields[0]);
    expect(join.toField).to.equal(b.fields[0]);
    expect(a.fields[0].fromJoins).to.deep.equal([join]);
    expect(b.fields[0].toJoins).to.deep.equal([join]);
    expect(a.fromJoins).to.deep.equal([join]);
    expect(b.fromJoins).to.deep.equal([]);
  });

  it('fails when a referenced field does not exist', () => {
    const ctx = makeContext({ 'ds.a': ['id'] }, () => []);
    expect(() => computeJoin(ctx, 'ids', { from: parseJoinRef('ds.a|id'), to: parseJoinRef('+ds.b|a_id') })).to.throw(
      'Join group "ids": fields not found: ds.a|id (found), ds.b|a_id (missing)'
    );
  });

  it('expands, pairs and computes every join group', () => {
    const ctx = makeContext({ 'ds.a': ['id'], 'ds.b': ['a_id'], 'ds.c': ['a_id'] }, () => [
      { cnt: '10', second_cnt: '10', sample_value: [] },
    ]);
    ctx.config.joins.set('ids', ['+ds.a|id', 'ds.*|a_id']);

    const joins = resolveJoins(ctx);

    expect(ctx.config.joins.get('ids')).to.deep.equal(['+ds.a|id', 'ds.b|a_id', 'ds.c|a_id']);
    expect(joins.map((j) => `${j.fromField.table.name}->${j.toField.table.name}`)).to.deep.equal([
      'ds.a->ds.b',
      'ds.a->ds.c',
    ]);
    expect(joins.every((j) => j.percent === 1)).to.equal(true);
  });
});

/**
 * Join groups: wildcard expansion, pair enumeration and match statistics.
 *
 * A join group is a list of `table|column` references. A leading `+` on the
 * table marks the reference as required; a pair of references is only
 * joined when at least one side is required. For each pair the query counts,
 * per row of the "from" table, whether the "to" table holds an equal value.
 */

import type { RunContext } from './context';
import { wildcardToRegExp } from './patterns';
import { bucketKey, countValue, valueText } from './schema';
import type { Field, Join, JoinStat, Table } from './types';
import { ALL_BUCKET } from './types';
import { sqlTableRef } from './warehouse';
import type { QueryRow } from './warehouse';

export const SAMPLE_SIZE = 5;

export interface JoinRef {
  table: string;
  column: string;
  required: boolean;
}

export interface JoinPair {
  from: JoinRef;
  to: JoinRef;
}

export function parseJoinRef(entry: string): JoinRef {
  const parts = entry.split('|');
  if (parts.length !== 2) {
    throw new Error(`Join entry "${entry}" is not of the form table|column`);
  }
  const [table, column] = parts;
  const required = table.startsWith('+');
  return { table: required ? table.replace(/^\++/, '') : table, column, required };
}

export function formatJoinRef(ref: JoinRef): string {
  return `${ref.required ? '+' : ''}${ref.table}|${ref.column}`;
}

// ── Wildcard expansion ───────────────────────────────────────────────────────

/**
 * Replace every wildcard entry with the concrete `table|column` references
 * it matches among current tables, keeping list order. Expansions inherit
 * the entry's required marker.
 */
export function expandJoinGroup(entries: string[], tables: Table[]): string[] {
  const expanded: string[] = [];
  for (const entry of entries) {
    if (!entry.includes('*')) {
      expanded.push(entry);
      continue;
    }
    const ref = parseJoinRef(entry);
    const tableRe = wildcardToRegExp(ref.table);
    const columnRe = wildcardToRegExp(ref.column);
    for (const table of tables) {
      if (table.isOldVersion || !tableRe.test(table.name)) continue;
      for (const field of table.fields) {
        if (columnRe.test(field.name)) {
          expanded.push(formatJoinRef({ table: table.name, column: field.name, required: ref.required }));
        }
      }
    }
  }
  return expanded;
}

export function expandJoins(ctx: RunContext): void {
  const tables = [...ctx.datasets.values()].flatMap((d) => d.tables);
  for (const [name, entries] of ctx.config.joins) {
    ctx.config.joins.set(name, expandJoinGroup(entries, tables));
  }
}

// ── Pairing ──────────────────────────────────────────────────────────────────

/** Same key for a pair and its mirror. */
export function pairKey(a: JoinRef, b: JoinRef): string {
  const x = `${a.table}|${a.column}`;
  const y = `${b.table}|${b.column}`;
  return x < y ? `${x} ${y}` : `${y} ${x}`;
}

/**
 * Eligible pairs of an expanded group, "from" being the earlier reference.
 * Keys of returned pairs are added to `done`; pairs already in it are skipped.
 */
export function enumeratePairs(entries: string[], done: Set<string>): JoinPair[] {
  const refs = entries.map(parseJoinRef);
  const pairs: JoinPair[] = [];
  for (let i = 0; i < refs.length; i++) {
    for (let j = 0; j < refs.length; j++) {
      if (i === j) continue;
      const a = refs[i];
      const b = refs[j];
      if (!a.required && !b.required) continue;
      if (a.table === b.table && a.column === b.column) continue;
      const key = pairKey(a, b);
      if (done.has(key)) continue;
      done.add(key);
      pairs.push({ from: a, to: b });
    }
  }
  return pairs;
}

// ── Statistics ───────────────────────────────────────────────────────────────

export function findField(ctx: RunContext, tableName: string, column: string): Field | null {
  for (const dataset of ctx.datasets.values()) {
    for (const table of dataset.tables) {
      if (table.name !== tableName) continue;
      const field = table.fields.find((f) => f.name === column);
      if (field) return field;
    }
  }
  return null;
}

export function joinSql(from: JoinRef, to: JoinRef, groupBy?: string): string {
  const select = [
    '  COUNT(*) AS cnt,',
    '  COUNT(second.second_column) AS second_cnt,',
    ...(groupBy ? [`  first.${groupBy} AS grouped,`] : []),
    `  ARRAY_AGG(IF(second.second_column IS NOT NULL, first.${from.column}, NULL) IGNORE NULLS ` +
      `ORDER BY RAND() LIMIT ${SAMPLE_SIZE}) AS sample_value`,
  ];
  const lines = [
    '#standardSQL',
    'SELECT',
    ...select,
    `FROM \`${sqlTableRef(from.table)}\` AS first`,
    'LEFT JOIN (',
    `  SELECT ${to.column} AS second_column, COUNT(*) AS cnt`,
    `  FROM \`${sqlTableRef(to.table)}\``,
    '  GROUP BY 1',
    `) AS second ON first.${from.column} = second.second_column`,
    ...(groupBy ? ['GROUP BY 3', 'ORDER BY 3'] : []),
  ];
  return lines.join('\n');
}

/** Null when nothing was counted. */
export function ratio(part: number, total: number): number | null {
  return total === 0 ? null : part / total;
}

function distinctSamples(values: string[]): string[] {
  return [...new Set(values)].slice(0, SAMPLE_SIZE);
}

function sampleValues(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return distinctSamples(
    value.filter((v: unknown) => v !== null && v !== undefined).map((v: unknown) => valueText(v))
  );
}

/** One statistic per result row, in query order. */
export function parseJoinStats(rows: QueryRow[], grouped: boolean, sql: string): JoinStat[] {
  return rows.map((row) => {
    const totalRows = countValue(row, 'cnt', sql);
    const numRows = countValue(row, 'second_cnt', sql);
    return {
      key: grouped ? bucketKey(row.grouped) : ALL_BUCKET,
      percent: ratio(numRows, totalRows),
      numRows,
      totalRows,
      sampleValues: sampleValues(row.sample_value),
    };
  });
}

/** Key row statistics by bucket; rows whose values print alike are merged. */
export function bucketJoinStats(stats: JoinStat[]): Map<string | null, JoinStat> {
  const buckets = new Map<string | null, JoinStat>();
  for (const stat of stats) {
    const seen = buckets.get(stat.key);
    if (!seen) {
      buckets.set(stat.key, { ...stat, sampleValues: [...stat.sampleValues] });
      continue;
    }
    seen.numRows += stat.numRows;
    seen.totalRows += stat.totalRows;
    seen.percent = ratio(seen.numRows, seen.totalRows);
    seen.sampleValues = distinctSamples([...seen.sampleValues, ...stat.sampleValues]);
  }
  return buckets;
}

/** Sum numerators and denominators over result rows; per-bucket percents are not averaged. */
export function aggregateJoinStats(stats: Iterable<JoinStat>): { percent: number | null; numRows: number } {
  let total = 0;
  let matched = 0;
  for (const stat of stats) {
    total += stat.totalRows;
    matched += stat.numRows;
  }
  return { percent: ratio(matched, total), numRows: matched };
}

export function computeJoin(ctx: RunContext, name: string, pair: JoinPair): Join {
  const fromField = findField(ctx, pair.from.table, pair.from.column);
  const toField = findField(ctx, pair.to.table, pair.to.column);
  if (!fromField || !toField) {
    throw new Error(
      `Join group "${name}": fields not found: ` +
      `${pair.from.table}|${pair.from.column} (${fromField ? 'found' : 'missing'}), ` +
      `${pair.to.table}|${pair.to.column} (${toField ? 'found' : 'missing'})`
    );
  }

  const groupBy = ctx.config.groups.get(pair.from.table);
  const sql = joinSql(pair.from, pair.to, groupBy);
  const rowStats = parseJoinStats(ctx.warehouse.query(sql), groupBy !== undefined, sql);
  const { percent, numRows } = aggregateJoinStats(rowStats);

  const join: Join = { name, fromField, toField, stats: bucketJoinStats(rowStats), sql, percent, numRows };
  fromField.fromJoins.push(join);
  toField.toJoins.push(join);
  fromField.table.fromJoins.push(join);
  return join;
}

export function runJoins(ctx: RunContext): Join[] {
  const joins: Join[] = [];
  for (const [name, entries] of ctx.config.joins) {
    for (const pair of enumeratePairs(entries, ctx.joinsDone)) {
      ctx.log(`  Running join between ${formatJoinRef(pair.from)} and ${formatJoinRef(pair.to)}`);
      joins.push(computeJoin(ctx, name, pair));
    }
  }
  return joins;
}

export function resolveJoins(ctx: RunContext): Join[] {
  expandJoins(ctx);
  return runJoins(ctx);
}

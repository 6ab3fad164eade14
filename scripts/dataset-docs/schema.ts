/**
 * Schema and row statistics for every current (non-old) table.
 */

import type { RunContext } from './context';
import type { Field, GroupStat, Table } from './types';
import { sqlTableRef } from './warehouse';
import type { QueryRow, SchemaField } from './warehouse';

/** Epoch milliseconds → UTC `YYYY-MM-DD`. */
export function msToDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Flatten a nested schema depth-first in declaration order; a record field
 * comes before its children, which are named `parent.child`.
 */
export function flattenFields(schema: SchemaField[], table: Table, parent = ''): Field[] {
  const out: Field[] = [];
  for (const sf of schema) {
    const name = parent ? `${parent}.${sf.name}` : sf.name;
    out.push({
      name,
      table,
      description: sf.description,
      type: sf.type,
      mode: sf.mode,
      fromJoins: [],
      toJoins: [],
    });
    out.push(...flattenFields(sf.fields, table, name));
  }
  return out;
}

export function groupStatsSql(table: string, column: string): string {
  return `SELECT COUNT(*) AS cnt, ${column} AS grouped FROM \`${sqlTableRef(table)}\` GROUP BY 2 ORDER BY 1`;
}

export function valueText(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** SQL NULL gets the `null` key, so it never collides with a value spelled `(null)`. */
export function bucketKey(value: unknown): string | null {
  return value === null || value === undefined ? null : valueText(value);
}

export function countValue(row: QueryRow, column: string, sql: string): number {
  const raw = row[column];
  const n = typeof raw === 'number' || typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(n)) {
    throw new Error(`Query returned a non-integer ${column} (${JSON.stringify(raw)}):\n${sql}`);
  }
  return n;
}

/** Values that print alike (`2019` and `"2019"`) share one bucket. */
export function parseGroupStats(rows: QueryRow[], sql: string): Map<string | null, GroupStat> {
  const stats = new Map<string | null, GroupStat>();
  for (const row of rows) {
    const key = bucketKey(row.grouped);
    const numRows = countValue(row, 'cnt', sql);
    const seen = stats.get(key);
    if (seen) {
      seen.numRows += numRows;
    } else {
      stats.set(key, { key, numRows });
    }
  }
  return stats;
}

export function loadTable(ctx: RunContext, table: Table): void {
  const info = ctx.warehouse.show(table.name);
  table.fields = flattenFields(info.fields, table);
  table.description = info.description;
  table.numRows = info.numRows;
  table.numBytes = info.numBytes;

  if (info.lastModifiedTime !== null) {
    table.lastUpdated = msToDate(info.lastModifiedTime);
    const dataset = table.dataset;
    if (dataset.lastUpdated === null || dataset.lastUpdated < table.lastUpdated) {
      dataset.lastUpdated = table.lastUpdated;
    }
  }

  const column = ctx.config.groups.get(table.name);
  if (column !== undefined) {
    table.groupBy = column;
    const sql = groupStatsSql(table.name, column);
    table.groupStats = parseGroupStats(ctx.warehouse.query(sql), sql);
  }
}

export function loadSchemas(ctx: RunContext): void {
  for (const dataset of ctx.datasets.values()) {
    for (const table of dataset.tables) {
      if (table.isOldVersion) {
        ctx.log(`  Skipping old table ${table.name}`);
        continue;
      }
      ctx.log(`  Loading table ${table.name}`);
      loadTable(ctx, table);
    }
  }
}

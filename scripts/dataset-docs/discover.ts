import type { RunContext } from './context';
import { matchesWildcard } from './patterns';
import type { Dataset, Table } from './types';

/** Split `dataset_id.table_pattern` at the last dot; project ids may contain dots. */
export function splitTableEntry(entry: string): { datasetId: string; tablePattern: string } {
  const dot = entry.lastIndexOf('.');
  if (dot <= 0 || dot === entry.length - 1) {
    throw new Error(`Table entry "${entry}" is not of the form dataset.table`);
  }
  return { datasetId: entry.slice(0, dot), tablePattern: entry.slice(dot + 1) };
}

export function newTable(name: string, dataset: Dataset, datasetDescription: string): Table {
  return {
    name,
    version: null,
    isOldVersion: false,
    dataset,
    datasetDescription,
    description: '',
    fields: [],
    lastUpdated: null,
    numRows: null,
    numBytes: null,
    groupBy: null,
    groupStats: null,
    fromJoins: [],
  };
}

/** List the warehouse tables matching each configured entry. */
export function discoverTables(ctx: RunContext): void {
  for (const [logicalName, entries] of ctx.config.tables) {
    let dataset = ctx.datasets.get(logicalName);
    if (!dataset) {
      dataset = { name: logicalName, lastUpdated: null, tables: [] };
      ctx.datasets.set(logicalName, dataset);
    }

    for (const entry of entries) {
      const { datasetId, tablePattern } = splitTableEntry(entry);
      const datasetInfo = ctx.warehouse.show(datasetId);

      ctx.log(`  Loading dataset ${datasetId}`);
      for (const tableId of ctx.warehouse.listTables(datasetId)) {
        if (!matchesWildcard(tablePattern, tableId)) continue;
        const table = newTable(`${datasetId}.${tableId}`, dataset, datasetInfo.description);
        dataset.tables.push(table);
        ctx.log(`    ${table.name}`);
      }
    }
  }
}

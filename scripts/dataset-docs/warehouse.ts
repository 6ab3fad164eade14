/**
 * Warehouse gateway.
 *
 * The pipeline only talks to the `Warehouse` interface. `BqCliWarehouse`
 * backs it with the `bq` command-line tool, run with `--format=prettyjson`
 * so every response is JSON on stdout.
 */

import { execFileSync } from 'child_process';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchemaField {
  name: string;
  type: string;
  mode: string;
  description: string;
  fields: SchemaField[];
}

export interface ResourceInfo {
  description: string;
  fields: SchemaField[];
  /** Milliseconds since the epoch. */
  lastModifiedTime: number | null;
  numRows: number | null;
  numBytes: number | null;
}

export type QueryRow = Record<string, unknown>;

export interface Warehouse {
  /** Table ids of a dataset, in listing order. */
  listTables(datasetId: string): string[];
  /** Metadata for a dataset (`dataset_id`) or table (`dataset_id.table_id`). */
  show(ref: string): ResourceInfo;
  query(sql: string): QueryRow[];
}

/** Runs an executable with arguments and returns its stdout. */
export type CommandRunner = (file: string, args: string[]) => string;

// ---------------------------------------------------------------------------
// Response validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/** bq encodes int64 values as strings. */
export function optionalNumber(value: unknown, what: string): number | null {
  if (value === undefined || value === null || value === '') return null;
  const n = typeof value === 'number' || typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    throw new Error(`Malformed ${what}: ${JSON.stringify(value)}`);
  }
  return n;
}

export function parseSchemaFields(value: unknown, where: string): SchemaField[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`${where}: schema fields must be a list`);
  }
  return value.map((raw: unknown) => {
    if (!isRecord(raw) || typeof raw.name !== 'string') {
      throw new Error(`${where}: schema field without a name`);
    }
    return {
      name: raw.name,
      type: optionalString(raw.type),
      mode: optionalString(raw.mode),
      description: optionalString(raw.description),
      fields: parseSchemaFields(raw.fields, `${where}.${raw.name}`),
    };
  });
}

export function parseTableList(value: unknown, datasetId: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`Unexpected table listing for ${datasetId}: expected a list`);
  }
  return value.map((entry: unknown) => {
    const ref = isRecord(entry) ? entry.tableReference : undefined;
    if (!isRecord(ref) || typeof ref.tableId !== 'string') {
      throw new Error(`Unexpected table listing for ${datasetId}: entry without tableReference.tableId`);
    }
    return ref.tableId;
  });
}

export function parseResourceInfo(value: unknown, ref: string): ResourceInfo {
  if (!isRecord(value)) {
    throw new Error(`Unexpected metadata for ${ref}: expected an object`);
  }
  const schema = value.schema;
  if (schema !== undefined && !isRecord(schema)) {
    throw new Error(`Unexpected metadata for ${ref}: schema must be an object`);
  }
  return {
    description: optionalString(value.description),
    fields: schema ? parseSchemaFields(schema.fields, ref) : [],
    lastModifiedTime: optionalNumber(value.lastModifiedTime, `lastModifiedTime of ${ref}`),
    numRows: optionalNumber(value.numRows, `numRows of ${ref}`),
    numBytes: optionalNumber(value.numBytes, `numBytes of ${ref}`),
  };
}

export function parseQueryRows(value: unknown): QueryRow[] {
  // bq prints nothing at all for an empty result set.
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new Error('Unexpected query result: expected a list of rows');
  }
  return value;
}

// ---------------------------------------------------------------------------
// bq CLI
// ---------------------------------------------------------------------------

export interface BqCliOptions {
  projectId: string;
  maxRows: number;
  bin?: string;
  run?: CommandRunner;
}

const runCommand: CommandRunner = (file, args) =>
  execFileSync(file, args, {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
    maxBuffer: 256 * 1024 * 1024,
  });

export class BqCliWarehouse implements Warehouse {
  private readonly bin: string;
  private readonly run: CommandRunner;

  constructor(private readonly options: BqCliOptions) {
    this.bin = options.bin ?? 'bq';
    this.run = options.run ?? runCommand;
  }

  listTables(datasetId: string): string[] {
    return parseTableList(this.exec(['ls', '-n', String(this.options.maxRows), datasetId]), datasetId);
  }

  show(ref: string): ResourceInfo {
    return parseResourceInfo(this.exec(['show', ref]), ref);
  }

  query(sql: string): QueryRow[] {
    return parseQueryRows(
      this.exec(['query', '--use_legacy_sql=false', `--max_rows=${this.options.maxRows}`, sql])
    );
  }

  private exec(args: string[]): unknown {
    const fullArgs = ['--format=prettyjson', '--project_id', this.options.projectId, ...args];
    const cmd = `${this.bin} ${fullArgs.join(' ')}`;
    let stdout: string;
    try {
      stdout = this.run(this.bin, fullArgs);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Command failed: ${cmd}\n${message}`);
    }
    if (stdout.trim() === '') return undefined;
    try {
      return JSON.parse(stdout);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Command returned invalid JSON: ${cmd}\n${message}`);
    }
  }
}

/** `project:dataset.table` → `project.dataset.table` for use inside SQL. */
export function sqlTableRef(table: string): string {
  return table.replace(/:/g, '.');
}

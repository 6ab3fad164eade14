/**
 * Object graph built by a documentation run.
 *
 * Back-references (Field.table, Table.dataset, Join.fromField/toField) are
 * plain object references into the same graph; nothing here owns anything
 * it points back to.
 */

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface DocsConfig {
  /** Logical dataset name → `dataset_id.table_pattern` entries. */
  tables: Map<string, string[]>;
  /** Fully-qualified table name → group-by column. */
  groups: Map<string, string>;
  /** Join group name → `table_pattern|column_pattern` entries. */
  joins: Map<string, string[]>;
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

export interface Dataset {
  name: string;
  /** Max `lastUpdated` over the dataset's loaded tables. */
  lastUpdated: string | null;
  tables: Table[];
}

export interface Table {
  /** `dataset_id.table_id` */
  name: string;
  version: string | null;
  isOldVersion: boolean;
  dataset: Dataset;
  datasetDescription: string;
  description: string;
  fields: Field[];
  lastUpdated: string | null;
  numRows: number | null;
  numBytes: number | null;
  /** Configured group-by column, if any. */
  groupBy: string | null;
  /** Row counts per group-by value (`null` key for SQL NULL); null when no group-by column is configured. */
  groupStats: Map<string | null, GroupStat> | null;
  /** Outgoing joins only. */
  fromJoins: Join[];
}

export interface Field {
  /** Dot-qualified for nested schema fields. */
  name: string;
  table: Table;
  description: string;
  type: string;
  mode: string;
  fromJoins: Join[];
  toJoins: Join[];
}

export interface Join {
  /** Join group name; shared by every pair of the group. */
  name: string;
  fromField: Field;
  toField: Field;
  /** Bucket key (group-by value, `null` for SQL NULL, or `all`) → statistics. */
  stats: Map<string | null, JoinStat>;
  sql: string;
  /** Null when the from table has no rows. */
  percent: number | null;
  numRows: number;
}

/** Match statistics for one bucket of a join. */
export interface JoinStat {
  key: string | null;
  percent: number | null;
  numRows: number;
  totalRows: number;
  sampleValues: string[];
}

/** Row count for one group-by value of a table. */
export interface GroupStat {
  key: string | null;
  numRows: number;
}

export const ALL_BUCKET = 'all';

import type { Dataset, DocsConfig } from './types';
import type { Warehouse } from './warehouse';

/**
 * State of a single documentation run, passed explicitly through each
 * phase: discovery, schema loading, then joins.
 */
export interface RunContext {
  config: DocsConfig;
  warehouse: Warehouse;
  /** Logical dataset name → dataset, in config order. */
  datasets: Map<string, Dataset>;
  /** Order-independent keys of table|column pairs already joined. */
  joinsDone: Set<string>;
  log: (message: string) => void;
}

export function createContext(
  config: DocsConfig,
  warehouse: Warehouse,
  log: (message: string) => void = console.log,
): RunContext {
  return { config, warehouse, datasets: new Map(), joinsDone: new Set(), log };
}

/**
 * generate-dataset-docs.ts
 *
 * Generates Markdown documentation for the warehouse tables listed in one or
 * more JSON config files: schemas, row counts, per-group row counts and join
 * coverage between configured columns.
 *
 * Outputs (in --output_dir):
 *   - index.md                 — every dataset with its tables and joins
 *   - dataset_<name>.md        — one page per logical dataset
 *   - <page>.md.<format>       — for each of --formats (xlsx in-process, others via pandoc)
 *
 * Usage:
 *   tsx scripts/generate-dataset-docs.ts --project_id my-project \
 *     --configs config/dataset_example.json --output_dir ../tables [--formats pdf,xlsx]
 *
 * Environment:
 *   BQ_BIN      warehouse CLI executable (default: bq)
 *   PANDOC_BIN  converter executable (default: pandoc)
 */

import { parseCliArgs } from './dataset-docs/cli';
import type { CliOptions } from './dataset-docs/cli';
import { loadConfigs } from './dataset-docs/config';
import { createContext } from './dataset-docs/context';
import { buildGraph, writeReports } from './dataset-docs/pipeline';
import { BqCliWarehouse } from './dataset-docs/warehouse';

function readOptions(): CliOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const startTime = Date.now();
  console.log('=== Dataset Docs: Generate Pages ===\n');

  const options = readOptions();

  const config = await loadConfigs(options.configs, console.log);
  console.log(
    `Loaded: ${config.tables.size} datasets, ${config.groups.size} group-by columns, ${config.joins.size} join groups\n`
  );

  const warehouse = new BqCliWarehouse({
    projectId: options.projectId,
    maxRows: options.maxRows,
    bin: process.env.BQ_BIN,
  });
  const ctx = createContext(config, warehouse, console.log);

  buildGraph(ctx);

  console.log('Writing pages...');
  const written = await writeReports(ctx, {
    outputDir: options.outputDir,
    projectId: options.projectId,
    formats: options.formats,
    pandocBin: process.env.PANDOC_BIN,
  });

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\nWrote ${written.length} files. Done in ${elapsed}s`);
}

main().catch((err) => {
  console.error('Fatal error generating dataset docs:', err);
  process.exit(1);
});

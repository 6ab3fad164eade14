/**
 * One documentation run, phase by phase: discover tables, mark old
 * versions, load schemas and stats, resolve joins, then write pages.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { RunContext } from './context';
import { discoverTables } from './discover';
import { convertFile } from './formats';
import { resolveJoins } from './joins';
import { datasetFileName, renderDataset, renderIndex } from './render';
import { loadSchemas } from './schema';
import { markOldVersions } from './versions';

export function buildGraph(ctx: RunContext): void {
  ctx.log('Discovering tables...');
  discoverTables(ctx);
  markOldVersions(ctx);

  ctx.log('Loading schemas...');
  loadSchemas(ctx);

  ctx.log('Computing joins...');
  const joins = resolveJoins(ctx);
  ctx.log(`  ${joins.length} joins computed`);
}

export interface WriteOptions {
  outputDir: string;
  projectId: string;
  formats: string[];
  pandocBin?: string;
}

/** Write `index.md` and every `dataset_<name>.md`; returns the paths written. */
export async function writeReports(ctx: RunContext, options: WriteOptions): Promise<string[]> {
  await fs.mkdir(options.outputDir, { recursive: true });
  const datasets = [...ctx.datasets.values()];
  const convert = { formats: options.formats, pandocBin: options.pandocBin, log: ctx.log };
  const written: string[] = [];

  const indexPath = path.join(options.outputDir, 'index.md');
  await fs.writeFile(indexPath, renderIndex(datasets, options.projectId), 'utf-8');
  ctx.log(`  Writing ${indexPath}`);
  written.push(indexPath, ...convertFile(indexPath, datasets, convert));

  for (const dataset of datasets) {
    const pagePath = path.join(options.outputDir, datasetFileName(dataset));
    await fs.writeFile(pagePath, renderDataset(dataset, options.projectId), 'utf-8');
    ctx.log(`  Writing ${pagePath}`);
    written.push(pagePath, ...convertFile(pagePath, [dataset], convert));
  }
  return written;
}

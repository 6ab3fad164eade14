/**
 * Config loading.
 *
 * Each config file may carry any of three top-level keys:
 *
 *   {
 *     "tables": { "<logical name>": ["dataset_id.table_pattern", ...] },
 *     "groups": { "dataset_id.table_id": "group_by_column" },
 *     "joins":  { "<join group>": ["+dataset_id.table_pattern|column_pattern", ...] }
 *   }
 *
 * Later files append to `tables` and `joins` entries of the same key and
 * overwrite `groups` entries.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { DocsConfig } from './types';

export interface ConfigSource {
  name: string;
  text: string;
}

export function emptyConfig(): DocsConfig {
  return { tables: new Map(), groups: new Map(), joins: new Map() };
}

/** Expand a leading `~` to the home directory. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`${where}: expected a list of strings`);
  }
  return value;
}

function section(doc: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = doc[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`${source}: "${key}" must be an object`);
  }
  return value;
}

function appendTo(target: Map<string, string[]>, key: string, values: string[]): void {
  const existing = target.get(key);
  if (existing) {
    existing.push(...values);
  } else {
    target.set(key, [...values]);
  }
}

/** Fold one parsed config document into `config`. */
export function mergeConfig(config: DocsConfig, doc: unknown, source: string): DocsConfig {
  if (!isRecord(doc)) {
    throw new Error(`${source}: config must be a JSON object`);
  }

  for (const [name, entries] of Object.entries(section(doc, 'tables', source))) {
    const list = stringList(entries, `${source}: tables["${name}"]`);
    for (const entry of list) {
      if (!entry.includes('.')) {
        throw new Error(`${source}: tables["${name}"] entry "${entry}" is not of the form dataset.table`);
      }
    }
    appendTo(config.tables, name, list);
  }

  for (const [table, column] of Object.entries(section(doc, 'groups', source))) {
    if (typeof column !== 'string') {
      throw new Error(`${source}: groups["${table}"] must be a column name`);
    }
    config.groups.set(table, column);
  }

  for (const [name, entries] of Object.entries(section(doc, 'joins', source))) {
    const list = stringList(entries, `${source}: joins["${name}"]`);
    for (const entry of list) {
      if (entry.split('|').length !== 2) {
        throw new Error(`${source}: joins["${name}"] entry "${entry}" is not of the form table|column`);
      }
    }
    appendTo(config.joins, name, list);
  }

  return config;
}

export function parseConfigs(sources: ConfigSource[]): DocsConfig {
  const config = emptyConfig();
  for (const { name, text } of sources) {
    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(
        `Error parsing JSON in ${name} (this is usually caused by a trailing comma): ${message}`
      );
    }
    mergeConfig(config, doc, name);
  }
  return config;
}

export async function loadConfigs(
  files: string[],
  log: (message: string) => void,
): Promise<DocsConfig> {
  const sources: ConfigSource[] = [];
  for (const file of files) {
    log(`Reading config ${file}`);
    sources.push({ name: file, text: await fs.readFile(expandHome(file), 'utf-8') });
  }
  return parseConfigs(sources);
}

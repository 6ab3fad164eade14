/**
 * Table version families.
 *
 * `ds.events_3` and `ds.events_4` share the base name `ds.events`; only the
 * lexicographically greatest member of a family is documented in full, the
 * rest are listed as old versions. The version token must end the table id;
 * the dataset part of the name is never searched, so `sales_2020.orders` is
 * unversioned.
 *
 * Known limitation: names are compared as strings, so `_10` sorts before
 * `_9` and `ds.t_9` wins over `ds.t_10`.
 */

import type { RunContext } from './context';

/** Table id ending in `_`, an optional `v`, then digits followed by any alphanumerics. */
const VERSION_PATTERN = /^(.+)_(v?[0-9]+[0-9a-zA-Z]*)$/;

export interface VersionInfo {
  base: string;
  version: string | null;
  isOldVersion: boolean;
}

export function parseVersion(name: string): { base: string; version: string | null } {
  const dot = name.lastIndexOf('.');
  const m = VERSION_PATTERN.exec(name.slice(dot + 1));
  return m ? { base: name.slice(0, dot + 1) + m[1], version: m[2] } : { base: name, version: null };
}

export function resolveVersions(names: string[]): Map<string, VersionInfo> {
  const parsed = names.map((name) => ({ name, ...parseVersion(name) }));

  // An unversioned table named like a family's base always wins the family.
  const latestByBase = new Map<string, string>();
  for (const p of parsed) {
    if (p.version === null) latestByBase.set(p.name, p.name);
  }
  const unversioned = new Set(latestByBase.keys());

  for (const p of parsed) {
    if (p.version === null || unversioned.has(p.base)) continue;
    const current = latestByBase.get(p.base);
    if (current === undefined || current < p.name) {
      latestByBase.set(p.base, p.name);
    }
  }

  const latest = new Set(latestByBase.values());
  const result = new Map<string, VersionInfo>();
  for (const p of parsed) {
    result.set(p.name, { base: p.base, version: p.version, isOldVersion: !latest.has(p.name) });
  }
  return result;
}

/** Set `version` and `isOldVersion` on every discovered table. */
export function markOldVersions(ctx: RunContext): void {
  const tables = [...ctx.datasets.values()].flatMap((d) => d.tables);
  const versions = resolveVersions(tables.map((t) => t.name));
  for (const table of tables) {
    const info = versions.get(table.name);
    if (!info) continue;
    table.version = info.version;
    table.isOldVersion = info.isOldVersion;
  }
}

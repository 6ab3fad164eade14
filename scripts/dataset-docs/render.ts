/**
 * Markdown pages: `index.md` for all datasets and one `dataset_<name>.md`
 * per logical dataset. Both carry pandoc front matter so they convert to PDF
 * with sane margins.
 */

import type { Dataset, Field, Join, Table } from './types';

const FRONT_MATTER = ['---', 'geometry: margin=0.6in', '---', ''];

// ── Formatting helpers ───────────────────────────────────────────────────────

export function formatCount(n: number | null): string {
  return n === null ? '' : n.toLocaleString('en-US');
}

const SIZE_UNITS = ['kB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'];

/** Decimal units: `1 Byte`, `999 Bytes`, `1.2 kB`, `3.0 MB`. */
export function formatBytes(n: number | null): string {
  if (n === null) return '';
  if (n === 1) return '1 Byte';
  if (n < 1000) return `${Math.trunc(n)} Bytes`;
  let unit = 1000;
  for (const prefix of SIZE_UNITS) {
    unit *= 1000;
    if (n < unit || prefix === 'YB') {
      return `${((1000 * n) / unit).toFixed(1)} ${prefix}`;
    }
  }
  return `${n} Bytes`;
}

export function formatPercent(p: number | null): string {
  return p === null ? 'n/a' : `${(100 * p).toFixed(2)}%`;
}

/** SQL NULL prints as italic *null*, apart from any value spelled `null`. */
export function formatKey(key: string | null): string {
  return key === null ? '*null*' : `\`${key}\``;
}

export function blockquote(text: string): string {
  return `> ${text.replace(/\n/g, '\n> ')}`;
}

export function datasetFileName(dataset: Dataset): string {
  return `dataset_${dataset.name}.md`;
}

/** Cloud console link for `[project:]dataset.table`. */
export function tableUrl(tableName: string, projectId: string): string {
  const colon = tableName.indexOf(':');
  const project = colon === -1 ? projectId : tableName.slice(0, colon);
  const rest = colon === -1 ? tableName : tableName.slice(colon + 1);
  const dot = rest.lastIndexOf('.');
  const params = new URLSearchParams({
    p: project,
    d: rest.slice(0, dot),
    t: rest.slice(dot + 1),
    page: 'table',
  });
  return `https://console.cloud.google.com/bigquery?${params.toString()}`;
}

/** Distinct join names of a table's outgoing joins, sorted. */
export function joinNames(table: Table): string[] {
  return [...new Set(table.fromJoins.map((j) => j.name))].sort();
}

// ── index.md ─────────────────────────────────────────────────────────────────

export function renderIndex(datasets: Iterable<Dataset>, projectId: string): string {
  const lines = [...FRONT_MATTER, '# Datasets', ''];
  for (const dataset of datasets) {
    lines.push(
      `## [${dataset.name}](${datasetFileName(dataset)})`,
      '',
      '| Name | Last updated | Rows | Joins |',
      '|-------------------------------------------|-------|--------|-----------------|',
    );
    for (const table of dataset.tables) {
      lines.push(
        `| [${table.name}](${tableUrl(table.name, projectId)}) | ${table.lastUpdated ?? ''} | ` +
        `${formatCount(table.numRows)} | ${joinNames(table).join(' ')} |`
      );
    }
    lines.push('');
  }
  return lines.join('\n');
}

// ── dataset_<name>.md ────────────────────────────────────────────────────────

function renderField(field: Field): string[] {
  const head = [`\`${field.name}\``, field.type, field.mode].filter((s) => s !== '').join(' ');
  const joins = field.fromJoins.length > 0 ? ` joins on **${field.fromJoins[0].name}**` : '';
  const lines = [`* ${head}${joins}`];
  if (field.description) {
    lines.push(`    ${blockquote(field.description).replace(/\n/g, '\n    ')}`);
  }
  return lines;
}

function joinSummary(join: Join): string {
  return `**${join.name}** (${formatPercent(join.percent)}, ${formatCount(join.numRows)} rows)`;
}

function renderOutgoingJoin(join: Join): string[] {
  const lines = [
    `joins to \`${join.toField.table.name}::${join.toField.name}\` on ${joinSummary(join)}`,
    '',
    '| Key | Percent | Rows | Sample values |',
    '|------|-----|--------|--------------------------------------------------------|',
  ];
  for (const stat of join.stats.values()) {
    const percent = stat.percent === null || stat.percent > 0 ? formatPercent(stat.percent) : '*none*';
    lines.push(
      `| ${formatKey(stat.key)} | ${percent} | ${formatCount(stat.numRows)} | \`${stat.sampleValues.join(', ')}\` |`
    );
  }
  lines.push('', ...join.sql.split('\n').map((l) => `    ${l}`), '');
  return lines;
}

function renderTable(table: Table, projectId: string): string[] {
  const lines = ['*****', `## ${table.name}`, ''];

  if (table.isOldVersion) {
    lines.push(`Old table version \`${table.version ?? ''}\`, schema skipped.`, '');
    return lines;
  }
  if (table.datasetDescription) lines.push(blockquote(table.datasetDescription), '');
  if (table.description) lines.push(blockquote(table.description), '');
  if (table.fields.length === 0) return lines;

  lines.push(
    '| Stat | Value |',
    '|----------|----------|',
    `| Last updated | ${table.lastUpdated ?? ''} |`,
    `| Rows | ${formatCount(table.numRows)} |`,
    `| Size | ${formatBytes(table.numBytes)} |`,
    '',
  );

  if (table.groupBy !== null && table.groupStats) {
    lines.push(`### Rows by \`${table.groupBy}\``, '', '| Value | Rows |', '|------|--------|');
    for (const stat of table.groupStats.values()) {
      lines.push(`| ${formatKey(stat.key)} | ${formatCount(stat.numRows)} |`);
    }
    lines.push('');
  }

  lines.push('### Schema', `[View in BigQuery](${tableUrl(table.name, projectId)})`, '');
  for (const field of table.fields) lines.push(...renderField(field));
  lines.push('');

  const joinFields = table.fields.filter((f) => f.fromJoins.length > 0 || f.toJoins.length > 0);
  if (joinFields.length > 0) {
    lines.push('### Join columns', '');
    for (const field of joinFields) {
      lines.push(`#### ${field.name}`, '');
      for (const join of field.fromJoins) lines.push(...renderOutgoingJoin(join));
      for (const join of field.toJoins) {
        lines.push(
          `joins from \`${join.fromField.table.name}::${join.fromField.name}\` on ${joinSummary(join)}`,
          '',
        );
      }
    }
  }
  return lines;
}

export function renderDataset(dataset: Dataset, projectId: string): string {
  const lines = [...FRONT_MATTER, `# ${dataset.name}`, ''];
  for (const table of dataset.tables) lines.push(...renderTable(table, projectId));
  return lines.join('\n');
}

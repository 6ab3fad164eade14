/**
 * Extra output formats for rendered pages.
 *
 * `xlsx` is written in-process as a workbook summary of the page's datasets;
 * any other format is handed to pandoc.
 */

import { execFileSync } from 'child_process';
import * as XLSX from 'xlsx';
import { joinNames } from './render';
import type { Dataset } from './types';
import type { CommandRunner } from './warehouse';

export interface ConvertOptions {
  formats: string[];
  pandocBin?: string;
  run?: CommandRunner;
  log: (message: string) => void;
}

interface TableRow {
  Dataset: string;
  Table: string;
  Version: string;
  'Old version': string;
  'Last updated': string;
  Rows: number | string;
  Bytes: number | string;
  Joins: string;
}

interface JoinRow {
  Join: string;
  From: string;
  To: string;
  Bucket: string;
  Percent: number | string;
  'Matched rows': number;
  'Sample values': string;
}

export function parseFormats(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((f) => f.trim())
    .filter((f) => f !== '');
}

export function buildWorkbook(datasets: Dataset[]): XLSX.WorkBook {
  const tableRows: TableRow[] = [];
  const joinRows: JoinRow[] = [];

  for (const dataset of datasets) {
    for (const table of dataset.tables) {
      tableRows.push({
        Dataset: dataset.name,
        Table: table.name,
        Version: table.version ?? '',
        'Old version': table.isOldVersion ? 'yes' : 'no',
        'Last updated': table.lastUpdated ?? '',
        Rows: table.numRows ?? '',
        Bytes: table.numBytes ?? '',
        Joins: joinNames(table).join(' '),
      });

      for (const join of table.fromJoins) {
        for (const stat of join.stats.values()) {
          joinRows.push({
            Join: join.name,
            From: `${join.fromField.table.name}|${join.fromField.name}`,
            To: `${join.toField.table.name}|${join.toField.name}`,
            Bucket: stat.key ?? 'NULL',
            Percent: stat.percent ?? '',
            'Matched rows': stat.numRows,
            'Sample values': stat.sampleValues.join(', '),
          });
        }
      }
    }
  }

  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(tableRows), 'Tables');
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(joinRows), 'Joins');
  return wb;
}

const runCommand: CommandRunner = (file, args) =>
  execFileSync(file, args, { encoding: 'utf-8', stdio: ['pipe', 'pipe', 'pipe'] });

/** Write `<file>.<format>` for every requested format. */
export function convertFile(file: string, datasets: Dataset[], options: ConvertOptions): string[] {
  const written: string[] = [];
  for (const format of options.formats) {
    const output = `${file}.${format}`;
    if (format === 'xlsx') {
      XLSX.writeFile(buildWorkbook(datasets), output);
    } else {
      const bin = options.pandocBin ?? 'pandoc';
      const args = [file, '--from', 'markdown', '-s', '-o', output];
      try {
        (options.run ?? runCommand)(bin, args);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Command failed: ${bin} ${args.join(' ')}\n${message}`);
      }
    }
    options.log(`  Writing ${output}`);
    written.push(output);
  }
  return written;
}

import { expandHome } from './config';
import { parseFormats } from './formats';

export interface CliOptions {
  projectId: string;
  configs: string[];
  outputDir: string;
  formats: string[];
  maxRows: number;
}

export const DEFAULT_MAX_ROWS = 100_000;

/**
 * Parse `--flag value` style arguments. `--configs` takes every value up to
 * the next flag; `--flag=value` is accepted too.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = new Map<string, string[]>();
  let current: string[] | null = null;

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      current = values.get(flag) ?? [];
      values.set(flag, current);
      if (eq !== -1) current.push(arg.slice(eq + 1));
    } else if (current) {
      current.push(arg);
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  const single = (flag: string): string | null => {
    const v = values.get(flag);
    if (!v || v.length === 0) return null;
    if (v.length > 1) throw new Error(`--${flag} takes a single value`);
    return v[0];
  };
  const required = (flag: string): string => {
    const v = single(flag);
    if (v === null) throw new Error(`--${flag} is required`);
    return v;
  };

  const projectId = required('project_id');
  const outputDir = required('output_dir');
  const configs = values.get('configs') ?? [];
  if (configs.length === 0) throw new Error('--configs is required');

  const maxRowsArg = single('max_rows');
  const maxRows = maxRowsArg === null ? DEFAULT_MAX_ROWS : Number(maxRowsArg);
  if (!Number.isInteger(maxRows) || maxRows <= 0) {
    throw new Error(`--max_rows must be a positive integer, got "${maxRowsArg}"`);
  }

  return {
    projectId,
    configs,
    outputDir: expandHome(outputDir),
    formats: parseFormats(single('formats')),
    maxRows,
  };
}

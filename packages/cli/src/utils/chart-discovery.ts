/**
 * Chart Discovery
 *
 * A chart is any directory holding a Chart.yaml. Subcharts (charts/<name>/)
 * are charts too.
 */

import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

export const CHART_FILE_NAME = 'Chart.yaml';

const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(['node_modules']);

function isSearchable(name: string): boolean {
  return !name.startsWith('.') && !SKIPPED_DIRECTORIES.has(name);
}

async function collectCharts(dir: string, charts: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  if (entries.some((entry) => entry.isFile() && entry.name === CHART_FILE_NAME)) {
    charts.push(dir);
  }

  for (const entry of entries) {
    if (entry.isDirectory() && isSearchable(entry.name)) {
      await collectCharts(join(dir, entry.name), charts);
    }
  }
}

/**
 * Absolute paths of every chart directory below `searchRoot`, sorted
 *
 * @throws when `searchRoot` cannot be read
 */
export async function discoverCharts(searchRoot: string): Promise<string[]> {
  const charts: string[] = [];
  await collectCharts(resolve(searchRoot), charts);
  return charts.sort();
}

/**
 * First candidate values file that exists in the chart
 */
export function findValuesFile(chartDir: string, candidates: readonly string[]): string | undefined {
  for (const name of candidates) {
    const candidate = join(chartDir, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

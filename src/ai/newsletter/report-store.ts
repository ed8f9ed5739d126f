/**
 * Report Store
 *
 * Writes each generated report to its own timestamped file.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { REPORT_CONFIG } from './config';
import { systemClock, type Clock } from './types';

export interface SaveReportOptions {
  /** Default: REPORT_CONFIG.DEFAULT_OUTPUT_DIR, relative to the working directory */
  readonly outputDir?: string;
  readonly clock?: Clock;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD-HHmmss` in local time.
 */
export function formatReportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function buildReportFileName(date: Date): string {
  return `${REPORT_CONFIG.FILE_PREFIX}-${formatReportTimestamp(date)}.${REPORT_CONFIG.FILE_EXTENSION}`;
}

/**
 * Saves the report, creating the output directory if needed.
 *
 * @returns Absolute path of the written file
 */
export async function saveReport(report: string, options: SaveReportOptions = {}): Promise<string> {
  const clock = options.clock ?? systemClock;
  const outputDir = path.resolve(options.outputDir ?? REPORT_CONFIG.DEFAULT_OUTPUT_DIR);
  const filePath = path.join(outputDir, buildReportFileName(new Date(clock.now())));

  await mkdir(outputDir, { recursive: true });
  await writeFile(filePath, report.endsWith('\n') ? report : `${report}\n`, 'utf-8');
  return filePath;
}

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { buildReportFileName, formatReportTimestamp, saveReport } from '../../../src/ai/newsletter/report-store';
import { createMockClock } from '../../../src/ai/newsletter/types';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'newsletter-reports-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

// Local-time date so the expectations hold in any timezone
const LOCAL_DATE = new Date(2025, 0, 5, 9, 7, 3);

describe('formatReportTimestamp', () => {
  it('zero-pads every field', () => {
    expect(formatReportTimestamp(LOCAL_DATE)).toBe('20250105-090703');
  });
});

describe('buildReportFileName', () => {
  it('uses the newsletter prefix and markdown extension', () => {
    expect(buildReportFileName(LOCAL_DATE)).toBe('newsletter-20250105-090703.md');
  });
});

describe('saveReport', () => {
  it('writes the report under a timestamped name, creating directories', async () => {
    const outputDir = path.join(tempDir, 'outputs', 'weekly');
    const clock = createMockClock(LOCAL_DATE.getTime());

    const filePath = await saveReport('# Issue 1', { outputDir, clock });

    expect(filePath).toBe(path.join(outputDir, 'newsletter-20250105-090703.md'));
    expect(await readFile(filePath, 'utf-8')).toBe('# Issue 1\n');
  });

  it('does not double the trailing newline', async () => {
    const filePath = await saveReport('# Issue 2\n', {
      outputDir: tempDir,
      clock: createMockClock(LOCAL_DATE.getTime()),
    });

    expect(await readFile(filePath, 'utf-8')).toBe('# Issue 2\n');
  });

  it('keeps earlier reports', async () => {
    const first = await saveReport('first', { outputDir: tempDir, clock: createMockClock(LOCAL_DATE.getTime()) });
    const second = await saveReport('second', {
      outputDir: tempDir,
      clock: createMockClock(LOCAL_DATE.getTime() + 1_000),
    });

    expect(first).not.toBe(second);
    expect(await readFile(first, 'utf-8')).toBe('first\n');
    expect(await readFile(second, 'utf-8')).toBe('second\n');
  });
});

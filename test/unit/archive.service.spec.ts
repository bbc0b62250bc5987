import { mkdtemp, readFile, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import dayjs from 'dayjs';
import { ArchiveService } from '../../src/services/ArchiveService';
import type { MatchReport } from '../../src/types';

const report: MatchReport = {
  results: [
    {
      billboardId: 'beatles--hey-jude',
      externalId: '0003',
      externalSource: 'mcgill',
      score: 1,
      matchedAt: '2024-05-01T12:00:00.000Z',
      explanation: 'exact title match',
    },
  ],
  unmatched: [
    {
      externalId: '12',
      externalSource: 'mcgill',
      reason: 'invalid',
      detail: 'missing title; missing artist',
    },
    {
      externalId: 'b-1970-04',
      externalSource: 'bimmuda',
      reason: 'below-threshold',
      bestScore: 0.7,
      detail: 'closest: beatles--let-it-be',
    },
  ],
  summary: {
    processed: 3,
    matched: 1,
    unmatched: 1,
    invalid: 1,
    bySource: {
      mcgill: { processed: 2, matched: 1, unmatched: 0, invalid: 1 },
      bimmuda: { processed: 1, matched: 0, unmatched: 1, invalid: 0 },
    },
    billboardSongs: 3,
    startedAt: '2024-05-01T12:00:00.000Z',
    finishedAt: '2024-05-01T12:00:01.000Z',
    status: 'completed',
  },
};

describe('ArchiveService', () => {
  let basePath: string;

  beforeEach(async () => {
    basePath = await mkdtemp(join(tmpdir(), 'chart-crosslink-'));
  });

  afterEach(async () => {
    await rm(basePath, { recursive: true, force: true });
  });

  it('writes the report as JSON and a Markdown audit table', async () => {
    const archive = new ArchiveService({ enabled: true, basePath, dryRun: false });

    const written = await archive.write(report);

    const started = dayjs(report.summary.startedAt);
    const dir = join(basePath, started.format('YYYY'), started.format('MM'));
    const baseName = `${started.format('YYYY-MM-DD-HHmmss')}-matches`;
    expect(written).toEqual({
      jsonPath: join(dir, `${baseName}.json`),
      markdownPath: join(dir, `${baseName}.md`),
    });

    const json: unknown = JSON.parse(await readFile(join(dir, `${baseName}.json`), 'utf8'));
    expect(json).toEqual(report);

    const markdown = await readFile(join(dir, `${baseName}.md`), 'utf8');
    const lines = markdown.split('\n');
    expect(lines).toContain('| mcgill | 0003 | beatles--hey-jude | 1.000 | exact title match |');
    expect(lines).toContain('| mcgill | 12 | invalid | - | missing title; missing artist |');
    expect(lines).toContain(
      '| bimmuda | b-1970-04 | below-threshold | 0.700 | closest: beatles--let-it-be |'
    );
    expect(lines).toContain('| Matched | 1 |');
  });

  it('writes nothing on a dry run', async () => {
    const archive = new ArchiveService({ enabled: true, basePath, dryRun: true });

    await expect(archive.write(report)).resolves.toBeNull();
    expect(existsSync(join(basePath, dayjs(report.summary.startedAt).format('YYYY')))).toBe(false);
  });

  it('writes nothing when disabled', async () => {
    const archive = new ArchiveService({ enabled: false, basePath, dryRun: false });

    await expect(archive.write(report)).resolves.toBeNull();
  });
});

describe('ArchiveService.formatMarkdown', () => {
  it('notes empty sections', () => {
    const markdown = ArchiveService.formatMarkdown({ ...report, results: [], unmatched: [] });

    expect(markdown).toContain('\n_No matches._\n');
    expect(markdown).toContain('\n_All records matched._\n');
  });

  it('escapes pipes inside cells', () => {
    const markdown = ArchiveService.formatMarkdown({
      ...report,
      results: [{ ...report.results[0], explanation: 'a | b' }],
    });

    expect(markdown.split('\n')).toContain(
      '| mcgill | 0003 | beatles--hey-jude | 1.000 | a \\| b |'
    );
  });
});

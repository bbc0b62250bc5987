import { writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import dayjs from 'dayjs';
import { Logger } from '../utils/logger.js';
import type {
  ArchiveConfig,
  ArchivedReport,
  MatchReport,
  MatchResult,
  ResultSink,
  UnmatchedReport,
} from '../types/index.js';

export interface ArchiveOptions extends ArchiveConfig {
  dryRun: boolean;
}

/**
 * Result sink that keeps every run on disk: the report as JSON, plus a
 * Markdown table of accepted and rejected links for manual audit.
 */
export class ArchiveService implements ResultSink {
  constructor(private readonly options: ArchiveOptions) {}

  async write(report: MatchReport): Promise<ArchivedReport | null> {
    if (!this.options.enabled) {
      Logger.debug('Archive disabled, report not written');
      return null;
    }

    if (this.options.dryRun) {
      Logger.info(`[DRY RUN] Would archive ${report.results.length} matches`);
      return null;
    }

    const startedAt = dayjs(report.summary.startedAt);
    const dir = join(this.options.basePath, startedAt.format('YYYY'), startedAt.format('MM'));
    const baseName = `${startedAt.format('YYYY-MM-DD-HHmmss')}-matches`;
    const jsonPath = join(dir, `${baseName}.json`);
    const markdownPath = join(dir, `${baseName}.md`);

    await this.ensureDirectoryExists(dir);
    await writeFile(jsonPath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    await writeFile(markdownPath, ArchiveService.formatMarkdown(report), 'utf8');

    Logger.info(`🗂️  Archived match report to ${jsonPath}`);
    return { jsonPath, markdownPath };
  }

  static formatMarkdown(report: MatchReport): string {
    const { summary } = report;
    const started = dayjs(summary.startedAt);

    let content = `---
title: "Match Report - ${started.format('YYYY-MM-DD HH:mm:ss')}"
date: "${started.format('YYYY-MM-DD')}"
status: "${summary.status}"
type: "match-report"
---

# Match Report - ${started.format('MMMM D, YYYY')}

## Summary

| Metric | Count |
|--------|-------|
| Billboard Songs | ${summary.billboardSongs} |
| External Records | ${summary.processed} |
| Matched | ${summary.matched} |
| Unmatched | ${summary.unmatched} |
| Invalid | ${summary.invalid} |

## Matches
`;

    if (report.results.length === 0) {
      content += '\n_No matches._\n';
    } else {
      content += `
| Source | External ID | Billboard ID | Score | Explanation |
|--------|-------------|--------------|-------|-------------|
`;
      content += report.results.map((result) => ArchiveService.formatMatchRow(result)).join('');
    }

    content += '\n## Unmatched\n';
    if (report.unmatched.length === 0) {
      content += '\n_All records matched._\n';
    } else {
      content += `
| Source | External ID | Reason | Best Score | Detail |
|--------|-------------|--------|------------|--------|
`;
      content += report.unmatched.map((entry) => ArchiveService.formatUnmatchedRow(entry)).join('');
    }

    return content;
  }

  private static formatMatchRow(result: MatchResult): string {
    return `| ${result.externalSource} | ${escapeCell(result.externalId)} | ${escapeCell(
      result.billboardId
    )} | ${result.score.toFixed(3)} | ${escapeCell(result.explanation)} |\n`;
  }

  private static formatUnmatchedRow(entry: UnmatchedReport): string {
    const best = entry.bestScore === undefined ? '-' : entry.bestScore.toFixed(3);
    return `| ${entry.externalSource} | ${escapeCell(entry.externalId)} | ${entry.reason} | ${best} | ${escapeCell(
      entry.detail ?? '-'
    )} |\n`;
  }

  private async ensureDirectoryExists(dirPath: string): Promise<void> {
    if (!existsSync(dirPath)) {
      await mkdir(dirPath, { recursive: true });
    }
  }
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

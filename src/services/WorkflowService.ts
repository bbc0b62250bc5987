import { setImmediate as yieldToEventLoop } from 'timers/promises';
import dayjs from 'dayjs';
import { CandidateIndex } from './CandidateIndex.js';
import { MatchingService, DEFAULT_MATCHER_OPTIONS } from './MatchingService.js';
import type { RecordStore } from './RecordStore.js';
import { Logger } from '../utils/logger.js';
import type {
  BatchSummary,
  BillboardRecord,
  ExternalRecord,
  ExternalSource,
  MatchingConfig,
  MatchReport,
  MatchResult,
  ResultSink,
  SourceStats,
  UnmatchedReport,
} from '../types/index.js';
import type { InvalidRecordError } from '../types/errors.js';

export interface WorkflowStores {
  billboard: RecordStore<BillboardRecord>;
  external: Array<RecordStore<ExternalRecord>>;
}

export interface WorkflowOptions {
  stores: WorkflowStores;
  sink: ResultSink;
  matching?: Readonly<MatchingConfig>;
  clock?: () => Date;
}

const YIELD_EVERY = 250;

/**
 * One batch run: load every store, index Billboard titles, match each external
 * record, keep one link per (Billboard song, source) and hand the report to the
 * sink. Per-record problems are counted, never thrown.
 */
export class WorkflowService {
  private shouldStop = false;
  private readonly clock: () => Date;

  constructor(private readonly options: WorkflowOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  stop(): void {
    this.shouldStop = true;
  }

  async run(): Promise<MatchReport> {
    this.shouldStop = false;
    Logger.info('🎵 Starting match run');

    const billboard = await this.options.stores.billboard.load();
    const rejected: InvalidRecordError[] = [...billboard.rejected];
    if (billboard.rejected.length > 0) {
      Logger.warn(`${billboard.rejected.length} chart entries rejected at load time`);
    }
    const externals: ExternalRecord[] = [];

    for (const store of this.options.stores.external) {
      const loaded = await store.load();
      externals.push(...loaded.records);
      rejected.push(...loaded.rejected);
    }

    const report = await this.matchAll(billboard.records, externals, rejected);

    if (report.summary.status === 'stopped') {
      Logger.warn('🛑 Run stopped before completion - report not archived, rerun to resume');
    } else {
      await this.options.sink.write(report);
    }

    this.logFinalStats(report.summary);
    return report;
  }

  async matchAll(
    billboardRecords: readonly BillboardRecord[],
    externals: readonly ExternalRecord[],
    rejected: readonly InvalidRecordError[] = []
  ): Promise<MatchReport> {
    const startedAt = this.clock();
    const matcher = new MatchingService(
      this.options.matching ?? DEFAULT_MATCHER_OPTIONS,
      () => startedAt
    );
    const index = CandidateIndex.build(billboardRecords);
    const billboardById = new Map(billboardRecords.map((record) => [record.id, record]));

    const accepted: MatchResult[] = [];
    const unmatched: UnmatchedReport[] = [];
    const stats = emptySourceStats();
    let status: BatchSummary['status'] = 'completed';

    for (const error of rejected) {
      // Billboard rows rejected at load time never reach the matcher
      if (error.source === 'billboard') continue;
      stats[error.source].processed++;
      stats[error.source].invalid++;
      unmatched.push({
        externalId: error.recordId,
        externalSource: error.source,
        reason: 'invalid',
        detail: error.issues.join('; '),
      });
    }

    Logger.info(`Processing ${externals.length} external records`, {
      billboardSongs: billboardRecords.length,
      indexedTokens: index.tokenCount,
    });

    for (const [position, external] of externals.entries()) {
      if (this.shouldStop) {
        status = 'stopped';
        break;
      }
      if (position > 0 && position % YIELD_EVERY === 0) {
        await yieldToEventLoop();
        if (this.shouldStop) {
          status = 'stopped';
          break;
        }
      }

      const outcome = matcher.evaluate(external, index, billboardById);
      stats[external.source].processed++;

      switch (outcome.status) {
        case 'matched':
          accepted.push(outcome.result);
          break;
        case 'invalid':
          stats[external.source].invalid++;
          unmatched.push({
            externalId: external.id,
            externalSource: external.source,
            reason: 'invalid',
            detail: outcome.error.issues.join('; '),
          });
          break;
        case 'unmatched':
          unmatched.push({
            externalId: external.id,
            externalSource: external.source,
            reason: outcome.reason,
            bestScore: outcome.best?.score,
            detail: outcome.best ? `closest: ${outcome.best.rightId}` : undefined,
          });
          break;
      }
    }

    const { winners, superseded } = resolveConflicts(accepted);
    unmatched.push(...superseded);

    for (const result of winners) stats[result.externalSource].matched++;
    for (const entry of unmatched) {
      if (entry.reason !== 'invalid') stats[entry.externalSource].unmatched++;
    }

    const summary: BatchSummary = {
      ...totals(stats),
      bySource: stats,
      billboardSongs: billboardRecords.length,
      startedAt: dayjs(startedAt).toISOString(),
      finishedAt: dayjs(this.clock()).toISOString(),
      status,
    };

    return {
      results: winners.sort(compareResults),
      unmatched: unmatched.sort(compareResults),
      summary,
    };
  }

  private logFinalStats(summary: BatchSummary): void {
    Logger.info('📊 Matching completed', {
      status: summary.status,
      processed: summary.processed,
      matched: summary.matched,
      unmatched: summary.unmatched,
      invalid: summary.invalid,
      matchRate:
        summary.processed > 0
          ? `${((summary.matched / summary.processed) * 100).toFixed(1)}%`
          : '0%',
    });
  }
}

/**
 * At most one accepted link per (Billboard id, source): the best score wins and
 * equal scores go to the smaller external id.
 */
export function resolveConflicts(results: readonly MatchResult[]): {
  winners: MatchResult[];
  superseded: UnmatchedReport[];
} {
  const best = new Map<string, MatchResult>();
  const superseded: MatchResult[] = [];

  for (const result of results) {
    const key = `${result.externalSource}\u0000${result.billboardId}`;
    const current = best.get(key);
    if (!current) {
      best.set(key, result);
      continue;
    }

    const wins =
      result.score > current.score ||
      (result.score === current.score && result.externalId < current.externalId);
    if (wins) {
      superseded.push(current);
      best.set(key, result);
    } else {
      superseded.push(result);
    }
  }

  return {
    winners: [...best.values()],
    superseded: superseded.map((loser): UnmatchedReport => {
      const winner = best.get(`${loser.externalSource}\u0000${loser.billboardId}`);
      return {
        externalId: loser.externalId,
        externalSource: loser.externalSource,
        reason: 'superseded',
        bestScore: loser.score,
        detail: `${loser.billboardId} linked to ${winner?.externalId ?? 'another record'}`,
      };
    }),
  };
}

function compareResults(
  a: { externalSource: ExternalSource; externalId: string },
  b: { externalSource: ExternalSource; externalId: string }
): number {
  if (a.externalSource !== b.externalSource) return a.externalSource < b.externalSource ? -1 : 1;
  if (a.externalId !== b.externalId) return a.externalId < b.externalId ? -1 : 1;
  return 0;
}

function emptySourceStats(): Record<ExternalSource, SourceStats> {
  const empty = (): SourceStats => ({ processed: 0, matched: 0, unmatched: 0, invalid: 0 });
  return { mcgill: empty(), bimmuda: empty() };
}

function totals(stats: Record<ExternalSource, SourceStats>): SourceStats {
  return Object.values(stats).reduce(
    (sum, entry) => ({
      processed: sum.processed + entry.processed,
      matched: sum.matched + entry.matched,
      unmatched: sum.unmatched + entry.unmatched,
      invalid: sum.invalid + entry.invalid,
    }),
    { processed: 0, matched: 0, unmatched: 0, invalid: 0 }
  );
}

import type { ExternalSource } from './record.js';

export interface NormalizedKey {
  readonly tokens: readonly string[];
}

export interface MatchCandidate {
  leftId: string;
  rightId: string;
  score: number;
}

export interface MatchResult {
  billboardId: string;
  externalId: string;
  externalSource: ExternalSource;
  score: number;
  matchedAt: string;
  explanation: string;
}

export type UnmatchedReason = 'invalid' | 'no-candidates' | 'below-threshold' | 'superseded';

export interface UnmatchedReport {
  externalId: string;
  externalSource: ExternalSource;
  reason: UnmatchedReason;
  bestScore?: number;
  detail?: string;
}

export interface SourceStats {
  processed: number;
  matched: number;
  unmatched: number;
  invalid: number;
}

export interface BatchSummary extends SourceStats {
  bySource: Record<ExternalSource, SourceStats>;
  billboardSongs: number;
  startedAt: string;
  finishedAt: string;
  status: 'completed' | 'stopped';
}

export interface MatchReport {
  results: MatchResult[];
  unmatched: UnmatchedReport[];
  summary: BatchSummary;
}

export interface ResultSink {
  write(report: MatchReport): Promise<ArchivedReport | null>;
}

export interface ArchivedReport {
  jsonPath: string;
  markdownPath: string;
}

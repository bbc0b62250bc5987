import dayjs from 'dayjs';
import type { CandidateIndex } from './CandidateIndex.js';
import { Logger } from '../utils/logger.js';
import { MatchValidator, SongMatcher, type RecordKey } from '../utils/matching.js';
import { InvalidRecordError } from '../types/errors.js';
import type {
  BillboardRecord,
  ExternalRecord,
  MatchCandidate,
  MatchingConfig,
  MatchResult,
} from '../types/index.js';

export const DEFAULT_MATCHER_OPTIONS: Readonly<MatchingConfig> = {
  threshold: 0.75,
  titleWeight: 0.6,
  artistWeight: 0.4,
};

export type MatchOutcome =
  | { status: 'matched'; result: MatchResult }
  | {
      status: 'unmatched';
      reason: 'no-candidates' | 'below-threshold';
      best?: MatchCandidate;
    }
  | { status: 'invalid'; error: InvalidRecordError };

/**
 * Highest score wins; equal scores go to the smaller Billboard id so repeated
 * runs pick the same candidate.
 */
export function pickBest(candidates: readonly MatchCandidate[]): MatchCandidate | null {
  let best: MatchCandidate | null = null;
  for (const candidate of candidates) {
    if (
      best === null ||
      candidate.score > best.score ||
      (candidate.score === best.score && candidate.rightId < best.rightId)
    ) {
      best = candidate;
    }
  }
  return best;
}

export class MatchingService {
  private readonly invalidRecords: InvalidRecordError[] = [];
  private readonly billboardKeys = new Map<string, RecordKey>();

  constructor(
    private readonly options: Readonly<MatchingConfig> = DEFAULT_MATCHER_OPTIONS,
    private readonly clock: () => Date = () => new Date()
  ) {}

  match(
    external: ExternalRecord,
    index: CandidateIndex,
    billboardRecords: ReadonlyMap<string, BillboardRecord>
  ): MatchResult | null {
    const outcome = this.evaluate(external, index, billboardRecords);
    return outcome.status === 'matched' ? outcome.result : null;
  }

  evaluate(
    external: ExternalRecord,
    index: CandidateIndex,
    billboardRecords: ReadonlyMap<string, BillboardRecord>
  ): MatchOutcome {
    const missing = MatchValidator.missingFields(external);
    if (missing.length > 0) {
      const error = new InvalidRecordError(
        external.source,
        external.id,
        missing.map((field) => `missing ${field}`)
      );
      this.invalidRecords.push(error);
      Logger.warn(error.message);
      return { status: 'invalid', error };
    }

    const key = SongMatcher.keyOf(external);
    const candidates = this.scoreCandidates(external, key, index, billboardRecords);
    const best = pickBest(candidates);

    if (!best) {
      Logger.debug(`No candidates for: ${external.rawArtist} - ${external.rawTitle}`);
      return { status: 'unmatched', reason: 'no-candidates' };
    }

    if (best.score < this.options.threshold) {
      Logger.debug(`Best candidate below threshold for: ${external.rawArtist} - ${external.rawTitle}`, {
        candidate: best.rightId,
        score: best.score,
      });
      return { status: 'unmatched', reason: 'below-threshold', best };
    }

    const billboard = billboardRecords.get(best.rightId);
    if (!billboard) {
      // scoreCandidates only yields ids present in the record map
      return { status: 'unmatched', reason: 'no-candidates' };
    }

    const breakdown = SongMatcher.score(key, this.billboardKey(billboard), this.options);
    return {
      status: 'matched',
      result: {
        billboardId: billboard.id,
        externalId: external.id,
        externalSource: external.source,
        score: best.score,
        matchedAt: dayjs(this.clock()).toISOString(),
        explanation: MatchValidator.explainMatch(external, billboard, breakdown),
      },
    };
  }

  getInvalidRecords(): readonly InvalidRecordError[] {
    return this.invalidRecords;
  }

  private scoreCandidates(
    external: ExternalRecord,
    key: RecordKey,
    index: CandidateIndex,
    billboardRecords: ReadonlyMap<string, BillboardRecord>
  ): MatchCandidate[] {
    const candidates: MatchCandidate[] = [];

    for (const id of index.lookup(key.title.tokens)) {
      const billboard = billboardRecords.get(id);
      if (!billboard) {
        Logger.debug('Indexed id has no Billboard record', { id });
        continue;
      }

      const { score } = SongMatcher.score(key, this.billboardKey(billboard), this.options);
      candidates.push({ leftId: external.id, rightId: billboard.id, score });
    }

    return candidates;
  }

  private billboardKey(record: BillboardRecord): RecordKey {
    let key = this.billboardKeys.get(record.id);
    if (!key) {
      key = SongMatcher.keyOf(record);
      this.billboardKeys.set(record.id, key);
    }
    return key;
  }
}

import { compareTwoStrings } from 'string-similarity';
import { TextNormalizer } from './normalizer.js';
import { editSimilarity, jaccard } from './similarity.js';
import type { BillboardRecord, MatchingConfig, NormalizedKey, SourceRecord } from '../types/index.js';

export interface RecordKey {
  /** Title without bracketed qualifiers; also the index key. */
  title: NormalizedKey;
  fullTitle: NormalizedKey;
  artist: NormalizedKey;
}

export type ScoreWeights = Pick<MatchingConfig, 'titleWeight' | 'artistWeight'>;

export interface ScoreBreakdown {
  titleScore: number;
  artistScore: number;
  score: number;
}

export class SongMatcher {
  static keyOf(record: SourceRecord): RecordKey {
    return {
      title: TextNormalizer.titleKey(record.rawTitle),
      fullTitle: TextNormalizer.normalize(record.rawTitle),
      artist: TextNormalizer.artistKey(record.rawArtist),
    };
  }

  /**
   * Weighted sum of title token overlap (Jaccard) and artist edit similarity.
   * The title overlap is the better of the stripped and the full title, so
   * identical normalized titles and artists score exactly 1 whenever the
   * weights sum to 1.
   */
  static score(external: RecordKey, billboard: RecordKey, weights: ScoreWeights): ScoreBreakdown {
    const titleScore = Math.max(
      jaccard(external.title.tokens, billboard.title.tokens),
      jaccard(external.fullTitle.tokens, billboard.fullTitle.tokens)
    );
    const artistScore = editSimilarity(
      TextNormalizer.toText(external.artist),
      TextNormalizer.toText(billboard.artist)
    );

    return {
      titleScore,
      artistScore,
      score: titleScore * weights.titleWeight + artistScore * weights.artistWeight,
    };
  }
}

export class MatchValidator {
  /** Fields a record needs before it can be matched. */
  static missingFields(record: SourceRecord): string[] {
    const missing: string[] = [];
    if (!record.rawTitle || record.rawTitle.trim() === '') missing.push('title');
    if (!record.rawArtist || record.rawArtist.trim() === '') missing.push('artist');
    return missing;
  }

  static explainMatch(
    external: SourceRecord,
    billboard: BillboardRecord,
    breakdown: ScoreBreakdown
  ): string {
    const reasons: string[] = [];

    const artistSim = compareTwoStrings(
      (external.rawArtist ?? '').toLowerCase(),
      billboard.rawArtist.toLowerCase()
    );
    const titleSim = compareTwoStrings(
      (external.rawTitle ?? '').toLowerCase(),
      billboard.rawTitle.toLowerCase()
    );

    if (artistSim > 0.8) reasons.push('exact artist match');
    else if (artistSim > 0.6) reasons.push('good artist match');
    else if (artistSim > 0.3) reasons.push('partial artist match');

    if (titleSim > 0.8) reasons.push('exact title match');
    else if (titleSim > 0.6) reasons.push('good title match');
    else if (titleSim > 0.3) reasons.push('partial title match');

    if (breakdown.titleScore === 1 && titleSim <= 0.8) {
      reasons.push('title equal after normalization');
    }

    const detail = reasons.length > 0 ? reasons.join(', ') : 'weak raw similarity';
    return (
      `Score: ${breakdown.score.toFixed(3)} ` +
      `(title ${breakdown.titleScore.toFixed(2)}, artist ${breakdown.artistScore.toFixed(2)}; ${detail})`
    );
  }
}

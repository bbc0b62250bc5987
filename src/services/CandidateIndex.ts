import { Logger } from '../utils/logger.js';
import { TextNormalizer } from '../utils/normalizer.js';
import { IndexBuildError } from '../types/errors.js';
import type { SourceRecord } from '../types/index.js';

/**
 * Inverted index from normalized title tokens to record ids. Built once per
 * run and read-only afterwards; a changed record set needs a fresh build.
 */
export class CandidateIndex {
  private constructor(
    private readonly postings: ReadonlyMap<string, ReadonlySet<string>>,
    readonly recordCount: number,
    readonly skipped: readonly string[]
  ) {}

  static build(records: Iterable<SourceRecord>): CandidateIndex {
    const postings = new Map<string, Set<string>>();
    const skipped: string[] = [];
    let recordCount = 0;

    try {
      for (const record of records) {
        const { tokens } = TextNormalizer.titleKey(record.rawTitle);
        if (tokens.length === 0) {
          Logger.warn(`Skipping ${record.source} record without a usable title`, {
            id: record.id,
          });
          skipped.push(record.id);
          continue;
        }

        for (const token of tokens) {
          let ids = postings.get(token);
          if (!ids) {
            ids = new Set<string>();
            postings.set(token, ids);
          }
          ids.add(record.id);
        }
        recordCount++;
      }
    } catch (error) {
      throw new IndexBuildError('record sequence could not be iterated', {
        indexed: recordCount,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    Logger.debug('Candidate index built', {
      records: recordCount,
      tokens: postings.size,
      skipped: skipped.length,
    });

    return new CandidateIndex(postings, recordCount, skipped);
  }

  /** Union of the postings of every token; unknown tokens add nothing. */
  lookup(tokens: readonly string[]): Set<string> {
    const ids = new Set<string>();
    for (const token of tokens) {
      const posting = this.postings.get(token);
      if (!posting) continue;
      for (const id of posting) {
        ids.add(id);
      }
    }
    return ids;
  }

  get tokenCount(): number {
    return this.postings.size;
  }
}

import type { NormalizedKey } from '../types/index.js';

const LEADING_ARTICLES = new Set(['the', 'a', 'an']);

const FEATURING_CLAUSE = /\s+(?:featuring|feat\.?|ft\.?)\s.*$/i;
const ARTIST_FEATURING_CLAUSE = /\s+(?:featuring|feat\.?|ft\.?|with)\s.*$/i;
const BRACKETED = /[([{][^)\]}]*[)\]}]/g;

export class TextNormalizer {
  /**
   * Case-folds, strips accents and punctuation, collapses whitespace and drops
   * leading articles. Never throws; absent or empty input gives no tokens.
   */
  static normalize(raw: string | null | undefined): NormalizedKey {
    if (!raw) {
      return { tokens: [] };
    }

    const cleaned = raw
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '') // Remove accents
      .toLowerCase()
      .replace(/&amp;/g, ' and ')
      .replace(/&/g, ' and ')
      .replace(/['’`]/g, '')
      .replace(/[^\p{L}\p{N}]+/gu, ' ')
      .trim();

    if (!cleaned) {
      return { tokens: [] };
    }

    const tokens = cleaned.split(' ');
    let start = 0;
    // "The The" keeps its last token
    while (start < tokens.length - 1 && LEADING_ARTICLES.has(tokens[start])) {
      start++;
    }

    return { tokens: tokens.slice(start) };
  }

  /** Title key without bracketed qualifiers or a trailing featuring clause. */
  static titleKey(raw: string | null | undefined): NormalizedKey {
    if (!raw) {
      return { tokens: [] };
    }

    const stripped = TextNormalizer.normalize(
      raw.replace(BRACKETED, ' ').replace(FEATURING_CLAUSE, '')
    );
    return stripped.tokens.length > 0 ? stripped : TextNormalizer.normalize(raw);
  }

  /** Artist key of the primary credited artist. */
  static artistKey(raw: string | null | undefined): NormalizedKey {
    if (!raw) {
      return { tokens: [] };
    }

    const primary = TextNormalizer.normalize(raw.replace(ARTIST_FEATURING_CLAUSE, ''));
    return primary.tokens.length > 0 ? primary : TextNormalizer.normalize(raw);
  }

  static toText(key: NormalizedKey): string {
    return key.tokens.join(' ');
  }

  static slug(key: NormalizedKey): string {
    return key.tokens.join('-');
  }
}

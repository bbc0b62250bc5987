import dayjs from 'dayjs';
import { Logger } from '../utils/logger.js';
import { TextNormalizer } from '../utils/normalizer.js';
import type { BillboardRecord, ChartEntry } from '../types/index.js';

export interface DecadeBucket {
  decade: number;
  songCount: number;
  topSongs: BillboardRecord[];
}

interface SongGroup {
  id: string;
  first: ChartEntry;
  last: ChartEntry;
  peakPosition: number;
  weeks: Set<string>;
}

export class ChartService {
  /**
   * Collapses weekly chart rows into one record per song. Rows are grouped by
   * normalized artist and title; the earliest week supplies the raw strings.
   */
  static dedupe(entries: readonly ChartEntry[]): BillboardRecord[] {
    const groups = new Map<string, SongGroup>();

    for (const entry of entries) {
      const id = ChartService.songId(entry.artist, entry.title);
      const group = groups.get(id);

      if (!group) {
        groups.set(id, {
          id,
          first: entry,
          last: entry,
          peakPosition: entry.rank,
          weeks: new Set([entry.week]),
        });
        continue;
      }

      group.weeks.add(entry.week);
      group.peakPosition = Math.min(group.peakPosition, entry.rank);
      if (entry.week < group.first.week) group.first = entry;
      if (entry.week > group.last.week) group.last = entry;
    }

    const records = [...groups.values()]
      .map((group): BillboardRecord => ({
        source: 'billboard',
        id: group.id,
        rawArtist: group.first.artist,
        rawTitle: group.first.title,
        payload: {
          peakPosition: group.peakPosition,
          weeksOnChart: group.weeks.size,
          firstChartDate: group.first.week,
          lastChartDate: group.last.week,
          decade: ChartService.decadeOf(group.first.week) ?? 0,
        },
      }))
      .sort((a, b) => ChartService.compareIds(a.id, b.id));

    Logger.debug(`Deduplicated ${entries.length} chart entries into ${records.length} songs`);
    return records;
  }

  /** Stable id of the form `artist-tokens--title-tokens`. */
  static songId(artist: string, title: string): string {
    const artistSlug = TextNormalizer.slug(TextNormalizer.normalize(artist)) || 'unknown';
    const titleSlug = TextNormalizer.slug(TextNormalizer.normalize(title)) || 'untitled';
    return `${artistSlug}--${titleSlug}`;
  }

  static decadeOf(date: string): number | null {
    const parsed = dayjs(date);
    if (!parsed.isValid()) {
      return null;
    }
    return Math.floor(parsed.year() / 10) * 10;
  }

  static topByDecade(records: readonly BillboardRecord[], limit: number): DecadeBucket[] {
    const byDecade = new Map<number, BillboardRecord[]>();
    for (const record of records) {
      const bucket = byDecade.get(record.payload.decade) ?? [];
      bucket.push(record);
      byDecade.set(record.payload.decade, bucket);
    }

    return [...byDecade.entries()]
      .sort(([a], [b]) => a - b)
      .map(([decade, songs]) => ({
        decade,
        songCount: songs.length,
        topSongs: [...songs]
          .sort(
            (a, b) =>
              a.payload.peakPosition - b.payload.peakPosition ||
              b.payload.weeksOnChart - a.payload.weeksOnChart ||
              ChartService.compareIds(a.id, b.id)
          )
          .slice(0, limit),
      }));
  }

  private static compareIds(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
}

import { ChartService } from '../../src/services/ChartService';
import type { ChartEntry } from '../../src/types';
import { billboard } from '../helpers';

describe('ChartService', () => {
  const entries: ChartEntry[] = [
    { week: '1968-09-21', rank: 3, title: 'Hey Jude', artist: 'Beatles' },
    { week: '1968-09-14', rank: 10, title: 'Hey Jude', artist: 'The Beatles' },
    { week: '1968-09-28', rank: 1, title: 'Hey Jude', artist: 'The Beatles' },
    { week: '1968-09-28', rank: 2, title: 'HEY JUDE', artist: 'The Beatles' },
    { week: '1970-03-14', rank: 6, title: 'Let It Be', artist: 'The Beatles' },
  ];

  describe('dedupe', () => {
    it('collapses weekly rows into one record per song', () => {
      const records = ChartService.dedupe(entries);

      expect(records.map((record) => record.id)).toEqual([
        'beatles--hey-jude',
        'beatles--let-it-be',
      ]);
    });

    it('computes chart statistics from every week', () => {
      const [heyJude] = ChartService.dedupe(entries);

      expect(heyJude).toEqual({
        source: 'billboard',
        id: 'beatles--hey-jude',
        rawArtist: 'The Beatles',
        rawTitle: 'Hey Jude',
        payload: {
          peakPosition: 1,
          weeksOnChart: 3,
          firstChartDate: '1968-09-14',
          lastChartDate: '1968-09-28',
          decade: 1960,
        },
      });
    });

    it('returns nothing for no entries', () => {
      expect(ChartService.dedupe([])).toEqual([]);
    });
  });

  describe('songId', () => {
    it('joins normalized artist and title tokens', () => {
      expect(ChartService.songId('The Beatles', 'Hey Jude')).toBe('beatles--hey-jude');
      expect(ChartService.songId('Simon & Garfunkel', "Mrs. Robinson")).toBe(
        'simon-and-garfunkel--mrs-robinson'
      );
    });

    it('falls back for strings without tokens', () => {
      expect(ChartService.songId('', '!!!')).toBe('unknown--untitled');
    });
  });

  describe('decadeOf', () => {
    it('floors the year to its decade', () => {
      expect(ChartService.decadeOf('1999-12-31')).toBe(1990);
      expect(ChartService.decadeOf('2000-01-01')).toBe(2000);
    });

    it('returns null for an unparseable date', () => {
      expect(ChartService.decadeOf('not a date')).toBeNull();
    });
  });

  describe('topByDecade', () => {
    const song = (id: string, decade: number, peakPosition: number, weeksOnChart: number) => {
      const record = billboard(id, 'Artist', id);
      return { ...record, payload: { ...record.payload, decade, peakPosition, weeksOnChart } };
    };

    it('buckets songs by decade and ranks them by peak then longevity', () => {
      const buckets = ChartService.topByDecade(
        [
          song('c', 1970, 2, 10),
          song('a', 1960, 1, 5),
          song('b', 1960, 1, 9),
          song('d', 1960, 4, 30),
          song('e', 1960, 1, 9),
        ],
        3
      );

      expect(buckets.map((bucket) => [bucket.decade, bucket.songCount])).toEqual([
        [1960, 4],
        [1970, 1],
      ]);
      expect(buckets[0].topSongs.map((record) => record.id)).toEqual(['b', 'e', 'a']);
      expect(buckets[1].topSongs.map((record) => record.id)).toEqual(['c']);
    });
  });
});

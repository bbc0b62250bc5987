import type { BiMMuDaRecord, BillboardRecord, McGillRecord } from '../src/types';

export const billboard = (id: string, artist: string, title: string): BillboardRecord => ({
  source: 'billboard',
  id,
  rawArtist: artist,
  rawTitle: title,
  payload: {
    peakPosition: 1,
    weeksOnChart: 1,
    firstChartDate: '1968-09-14',
    lastChartDate: '1968-09-14',
    decade: 1960,
  },
});

export const mcgill = (id: string, artist?: string, title?: string): McGillRecord => ({
  source: 'mcgill',
  id,
  rawArtist: artist,
  rawTitle: title,
  payload: { chords: ['C', 'F', 'G'] },
});

export const bimmuda = (id: string, artist?: string, title?: string): BiMMuDaRecord => ({
  source: 'bimmuda',
  id,
  rawArtist: artist,
  rawTitle: title,
  payload: { midiPath: `${id}.mid` },
});

export const byId = (records: BillboardRecord[]): Map<string, BillboardRecord> =>
  new Map(records.map((record) => [record.id, record]));

export const fixedClock = (): Date => new Date('2024-05-01T12:00:00.000Z');

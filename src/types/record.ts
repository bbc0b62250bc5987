export const SOURCE_KINDS = ['billboard', 'mcgill', 'bimmuda'] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export type ExternalSource = Exclude<SourceKind, 'billboard'>;

export interface ChartStats {
  peakPosition: number;
  weeksOnChart: number;
  firstChartDate: string;
  lastChartDate: string;
  decade: number;
}

export interface ChordPayload {
  chords: string[];
}

export interface MelodyPayload {
  midiPath: string;
  year?: number;
  position?: number;
}

interface BaseRecord<S extends SourceKind, P> {
  readonly source: S;
  readonly id: string;
  readonly rawArtist?: string;
  readonly rawTitle?: string;
  readonly payload: Readonly<P>;
}

export interface BillboardRecord extends BaseRecord<'billboard', ChartStats> {
  readonly rawArtist: string;
  readonly rawTitle: string;
}

export type McGillRecord = BaseRecord<'mcgill', ChordPayload>;

export type BiMMuDaRecord = BaseRecord<'bimmuda', MelodyPayload>;

export type ExternalRecord = McGillRecord | BiMMuDaRecord;

export type SourceRecord = BillboardRecord | ExternalRecord;

/** One row of a weekly Hot 100 chart. */
export interface ChartEntry {
  week: string;
  rank: number;
  title: string;
  artist: string;
}

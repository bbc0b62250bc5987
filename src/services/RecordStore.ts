import { readFile } from 'fs/promises';
import dayjs from 'dayjs';
import { z } from 'zod';
import { ChartService } from './ChartService.js';
import { Logger } from '../utils/logger.js';
import { InvalidRecordError, StoreError } from '../types/errors.js';
import type {
  BiMMuDaRecord,
  BillboardRecord,
  ChartEntry,
  McGillRecord,
  SourceKind,
} from '../types/index.js';

export interface LoadedRecords<T> {
  records: T[];
  rejected: InvalidRecordError[];
}

export interface RecordStore<T> {
  readonly source: SourceKind;
  load(): Promise<LoadedRecords<T>>;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const recordId = z.union([z.string().min(1), z.number().int()]).transform(String);

export const ChartEntrySchema = z.object({
  week: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'week must be YYYY-MM-DD')
    .refine((week) => dayjs(week).format('YYYY-MM-DD') === week, 'week must be a valid date'),
  rank: z.number().int().min(1).max(100),
  title: z.string().trim().min(1, 'title is required'),
  artist: z.string().trim().min(1, 'artist is required'),
});

export const AnnotationSchema = z.object({
  id: recordId,
  artist: optionalText,
  title: optionalText,
  chords: z.array(z.string()).default([]),
});

export const MelodySchema = z.object({
  id: recordId,
  artist: optionalText,
  title: optionalText,
  midiPath: z.string().min(1, 'midiPath is required'),
  year: z.number().int().optional(),
  position: z.number().int().optional(),
});

/**
 * Reads a JSON array from disk and validates each element on its own, so a
 * bad element is rejected without failing the load.
 */
export class JsonFileStore<Entry, T> implements RecordStore<T> {
  constructor(
    readonly source: SourceKind,
    private readonly filePath: string,
    private readonly schema: z.ZodType<Entry, z.ZodTypeDef, unknown>,
    private readonly toRecord: (entry: Entry) => T
  ) {}

  async load(): Promise<LoadedRecords<T>> {
    const items = await this.readArray();
    const records: T[] = [];
    const rejected: InvalidRecordError[] = [];

    items.forEach((item, position) => {
      const parsed = this.schema.safeParse(item);
      if (parsed.success) {
        records.push(this.toRecord(parsed.data));
        return;
      }

      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`
      );
      const error = new InvalidRecordError(this.source, describeEntry(item, position), issues);
      Logger.warn(error.message);
      rejected.push(error);
    });

    Logger.info(`📂 Loaded ${records.length} ${this.source} entries from ${this.filePath}`, {
      rejected: rejected.length,
    });
    return { records, rejected };
  }

  private async readArray(): Promise<unknown[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new StoreError(`cannot read ${this.source} file`, {
        path: this.filePath,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new StoreError(`${this.source} file is not valid JSON`, {
        path: this.filePath,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    if (!Array.isArray(data)) {
      throw new StoreError(`${this.source} file must contain a JSON array`, { path: this.filePath });
    }
    return data;
  }
}

function describeEntry(item: unknown, position: number): string {
  if (typeof item === 'object' && item !== null && 'id' in item) {
    const { id } = item;
    if (typeof id === 'string' || typeof id === 'number') {
      return String(id);
    }
  }
  return `#${position}`;
}

/** Weekly chart rows, deduplicated into one Billboard record per song. */
export class ChartFileStore implements RecordStore<BillboardRecord> {
  readonly source = 'billboard' as const;
  private readonly entries: JsonFileStore<ChartEntry, ChartEntry>;

  constructor(filePath: string) {
    this.entries = new JsonFileStore('billboard', filePath, ChartEntrySchema, (entry) => entry);
  }

  async load(): Promise<LoadedRecords<BillboardRecord>> {
    const { records, rejected } = await this.entries.load();
    return { records: ChartService.dedupe(records), rejected };
  }
}

export function createAnnotationStore(filePath: string): RecordStore<McGillRecord> {
  return new JsonFileStore(
    'mcgill',
    filePath,
    AnnotationSchema,
    (entry): McGillRecord => ({
      source: 'mcgill',
      id: entry.id,
      rawArtist: entry.artist,
      rawTitle: entry.title,
      payload: { chords: entry.chords },
    })
  );
}

export function createMelodyStore(filePath: string): RecordStore<BiMMuDaRecord> {
  return new JsonFileStore(
    'bimmuda',
    filePath,
    MelodySchema,
    (entry): BiMMuDaRecord => ({
      source: 'bimmuda',
      id: entry.id,
      rawArtist: entry.artist,
      rawTitle: entry.title,
      payload: { midiPath: entry.midiPath, year: entry.year, position: entry.position },
    })
  );
}

/** Fixed records, for callers that already hold them in memory. */
export class InMemoryStore<T> implements RecordStore<T> {
  constructor(
    readonly source: SourceKind,
    private readonly records: readonly T[]
  ) {}

  async load(): Promise<LoadedRecords<T>> {
    return { records: [...this.records], rejected: [] };
  }
}

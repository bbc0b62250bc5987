import { z } from 'zod';
import type { AppConfig } from '../types/config.js';

export const MatchingConfigSchema = z
  .object({
    threshold: z
      .number()
      .min(0, 'Match threshold must be between 0 and 1')
      .max(1, 'Match threshold must be between 0 and 1'),
    titleWeight: z.number().min(0).max(1),
    artistWeight: z.number().min(0).max(1),
  })
  .refine((matching) => Math.abs(matching.titleWeight + matching.artistWeight - 1) < 1e-9, {
    message: 'Title and artist weights must sum to 1',
  });

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
  silent: z.boolean(),
});

export const ArchiveConfigSchema = z.object({
  enabled: z.boolean(),
  basePath: z.string().min(1, 'Archive base path is required'),
});

export const AppConfigSchema = z.object({
  matching: MatchingConfigSchema,
  logging: LoggingConfigSchema,
  archive: ArchiveConfigSchema,
  dryRun: z.boolean(),
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema> & AppConfig;

export const MatchCommandSchema = z.object({
  charts: z.string().min(1, 'A chart file is required'),
  mcgill: z.string().min(1).optional(),
  bimmuda: z.string().min(1).optional(),
  threshold: z.coerce.number().min(0).max(1).optional(),
  out: z.string().min(1).optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export const DecadesCommandSchema = z.object({
  charts: z.string().min(1, 'A chart file is required'),
  top: z.coerce.number().int().min(1).default(10),
});

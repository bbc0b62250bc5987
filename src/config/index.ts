import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';
import type { AppConfig } from '../types/config.js';

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return Number.parseFloat(value);
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): ValidatedAppConfig {
  const rawConfig = {
    matching: {
      threshold: parseNumber(env.MATCH_THRESHOLD, 0.75),
      titleWeight: parseNumber(env.MATCH_TITLE_WEIGHT, 0.6),
      artistWeight: parseNumber(env.MATCH_ARTIST_WEIGHT, 0.4),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      silent: env.LOG_SILENT === 'true' || env.NODE_ENV === 'test',
    },
    archive: {
      enabled: env.ARCHIVE_ENABLED !== 'false',
      basePath: env.ARCHIVE_PATH || './data/matches',
    },
    dryRun: env.DRY_RUN === 'true',
  };

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
  return parsed.data;
}

export const config = createConfig();

export function printConfigSummary(effective: AppConfig = config): void {
  console.log('Configuration Summary:');
  console.log(`- Dry Run: ${effective.dryRun ? 'YES' : 'NO'}`);
  console.log(`- Match Threshold: ${effective.matching.threshold}`);
  console.log(
    `- Weights: title ${effective.matching.titleWeight} / artist ${effective.matching.artistWeight}`
  );
  console.log(`- Log Level: ${effective.logging.level}`);
  console.log(`- Archive: ${effective.archive.enabled ? effective.archive.basePath : 'disabled'}`);
}

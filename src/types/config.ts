export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface MatchingConfig {
  threshold: number;
  titleWeight: number;
  artistWeight: number;
}

export interface LoggingConfig {
  level: LogLevel;
  silent: boolean;
}

export interface ArchiveConfig {
  enabled: boolean;
  basePath: string;
}

export interface AppConfig {
  matching: MatchingConfig;
  logging: LoggingConfig;
  archive: ArchiveConfig;
  dryRun: boolean;
}

export interface MatchCommandOptions {
  charts: string;
  mcgill?: string;
  bimmuda?: string;
  threshold?: number;
  out?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export interface DecadesCommandOptions {
  charts: string;
  top: number;
}

import { createConfig } from '../../src/config';
import { ConfigurationError } from '../../src/types/errors';

describe('createConfig', () => {
  it('applies defaults', () => {
    const config = createConfig({});

    expect(config).toEqual({
      matching: { threshold: 0.75, titleWeight: 0.6, artistWeight: 0.4 },
      logging: { level: 'info', silent: false },
      archive: { enabled: true, basePath: './data/matches' },
      dryRun: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = createConfig({
      MATCH_THRESHOLD: '0.9',
      MATCH_TITLE_WEIGHT: '0.5',
      MATCH_ARTIST_WEIGHT: '0.5',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'test',
      ARCHIVE_ENABLED: 'false',
      ARCHIVE_PATH: '/tmp/reports',
      DRY_RUN: 'true',
    });

    expect(config.matching).toEqual({ threshold: 0.9, titleWeight: 0.5, artistWeight: 0.5 });
    expect(config.logging).toEqual({ level: 'debug', silent: true });
    expect(config.archive).toEqual({ enabled: false, basePath: '/tmp/reports' });
    expect(config.dryRun).toBe(true);
  });

  it('rejects weights that do not sum to 1', () => {
    expect(() => createConfig({ MATCH_TITLE_WEIGHT: '0.7' })).toThrow(ConfigurationError);
  });

  it('rejects a threshold outside 0..1', () => {
    expect(() => createConfig({ MATCH_THRESHOLD: '1.5' })).toThrow(
      'Configuration Error: Invalid configuration: matching.threshold: Match threshold must be between 0 and 1'
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => createConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});

import { Command } from 'commander';
import type { z } from 'zod';
import { WorkflowService } from '../services/WorkflowService.js';
import { ArchiveService } from '../services/ArchiveService.js';
import { ChartService } from '../services/ChartService.js';
import {
  ChartFileStore,
  createAnnotationStore,
  createMelodyStore,
  type RecordStore,
} from '../services/RecordStore.js';
import { config, printConfigSummary } from '../config/index.js';
import { DecadesCommandSchema, MatchCommandSchema } from '../config/schema.js';
import { Logger } from '../utils/logger.js';
import { ValidationError } from '../types/errors.js';
import type {
  AppConfig,
  BatchSummary,
  DecadesCommandOptions,
  ExternalRecord,
  MatchCommandOptions,
} from '../types/index.js';

export interface CLIHooks {
  /** Receives the running workflow so a signal handler can stop it. */
  onWorkflow?: (workflow: WorkflowService) => void;
}

export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid options: ${issues.join(', ')}`, { issues });
  }
  return parsed.data;
}

export async function runMatchCommand(
  options: MatchCommandOptions,
  hooks: CLIHooks = {}
): Promise<BatchSummary> {
  const effective: AppConfig = {
    matching: { ...config.matching, threshold: options.threshold ?? config.matching.threshold },
    logging: { ...config.logging, level: options.verbose ? 'debug' : config.logging.level },
    archive: { ...config.archive, basePath: options.out ?? config.archive.basePath },
    dryRun: options.dryRun ?? config.dryRun,
  };

  if (options.verbose) {
    Logger.setLevel('debug');
    printConfigSummary(effective);
  }

  const external: Array<RecordStore<ExternalRecord>> = [];
  if (options.mcgill) external.push(createAnnotationStore(options.mcgill));
  if (options.bimmuda) external.push(createMelodyStore(options.bimmuda));
  if (external.length === 0) {
    throw new ValidationError('At least one of --mcgill or --bimmuda is required');
  }

  const workflow = new WorkflowService({
    stores: { billboard: new ChartFileStore(options.charts), external },
    sink: new ArchiveService({ ...effective.archive, dryRun: effective.dryRun }),
    matching: effective.matching,
  });
  hooks.onWorkflow?.(workflow);

  const { summary } = await workflow.run();
  printSummary(summary);
  return summary;
}

export async function runDecadesCommand(options: DecadesCommandOptions): Promise<void> {
  const { records } = await new ChartFileStore(options.charts).load();

  for (const bucket of ChartService.topByDecade(records, options.top)) {
    console.log(`\n${bucket.decade}s: ${bucket.songCount} songs`);
    bucket.topSongs.forEach((song, position) => {
      console.log(
        `  ${String(position + 1).padStart(2)}. ${song.rawTitle} - ${song.rawArtist} ` +
          `(peak #${song.payload.peakPosition}, ${song.payload.weeksOnChart} weeks)`
      );
    });
  }
}

function printSummary(summary: BatchSummary): void {
  console.log('\nMatch Summary:');
  console.log(`- Status: ${summary.status}`);
  console.log(`- Billboard songs: ${summary.billboardSongs}`);
  console.log(`- External records: ${summary.processed}`);
  console.log(`- Matched: ${summary.matched}`);
  console.log(`- Unmatched: ${summary.unmatched}`);
  console.log(`- Invalid: ${summary.invalid}`);
}

export function createCLI(hooks: CLIHooks = {}): Command {
  const program = new Command();

  program
    .name('chart-crosslink')
    .description('Link Billboard Hot 100 songs to McGill chord annotations and BiMMuDa melodies')
    .version('1.0.0');

  program
    .command('match')
    .description('Match external records against deduplicated Billboard songs')
    .requiredOption('-c, --charts <file>', 'JSON file of weekly Hot 100 chart entries')
    .option('-m, --mcgill <file>', 'JSON file of McGill chord annotations')
    .option('-b, --bimmuda <file>', 'JSON file of BiMMuDa melody records')
    .option('-t, --threshold <number>', 'acceptance threshold between 0 and 1')
    .option('-o, --out <dir>', 'archive directory for the match report')
    .option('--dry-run', 'match without writing the report')
    .option('-v, --verbose', 'debug logging')
    .action(async (raw: unknown) => {
      await runMatchCommand(parseOptions(MatchCommandSchema, raw), hooks);
    });

  program
    .command('decades')
    .description('Show song counts and top songs per decade of first chart appearance')
    .requiredOption('-c, --charts <file>', 'JSON file of weekly Hot 100 chart entries')
    .option('-n, --top <number>', 'songs to list per decade', '10')
    .action(async (raw: unknown) => {
      await runDecadesCommand(parseOptions(DecadesCommandSchema, raw));
    });

  return program;
}

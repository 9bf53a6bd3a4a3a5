// src/cli/commands/sync.ts
import { Command } from 'commander';
import { loadConfig, type ArchiverConfig, type ConfigOverrides } from '../../core/config/env.js';
import { ensureArchiveLayout } from '../../core/config/layout.js';
import { describeError } from '../../core/errors.js';
import type { FetchLike } from '../../core/feed/fetcher.js';
import { ConsoleSink, FileSink, Logger, type LogSink } from '../../core/logging/logger.js';
import { createSyncEngine, type SyncSummary } from '../../core/orchestrator.js';
import type { BoundaryStrategy, Category } from '../../core/types/index.js';
import { CATEGORIES } from '../../core/types/index.js';
import { parseBoundary, parseCategory, parseCount } from './options.js';

export interface SyncCommandOptions {
  baseUrl?: string;
  token?: string;
  archiveDir?: string;
  only?: Category[];
  pageSize?: number;
  maxPages?: number;
  boundary?: BoundaryStrategy;
  verbose?: boolean;
}

export interface SyncDependencies {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** Extra sinks next to the console and the archive log file */
  sinks?: LogSink[];
  console?: boolean;
}

export interface SyncOutcome {
  exitCode: number;
  summary?: SyncSummary;
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync', { isDefault: true })
    .description('Archive new favourites and bookmarks')
    .option('--base-url <url>', 'Server base URL (default: $MASTODON_BASE_URL)')
    .option('--token <token>', 'Access token (default: $MASTODON_ACCESS_TOKEN)')
    .option('--archive-dir <dir>', 'Archive root directory (default: $ARCHIVE_DIR or /archive)')
    .option('--only <category>', 'Only sync this category (favorite|bookmark), repeatable', parseCategory)
    .option('--page-size <n>', 'Items requested per page', parseCount)
    .option('--max-pages <n>', 'Page limit per category', parseCount)
    .option('--boundary <strategy>', 'Boundary marker (highest-id|last-archived)', parseBoundary)
    .option('--verbose', 'Verbose output', false)
    .action(async (options: SyncCommandOptions) => {
      const { exitCode } = await runSync(options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}

function toOverrides(options: SyncCommandOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.baseUrl !== undefined) overrides.baseUrl = options.baseUrl;
  if (options.token !== undefined) overrides.accessToken = options.token;
  if (options.archiveDir !== undefined) overrides.archiveDir = options.archiveDir;
  if (options.pageSize !== undefined) overrides.pageSize = options.pageSize;
  if (options.maxPages !== undefined) overrides.maxPages = options.maxPages;
  if (options.boundary !== undefined) overrides.boundary = options.boundary;
  if (options.verbose) overrides.logLevel = 'debug';
  return overrides;
}

export async function runSync(options: SyncCommandOptions, deps: SyncDependencies = {}): Promise<SyncOutcome> {
  let config: ArchiverConfig;
  try {
    config = loadConfig(deps.env ?? process.env, toOverrides(options));
  } catch (error) {
    console.error('Error:', describeError(error));
    return { exitCode: 1 };
  }

  let logPath: string;
  try {
    ({ logPath } = await ensureArchiveLayout(config.archiveDir));
  } catch (error) {
    console.error(`Error: cannot create archive directory ${config.archiveDir}:`, describeError(error));
    return { exitCode: 1 };
  }

  const sinks: LogSink[] = [new FileSink(logPath), ...(deps.sinks ?? [])];
  if (deps.console !== false) {
    sinks.push(new ConsoleSink());
  }
  const logger = new Logger({ level: config.logLevel, sinks });

  try {
    const engine = await createSyncEngine(config, logger, { fetch: deps.fetch, sleep: deps.sleep });
    const categories = options.only && options.only.length > 0 ? options.only : CATEGORIES;
    const summary = await engine.orchestrator.run(categories);
    return { exitCode: 0, summary };
  } catch (error) {
    logger.error('archival process failed', error);
    return { exitCode: 1 };
  } finally {
    await logger.close();
  }
}

// src/cli/commands/status.ts
import { Command } from 'commander';
import { DEFAULT_ARCHIVE_DIR, CATEGORY_LABELS } from '../../core/config/constants.js';
import { getArchiveLayout } from '../../core/config/layout.js';
import { describeError } from '../../core/errors.js';
import { ArchiveLedger, type CategoryStats } from '../../core/ledger/index.js';
import { CATEGORIES } from '../../core/types/index.js';

export interface StatusCommandOptions {
  archiveDir?: string;
}

export function formatCategoryStatus(label: string, stats: CategoryStats): string {
  if (stats.count === 0) {
    return `${label}: 0 archived`;
  }
  return `${label}: ${stats.count} archived (most recent: ${stats.mostRecentId}, highest id: ${stats.highestId})`;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show what the archive ledger holds')
    .option('--archive-dir <dir>', 'Archive root directory (default: $ARCHIVE_DIR or /archive)')
    .action(async (options: StatusCommandOptions) => {
      const exitCode = await runStatus(options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}

export async function runStatus(
  options: StatusCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const archiveDir = options.archiveDir ?? (env.ARCHIVE_DIR || DEFAULT_ARCHIVE_DIR);
  const layout = getArchiveLayout(archiveDir);
  const ledger = new ArchiveLedger(layout.ledgerPath);

  try {
    const stats = await ledger.stats();
    console.log(`Archive: ${layout.root}`);
    for (const category of CATEGORIES) {
      console.log(formatCategoryStatus(CATEGORY_LABELS[category], stats[category]));
    }
    return 0;
  } catch (error) {
    console.error('Error:', describeError(error));
    return 1;
  }
}

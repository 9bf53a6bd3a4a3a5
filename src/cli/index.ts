#!/usr/bin/env node

import { Command } from 'commander';
import { registerStatusCommand } from './commands/status.js';
import { registerSyncCommand } from './commands/sync.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('mastodon-archiver')
    .description('Incrementally archive favourites and bookmarks')
    .version('0.1.0');

  registerSyncCommand(program);
  registerStatusCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}

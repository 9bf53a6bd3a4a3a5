// src/core/config/layout.ts
import * as fs from 'fs/promises';
import * as path from 'path';

export interface ArchiveLayout {
  root: string;
  mediaDir: string;
  postsDir: string;
  ledgerPath: string;
  logPath: string;
}

export function getArchiveLayout(archiveDir: string): ArchiveLayout {
  const root = path.resolve(archiveDir);
  return {
    root,
    mediaDir: path.join(root, 'media'),
    postsDir: path.join(root, 'posts'),
    ledgerPath: path.join(root, 'archiver.json'),
    logPath: path.join(root, 'archiver.log'),
  };
}

export async function ensureArchiveLayout(archiveDir: string): Promise<ArchiveLayout> {
  const layout = getArchiveLayout(archiveDir);
  await fs.mkdir(layout.mediaDir, { recursive: true });
  await fs.mkdir(layout.postsDir, { recursive: true });
  return layout;
}

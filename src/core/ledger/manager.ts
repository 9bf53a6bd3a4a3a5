// src/core/ledger/manager.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { ArchiverError, ErrorCode, describeError } from '../errors.js';
import type { Category } from '../types/index.js';
import { compareIds } from '../utils.js';
import type { ArchivedItemRecord, CategoryStats, Ledger, LedgerDatabase, LedgerEntry } from './types.js';
import { getLedgerKey } from './strategy.js';

const recordSchema = z.object({
  itemId: z.string().min(1),
  category: z.enum(['favorite', 'bookmark']),
  archivedAt: z.string(),
  sourceUrl: z.string(),
  authorHandle: z.string(),
  createdAt: z.string(),
});

const databaseSchema = z.object({
  version: z.literal(1),
  records: z.array(recordSchema),
});

/**
 * Append-only record of archived (itemId, category) pairs, persisted as JSON.
 *
 * The whole document is rewritten on each commit through a temporary file and
 * a rename, so a crash leaves either the old or the new document on disk.
 */
export class ArchiveLedger implements Ledger {
  private readonly ledgerPath: string;
  private records: ArchivedItemRecord[] = [];
  private keys = new Set<string>();
  private loaded = false;
  private readonly now: () => Date;

  constructor(ledgerPath: string, options: { now?: () => Date } = {}) {
    this.ledgerPath = ledgerPath;
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<void> {
    if (this.loaded) return;

    let content: string;
    try {
      content = await fs.readFile(this.ledgerPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        // first run
        this.loaded = true;
        return;
      }
      throw new ArchiverError(ErrorCode.LEDGER_UNAVAILABLE, `Cannot read ledger ${this.ledgerPath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    let database: LedgerDatabase;
    try {
      database = databaseSchema.parse(JSON.parse(content));
    } catch (error) {
      throw new ArchiverError(ErrorCode.LEDGER_UNAVAILABLE, `Ledger ${this.ledgerPath} is corrupted: ${describeError(error)}`, {
        cause: error,
        suggestion: 'Restore the file from a backup; it is left untouched',
      });
    }

    this.records = database.records;
    this.keys = new Set(database.records.map(record => getLedgerKey(record.itemId, record.category)));
    this.loaded = true;
  }

  async exists(itemId: string, category: Category): Promise<boolean> {
    await this.ensureLoaded();
    return this.keys.has(getLedgerKey(itemId, category));
  }

  async mostRecentId(category: Category): Promise<string | undefined> {
    await this.ensureLoaded();

    let latest: ArchivedItemRecord | undefined;
    for (const record of this.records) {
      if (record.category !== category) continue;
      // >= so that ties go to the record committed last
      if (!latest || Date.parse(record.archivedAt) >= Date.parse(latest.archivedAt)) {
        latest = record;
      }
    }
    return latest?.itemId;
  }

  async highestId(category: Category): Promise<string | undefined> {
    await this.ensureLoaded();

    let highest: string | undefined;
    for (const record of this.records) {
      if (record.category !== category) continue;
      if (highest === undefined || compareIds(record.itemId, highest) > 0) {
        highest = record.itemId;
      }
    }
    return highest;
  }

  async commit(entry: LedgerEntry): Promise<boolean> {
    await this.ensureLoaded();

    const key = getLedgerKey(entry.itemId, entry.category);
    if (this.keys.has(key)) {
      return false;
    }

    const record: ArchivedItemRecord = {
      itemId: entry.itemId,
      category: entry.category,
      archivedAt: this.now().toISOString(),
      sourceUrl: entry.sourceUrl,
      authorHandle: entry.authorHandle,
      createdAt: entry.createdAt,
    };

    const next = [...this.records, record];
    try {
      await this.save({ version: 1, records: next });
    } catch (error) {
      throw new ArchiverError(ErrorCode.LEDGER_WRITE_FAILED, `Failed to commit ${entry.category} ${entry.itemId}: ${describeError(error)}`, {
        cause: error,
        context: { itemId: entry.itemId, category: entry.category },
      });
    }

    this.records = next;
    this.keys.add(key);
    return true;
  }

  async stats(): Promise<Record<Category, CategoryStats>> {
    return {
      favorite: await this.categoryStats('favorite'),
      bookmark: await this.categoryStats('bookmark'),
    };
  }

  private async categoryStats(category: Category): Promise<CategoryStats> {
    await this.ensureLoaded();
    return {
      count: this.records.filter(record => record.category === category).length,
      mostRecentId: await this.mostRecentId(category),
      highestId: await this.highestId(category),
    };
  }

  private async save(database: LedgerDatabase): Promise<void> {
    await fs.mkdir(path.dirname(this.ledgerPath), { recursive: true });
    const tempPath = `${this.ledgerPath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(database, null, 2), 'utf-8');
    await fs.rename(tempPath, this.ledgerPath);
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.load();
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// src/core/ledger/types.ts
import type { Category } from '../types/index.js';

export interface ArchivedItemRecord {
  itemId: string;
  category: Category;
  archivedAt: string;     // ISO 8601, set at insert
  sourceUrl: string;
  authorHandle: string;
  createdAt: string;      // as provided by the server
}

/** Fields supplied by the caller; `archivedAt` is stamped by the ledger. */
export type LedgerEntry = Omit<ArchivedItemRecord, 'archivedAt'>;

export interface LedgerDatabase {
  version: 1;
  records: ArchivedItemRecord[];
}

export interface CategoryStats {
  count: number;
  mostRecentId?: string;
  highestId?: string;
}

/** Read side used for boundary computation and dedup checks. */
export interface LedgerReader {
  exists(itemId: string, category: Category): Promise<boolean>;
  mostRecentId(category: Category): Promise<string | undefined>;
  highestId(category: Category): Promise<string | undefined>;
}

export interface LedgerWriter {
  /** Resolves `false` when the key was already present. */
  commit(entry: LedgerEntry): Promise<boolean>;
}

export type Ledger = LedgerReader & LedgerWriter;

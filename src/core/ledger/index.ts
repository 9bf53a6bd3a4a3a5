// src/core/ledger/index.ts
export { ArchiveLedger } from './manager.js';
export { getBoundaryId, getLedgerKey } from './strategy.js';
export type {
  ArchivedItemRecord,
  CategoryStats,
  Ledger,
  LedgerDatabase,
  LedgerEntry,
  LedgerReader,
  LedgerWriter,
} from './types.js';

// src/core/ledger/strategy.ts
import type { BoundaryStrategy, Category } from '../types/index.js';
import type { LedgerReader } from './types.js';

export function getLedgerKey(itemId: string, category: Category): string {
  return `${category}:${itemId}`;
}

/**
 * Boundary marker for pagination.
 * 'last-archived' follows commit time, 'highest-id' follows the ids themselves
 * and stays correct when a previous run archived items out of order.
 */
export function getBoundaryId(
  ledger: LedgerReader,
  category: Category,
  strategy: BoundaryStrategy
): Promise<string | undefined> {
  return strategy === 'highest-id'
    ? ledger.highestId(category)
    : ledger.mostRecentId(category);
}

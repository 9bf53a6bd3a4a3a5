// src/cli/commands/options.ts
import { InvalidArgumentError } from 'commander';
import { parseBoundaryStrategy, parsePositiveIntOption } from '../../core/config/env.js';
import type { BoundaryStrategy, Category } from '../../core/types/index.js';
import { CATEGORIES } from '../../core/types/index.js';

export function parseCategory(value: string, previous: Category[] = []): Category[] {
  const category = CATEGORIES.find(candidate => candidate === value);
  if (!category) {
    throw new InvalidArgumentError(`Invalid category: ${value}. Use favorite or bookmark`);
  }
  return previous.includes(category) ? previous : [...previous, category];
}

export function parseCount(value: string): number {
  try {
    return parsePositiveIntOption('value', value);
  } catch {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
}

export function parseBoundary(value: string): BoundaryStrategy {
  try {
    return parseBoundaryStrategy(value);
  } catch {
    throw new InvalidArgumentError(`Invalid boundary: ${value}. Use highest-id or last-archived`);
  }
}

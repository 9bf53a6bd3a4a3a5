// src/core/config/env.ts
/**
 * Archiver configuration from environment variables, with CLI overrides.
 * Validation happens before any I/O so a bad configuration leaves no partial state.
 */
import { ArchiverError, ErrorCode } from '../errors.js';
import type { LogLevel } from '../logging/logger.js';
import type { BoundaryStrategy } from '../types/index.js';
import { isValidUrl } from '../utils.js';
import {
  DEFAULT_ARCHIVE_DIR,
  DEFAULT_BOUNDARY,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_DELAY_MS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TIMEOUT,
} from './constants.js';

export interface ArchiverConfig {
  /** Server base URL without trailing slash */
  baseUrl: string;
  accessToken: string;
  archiveDir: string;
  pageSize: number;
  maxPages: number;
  pageDelayMs: number;
  requestTimeoutMs: number;
  boundary: BoundaryStrategy;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<ArchiverConfig>;

const requiredEnvVars = ['MASTODON_BASE_URL', 'MASTODON_ACCESS_TOKEN'] as const;

const BOUNDARY_STRATEGIES: readonly BoundaryStrategy[] = ['highest-id', 'last-archived'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function invalid(message: string, suggestion?: string): ArchiverError {
  return new ArchiverError(ErrorCode.CONFIG_INVALID, message, { suggestion });
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number, allowZero = false): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || (value === 0 && !allowZero)) {
    throw invalid(`${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got "${raw}"`);
  }
  return value;
}

export function parseBoundaryStrategy(value: string): BoundaryStrategy {
  const match = BOUNDARY_STRATEGIES.find(strategy => strategy === value);
  if (!match) {
    throw invalid(`Invalid boundary strategy: ${value}. Use ${BOUNDARY_STRATEGIES.join(' or ')}`);
  }
  return match;
}

function parseLogLevel(value: string): LogLevel {
  const match = LOG_LEVELS.find(level => level === value.toLowerCase());
  if (!match) {
    throw invalid(`Invalid log level: ${value}. Use ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}

/**
 * Builds the configuration, throwing CONFIG_INVALID on the first problem.
 * Every missing required variable is reported at once.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): ArchiverConfig {
  const values: Record<(typeof requiredEnvVars)[number], string | undefined> = {
    MASTODON_BASE_URL: overrides.baseUrl ?? env.MASTODON_BASE_URL,
    MASTODON_ACCESS_TOKEN: overrides.accessToken ?? env.MASTODON_ACCESS_TOKEN,
  };

  const missing = requiredEnvVars.filter(name => !values[name]);
  if (missing.length > 0) {
    throw invalid(
      `Missing required env var${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
      'Set them in the environment or pass --base-url/--token'
    );
  }

  const baseUrl = (values.MASTODON_BASE_URL ?? '').replace(/\/+$/, '');
  if (!isValidUrl(baseUrl)) {
    throw invalid(`MASTODON_BASE_URL must be an http(s) URL, got "${values.MASTODON_BASE_URL}"`);
  }

  return {
    baseUrl,
    accessToken: values.MASTODON_ACCESS_TOKEN ?? '',
    archiveDir: overrides.archiveDir ?? (env.ARCHIVE_DIR || DEFAULT_ARCHIVE_DIR),
    pageSize: overrides.pageSize ?? parsePositiveInt('ARCHIVER_PAGE_SIZE', env.ARCHIVER_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    maxPages: overrides.maxPages ?? parsePositiveInt('ARCHIVER_MAX_PAGES', env.ARCHIVER_MAX_PAGES, DEFAULT_MAX_PAGES),
    pageDelayMs:
      overrides.pageDelayMs ??
      parsePositiveInt('ARCHIVER_PAGE_DELAY_MS', env.ARCHIVER_PAGE_DELAY_MS, DEFAULT_PAGE_DELAY_MS, true),
    requestTimeoutMs:
      overrides.requestTimeoutMs ??
      parsePositiveInt('ARCHIVER_REQUEST_TIMEOUT_MS', env.ARCHIVER_REQUEST_TIMEOUT_MS, DEFAULT_TIMEOUT),
    boundary: overrides.boundary ?? (env.ARCHIVER_BOUNDARY ? parseBoundaryStrategy(env.ARCHIVER_BOUNDARY) : DEFAULT_BOUNDARY),
    logLevel: overrides.logLevel ?? (env.ARCHIVER_LOG_LEVEL ? parseLogLevel(env.ARCHIVER_LOG_LEVEL) : 'info'),
  };
}

export function parsePositiveIntOption(name: string, raw: string): number {
  if (raw.trim() === '') {
    throw invalid(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsePositiveInt(name, raw, 0);
}

// src/core/errors.ts
import { ZodError } from 'zod';

export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  TIMEOUT = 'timeout',
  HTTP_ERROR = 'http_error',
  RATE_LIMITED = 'rate_limited',
  DECODE_FAILED = 'decode_failed',
  MEDIA_DOWNLOAD_FAILED = 'media_download_failed',
  RECORD_WRITE_FAILED = 'record_write_failed',
  LEDGER_WRITE_FAILED = 'ledger_write_failed',
  LEDGER_UNAVAILABLE = 'ledger_unavailable',
  CONFIG_INVALID = 'config_invalid',
}

/** Codes that end the whole run. */
export type FatalErrorCode = ErrorCode.LEDGER_UNAVAILABLE | ErrorCode.CONFIG_INVALID;

/** Codes scoped to one page or one item; the next run retries them. */
export type RecoverableErrorCode = Exclude<ErrorCode, FatalErrorCode>;

const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.LEDGER_UNAVAILABLE,
  ErrorCode.CONFIG_INVALID,
]);

export class ArchiverError<C extends ErrorCode = ErrorCode> extends Error {
  code: C;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: C,
    message: string,
    options: {
      retryable?: boolean;
      suggestion?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ArchiverError';
    this.code = code;
    this.retryable = options.retryable ?? !FATAL_CODES.has(code);
    this.suggestion = options.suggestion;
    this.context = options.context;
    Object.setPrototypeOf(this, ArchiverError.prototype);
  }
}

export type RecoverableError = ArchiverError<RecoverableErrorCode>;
export type FatalError = ArchiverError<FatalErrorCode>;

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof ArchiverError && FATAL_CODES.has(error.code);
}

export function isRecoverableError(error: unknown): error is RecoverableError {
  return error instanceof ArchiverError && !FATAL_CODES.has(error.code);
}

/** One-line description; validation issues are flattened to `path: message` pairs. */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

// src/core/__tests__/errors.test.ts
import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { ArchiverError, ErrorCode, describeError, isFatalError, isRecoverableError } from '../errors.js';

describe('ArchiverError', () => {
  it('should create error with all properties', () => {
    const cause = new Error('socket hang up');
    const error = new ArchiverError(ErrorCode.NETWORK_ERROR, 'Network connection failed', {
      suggestion: 'Check your internet connection',
      context: { url: 'https://social.example' },
      cause,
    });

    expect(error).toBeInstanceOf(ArchiverError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ArchiverError');
    expect(error.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(error.message).toBe('Network connection failed');
    expect(error.retryable).toBe(true);
    expect(error.suggestion).toBe('Check your internet connection');
    expect(error.context).toEqual({ url: 'https://social.example' });
    expect(error.cause).toBe(cause);
  });

  it('should not be retryable for fatal codes', () => {
    expect(new ArchiverError(ErrorCode.LEDGER_UNAVAILABLE, 'corrupt').retryable).toBe(false);
    expect(new ArchiverError(ErrorCode.CONFIG_INVALID, 'missing').retryable).toBe(false);
  });

  it('should allow overriding retryable', () => {
    expect(new ArchiverError(ErrorCode.HTTP_ERROR, 'HTTP 404', { retryable: false }).retryable).toBe(false);
  });
});

describe('error classification', () => {
  it('should treat ledger and configuration problems as fatal', () => {
    const fatal = new ArchiverError(ErrorCode.LEDGER_UNAVAILABLE, 'corrupt');

    expect(isFatalError(fatal)).toBe(true);
    expect(isRecoverableError(fatal)).toBe(false);
  });

  it('should treat item and page problems as recoverable', () => {
    for (const code of [
      ErrorCode.NETWORK_ERROR,
      ErrorCode.TIMEOUT,
      ErrorCode.HTTP_ERROR,
      ErrorCode.RATE_LIMITED,
      ErrorCode.DECODE_FAILED,
      ErrorCode.MEDIA_DOWNLOAD_FAILED,
      ErrorCode.RECORD_WRITE_FAILED,
      ErrorCode.LEDGER_WRITE_FAILED,
    ]) {
      const error = new ArchiverError(code, 'failed');
      expect(isRecoverableError(error)).toBe(true);
      expect(isFatalError(error)).toBe(false);
    }
  });

  it('should classify plain errors as neither', () => {
    expect(isFatalError(new Error('boom'))).toBe(false);
    expect(isRecoverableError(new Error('boom'))).toBe(false);
    expect(isRecoverableError('boom')).toBe(false);
  });
});

describe('describeError', () => {
  it('should use the message of errors and stringify anything else', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });

  it('should flatten validation issues onto one line', () => {
    const result = z.object({ version: z.literal(1), records: z.array(z.string()) }).safeParse({ version: 1, records: [3] });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(describeError(result.error)).toBe('records.0: Expected string, received number');
  });
});

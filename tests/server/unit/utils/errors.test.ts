import { describe, expect, it } from 'vitest';
import {
  AppError,
  ErrorCode,
  IndexUploadError,
  ReportParseError,
  isOperationalError,
  toAppError,
} from '../../../../src/server/types/errors.js';

describe('errors', () => {
  it('carries code, status and context', () => {
    const error = new ReportParseError('run-7.html', 'document is empty', { bytes: 0 });

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('ReportParseError');
    expect(error.code).toBe(ErrorCode.REPORT_PARSE_ERROR);
    expect(error.statusCode).toBe(422);
    expect(error.context).toEqual({ source: 'run-7.html', reason: 'document is empty', bytes: 0 });
  });

  it('marks domain errors as operational', () => {
    expect(isOperationalError(new IndexUploadError('test_results', 'timeout'))).toBe(true);
    expect(isOperationalError(new Error('boom'))).toBe(false);
  });

  it('wraps unknown errors as internal', () => {
    const known = new IndexUploadError('test_results', 'timeout');
    expect(toAppError(known)).toBe(known);

    const wrapped = toAppError(new TypeError('x is undefined'));
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('x is undefined');
    expect(wrapped.isOperational).toBe(false);

    expect(toAppError('nope').message).toBe('An unexpected error occurred');
  });
});

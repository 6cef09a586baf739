import { describe, expect, it } from 'vitest';
import { ErrorCategory, Logger } from '../../src/utils/logger';

describe('Logger.categorizeError', () => {
  it('categorizes network errors', () => {
    expect(Logger.categorizeError(new Error('ETIMEDOUT socket hang up'))).toBe(ErrorCategory.NETWORK);
  });

  it('categorizes network errors by code', () => {
    const err = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });
    expect(Logger.categorizeError(err)).toBe(ErrorCategory.NETWORK);
  });

  it('categorizes rendered-page failures', () => {
    expect(Logger.categorizeError(new Error('render service target closed'))).toBe(ErrorCategory.BROWSER);
  });

  it('categorizes parsing errors', () => {
    expect(Logger.categorizeError(new Error('Unexpected token in JSON at position 2'))).toBe(ErrorCategory.PARSING);
  });

  it('categorizes validation errors', () => {
    expect(Logger.categorizeError(new Error('Validation failed: zod invalid input'))).toBe(ErrorCategory.VALIDATION);
  });

  it('categorizes auth errors', () => {
    expect(Logger.categorizeError(new Error('429 rate limit exceeded api key'))).toBe(ErrorCategory.AUTH);
  });

  it('categorizes filesystem errors', () => {
    const err = Object.assign(new Error('EISDIR: illegal operation on a directory, open'), { code: 'EISDIR' });
    expect(Logger.categorizeError(err)).toBe(ErrorCategory.IO);
  });

  it('falls back to logic errors', () => {
    expect(Logger.categorizeError(new Error('unhandled branch'))).toBe(ErrorCategory.LOGIC);
  });

  it('logs non-Error values without throwing', () => {
    expect(() => Logger.logError('boom', 'plain string')).not.toThrow();
  });
});

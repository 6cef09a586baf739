import { describe, expect, it } from 'vitest';
import { ConfigurationError, NetworkError, PersistenceError, PipelineError, ValidationError } from '../../src/utils/errors';

describe('pipeline errors', () => {
  it('retries connection failures, 429 and 5xx only', () => {
    expect(new NetworkError('reset', 'https://acme.it').retryable).toBe(true);
    expect(new NetworkError('HTTP 429', 'https://acme.it', 429).retryable).toBe(true);
    expect(new NetworkError('HTTP 503', 'https://acme.it', 503).retryable).toBe(true);
    expect(new NetworkError('HTTP 404', 'https://acme.it', 404).retryable).toBe(false);
  });

  it('marks startup errors as fatal', () => {
    expect(new ConfigurationError('missing key').fatal).toBe(true);
    expect(new ValidationError('bad option').fatal).toBe(true);
    expect(new NetworkError('reset', 'https://acme.it').fatal).toBe(false);
  });

  it('names the unusable output path', () => {
    const error = new PersistenceError('Output path is not a regular file', '/tmp/out.csv');
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.name).toBe('PersistenceError');
    expect(error.code).toBe('PERSISTENCE_ERROR');
    expect(error.message).toBe('Output path is not a regular file (/tmp/out.csv)');
    expect(error.context).toEqual({ path: '/tmp/out.csv' });
  });
});

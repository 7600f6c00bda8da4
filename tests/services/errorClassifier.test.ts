import {
  classifyProviderError,
  extractRetryAfterSeconds,
  toProviderError,
} from '../../src/services/ai/errorClassifier';
import { ProviderError } from '../../src/services/ai/errors';

describe('classifyProviderError', () => {
  it.each([
    [{ status: 401 }, 'auth'],
    [{ statusCode: 403 }, 'auth'],
    [new Error('API key not valid. Please pass a valid API key.'), 'auth'],
    [new Error('Quota exceeded for quota metric'), 'exhausted'],
    [new Error('You exceeded your current quota'), 'exhausted'],
    [{ status: 429 }, 'rate_limited'],
    [new Error('Rate limit reached, retry after 20s'), 'rate_limited'],
    [{ status: '503' }, 'transient'],
    [new Error('socket hang up'), 'transient'],
    [new Error('Unexpected response shape'), 'error'],
    ['plain failure', 'error'],
  ])('classifies %p as %s', (error, kind) => {
    expect(classifyProviderError(error)).toBe(kind);
  });
});

describe('extractRetryAfterSeconds', () => {
  it('reads a retry hint from the error or its message', () => {
    expect(extractRetryAfterSeconds({ retryAfter: '30' })).toBe(30);
    expect(extractRetryAfterSeconds(new Error('Please retry in 12.5 seconds'))).toBe(12.5);
    expect(extractRetryAfterSeconds(new Error('no hint'))).toBeUndefined();
  });
});

describe('toProviderError', () => {
  it('wraps unknown errors with kind, status and provider', () => {
    const cause = Object.assign(new Error('Too many requests'), { status: 429 });

    const error = toProviderError(cause, 'gemini');

    expect(error).toBeInstanceOf(ProviderError);
    expect(error.kind).toBe('rate_limited');
    expect(error.status).toBe(429);
    expect(error.provider).toBe('gemini');
    expect(error.message).toBe('Too many requests');
    expect(error.cause).toBe(cause);
    expect(error.isQuota).toBe(true);
    expect(error.disablesProvider).toBe(false);
  });

  it('passes provider errors through untouched', () => {
    const original = new ProviderError('exhausted', 'mistral', 'Quota exceeded');

    expect(toProviderError(original, 'gemini')).toBe(original);
    expect(original.disablesProvider).toBe(true);
  });
});

import { ProviderError } from '../../src/services/ai/errors';
import { ProviderMetrics } from '../../src/services/ai/providerMetrics';

describe('ProviderMetrics', () => {
  let clock: number;
  let metrics: ProviderMetrics;

  beforeEach(() => {
    clock = 0;
    metrics = new ProviderMetrics({ now: () => clock });
  });

  it('tracks requests and smooths latency', () => {
    metrics.recordSuccess('gemini', 100);
    clock += 10;
    metrics.recordSuccess('gemini', 200);

    expect(metrics.snapshot('gemini', true)).toEqual({
      name: 'gemini',
      health: 'OK',
      requestsLastMinute: 2,
      errorsLast15m: 0,
      avgLatencyMs: 130,
      lastError: null,
      retryAfterSeconds: 0,
    });
  });

  it('reports a rate limit until the retry window passes', () => {
    metrics.recordFailure(new ProviderError('rate_limited', 'gemini', 'Too many requests', { retryAfterSeconds: 30 }));

    expect(metrics.snapshot('gemini', true)).toMatchObject({
      health: 'RATE_LIMITED',
      retryAfterSeconds: 30,
      errorsLast15m: 1,
      lastError: 'Too many requests',
    });

    clock += 30_000;
    expect(metrics.snapshot('gemini', true)).toMatchObject({ health: 'OK', retryAfterSeconds: 0 });
  });

  it('marks exhausted providers until a call succeeds', () => {
    metrics.recordFailure(new ProviderError('exhausted', 'mistral', 'Quota exceeded'));
    expect(metrics.snapshot('mistral', true).health).toBe('EXHAUSTED');

    metrics.recordSuccess('mistral', 50);
    expect(metrics.snapshot('mistral', true).health).toBe('OK');
  });

  it('degrades after repeated transient errors and recovers once they age out', () => {
    for (let index = 0; index < 3; index += 1) {
      metrics.recordFailure(new ProviderError('transient', 'gemini', 'Upstream timeout'));
    }
    expect(metrics.snapshot('gemini', true).health).toBe('DEGRADED');

    clock += 15 * 60_000;
    expect(metrics.snapshot('gemini', true)).toMatchObject({ health: 'OK', errorsLast15m: 0 });
  });

  it('reports unconfigured providers as unknown', () => {
    expect(metrics.snapshot('openrouter', false).health).toBe('UNKNOWN');
  });
});

import { ProviderError, ProviderErrorKind } from './errors';

const AUTH_MARKERS = ['invalid api key', 'api key not valid', 'incorrect api key', 'permission denied', 'unauthorized', 'forbidden'];

const EXHAUSTED_MARKERS = [
  'quota exceeded',
  'resource_exhausted',
  'insufficient_quota',
  'project quota/billing',
  'exceeded your current quota',
];

const RATE_LIMIT_MARKERS = ['rate limit', 'rate-limited', 'retry after', 'retry in', '429'];

const TRANSIENT_MARKERS = [
  'timeout',
  'timed out',
  'connection reset',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'temporarily unavailable',
  'service unavailable',
  'bad record mac',
];

const TRANSIENT_STATUSES = new Set([500, 502, 503, 504]);

const RETRY_AFTER_PATTERN = /(?:retry\s+after|retry\s+in)\s+([0-9]+(?:\.[0-9]+)?)/i;

function readNumber(source: unknown, key: string): number | undefined {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

export function readStatus(error: unknown): number | undefined {
  return readNumber(error, 'status') ?? readNumber(error, 'statusCode');
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : '';
}

export function classifyProviderError(error: unknown, status = readStatus(error)): ProviderErrorKind {
  const message = describe(error).toLowerCase();
  const includesAny = (markers: string[]) => markers.some((marker) => message.includes(marker));

  if (status === 401 || status === 403 || includesAny(AUTH_MARKERS)) {
    return 'auth';
  }
  if (includesAny(EXHAUSTED_MARKERS)) {
    return 'exhausted';
  }
  if (status === 429 || includesAny(RATE_LIMIT_MARKERS)) {
    return 'rate_limited';
  }
  if ((status !== undefined && TRANSIENT_STATUSES.has(status)) || includesAny(TRANSIENT_MARKERS)) {
    return 'transient';
  }
  return 'error';
}

export function extractRetryAfterSeconds(error: unknown): number | undefined {
  const direct = readNumber(error, 'retryAfter');
  if (direct !== undefined && direct > 0) {
    return direct;
  }
  const match = RETRY_AFTER_PATTERN.exec(describe(error));
  if (match) {
    const value = Number(match[1]);
    return value > 0 ? value : undefined;
  }
  return undefined;
}

export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const status = readStatus(error);
  const message = error instanceof Error && error.message ? error.message : 'Provider request failed';
  return new ProviderError(classifyProviderError(error, status), provider, message, {
    status,
    retryAfterSeconds: extractRetryAfterSeconds(error),
    cause: error,
  });
}

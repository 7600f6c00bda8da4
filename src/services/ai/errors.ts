export type ProviderErrorKind = 'rate_limited' | 'exhausted' | 'auth' | 'transient' | 'error';

export class ProviderError extends Error {
  public readonly kind: ProviderErrorKind;

  public readonly provider: string;

  public readonly status?: number;

  public readonly retryAfterSeconds?: number;

  constructor(
    kind: ProviderErrorKind,
    provider: string,
    message: string,
    { status, retryAfterSeconds, cause }: { status?: number; retryAfterSeconds?: number; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.provider = provider;
    this.status = status;
    this.retryAfterSeconds = retryAfterSeconds;
    this.cause = cause;
  }

  /** Quota and rate-limit failures. */
  get isQuota(): boolean {
    return this.kind === 'rate_limited' || this.kind === 'exhausted';
  }

  /** Failures that will repeat for every remaining section. */
  get disablesProvider(): boolean {
    return this.kind === 'auth' || this.kind === 'exhausted';
  }
}

export class GenerationCancelledError extends Error {
  constructor(message = 'Generation cancelled by client') {
    super(message);
    this.name = 'GenerationCancelledError';
  }
}

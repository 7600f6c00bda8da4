import { ProviderError, ProviderErrorKind } from './errors';

export type ProviderHealthState = 'OK' | 'RATE_LIMITED' | 'EXHAUSTED' | 'DEGRADED' | 'UNKNOWN';

export interface ProviderRuntimeSnapshot {
  name: string;
  health: ProviderHealthState;
  requestsLastMinute: number;
  errorsLast15m: number;
  avgLatencyMs: number;
  lastError: string | null;
  retryAfterSeconds: number;
}

interface RuntimeState {
  requests: number[];
  errors: Array<{ at: number; kind: ProviderErrorKind }>;
  latencyEmaMs: number | null;
  lastError: string | null;
  rateLimitedUntil: number | null;
  exhausted: boolean;
}

const REQUEST_WINDOW_MS = 60_000;
const ERROR_WINDOW_MS = 15 * 60_000;
const DEFAULT_RATE_LIMIT_SECONDS = 10;
const DEGRADED_AFTER_TRANSIENT_ERRORS = 3;
const LAST_ERROR_LENGTH = 240;

/**
 * In-memory health per provider, fed by every provider call of every run.
 * State lives for the lifetime of the process.
 */
export class ProviderMetrics {
  private readonly runtime = new Map<string, RuntimeState>();

  private readonly now: () => number;

  constructor({ now = Date.now }: { now?: () => number } = {}) {
    this.now = now;
  }

  recordSuccess(provider: string, latencyMs: number): void {
    const at = this.now();
    const state = this.trimmed(provider, at);
    state.requests.push(at);
    state.latencyEmaMs = state.latencyEmaMs === null ? latencyMs : 0.7 * state.latencyEmaMs + 0.3 * latencyMs;
    state.exhausted = false;
  }

  recordFailure(error: ProviderError, latencyMs?: number): void {
    const at = this.now();
    const state = this.trimmed(error.provider, at);
    if (latencyMs !== undefined) {
      state.latencyEmaMs = state.latencyEmaMs === null ? latencyMs : 0.8 * state.latencyEmaMs + 0.2 * latencyMs;
    }
    state.lastError = error.message.trim().slice(0, LAST_ERROR_LENGTH);
    state.errors.push({ at, kind: error.kind });

    if (error.kind === 'exhausted') {
      state.exhausted = true;
    }
    if (error.kind === 'rate_limited') {
      const waitSeconds = Math.max(1, Math.round(error.retryAfterSeconds ?? DEFAULT_RATE_LIMIT_SECONDS));
      state.rateLimitedUntil = at + waitSeconds * 1000;
    }
  }

  snapshot(provider: string, configured: boolean): ProviderRuntimeSnapshot {
    const at = this.now();
    const state = this.trimmed(provider, at);
    const retryAfterSeconds = state.rateLimitedUntil === null ? 0 : Math.ceil((state.rateLimitedUntil - at) / 1000);

    return {
      name: provider,
      health: this.deriveHealth(state, configured),
      requestsLastMinute: state.requests.length,
      errorsLast15m: state.errors.length,
      avgLatencyMs: Math.round(state.latencyEmaMs ?? 0),
      lastError: state.lastError,
      retryAfterSeconds,
    };
  }

  private deriveHealth(state: RuntimeState, configured: boolean): ProviderHealthState {
    if (!configured) {
      return 'UNKNOWN';
    }
    if (state.exhausted) {
      return 'EXHAUSTED';
    }
    if (state.rateLimitedUntil !== null) {
      return 'RATE_LIMITED';
    }
    const transient = state.errors.filter((entry) => entry.kind === 'transient').length;
    return transient >= DEGRADED_AFTER_TRANSIENT_ERRORS ? 'DEGRADED' : 'OK';
  }

  private trimmed(provider: string, at: number): RuntimeState {
    let state = this.runtime.get(provider);
    if (!state) {
      state = { requests: [], errors: [], latencyEmaMs: null, lastError: null, rateLimitedUntil: null, exhausted: false };
      this.runtime.set(provider, state);
    }
    state.requests = state.requests.filter((requestAt) => at - requestAt < REQUEST_WINDOW_MS);
    state.errors = state.errors.filter((entry) => at - entry.at < ERROR_WINDOW_MS);
    if (state.rateLimitedUntil !== null && state.rateLimitedUntil <= at) {
      state.rateLimitedUntil = null;
    }
    return state;
  }
}

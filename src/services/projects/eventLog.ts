import { EventStatus, Progress, ProjectEvent } from '../../models/Project';

export const EVENT_LOG_CAPACITY = 200;

export interface EventInput {
  step: string;
  status: EventStatus;
  title: string;
  detail?: string;
  meta?: Record<string, unknown>;
  preview?: Record<string, string>;
}

export function createEvent(input: EventInput, now: Date = new Date()): ProjectEvent {
  return {
    ts: now.toISOString(),
    step: input.step,
    status: input.status,
    title: input.title,
    detail: input.detail ?? '',
    meta: input.meta ?? {},
    preview: input.preview ?? {},
  };
}

/** Appends in order and keeps only the newest `capacity` entries. */
export function appendEvents(
  existing: readonly ProjectEvent[],
  incoming: readonly ProjectEvent[],
  capacity = EVENT_LOG_CAPACITY
): ProjectEvent[] {
  const merged = [...existing, ...incoming];
  return merged.length > capacity ? merged.slice(merged.length - capacity) : merged;
}

export function emptyProgress(): Progress {
  return {
    current: 0,
    total: 0,
    currentPath: null,
    provider: null,
    updatedAt: null,
  };
}

export function startProgress(total: number, now: Date = new Date()): Progress {
  return {
    current: 0,
    total,
    currentPath: null,
    provider: null,
    updatedAt: now.toISOString(),
  };
}

/**
 * `current` only moves forward and is clamped to `total`.
 */
export function advanceProgress(
  progress: Progress,
  update: { current?: number; currentPath?: string | null; provider?: string | null },
  now: Date = new Date()
): Progress {
  const requested = update.current ?? progress.current;
  const current = Math.min(progress.total, Math.max(progress.current, requested));
  return {
    current,
    total: progress.total,
    currentPath: update.currentPath === undefined ? progress.currentPath : update.currentPath,
    provider: update.provider === undefined ? progress.provider : update.provider,
    updatedAt: now.toISOString(),
  };
}

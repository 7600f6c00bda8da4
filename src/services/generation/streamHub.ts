import { Response } from 'express';
import { Logger } from 'pino';
import baseLogger from '../../utils/logger';

export type StreamEventName = 'start' | 'snapshot' | 'progress' | 'event' | 'heartbeat' | 'error' | 'done';

interface SseSubscription {
  res: Response;
  heartbeat: NodeJS.Timeout;
}

export function formatSseMessage(event: StreamEventName, payload?: unknown): string {
  const serialised = payload === undefined ? '' : JSON.stringify(payload);
  return `event: ${event}\ndata: ${serialised}\n\n`;
}

/**
 * Server-sent event subscribers per project. Subscribers are passive:
 * closing a stream never affects the run itself.
 */
export class StreamHub {
  private readonly subscriptions = new Map<string, Set<SseSubscription>>();

  private readonly heartbeatMs: number;

  private readonly logger: Logger;

  constructor({ heartbeatMs, logger }: { heartbeatMs: number; logger?: Logger }) {
    this.heartbeatMs = heartbeatMs;
    this.logger = logger ?? baseLogger.child({ module: 'stream-hub' });
  }

  register(projectId: string, res: Response): void {
    let subscribers = this.subscriptions.get(projectId);
    if (!subscribers) {
      subscribers = new Set();
      this.subscriptions.set(projectId, subscribers);
    }

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) {
        res.write(formatSseMessage('heartbeat', { ts: new Date().toISOString() }));
      }
    }, this.heartbeatMs);
    heartbeat.unref?.();

    const subscription: SseSubscription = { res, heartbeat };
    subscribers.add(subscription);

    const handleClose = () => {
      clearInterval(heartbeat);
      const current = this.subscriptions.get(projectId);
      current?.delete(subscription);
      if (current && current.size === 0) {
        this.subscriptions.delete(projectId);
      }
      this.logger.debug({ projectId, subscribers: current?.size ?? 0 }, 'sse subscriber disconnected');
    };

    res.on('close', handleClose);
    res.on('error', handleClose);
  }

  subscriberCount(projectId: string): number {
    return this.subscriptions.get(projectId)?.size ?? 0;
  }

  emit(projectId: string, event: StreamEventName, payload?: unknown): void {
    const subscribers = this.subscriptions.get(projectId);
    if (!subscribers || subscribers.size === 0) {
      return;
    }

    const message = formatSseMessage(event, payload);
    for (const { res } of subscribers) {
      if (!res.writableEnded) {
        res.write(message);
      }
    }
  }

  finish(projectId: string, payload?: unknown): void {
    const subscribers = this.subscriptions.get(projectId);
    if (!subscribers) {
      return;
    }

    subscribers.forEach(({ res, heartbeat }) => {
      clearInterval(heartbeat);
      if (!res.writableEnded) {
        if (payload !== undefined) {
          res.write(formatSseMessage('done', payload));
        }
        res.end();
      }
    });

    this.subscriptions.delete(projectId);
  }

  closeAll(): void {
    [...this.subscriptions.keys()].forEach((projectId) => this.finish(projectId));
  }
}

import pLimit from 'p-limit';
import { Logger } from 'pino';
import baseLogger from '../../utils/logger';

export type QueueTask = () => Promise<void>;

export type EnqueueResult = 'accepted' | 'duplicate' | 'closed';

/**
 * Runs at most `concurrency` generation runs at once. A project id is held
 * from enqueue until its task settles, so duplicates are refused.
 */
export class GenerationQueue {
  private readonly limit: ReturnType<typeof pLimit>;

  private readonly pending = new Map<string, Promise<void>>();

  private readonly active = new Set<string>();

  private closed = false;

  private readonly logger: Logger;

  constructor({ concurrency, logger }: { concurrency: number; logger?: Logger }) {
    this.limit = pLimit(Math.max(1, concurrency));
    this.logger = logger ?? baseLogger.child({ module: 'generation-queue' });
  }

  has(projectId: string): boolean {
    return this.pending.has(projectId);
  }

  isRunning(projectId: string): boolean {
    return this.active.has(projectId);
  }

  get size(): number {
    return this.pending.size;
  }

  enqueue(projectId: string, task: QueueTask): EnqueueResult {
    if (this.closed) {
      return 'closed';
    }
    if (this.pending.has(projectId)) {
      return 'duplicate';
    }

    const run = this.limit(async () => {
      this.active.add(projectId);
      try {
        await task();
      } finally {
        this.active.delete(projectId);
      }
    })
      .catch((error) => {
        this.logger.error({ err: error, projectId }, 'generation task crashed');
      })
      .finally(() => {
        this.pending.delete(projectId);
      });

    this.pending.set(projectId, run);
    this.logger.debug({ projectId, queued: this.limit.pendingCount, running: this.limit.activeCount }, 'generation task queued');
    return 'accepted';
  }

  /** Resolves once the project's task has settled; immediately when none. */
  async wait(projectId: string): Promise<void> {
    await this.pending.get(projectId);
  }

  /** Stops accepting work and waits for everything already accepted. */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.all([...this.pending.values()]);
  }
}

import { GenerationQueue } from '../../src/services/generation/generationQueue';
import { StreamHub, formatSseMessage } from '../../src/services/generation/streamHub';
import WebhookNotifier, { WEBHOOK_SECRET_HEADER } from '../../src/services/webhookNotifier';
import { MockSseResponse, asResponse } from '../helpers/fixtures';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('GenerationQueue', () => {
  it('runs no more than the configured number of tasks at once', async () => {
    const queue = new GenerationQueue({ concurrency: 1 });
    const order: string[] = [];
    const gate = deferred();

    expect(
      queue.enqueue('p1', async () => {
        order.push('p1:start');
        await gate.promise;
        order.push('p1:end');
      })
    ).toBe('accepted');
    expect(
      queue.enqueue('p2', async () => {
        order.push('p2:start');
      })
    ).toBe('accepted');

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(['p1:start']);
    expect(queue.isRunning('p1')).toBe(true);
    expect(queue.isRunning('p2')).toBe(false);
    expect(queue.size).toBe(2);

    gate.resolve();
    await queue.wait('p2');
    expect(order).toEqual(['p1:start', 'p1:end', 'p2:start']);
    expect(queue.size).toBe(0);
  });

  it('refuses a second task for the same project', async () => {
    const queue = new GenerationQueue({ concurrency: 2 });
    const gate = deferred();

    queue.enqueue('p1', () => gate.promise);

    expect(queue.enqueue('p1', async () => undefined)).toBe('duplicate');
    gate.resolve();
    await queue.wait('p1');
    expect(queue.has('p1')).toBe(false);
  });

  it('releases a project whose task crashed', async () => {
    const queue = new GenerationQueue({ concurrency: 1 });

    queue.enqueue('p1', async () => {
      throw new Error('boom');
    });
    await queue.wait('p1');

    expect(queue.has('p1')).toBe(false);
    expect(queue.enqueue('p1', async () => undefined)).toBe('accepted');
    await queue.wait('p1');
  });

  it('drains accepted work on close and refuses new work', async () => {
    const queue = new GenerationQueue({ concurrency: 1 });
    let finished = false;
    queue.enqueue('p1', async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      finished = true;
    });

    await queue.close();

    expect(finished).toBe(true);
    expect(queue.enqueue('p2', async () => undefined)).toBe('closed');
  });
});

describe('StreamHub', () => {
  it('formats server-sent event frames', () => {
    expect(formatSseMessage('progress', { current: 1 })).toBe('event: progress\ndata: {"current":1}\n\n');
    expect(formatSseMessage('heartbeat')).toBe('event: heartbeat\ndata: \n\n');
  });

  it('broadcasts to every subscriber of a project', () => {
    const hub = new StreamHub({ heartbeatMs: 60_000 });
    const first = new MockSseResponse();
    const second = new MockSseResponse();
    const other = new MockSseResponse();
    hub.register('p1', asResponse(first));
    hub.register('p1', asResponse(second));
    hub.register('p2', asResponse(other));

    hub.emit('p1', 'progress', { current: 1 });

    expect(first.chunks).toEqual(['event: progress\ndata: {"current":1}\n\n']);
    expect(second.chunks).toEqual(first.chunks);
    expect(other.chunks).toEqual([]);
    expect(hub.subscriberCount('p1')).toBe(2);
    hub.closeAll();
  });

  it('forgets subscribers that disconnect', () => {
    const hub = new StreamHub({ heartbeatMs: 60_000 });
    const res = new MockSseResponse();
    hub.register('p1', asResponse(res));

    res.emit('close');
    hub.emit('p1', 'progress', { current: 2 });

    expect(hub.subscriberCount('p1')).toBe(0);
    expect(res.chunks).toEqual([]);
  });

  it('writes done and ends every stream when a run finishes', () => {
    const hub = new StreamHub({ heartbeatMs: 60_000 });
    const res = new MockSseResponse();
    hub.register('p1', asResponse(res));

    hub.finish('p1', { status: 'completed' });

    expect(res.chunks).toEqual(['event: done\ndata: {"status":"completed"}\n\n']);
    expect(res.writableEnded).toBe(true);
    expect(hub.subscriberCount('p1')).toBe(0);
  });

  it('sends heartbeats while a stream is open', () => {
    jest.useFakeTimers();
    try {
      const hub = new StreamHub({ heartbeatMs: 1000 });
      const res = new MockSseResponse();
      hub.register('p1', asResponse(res));

      jest.advanceTimersByTime(2500);

      expect(res.chunks).toHaveLength(2);
      expect(res.chunks[0].startsWith('event: heartbeat\n')).toBe(true);
      hub.closeAll();
    } finally {
      jest.useRealTimers();
    }
  });
});

describe('WebhookNotifier', () => {
  const payload = { projectId: 'proj_1', runId: 'run_1', status: 'completed' as const, aiResult: null, artifacts: [] };

  it('is disabled without a url', async () => {
    const notifier = new WebhookNotifier({});

    expect(notifier.isEnabled()).toBe(false);
    expect(await notifier.notify(payload)).toEqual({ delivered: false, reason: 'Webhook URL is not configured' });
  });

  it('posts the payload with the shared secret', async () => {
    const fetchImpl = jest.fn(async (_input: string, _init?: RequestInit) => new Response(null, { status: 200 }));
    const notifier = new WebhookNotifier({ url: 'http://hooks.test/done', secret: 'test-secret', fetchImpl });

    expect(await notifier.notify(payload)).toEqual({ delivered: true, status: 200 });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://hooks.test/done');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', [WEBHOOK_SECRET_HEADER]: 'test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual(payload);
  });

  it('reports rejected and failed deliveries without throwing', async () => {
    const rejected = new WebhookNotifier({
      url: 'http://hooks.test/done',
      fetchImpl: async () => new Response('nope', { status: 500 }),
    });
    const unreachable = new WebhookNotifier({
      url: 'http://hooks.test/done',
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    expect(await rejected.notify(payload)).toEqual({ delivered: false, reason: 'Webhook answered 500' });
    expect(await unreachable.notify(payload)).toEqual({ delivered: false, reason: 'fetch failed' });
  });
});

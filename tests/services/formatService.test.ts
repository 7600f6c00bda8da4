import { FormatsResponseError, FormatsUnavailableError } from '../../src/services/formats/errors';
import FormatsClient from '../../src/services/formats/formatsClient';
import FormatService from '../../src/services/formats/formatService';

const BASE_URL = 'http://formats.test/api/v1';

function jsonResponse(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json', ...init.headers },
  });
}

type FetchStep = Response | Error;

function scriptedFetch(steps: FetchStep[]) {
  const queue = [...steps];
  return jest.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
    const step = queue.shift();
    if (!step) {
      throw new Error('unexpected request');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  });
}

describe('FormatsClient', () => {
  it('sends filters as query parameters and keeps the ETag', async () => {
    const fetchImpl = scriptedFetch([
      jsonResponse([{ id: 'fmt-1', title: 'Tesis UNI' }], { headers: { ETag: '"v1"' } }),
    ]);
    const client = new FormatsClient({ baseUrl: `${BASE_URL}/`, timeoutMs: 1000, fetchImpl });

    const result = await client.listFormats({ university: 'UNI', documentType: 'tesis' });

    expect(fetchImpl.mock.calls[0][0]).toBe(`${BASE_URL}/formats?university=UNI&documentType=tesis`);
    expect(result).toEqual({
      notModified: false,
      etag: '"v1"',
      formats: [{ id: 'fmt-1', title: 'Tesis UNI', university: '', category: '', version: '' }],
    });
  });

  it('maps a missing format to null', async () => {
    const client = new FormatsClient({
      baseUrl: BASE_URL,
      timeoutMs: 1000,
      fetchImpl: scriptedFetch([new Response(null, { status: 404 })]),
    });

    expect(await client.getFormat('fmt-x')).toBeNull();
  });

  it('rejects payloads of the wrong shape', async () => {
    const client = new FormatsClient({
      baseUrl: BASE_URL,
      timeoutMs: 1000,
      fetchImpl: scriptedFetch([jsonResponse({ version: 7 })]),
    });

    await expect(client.getVersion()).rejects.toBeInstanceOf(FormatsResponseError);
  });

  it('reports connection failures as an unavailable upstream', async () => {
    const client = new FormatsClient({
      baseUrl: BASE_URL,
      timeoutMs: 1000,
      fetchImpl: scriptedFetch([new TypeError('fetch failed')]),
    });

    await expect(client.getVersion()).rejects.toMatchObject({
      statusCode: 502,
      code: 'FORMATS_UNAVAILABLE',
      message: 'Cannot connect to formats service: fetch failed',
    });
  });
});

describe('FormatService', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  it('serves cached lists inside the TTL and revalidates with the ETag', async () => {
    const fetchImpl = scriptedFetch([
      jsonResponse([{ id: 'fmt-1', title: 'Tesis' }], { headers: { ETag: '"v1"' } }),
      new Response(null, { status: 304 }),
    ]);
    const service = new FormatService({
      client: new FormatsClient({ baseUrl: BASE_URL, timeoutMs: 1000, fetchImpl }),
      ttlMs: 100,
      now,
    });

    const first = await service.listFormats();
    const cached = await service.listFormats();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(cached.formats).toEqual(first.formats);

    clock += 500;
    const revalidated = await service.listFormats();

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(fetchImpl.mock.calls[1][1]?.headers).toMatchObject({ 'If-None-Match': '"v1"' });
    expect(revalidated).toEqual({
      formats: first.formats,
      stale: false,
      cachedAt: new Date(clock).toISOString(),
    });
  });

  it('falls back to the stale list when the upstream is down', async () => {
    const fetchImpl = scriptedFetch([jsonResponse([{ id: 'fmt-1', title: 'Tesis' }]), new TypeError('fetch failed')]);
    const service = new FormatService({
      client: new FormatsClient({ baseUrl: BASE_URL, timeoutMs: 1000, fetchImpl }),
      ttlMs: 100,
      now,
    });

    await service.listFormats();
    const fetchedAt = new Date(clock).toISOString();
    clock += 500;
    const stale = await service.listFormats();

    expect(stale.stale).toBe(true);
    expect(stale.cachedAt).toBe(fetchedAt);
    expect(stale.formats.map((format) => format.id)).toEqual(['fmt-1']);
  });

  it('propagates upstream failures when nothing is cached', async () => {
    const service = new FormatService({
      client: new FormatsClient({ baseUrl: BASE_URL, timeoutMs: 1000, fetchImpl: scriptedFetch([new TypeError('fetch failed')]) }),
      ttlMs: 100,
      now,
    });

    await expect(service.listFormats()).rejects.toBeInstanceOf(FormatsUnavailableError);
  });

  it('caches format details per id', async () => {
    const fetchImpl = scriptedFetch([
      jsonResponse({ id: 'fmt-1', title: 'Tesis', version: '2.0.0', definition: { cuerpo: { cap1: 'Introduccion' } } }),
    ]);
    const service = new FormatService({
      client: new FormatsClient({ baseUrl: BASE_URL, timeoutMs: 1000, fetchImpl }),
      ttlMs: 100,
      now,
    });

    const detail = await service.getFormat('fmt-1');
    const again = await service.getFormat('fmt-1');

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(again).toBe(detail);
    expect(detail).toMatchObject({ id: 'fmt-1', version: '2.0.0', fields: [], assets: [] });
  });
});

import { Logger } from 'pino';
import baseLogger from '../../utils/logger';
import { CatalogVersion, FormatDetail, FormatSummary } from '../../models/Format';
import FormatsClient, { FormatFilters } from './formatsClient';
import { FormatsServiceError } from './errors';

interface CachedList {
  formats: FormatSummary[];
  etag: string | null;
  fetchedAt: number;
}

interface CachedDetail {
  detail: FormatDetail;
  fetchedAt: number;
}

export interface FormatListResult {
  formats: FormatSummary[];
  stale: boolean;
  cachedAt: string | null;
}

/** What the HTTP layer and the generation run need from the formats service. */
export interface FormatCatalog {
  listFormats(filters?: FormatFilters): Promise<FormatListResult>;
  getFormat(formatId: string): Promise<FormatDetail | null>;
  getVersion(): Promise<CatalogVersion>;
}

/**
 * Caching facade over the formats service. Lists are revalidated with
 * ETags; when the upstream is down a previously cached list is served as
 * stale instead of failing.
 */
class FormatService implements FormatCatalog {
  private readonly lists = new Map<string, CachedList>();

  private readonly details = new Map<string, CachedDetail>();

  private readonly client: FormatsClient;

  private readonly ttlMs: number;

  private readonly logger: Logger;

  private readonly now: () => number;

  constructor({ client, ttlMs, logger, now }: { client: FormatsClient; ttlMs: number; logger?: Logger; now?: () => number }) {
    this.client = client;
    this.ttlMs = ttlMs;
    this.logger = logger ?? baseLogger.child({ module: 'format-service' });
    this.now = now ?? Date.now;
  }

  private static cacheKey(filters: FormatFilters): string {
    return [filters.university ?? '', filters.category ?? '', filters.documentType ?? ''].join('|');
  }

  private fresh(fetchedAt: number): boolean {
    return this.now() - fetchedAt < this.ttlMs;
  }

  async listFormats(filters: FormatFilters = {}): Promise<FormatListResult> {
    const key = FormatService.cacheKey(filters);
    const cached = this.lists.get(key);
    if (cached && this.fresh(cached.fetchedAt)) {
      return { formats: cached.formats, stale: false, cachedAt: new Date(cached.fetchedAt).toISOString() };
    }

    try {
      const response = await this.client.listFormats(filters, cached?.etag);
      if (response.notModified && cached) {
        cached.fetchedAt = this.now();
        return { formats: cached.formats, stale: false, cachedAt: new Date(cached.fetchedAt).toISOString() };
      }
      if (response.notModified) {
        // 304 without a local copy: ask again unconditionally.
        return this.refetch(key, filters);
      }
      return this.store(key, response.formats, response.etag);
    } catch (error) {
      if (cached && error instanceof FormatsServiceError) {
        this.logger.warn({ err: error, key }, 'formats service unavailable; serving stale catalogue');
        return { formats: cached.formats, stale: true, cachedAt: new Date(cached.fetchedAt).toISOString() };
      }
      throw error;
    }
  }

  private async refetch(key: string, filters: FormatFilters): Promise<FormatListResult> {
    const response = await this.client.listFormats(filters, null);
    return this.store(key, response.notModified ? [] : response.formats, response.notModified ? null : response.etag);
  }

  private store(key: string, formats: FormatSummary[], etag: string | null): FormatListResult {
    const fetchedAt = this.now();
    this.lists.set(key, { formats, etag, fetchedAt });
    return { formats, stale: false, cachedAt: new Date(fetchedAt).toISOString() };
  }

  async getFormat(formatId: string): Promise<FormatDetail | null> {
    const cached = this.details.get(formatId);
    if (cached && this.fresh(cached.fetchedAt)) {
      return cached.detail;
    }
    try {
      const detail = await this.client.getFormat(formatId);
      if (detail) {
        this.details.set(formatId, { detail, fetchedAt: this.now() });
      } else {
        this.details.delete(formatId);
      }
      return detail;
    } catch (error) {
      if (cached && error instanceof FormatsServiceError) {
        this.logger.warn({ err: error, formatId }, 'formats service unavailable; serving cached format detail');
        return cached.detail;
      }
      throw error;
    }
  }

  getVersion(): Promise<CatalogVersion> {
    return this.client.getVersion();
  }
}

export default FormatService;

import { z } from 'zod';
import { Logger } from 'pino';
import baseLogger from '../../utils/logger';
import {
  CatalogVersion,
  FormatDetail,
  FormatSummary,
  catalogVersionSchema,
  formatDetailSchema,
  formatSummarySchema,
} from '../../models/Format';
import { FormatsResponseError, FormatsTimeoutError, FormatsUnavailableError } from './errors';

export interface FormatFilters {
  university?: string;
  category?: string;
  documentType?: string;
}

export type FormatListResponse =
  | { notModified: true }
  | { notModified: false; formats: FormatSummary[]; etag: string | null };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FormatsClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

const formatListSchema = z.array(formatSummarySchema);

/**
 * HTTP client for the sibling formats service.
 */
class FormatsClient {
  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchLike;

  private readonly logger: Logger;

  constructor({ baseUrl, timeoutMs, fetchImpl, logger }: FormatsClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = logger ?? baseLogger.child({ module: 'formats-client' });
  }

  private async request(path: string, headers: Record<string, string> = {}): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await this.fetchImpl(url, {
        headers: { Accept: 'application/json', ...headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new FormatsTimeoutError(`Formats service timed out after ${this.timeoutMs}ms`, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new FormatsUnavailableError(`Cannot connect to formats service: ${reason}`, error);
    }
  }

  private async readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string): Promise<T> {
    if (!response.ok) {
      throw new FormatsResponseError(`Formats service answered ${response.status} for ${path}`);
    }
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FormatsResponseError(`Formats service returned invalid JSON for ${path}`, error);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ path, issues: parsed.error.issues.slice(0, 5) }, 'unexpected formats payload');
      throw new FormatsResponseError(`Formats service returned an unexpected payload for ${path}`, parsed.error);
    }
    return parsed.data;
  }

  async getVersion(): Promise<CatalogVersion> {
    const path = '/formats/version';
    return this.readJson(await this.request(path), catalogVersionSchema, path);
  }

  async listFormats(filters: FormatFilters = {}, etag?: string | null): Promise<FormatListResponse> {
    const params = new URLSearchParams();
    (['university', 'category', 'documentType'] as const).forEach((key) => {
      const value = filters[key];
      if (value) {
        params.set(key, value);
      }
    });
    const query = params.toString();
    const path = `/formats${query ? `?${query}` : ''}`;
    // The ETag goes back exactly as received, quotes included.
    const response = await this.request(path, etag ? { 'If-None-Match': etag } : {});

    if (response.status === 304) {
      return { notModified: true };
    }

    const formats = await this.readJson(response, formatListSchema, path);
    return { notModified: false, formats, etag: response.headers.get('ETag') };
  }

  async getFormat(formatId: string): Promise<FormatDetail | null> {
    const path = `/formats/${encodeURIComponent(formatId)}`;
    const response = await this.request(path);
    if (response.status === 404) {
      return null;
    }
    return this.readJson(response, formatDetailSchema, path);
  }
}

export default FormatsClient;

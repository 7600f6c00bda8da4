import { Logger } from 'pino';
import { Artifact, Project, ProjectStatus, SectionResult } from '../models/Project';
import baseLogger from '../utils/logger';
import { FetchLike } from './formats/formatsClient';

export interface WebhookPayload {
  projectId: string;
  runId: string | null;
  status: ProjectStatus;
  aiResult: { sections: SectionResult[] } | null;
  artifacts: Artifact[];
}

export type WebhookOutcome =
  | { delivered: true; status: number }
  | { delivered: false; reason: string };

export interface WebhookNotifierOptions {
  url?: string;
  secret?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export const WEBHOOK_SECRET_HEADER = 'X-Webhook-Secret';

export default class WebhookNotifier {
  private readonly url?: string;

  private readonly secret?: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchLike;

  private readonly logger: Logger;

  constructor({ url, secret, timeoutMs = 10_000, fetchImpl, logger }: WebhookNotifierOptions) {
    this.url = url;
    this.secret = secret;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = logger ?? baseLogger.child({ module: 'webhook-notifier' });
  }

  isEnabled(): boolean {
    return Boolean(this.url);
  }

  static payloadFor(project: Project): WebhookPayload {
    return {
      projectId: project.id,
      runId: project.runId,
      status: project.status,
      aiResult: project.aiResult,
      artifacts: project.artifacts,
    };
  }

  /** Never throws: delivery problems are reported in the outcome. */
  async notify(payload: WebhookPayload): Promise<WebhookOutcome> {
    if (!this.url) {
      return { delivered: false, reason: 'Webhook URL is not configured' };
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.secret) {
      headers[WEBHOOK_SECRET_HEADER] = this.secret;
    }

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.logger.warn({ projectId: payload.projectId, status: response.status }, 'webhook rejected notification');
        return { delivered: false, reason: `Webhook answered ${response.status}` };
      }
      this.logger.info({ projectId: payload.projectId, status: response.status }, 'webhook notified');
      return { delivered: true, status: response.status };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn({ err: error, projectId: payload.projectId }, 'webhook delivery failed');
      return { delivered: false, reason };
    }
  }
}

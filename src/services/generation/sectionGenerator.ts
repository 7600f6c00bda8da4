import { Logger } from 'pino';
import { SectionIndexEntry } from '../../models/SectionIndex';
import { buildSectionPrompt } from '../../utils/promptTemplates';
import baseLogger from '../../utils/logger';
import { autofillContent, detectIncomplete, stripPlaceholders } from '../ai/completenessValidator';
import { toProviderError } from '../ai/errorClassifier';
import { ProviderError, ProviderErrorKind } from '../ai/errors';
import { clipPreview } from '../ai/promptRenderer';
import { isSkipToken, sanitizeSectionContent } from '../ai/contentSanitizer';
import { ProviderRegistry } from '../ai/providers/providerRegistry';
import { GenerateResult, TextProvider } from '../ai/providers/types';
import { isIndexPath } from '../outline/tocDetector';
import { EventInput } from '../projects/eventLog';

export type SkipReason = 'index_path' | 'skip_token' | 'empty_output' | 'placeholder';

export type SectionOutcome =
  | {
      status: 'generated';
      content: string;
      provider: string;
      model: string;
      usedFallback: boolean;
      preview: Record<string, string>;
    }
  | { status: 'skipped'; reason: SkipReason; provider: string | null; preview: Record<string, string> }
  | { status: 'failed'; error: ProviderError; provider: string | null; preview: Record<string, string> };

/**
 * Provider state that outlives a single section. Providers that failed with
 * `auth` or `exhausted` are not called again for the rest of the run.
 */
export class RunProviderState {
  readonly disabled = new Map<string, ProviderErrorKind>();

  readonly attempted = new Set<string>();

  disable(error: ProviderError): void {
    if (error.disablesProvider) {
      this.disabled.set(error.provider, error.kind);
    }
  }

  isDisabled(provider: TextProvider): boolean {
    return this.disabled.has(provider.name);
  }

  /** Every provider this run called is now disabled by an authentication failure. */
  allAttemptedBlockedByAuth(): boolean {
    if (this.attempted.size === 0) {
      return false;
    }
    return [...this.attempted].every((name) => this.disabled.get(name) === 'auth');
  }
}

export interface SectionRequest {
  section: SectionIndexEntry;
  sectionIndex: number;
  projectTitle: string;
  renderedTemplate: string;
  state: RunProviderState;
  record: (event: EventInput) => void;
}

export class SectionGenerator {
  private readonly providers: ProviderRegistry;

  private readonly logger: Logger;

  constructor({ providers, logger }: { providers: ProviderRegistry; logger?: Logger }) {
    this.providers = providers;
    this.logger = logger ?? baseLogger.child({ module: 'section-generator' });
  }

  /** Provider that would serve the next section, if any is left. */
  nextProvider(state: RunProviderState): TextProvider | null {
    if (!state.isDisabled(this.providers.primary)) {
      return this.providers.primary;
    }
    return this.usableFallback(state, this.providers.primary);
  }

  private usableFallback(state: RunProviderState, failed: TextProvider): TextProvider | null {
    const { fallback } = this.providers;
    if (!this.providers.fallbackEnabled || !fallback || fallback.name === failed.name || state.isDisabled(fallback)) {
      return null;
    }
    return fallback;
  }

  async generate({ section, sectionIndex, projectTitle, renderedTemplate, state, record }: SectionRequest): Promise<SectionOutcome> {
    if (isIndexPath(section.path)) {
      return { status: 'skipped', reason: 'index_path', provider: null, preview: {} };
    }

    const prompt = buildSectionPrompt({ projectTitle, renderedTemplate, section });
    const userMessage = prompt.messages[prompt.messages.length - 1]?.content ?? '';
    const preview: Record<string, string> = { prompt: clipPreview(userMessage) };
    const sectionMeta = { sectionIndex, sectionId: section.sectionId, path: section.path };

    const primary = this.providers.primary;
    let provider: TextProvider | null = state.isDisabled(primary) ? this.usableFallback(state, primary) : primary;
    if (!provider) {
      const error = new ProviderError(
        state.disabled.get(primary.name) ?? 'error',
        primary.name,
        'No enabled provider is left for this run'
      );
      return { status: 'failed', error, provider: null, preview };
    }
    let usedFallback = provider !== primary;
    let lastError: ProviderError | null = null;

    // One attempt on the chosen provider, then at most one on the fallback.
    for (let attempt = 0; attempt < 2 && provider; attempt += 1) {
      state.attempted.add(provider.name);
      const startedAt = Date.now();
      let result: GenerateResult;
      try {
        result = await provider.generate({ prompt, section });
      } catch (error) {
        const providerError = toProviderError(error, provider.name);
        this.providers.metrics.recordFailure(providerError, Date.now() - startedAt);
        lastError = providerError;
        state.disable(providerError);
        this.reportFailure(providerError, sectionMeta, record);

        const next: TextProvider | null = attempt === 0 ? this.usableFallback(state, provider) : null;
        if (next) {
          record({
            step: 'ai.provider.fallback',
            status: 'warn',
            title: `Retrying with ${next.name}`,
            detail: `${provider.name} failed (${providerError.kind}); retrying the section once on ${next.name}.`,
            meta: { ...sectionMeta, from: provider.name, to: next.name, reason: providerError.kind },
          });
          usedFallback = true;
        }
        provider = next;
        continue;
      }

      this.providers.metrics.recordSuccess(provider.name, Date.now() - startedAt);
      const served = provider.name;
      const responsePreview = { ...preview, response: clipPreview(result.text) };
      if (isSkipToken(result.text)) {
        return { status: 'skipped', reason: 'skip_token', provider: served, preview: responsePreview };
      }
      const completed = this.completeContent(sanitizeSectionContent(result.text, section.path), section, sectionMeta, record);
      if (completed.status === 'skipped') {
        return { status: 'skipped', reason: completed.reason, provider: served, preview: responsePreview };
      }
      const { content } = completed;
      return {
        status: 'generated',
        content,
        provider: served,
        model: result.model,
        usedFallback,
        preview: { ...preview, response: clipPreview(content) },
      };
    }

    const error = lastError ?? new ProviderError('error', primary.name, 'Provider request failed');
    return { status: 'failed', error, provider: error.provider, preview };
  }

  /**
   * Replaces placeholder or missing text: front-matter sections get stock
   * text, others lose the placeholder fragments.
   */
  private completeContent(
    content: string,
    section: SectionIndexEntry,
    meta: Record<string, unknown>,
    record: (event: EventInput) => void
  ): { status: 'ready'; content: string } | { status: 'skipped'; reason: SkipReason } {
    const autofill = autofillContent(section.path);
    if (!content) {
      if (!autofill) {
        return { status: 'skipped', reason: 'empty_output' };
      }
      record({
        step: 'ai.section.autofill',
        status: 'warn',
        title: 'Empty section filled with default content',
        meta: { ...meta, issue: 'empty' },
      });
      return { status: 'ready', content: autofill };
    }

    const issue = detectIncomplete(content);
    if (!issue) {
      return { status: 'ready', content };
    }
    const repaired = autofill ?? (issue.type === 'instruction' ? '' : stripPlaceholders(content));
    record({
      step: autofill ? 'ai.section.autofill' : 'ai.section.placeholder',
      status: 'warn',
      title: autofill ? 'Placeholder text replaced with default content' : 'Placeholder text removed',
      meta: { ...meta, issue: issue.type, sample: issue.sample },
    });
    return repaired ? { status: 'ready', content: repaired } : { status: 'skipped', reason: 'placeholder' };
  }

  private reportFailure(error: ProviderError, meta: Record<string, unknown>, record: (event: EventInput) => void): void {
    this.logger.warn(
      { provider: error.provider, kind: error.kind, status: error.status, sectionId: meta.sectionId },
      'provider call failed'
    );
    record({
      step: error.isQuota ? 'ai.provider.quota' : 'ai.provider.error',
      status: 'warn',
      title: error.isQuota ? `${error.provider} quota or rate limit reached` : `${error.provider} request failed`,
      detail: clipPreview(error.message),
      meta: {
        ...meta,
        provider: error.provider,
        kind: error.kind,
        status: error.status ?? null,
        retryAfterSeconds: error.retryAfterSeconds ?? null,
        disabled: error.disablesProvider,
      },
    });
  }
}

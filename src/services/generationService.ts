import { Response } from 'express';
import { nanoid } from 'nanoid';
import { Logger } from 'pino';
import { FormatDefinition, FormatDetail } from '../models/Format';
import {
  ACTIVE_STATUSES,
  Artifact,
  Incident,
  Progress,
  Project,
  ProjectEvent,
  ProjectStatus,
  SectionResult,
  TerminalStatus,
  isActiveStatus,
} from '../models/Project';
import { PromptTemplate } from '../models/Prompt';
import { SectionIndexEntry } from '../models/SectionIndex';
import ApiError from '../utils/ApiError';
import baseLogger from '../utils/logger';
import { GENERIC_PROMPT, genericSection } from '../utils/promptTemplates';
import { GenerationCancelledError } from './ai/errors';
import { clipPreview, renderTemplate } from './ai/promptRenderer';
import { ProviderRegistry } from './ai/providers/providerRegistry';
import ArtifactService from './artifacts/artifactService';
import { GenerationQueue } from './generation/generationQueue';
import { RunProviderState, SectionGenerator, SectionOutcome, SkipReason } from './generation/sectionGenerator';
import { StreamHub } from './generation/streamHub';
import { compileOutline, isFormatDefinition } from './outline/outlineCompiler';
import { EventInput, advanceProgress, appendEvents, createEvent, emptyProgress, startProgress } from './projects/eventLog';
import { ProjectStore } from './projects/projectStore';
import WebhookNotifier from './webhookNotifier';

export const INTERRUPTED_RUN_MESSAGE = 'Generation interrupted by service restart';

export const SHUTDOWN_MESSAGE = 'Generation stopped by service shutdown';

const SKIP_MESSAGES: Record<SkipReason, string> = {
  index_path: 'Section skipped as an index',
  skip_token: 'Provider asked to skip the section',
  empty_output: 'Provider returned no usable text',
  placeholder: 'Provider returned placeholder text only',
};

export interface FormatLookup {
  getFormat(formatId: string): Promise<FormatDetail | null>;
}

export interface PromptLookup {
  get(promptId: string): Promise<PromptTemplate | null>;
}

export interface GenerationServiceOptions {
  projects: ProjectStore;
  prompts: PromptLookup;
  formats: FormatLookup;
  providers: ProviderRegistry;
  artifacts: ArtifactService;
  webhook: WebhookNotifier;
  queue: GenerationQueue;
  streams: StreamHub;
  persistEvery?: number;
  logger?: Logger;
}

interface RunState {
  projectId: string;
  runId: string;
  signal: AbortSignal;
  progress: Progress;
  sections: SectionResult[];
  incidents: Incident[];
  pendingEvents: ProjectEvent[];
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
  providers: RunProviderState;
}

interface PreparedRun {
  project: Project;
  definition: FormatDefinition | null;
  outline: SectionIndexEntry[];
  renderedTemplate: string;
}

class GenerationService {
  private readonly projects: ProjectStore;

  private readonly prompts: PromptLookup;

  private readonly formats: FormatLookup;

  private readonly providers: ProviderRegistry;

  private readonly artifacts: ArtifactService;

  private readonly webhook: WebhookNotifier;

  private readonly queue: GenerationQueue;

  private readonly streams: StreamHub;

  private readonly sectionGenerator: SectionGenerator;

  private readonly persistEvery: number;

  private readonly runControllers = new Map<string, AbortController>();

  private shuttingDown = false;

  private readonly logger: Logger;

  constructor({
    projects,
    prompts,
    formats,
    providers,
    artifacts,
    webhook,
    queue,
    streams,
    persistEvery = 1,
    logger,
  }: GenerationServiceOptions) {
    this.projects = projects;
    this.prompts = prompts;
    this.formats = formats;
    this.providers = providers;
    this.artifacts = artifacts;
    this.webhook = webhook;
    this.queue = queue;
    this.streams = streams;
    this.persistEvery = Math.max(1, persistEvery);
    this.logger = logger ?? baseLogger.child({ module: 'generation-service' });
    this.sectionGenerator = new SectionGenerator({ providers, logger: this.logger.child({ module: 'section-generator' }) });
  }

  registerStream(projectId: string, res: Response): void {
    this.streams.register(projectId, res);
  }

  isRunActive(projectId: string): boolean {
    return this.runControllers.has(projectId) || this.queue.has(projectId);
  }

  /** Resolves once the project's current run (if any) has finished. */
  waitForRun(projectId: string): Promise<void> {
    return this.queue.wait(projectId);
  }

  /**
   * Moves a project into `generating` and queues a run. A new run always
   * starts from the first section.
   */
  async trigger(projectId: string, { requestId }: { requestId?: string } = {}): Promise<Project> {
    if (this.shuttingDown) {
      throw new ApiError(503, 'Service is shutting down', undefined, 'SERVICE_UNAVAILABLE');
    }
    if (this.isRunActive(projectId)) {
      throw ApiError.conflict('Generation already in progress', 'GENERATION_IN_PROGRESS', { projectId });
    }

    const runId = `run_${nanoid(12)}`;
    const project = await this.projects.update(projectId, (current) => {
      if (isActiveStatus(current.status)) {
        throw ApiError.conflict('Generation already in progress', 'GENERATION_IN_PROGRESS', {
          projectId,
          status: current.status,
        });
      }
      const now = new Date().toISOString();
      current.status = 'generating';
      current.runId = runId;
      current.startedAt = now;
      current.completedAt = null;
      current.progress = emptyProgress();
      current.aiResult = null;
      current.incidents = [];
      current.artifacts = [];
      current.error = null;
      current.events = appendEvents(current.events, [
        createEvent({
          step: 'generation.queued',
          status: 'running',
          title: 'Generation queued',
          meta: { runId, requestId: requestId ?? null },
        }),
      ]);
    });

    const controller = new AbortController();
    this.runControllers.set(projectId, controller);
    const accepted = this.queue.enqueue(projectId, () => this.executeRun(projectId, runId, controller.signal));
    if (accepted !== 'accepted') {
      this.runControllers.delete(projectId);
      await this.projects.update(projectId, (current) => {
        current.status = 'failed';
        current.error = 'Generation could not be queued';
        current.completedAt = new Date().toISOString();
      });
      throw accepted === 'duplicate'
        ? ApiError.conflict('Generation already in progress', 'GENERATION_IN_PROGRESS', { projectId })
        : new ApiError(503, 'Service is shutting down', undefined, 'SERVICE_UNAVAILABLE');
    }

    this.logger.info({ projectId, runId, requestId }, 'generation run queued');
    return project;
  }

  /**
   * Requests cancellation. The run stops before its next section; the
   * section in flight is allowed to finish.
   */
  async cancel(projectId: string): Promise<Project> {
    const existing = await this.projects.require(projectId);
    if (!isActiveStatus(existing.status)) {
      throw ApiError.conflict('No generation is running for this project', 'GENERATION_NOT_ACTIVE', {
        projectId,
        status: existing.status,
      });
    }

    const controller = this.runControllers.get(projectId);
    if (!controller) {
      // Record left active by another process; nothing here will finish it.
      return this.projects.update(projectId, (current) => {
        // The run may have settled since the status was read.
        if (!isActiveStatus(current.status)) {
          throw ApiError.conflict('No generation is running for this project', 'GENERATION_NOT_ACTIVE', {
            projectId,
            status: current.status,
          });
        }
        current.status = 'failed';
        current.error = new GenerationCancelledError().message;
        current.completedAt = new Date().toISOString();
        current.events = appendEvents(current.events, [
          createEvent({ step: 'generation.cancel', status: 'warn', title: 'Cancelled a run with no active worker' }),
        ]);
      });
    }

    const project = await this.projects.update(projectId, (current) => {
      if (!isActiveStatus(current.status)) {
        throw ApiError.conflict('No generation is running for this project', 'GENERATION_NOT_ACTIVE', {
          projectId,
          status: current.status,
        });
      }
      if (current.status === 'generating') {
        current.status = 'cancel_requested';
      }
      current.events = appendEvents(current.events, [
        createEvent({ step: 'generation.cancel', status: 'warn', title: 'Cancellation requested' }),
      ]);
    });
    controller.abort(new GenerationCancelledError());
    this.streams.emit(projectId, 'progress', { status: project.status, progress: project.progress });
    this.logger.warn({ projectId, runId: project.runId }, 'generation cancellation requested');
    return project;
  }

  /** Fails records that a previous process left active. */
  async recoverInterruptedRuns(): Promise<number> {
    const stuck = await this.projects.findByStatus(ACTIVE_STATUSES);
    let recovered = 0;
    for (const project of stuck) {
      if (this.isRunActive(project.id)) {
        continue;
      }
      await this.projects.update(project.id, (current) => {
        current.status = 'failed';
        current.error = INTERRUPTED_RUN_MESSAGE;
        current.completedAt = new Date().toISOString();
        current.events = appendEvents(current.events, [
          createEvent({ step: 'generation.recovered', status: 'error', title: INTERRUPTED_RUN_MESSAGE }),
        ]);
      });
      recovered += 1;
    }
    if (recovered > 0) {
      this.logger.warn({ recovered }, 'marked interrupted generation runs as failed');
    }
    return recovered;
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.runControllers.forEach((controller) => controller.abort(new GenerationCancelledError(SHUTDOWN_MESSAGE)));
    await this.queue.close();
    this.streams.closeAll();
  }

  private async executeRun(projectId: string, runId: string, signal: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    const state: RunState = {
      projectId,
      runId,
      signal,
      progress: emptyProgress(),
      sections: [],
      incidents: [],
      pendingEvents: [],
      succeeded: 0,
      failed: 0,
      skipped: 0,
      cancelled: false,
      providers: new RunProviderState(),
    };

    let final: Project | null = null;
    try {
      const prepared = await this.prepare(state);
      if (prepared) {
        await this.generateSections(state, prepared);
        final = await this.complete(state, prepared);
      }
    } catch (error) {
      final = await this.failRun(state, error);
    } finally {
      if (this.runControllers.get(projectId)?.signal === signal) {
        this.runControllers.delete(projectId);
      }
    }

    this.logger.info(
      {
        projectId,
        runId,
        status: final?.status ?? null,
        durationMs: Date.now() - startedAt,
        succeeded: state.succeeded,
        failed: state.failed,
        skipped: state.skipped,
      },
      'generation run finished'
    );
    this.streams.finish(projectId, {
      projectId,
      runId,
      status: final?.status ?? null,
      error: final?.error ?? null,
    });
  }

  private record(state: RunState, input: EventInput): void {
    const event = createEvent(input);
    state.pendingEvents.push(event);
    this.streams.emit(state.projectId, 'event', event);
  }

  private setProgress(state: RunState, update: Parameters<typeof advanceProgress>[1]): void {
    state.progress = advanceProgress(state.progress, update);
    this.streams.emit(state.projectId, 'progress', state.progress);
  }

  /** Writes the run's in-memory state; never touches the stored status. */
  private async flush(state: RunState): Promise<Project> {
    const events = state.pendingEvents;
    state.pendingEvents = [];
    return this.projects.update(state.projectId, (project) => {
      project.events = appendEvents(project.events, events);
      project.progress = state.progress;
      project.aiResult = { sections: [...state.sections] };
      project.incidents = [...state.incidents];
    });
  }

  private async prepare(state: RunState): Promise<PreparedRun | null> {
    const project = await this.projects.require(state.projectId);
    if (project.runId !== state.runId) {
      this.logger.warn({ projectId: state.projectId, runId: state.runId }, 'run superseded before start; skipping');
      return null;
    }

    const prompt = await this.prompts.get(project.promptId);
    if (!prompt) {
      throw ApiError.notFound('Prompt', project.promptId);
    }

    const format = await this.formats.getFormat(project.formatId);
    if (!format) {
      throw ApiError.notFound('Format', project.formatId);
    }

    const definition = isFormatDefinition(format.definition) ? format.definition : null;
    let outline = definition ? compileOutline(definition, this.logger.child({ module: 'outline-compiler' })) : [];
    this.record(state, {
      step: 'format.section_index',
      status: outline.length ? 'done' : 'warn',
      title: outline.length ? `Outline compiled with ${outline.length} sections` : 'Format produced no sections',
      meta: { formatId: format.id, formatVersion: format.version, sections: outline.length },
    });
    if (!outline.length) {
      outline = [genericSection()];
      this.record(state, {
        step: 'format.section_index',
        status: 'warn',
        title: 'Using a single generic section',
        meta: { sectionId: outline[0].sectionId, path: outline[0].path },
      });
    }

    state.progress = startProgress(outline.length);

    const values = { ...project.values };
    if (!values.title?.trim()) {
      values.title = project.title;
    }
    let rendered = renderTemplate(prompt.template, values);
    this.record(state, {
      step: 'prompt.render',
      status: rendered.missingVariables.length ? 'warn' : 'done',
      title: rendered.missingVariables.length
        ? `Template rendered with ${rendered.missingVariables.length} missing variables`
        : 'Template rendered',
      meta: { promptId: prompt.id, missingVariables: rendered.missingVariables },
      preview: { prompt: clipPreview(rendered.text) },
    });
    if (!rendered.text.trim()) {
      rendered = renderTemplate(GENERIC_PROMPT, values);
      this.record(state, {
        step: 'prompt.render',
        status: 'warn',
        title: 'Template is empty; using the generic prompt',
        meta: { promptId: prompt.id },
        preview: { prompt: clipPreview(rendered.text) },
      });
    }

    const primary = this.providers.primary;
    this.record(state, {
      step: 'ai.generate.start',
      status: 'running',
      title: `Generating ${outline.length} sections`,
      meta: {
        runId: state.runId,
        total: outline.length,
        provider: primary.name,
        model: primary.model,
        fallback: this.providers.fallbackEnabled ? this.providers.fallback?.name ?? null : null,
        simulation: this.providers.simulation,
      },
    });

    await this.projects.update(state.projectId, (current) => {
      current.formatName = current.formatName ?? format.title;
      current.formatVersion = format.version || current.formatVersion;
      current.promptName = current.promptName ?? prompt.name;
    });
    const flushed = await this.flush(state);

    return { project: flushed, definition, outline, renderedTemplate: rendered.text };
  }

  private async generateSections(state: RunState, { project, outline, renderedTemplate }: PreparedRun): Promise<void> {
    for (let index = 0; index < outline.length; index += 1) {
      if (state.signal.aborted) {
        state.cancelled = true;
        break;
      }

      const section = outline[index];
      const sectionIndex = index + 1;
      const provider = this.sectionGenerator.nextProvider(state.providers);
      this.setProgress(state, { currentPath: section.path, provider: provider?.name ?? null });
      this.record(state, {
        step: 'ai.generate.section',
        status: 'running',
        title: `Section ${sectionIndex}/${outline.length}: ${section.title}`,
        meta: { stage: 'section_start', sectionIndex, sectionId: section.sectionId, path: section.path, kind: section.kind },
      });

      const outcome = await this.sectionGenerator.generate({
        section,
        sectionIndex,
        projectTitle: project.title,
        renderedTemplate,
        state: state.providers,
        record: (event) => this.record(state, event),
      });
      this.applyOutcome(state, section, sectionIndex, outline.length, outcome);

      this.setProgress(state, { current: sectionIndex, provider: outcome.provider });
      if (sectionIndex % this.persistEvery === 0 || sectionIndex === outline.length) {
        await this.flush(state);
      }
    }
  }

  private applyOutcome(
    state: RunState,
    section: SectionIndexEntry,
    sectionIndex: number,
    total: number,
    outcome: SectionOutcome
  ): void {
    const meta = { stage: 'section_end', sectionIndex, sectionId: section.sectionId, path: section.path };

    if (outcome.status === 'generated') {
      state.succeeded += 1;
      state.sections.push({ sectionId: section.sectionId, path: section.path, content: outcome.content });
      this.record(state, {
        step: 'ai.generate.section',
        status: 'done',
        title: `Section ${sectionIndex}/${total} generated`,
        meta: { ...meta, provider: outcome.provider, model: outcome.model, usedFallback: outcome.usedFallback },
        preview: outcome.preview,
      });
      return;
    }

    state.sections.push({ sectionId: section.sectionId, path: section.path, content: '' });

    if (outcome.status === 'skipped') {
      state.skipped += 1;
      state.incidents.push({
        sectionId: section.sectionId,
        path: section.path,
        kind: outcome.reason,
        provider: outcome.provider,
        message: SKIP_MESSAGES[outcome.reason],
      });
      this.record(state, {
        step: 'ai.section.skipped',
        status: 'warn',
        title: `Section ${sectionIndex}/${total} skipped`,
        meta: { ...meta, reason: outcome.reason, provider: outcome.provider },
        preview: outcome.preview,
      });
      return;
    }

    state.failed += 1;
    state.incidents.push({
      sectionId: section.sectionId,
      path: section.path,
      kind: outcome.error.kind,
      provider: outcome.error.provider,
      message: outcome.error.message,
    });
    this.record(state, {
      step: 'ai.generate.section',
      status: 'error',
      title: `Section ${sectionIndex}/${total} failed`,
      detail: clipPreview(outcome.error.message),
      meta: { ...meta, provider: outcome.error.provider, kind: outcome.error.kind },
      preview: outcome.preview,
    });
  }

  private resolveStatus(state: RunState): TerminalStatus {
    if (state.cancelled) {
      return state.succeeded > 0 ? 'completed_with_incidents' : 'failed';
    }
    if (state.succeeded === 0) {
      return state.providers.allAttemptedBlockedByAuth() ? 'blocked' : 'failed';
    }
    return state.failed === 0 && state.skipped === 0 ? 'completed' : 'completed_with_incidents';
  }

  private async complete(state: RunState, prepared: PreparedRun): Promise<Project> {
    let status: TerminalStatus = this.resolveStatus(state);
    const error = this.describeOutcome(state, status);

    this.record(state, {
      step: 'ai.generate.done',
      status: status === 'completed' ? 'done' : status === 'completed_with_incidents' ? 'warn' : 'error',
      title: `Generation finished: ${status}`,
      detail: error ?? '',
      meta: {
        runId: state.runId,
        succeeded: state.succeeded,
        failed: state.failed,
        skipped: state.skipped,
        cancelled: state.cancelled,
      },
    });

    const artifacts: Artifact[] = [];
    if (status === 'completed' || status === 'completed_with_incidents') {
      const snapshot = await this.flush(state);
      try {
        const artifact = await this.artifacts.buildDocx(snapshot, prepared.definition);
        artifacts.push(artifact);
        this.record(state, {
          step: 'artifact.docx',
          status: 'done',
          title: 'DOCX document ready',
          meta: { fileName: artifact.fileName, downloadUrl: artifact.downloadUrl },
        });
      } catch (artifactError) {
        const message = artifactError instanceof Error ? artifactError.message : String(artifactError);
        this.logger.error({ err: artifactError, projectId: state.projectId }, 'docx artifact failed');
        status = 'completed_with_incidents';
        state.incidents.push({ sectionId: null, path: null, kind: 'artifact', provider: null, message });
        this.record(state, { step: 'artifact.docx', status: 'error', title: 'DOCX document failed', detail: message });
      }
    }

    const events = state.pendingEvents;
    state.pendingEvents = [];
    const final = await this.projects.update(state.projectId, (project) => {
      project.status = status;
      project.error = error;
      project.completedAt = new Date().toISOString();
      project.progress = state.progress;
      project.aiResult = { sections: [...state.sections] };
      project.incidents = [...state.incidents];
      project.artifacts = artifacts;
      project.events = appendEvents(project.events, events);
    });

    return this.notifyWebhook(final);
  }

  private describeOutcome(state: RunState, status: ProjectStatus): string | null {
    if (state.cancelled) {
      const reason: unknown = state.signal.reason;
      return reason instanceof GenerationCancelledError ? reason.message : new GenerationCancelledError().message;
    }
    if (status === 'blocked') {
      return 'Every AI provider rejected its credentials';
    }
    if (status === 'failed') {
      const lastIncident = state.incidents[state.incidents.length - 1];
      return lastIncident ? `No section could be generated: ${lastIncident.message}` : 'No section could be generated';
    }
    return null;
  }

  private async notifyWebhook(project: Project): Promise<Project> {
    if (!this.webhook.isEnabled()) {
      return project;
    }
    const outcome = await this.webhook.notify(WebhookNotifier.payloadFor(project));
    const event = createEvent(
      outcome.delivered
        ? { step: 'webhook.notify', status: 'done', title: 'Webhook notified', meta: { status: outcome.status } }
        : { step: 'webhook.notify', status: 'warn', title: 'Webhook notification failed', detail: outcome.reason }
    );
    this.streams.emit(project.id, 'event', event);
    return this.projects.appendEvents(project.id, [event]);
  }

  private async failRun(state: RunState, error: unknown): Promise<Project | null> {
    const message = error instanceof Error ? error.message : 'Unknown error during generation';
    this.logger.error({ err: error, projectId: state.projectId, runId: state.runId }, 'generation run failed');
    this.record(state, { step: 'ai.generate.done', status: 'error', title: 'Generation failed', detail: message });
    this.streams.emit(state.projectId, 'error', { message });

    const events = state.pendingEvents;
    state.pendingEvents = [];
    try {
      return await this.projects.update(state.projectId, (project) => {
        project.status = 'failed';
        project.error = message;
        project.completedAt = new Date().toISOString();
        project.progress = state.progress;
        project.incidents = [...state.incidents];
        if (state.sections.length) {
          project.aiResult = { sections: [...state.sections] };
        }
        project.events = appendEvents(project.events, events);
      });
    } catch (persistError) {
      this.logger.error({ err: persistError, projectId: state.projectId }, 'could not record failed generation run');
      return null;
    }
  }
}

export default GenerationService;

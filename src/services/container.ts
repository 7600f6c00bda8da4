import path from 'path';
import { Logger } from 'pino';
import { AppConfig } from '../config/appConfig';
import baseLogger from '../utils/logger';
import { ClientFactory } from './ai/providers/openAICompatibleProvider';
import { ProviderRegistry } from './ai/providers/providerRegistry';
import ArtifactService from './artifacts/artifactService';
import FormatsClient, { FetchLike } from './formats/formatsClient';
import FormatService, { FormatCatalog } from './formats/formatService';
import { GenerationQueue } from './generation/generationQueue';
import { StreamHub } from './generation/streamHub';
import GenerationService from './generationService';
import { ProjectStore } from './projects/projectStore';
import PromptService from './prompts/promptService';
import WebhookNotifier from './webhookNotifier';

export interface AppServices {
  projectStore: ProjectStore;
  promptService: PromptService;
  formatService: FormatCatalog;
  providerRegistry: ProviderRegistry;
  artifactService: ArtifactService;
  generationService: GenerationService;
}

export interface ServiceOverrides {
  formatService?: FormatCatalog;
  providerRegistry?: ProviderRegistry;
  clientFactory?: ClientFactory;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/** Builds the process-wide service graph from configuration. */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const logger = overrides.logger ?? baseLogger;
  const dataDir = path.resolve(config.storage.dataDir);
  const outputDir = path.resolve(config.storage.outputDir);

  const projectStore = new ProjectStore({ dataDir, logger: logger.child({ module: 'project-store' }) });
  const promptService = new PromptService({ dataDir, logger: logger.child({ module: 'prompt-service' }) });

  const formatService =
    overrides.formatService ??
    new FormatService({
      client: new FormatsClient({
        baseUrl: config.formats.baseUrl,
        timeoutMs: config.formats.timeoutMs,
        fetchImpl: overrides.fetchImpl,
        logger: logger.child({ module: 'formats-client' }),
      }),
      ttlMs: config.formats.cacheTtlMs,
      logger: logger.child({ module: 'format-service' }),
    });

  const providerRegistry =
    overrides.providerRegistry ??
    ProviderRegistry.fromConfig(config.ai, {
      clientFactory: overrides.clientFactory,
      logger: logger.child({ module: 'provider-registry' }),
    });

  const artifactService = new ArtifactService({
    outputDir,
    publicBaseUrl: config.server.publicBaseUrl,
    logger: logger.child({ module: 'artifact-service' }),
  });

  const generationService = new GenerationService({
    projects: projectStore,
    prompts: promptService,
    formats: formatService,
    providers: providerRegistry,
    artifacts: artifactService,
    webhook: new WebhookNotifier({
      url: config.webhook.url,
      secret: config.webhook.secret,
      fetchImpl: overrides.fetchImpl,
      logger: logger.child({ module: 'webhook-notifier' }),
    }),
    queue: new GenerationQueue({
      concurrency: config.generation.concurrency,
      logger: logger.child({ module: 'generation-queue' }),
    }),
    streams: new StreamHub({
      heartbeatMs: config.generation.sseHeartbeatMs,
      logger: logger.child({ module: 'stream-hub' }),
    }),
    persistEvery: config.generation.persistEvery,
    logger: logger.child({ module: 'generation-service' }),
  });

  return {
    projectStore,
    promptService,
    formatService,
    providerRegistry,
    artifactService,
    generationService,
  };
}

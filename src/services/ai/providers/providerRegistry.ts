import { Logger } from 'pino';
import { AppConfig, PROVIDER_NAMES, ProviderName } from '../../../config/appConfig';
import baseLogger from '../../../utils/logger';
import { ProviderMetrics, ProviderRuntimeSnapshot } from '../providerMetrics';
import OpenAICompatibleProvider, { ClientFactory } from './openAICompatibleProvider';
import SimulationProvider from './simulationProvider';
import { TextProvider } from './types';

export interface ProviderSelection {
  primary: TextProvider;
  fallback: TextProvider | null;
  fallbackEnabled: boolean;
  simulation: boolean;
  metrics?: ProviderMetrics;
}

export interface ProviderHealth {
  simulation: boolean;
  fallbackEnabled: boolean;
  primary: { name: string; model: string; configured: boolean };
  fallback: { name: string; model: string; configured: boolean } | null;
  available: Array<{ name: ProviderName; model: string; configured: boolean }>;
  runtime: ProviderRuntimeSnapshot[];
}

function describe(provider: TextProvider) {
  return { name: provider.name, model: provider.model, configured: provider.isConfigured() };
}

export class ProviderRegistry {
  readonly primary: TextProvider;

  readonly fallback: TextProvider | null;

  readonly fallbackEnabled: boolean;

  readonly simulation: boolean;

  readonly metrics: ProviderMetrics;

  private readonly catalogue: OpenAICompatibleProvider[];

  constructor(
    { primary, fallback, fallbackEnabled, simulation, metrics }: ProviderSelection,
    catalogue: OpenAICompatibleProvider[] = []
  ) {
    this.primary = primary;
    this.fallback = fallback && fallback.name !== primary.name ? fallback : null;
    this.fallbackEnabled = fallbackEnabled && this.fallback !== null;
    this.simulation = simulation;
    this.metrics = metrics ?? new ProviderMetrics();
    this.catalogue = catalogue;
  }

  /**
   * Picks primary and fallback from configuration. Without any key (or with
   * simulation forced) the offline provider becomes the only provider.
   */
  static fromConfig(
    ai: AppConfig['ai'],
    { clientFactory, logger = baseLogger.child({ module: 'provider-registry' }) }: { clientFactory?: ClientFactory; logger?: Logger } = {}
  ): ProviderRegistry {
    const providers = new Map<ProviderName, OpenAICompatibleProvider>(
      PROVIDER_NAMES.map((name) => [
        name,
        new OpenAICompatibleProvider({ settings: ai.providers[name], timeoutMs: ai.requestTimeoutMs, clientFactory }),
      ])
    );
    const catalogue = [...providers.values()];
    const configured = PROVIDER_NAMES.filter((name) => providers.get(name)?.isConfigured());

    const useSimulation = ai.simulationMode === 'always' || (ai.simulationMode === 'auto' && configured.length === 0);
    if (useSimulation) {
      logger.warn({ mode: ai.simulationMode }, 'no AI provider configured; running in simulation mode');
      return new ProviderRegistry(
        { primary: new SimulationProvider(), fallback: null, fallbackEnabled: false, simulation: true },
        catalogue
      );
    }

    const pick = (preferred: ProviderName, exclude?: ProviderName): OpenAICompatibleProvider | null => {
      const candidates = [preferred, ...configured].filter((name) => name !== exclude);
      const name = candidates.find((candidate) => ai.simulationMode === 'never' || configured.includes(candidate));
      return name ? providers.get(name) ?? null : null;
    };

    const primary = pick(ai.primary) ?? catalogue[0];
    const fallback = pick(ai.fallback, primary.name);

    logger.info(
      { primary: primary.name, fallback: fallback?.name ?? null, fallbackEnabled: ai.fallbackOnQuota },
      'AI providers selected'
    );

    return new ProviderRegistry(
      { primary, fallback, fallbackEnabled: ai.fallbackOnQuota, simulation: false },
      catalogue
    );
  }

  health(): ProviderHealth {
    const selected = this.fallback ? [this.primary, this.fallback] : [this.primary];
    return {
      simulation: this.simulation,
      fallbackEnabled: this.fallbackEnabled,
      primary: describe(this.primary),
      fallback: this.fallback ? describe(this.fallback) : null,
      available: this.catalogue.map((provider) => ({
        name: provider.name,
        model: provider.model,
        configured: provider.isConfigured(),
      })),
      runtime: selected.map((provider) => this.metrics.snapshot(provider.name, provider.isConfigured())),
    };
  }
}

import { loadConfig, parseBoolean } from '../../src/config/appConfig';
import { ProviderError } from '../../src/services/ai/errors';
import OpenAICompatibleProvider, {
  ChatClient,
  ChatCompletionParams,
  ClientFactory,
} from '../../src/services/ai/providers/openAICompatibleProvider';
import { ProviderRegistry } from '../../src/services/ai/providers/providerRegistry';
import SimulationProvider from '../../src/services/ai/providers/simulationProvider';
import { SectionIndexEntry } from '../../src/models/SectionIndex';
import { SKIP_SECTION_TOKEN, buildSectionPrompt } from '../../src/utils/promptTemplates';

const section: SectionIndexEntry = {
  sectionId: 'sec-0001',
  path: 'Capitulo 1',
  kind: 'chapter',
  level: 1,
  title: 'Capitulo 1',
  hints: '',
};

const prompt = buildSectionPrompt({ projectTitle: 'Tesis', renderedTemplate: '', section });

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.environment).toBe('development');
    expect(config.server).toEqual({ port: 8001, publicBaseUrl: undefined, clientOrigins: ['http://localhost:5173'] });
    expect(config.storage).toEqual({ dataDir: 'data', outputDir: 'outputs' });
    expect(config.formats.baseUrl).toBe('http://localhost:8000/api/v1');
    expect(config.ai).toMatchObject({ primary: 'gemini', fallback: 'mistral', fallbackOnQuota: true, simulationMode: 'auto' });
    expect(config.generation).toMatchObject({ concurrency: 2, persistEvery: 1, sseHeartbeatMs: 15000 });
  });

  it('normalises urls, origins and provider names', () => {
    const config = loadConfig({
      PUBLIC_BASE_URL: 'https://bff.test/',
      CLIENT_ORIGIN: 'http://a.test, http://b.test',
      AI_PRIMARY_PROVIDER: ' Mistral ',
      GEMINI_API_KEY: '  test-key  ',
    });

    expect(config.server.publicBaseUrl).toBe('https://bff.test');
    expect(config.server.clientOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.ai.primary).toBe('mistral');
    expect(config.ai.fallback).toBe('gemini');
    expect(config.ai.providers.gemini.apiKey).toBe('test-key');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be a finite number');
    expect(() => loadConfig({ GENERATION_CONCURRENCY: '99' })).toThrow('GENERATION_CONCURRENCY must be between 1 and 16');
    expect(() => loadConfig({ WEBHOOK_URL: 'not a url' })).toThrow(
      'Invalid environment configuration: WEBHOOK_URL: WEBHOOK_URL must be a valid URL'
    );
    expect(() => parseBoolean('maybe', 'AI_FALLBACK_ON_QUOTA')).toThrow(
      'AI_FALLBACK_ON_QUOTA must be a boolean-like value (true/false)'
    );
  });
});

describe('ProviderRegistry.fromConfig', () => {
  it('runs in simulation mode without keys', () => {
    const registry = ProviderRegistry.fromConfig(loadConfig({}).ai);

    expect(registry.simulation).toBe(true);
    expect(registry.primary.name).toBe('simulation');
    expect(registry.fallback).toBeNull();
    expect(registry.health().available.map((provider) => [provider.name, provider.configured])).toEqual([
      ['gemini', false],
      ['mistral', false],
      ['openrouter', false],
    ]);
  });

  it('picks the configured primary and fallback', () => {
    const registry = ProviderRegistry.fromConfig(
      loadConfig({ GEMINI_API_KEY: 'test-key', MISTRAL_API_KEY: 'test-key' }).ai
    );

    expect(registry.simulation).toBe(false);
    expect(registry.primary.name).toBe('gemini');
    expect(registry.fallback?.name).toBe('mistral');
    expect(registry.fallbackEnabled).toBe(true);
  });

  it('reports runtime health for the selected providers', () => {
    const registry = ProviderRegistry.fromConfig(
      loadConfig({ GEMINI_API_KEY: 'test-key', MISTRAL_API_KEY: 'test-key' }).ai
    );
    registry.metrics.recordFailure(new ProviderError('exhausted', 'mistral', 'Quota exceeded'));

    expect(registry.health().runtime.map((entry) => [entry.name, entry.health])).toEqual([
      ['gemini', 'OK'],
      ['mistral', 'EXHAUSTED'],
    ]);
  });

  it('promotes the only configured provider to primary', () => {
    const registry = ProviderRegistry.fromConfig(loadConfig({ MISTRAL_API_KEY: 'test-key' }).ai);

    expect(registry.primary.name).toBe('mistral');
    expect(registry.fallback).toBeNull();
    expect(registry.fallbackEnabled).toBe(false);
  });

  it('honours forced simulation and a disabled fallback', () => {
    const forced = ProviderRegistry.fromConfig(loadConfig({ GEMINI_API_KEY: 'test-key', AI_SIMULATION_MODE: 'always' }).ai);
    const noFallback = ProviderRegistry.fromConfig(
      loadConfig({ GEMINI_API_KEY: 'test-key', MISTRAL_API_KEY: 'test-key', AI_FALLBACK_ON_QUOTA: 'false' }).ai
    );

    expect(forced.simulation).toBe(true);
    expect(noFallback.fallback?.name).toBe('mistral');
    expect(noFallback.fallbackEnabled).toBe(false);
  });
});

describe('OpenAICompatibleProvider', () => {
  const settings = { name: 'gemini' as const, apiKey: 'test-key', model: 'gemini-test', baseUrl: 'http://llm.test/v1' };

  function providerWith(complete: ChatClient['complete']) {
    const created: string[] = [];
    const clientFactory: ClientFactory = (options) => {
      created.push(options.apiKey);
      return { complete };
    };
    return { provider: new OpenAICompatibleProvider({ settings, timeoutMs: 1000, clientFactory }), created };
  }

  it('sends the chat prompt and returns the completion text', async () => {
    const seen: ChatCompletionParams[] = [];
    const { provider, created } = providerWith(async (params) => {
      seen.push(params);
      return { id: 'cmpl-1', content: 'Texto generado.', usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 } };
    });

    const result = await provider.generate({ prompt, section });
    await provider.generate({ prompt, section });

    expect(result).toEqual({
      text: 'Texto generado.',
      provider: 'gemini',
      model: 'gemini-test',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      requestId: 'cmpl-1',
    });
    expect(seen[0]).toMatchObject({ model: 'gemini-test', temperature: 0.7, maxTokens: 2048 });
    expect(seen[0].messages.map((message) => message.role)).toEqual(['system', 'user']);
    expect(created).toEqual(['test-key']);
  });

  it('classifies client failures', async () => {
    const { provider } = providerWith(async () => {
      throw Object.assign(new Error('Incorrect API key provided'), { status: 401 });
    });

    const attempt = provider.generate({ prompt, section });

    await expect(attempt).rejects.toBeInstanceOf(ProviderError);
    await expect(attempt).rejects.toMatchObject({ kind: 'auth', provider: 'gemini', status: 401 });
  });

  it('fails with an auth error when no key is configured', async () => {
    const provider = new OpenAICompatibleProvider({ settings: { ...settings, apiKey: undefined }, timeoutMs: 1000 });

    expect(provider.isConfigured()).toBe(false);
    await expect(provider.generate({ prompt, section })).rejects.toMatchObject({ kind: 'auth', provider: 'gemini' });
  });
});

describe('SimulationProvider', () => {
  const provider = new SimulationProvider();

  it('answers index sections with the skip token', async () => {
    const result = await provider.generate({ prompt, section: { ...section, path: 'Preliminares/ÍNDICE', title: 'ÍNDICE' } });

    expect(result.text).toBe(SKIP_SECTION_TOKEN);
  });

  it('writes deterministic text for content sections', async () => {
    const first = await provider.generate({ prompt, section });
    const second = await provider.generate({ prompt, section });

    expect(first.text).toBe(second.text);
    expect(first.text).toContain('Capitulo 1 (sec-0001)');
    expect(first).toMatchObject({ provider: 'simulation', model: 'simulation-v1' });
  });
});

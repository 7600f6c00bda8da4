import { OpenAI } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { Logger } from 'pino';
import { ProviderName, ProviderSettings } from '../../../config/appConfig';
import baseLogger from '../../../utils/logger';
import { ProviderError } from '../errors';
import { toProviderError } from '../errorClassifier';
import { GenerateRequest, GenerateResult, TextProvider, UsageRecord } from './types';

export interface ChatCompletionParams {
  model: string;
  messages: GenerateRequest['prompt']['messages'];
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResponse {
  id?: string;
  model?: string;
  content: string;
  usage?: UsageRecord;
}

export interface ChatClient {
  complete(params: ChatCompletionParams, options: { signal?: AbortSignal }): Promise<ChatCompletionResponse>;
}

export type ClientFactory = (settings: ProviderSettings & { apiKey: string; timeoutMs: number }) => ChatClient;

function toMessageParam({ role, content }: ChatCompletionParams['messages'][number]): ChatCompletionMessageParam {
  switch (role) {
    case 'system':
      return { role, content };
    case 'assistant':
      return { role, content };
    default:
      return { role, content };
  }
}

export const createOpenAIChatClient: ClientFactory = ({ apiKey, baseUrl, timeoutMs }) => {
  const client = new OpenAI({ apiKey, baseURL: baseUrl, timeout: timeoutMs, maxRetries: 0 });
  return {
    async complete(params, { signal }) {
      const completion = await client.chat.completions.create(
        {
          model: params.model,
          messages: params.messages.map(toMessageParam),
          temperature: params.temperature,
          max_tokens: params.maxTokens,
        },
        { signal }
      );
      const usage = completion.usage;
      return {
        id: completion.id,
        model: completion.model,
        content: completion.choices[0]?.message?.content ?? '',
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens ?? 0,
              completionTokens: usage.completion_tokens ?? 0,
              totalTokens: usage.total_tokens ?? 0,
            }
          : undefined,
      };
    },
  };
};

export interface OpenAICompatibleProviderOptions {
  settings: ProviderSettings;
  timeoutMs: number;
  clientFactory?: ClientFactory;
  logger?: Logger;
}

/**
 * Gemini, Mistral and OpenRouter all expose an OpenAI-compatible chat
 * completions endpoint, so one SDK client covers the three of them.
 */
class OpenAICompatibleProvider implements TextProvider {
  readonly name: ProviderName;

  readonly model: string;

  private readonly settings: ProviderSettings;

  private readonly timeoutMs: number;

  private readonly clientFactory: ClientFactory;

  private client: ChatClient | null = null;

  private readonly logger: Logger;

  constructor({ settings, timeoutMs, clientFactory, logger }: OpenAICompatibleProviderOptions) {
    this.name = settings.name;
    this.model = settings.model;
    this.settings = settings;
    this.timeoutMs = timeoutMs;
    this.clientFactory = clientFactory ?? createOpenAIChatClient;
    this.logger = logger ?? baseLogger.child({ module: 'ai-provider', provider: settings.name });
  }

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  private getClient(): ChatClient {
    const apiKey = this.settings.apiKey;
    if (!apiKey) {
      throw new ProviderError('auth', this.name, `No API key configured for ${this.name}`);
    }
    if (!this.client) {
      this.client = this.clientFactory({ ...this.settings, apiKey, timeoutMs: this.timeoutMs });
    }
    return this.client;
  }

  async generate({ prompt, section, signal }: GenerateRequest): Promise<GenerateResult> {
    const client = this.getClient();
    const startedAt = Date.now();
    try {
      const response = await client.complete(
        {
          model: this.model,
          messages: prompt.messages,
          temperature: prompt.temperature,
          maxTokens: prompt.maxTokens,
        },
        { signal }
      );
      this.logger.debug(
        { sectionId: section.sectionId, durationMs: Date.now() - startedAt, usage: response.usage },
        'provider completion received'
      );
      return {
        text: response.content,
        provider: this.name,
        model: response.model ?? this.model,
        usage: response.usage,
        requestId: response.id,
      };
    } catch (error) {
      const providerError = toProviderError(error, this.name);
      this.logger.warn(
        { sectionId: section.sectionId, kind: providerError.kind, status: providerError.status, durationMs: Date.now() - startedAt },
        'provider request failed'
      );
      throw providerError;
    }
  }
}

export default OpenAICompatibleProvider;

import { z } from 'zod';

export const PROVIDER_NAMES = ['gemini', 'mistral', 'openrouter'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type SimulationMode = 'auto' | 'always' | 'never';

const booleanStrings = new Map<unknown, boolean>([
  [true, true],
  [false, false],
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false],
  ['yes', true],
  ['no', false],
  ['y', true],
  ['n', false],
  ['on', true],
  ['off', false],
]);

export function parseBoolean(value: unknown, field: string, defaultValue = false): boolean {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return defaultValue;
  }
  const normalised = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (booleanStrings.has(normalised)) {
    return Boolean(booleanStrings.get(normalised));
  }
  throw new Error(`${field} must be a boolean-like value (true/false)`);
}

export function parseIntegerInRange(
  raw: unknown,
  field: string,
  { min, max, defaultValue }: { min: number; max: number; defaultValue: number }
): number {
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }
  const numeric = typeof raw === 'number' ? raw : Number(String(raw).trim());
  if (!Number.isFinite(numeric)) {
    throw new Error(`${field} must be a finite number`);
  }
  const integer = Math.floor(numeric);
  if (integer < min || integer > max) {
    throw new Error(`${field} must be between ${min} and ${max}`);
  }
  return integer;
}

const optionalUrl = (field: string) =>
  z
    .preprocess((value) => {
      if (typeof value !== 'string') {
        return value;
      }
      const trimmed = value.trim();
      return trimmed.length ? trimmed : undefined;
    }, z.string().url(`${field} must be a valid URL`).optional());

const numeric = z.union([z.string(), z.number()]).optional();
const flag = z.union([z.string(), z.boolean(), z.number()]).optional();

const providerName = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : undefined),
  z.enum(PROVIDER_NAMES).optional()
);

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: numeric,
  DATA_DIR: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),
  CLIENT_ORIGIN: z.string().optional(),
  PUBLIC_BASE_URL: optionalUrl('PUBLIC_BASE_URL'),
  FORMATS_API_BASE_URL: optionalUrl('FORMATS_API_BASE_URL'),
  FORMATS_API_TIMEOUT_MS: numeric,
  FORMATS_CACHE_TTL_MS: numeric,
  AI_PRIMARY_PROVIDER: providerName,
  AI_FALLBACK_PROVIDER: providerName,
  AI_FALLBACK_ON_QUOTA: flag,
  AI_SIMULATION_MODE: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : undefined),
    z.enum(['auto', 'always', 'never']).optional()
  ),
  AI_REQUEST_TIMEOUT_MS: numeric,
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().optional(),
  GEMINI_BASE_URL: optionalUrl('GEMINI_BASE_URL'),
  MISTRAL_API_KEY: z.string().optional(),
  MISTRAL_MODEL: z.string().optional(),
  MISTRAL_BASE_URL: optionalUrl('MISTRAL_BASE_URL'),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().optional(),
  OPENROUTER_BASE_URL: optionalUrl('OPENROUTER_BASE_URL'),
  GENERATION_CONCURRENCY: numeric,
  GENERATION_PERSIST_EVERY: numeric,
  GENERATION_RATE_LIMIT_MAX: numeric,
  GENERATION_RATE_LIMIT_WINDOW_MS: numeric,
  SSE_HEARTBEAT_MS: numeric,
  WEBHOOK_URL: optionalUrl('WEBHOOK_URL'),
  WEBHOOK_SECRET: z.string().optional(),
});

export interface ProviderSettings {
  name: ProviderName;
  apiKey?: string;
  model: string;
  baseUrl: string;
}

export interface AppConfig {
  environment: string;
  server: {
    port: number;
    publicBaseUrl?: string;
    clientOrigins: string[];
  };
  storage: {
    dataDir: string;
    outputDir: string;
  };
  formats: {
    baseUrl: string;
    timeoutMs: number;
    cacheTtlMs: number;
  };
  ai: {
    primary: ProviderName;
    fallback: ProviderName;
    fallbackOnQuota: boolean;
    simulationMode: SimulationMode;
    requestTimeoutMs: number;
    providers: Record<ProviderName, ProviderSettings>;
  };
  generation: {
    concurrency: number;
    persistEvery: number;
    sseHeartbeatMs: number;
    rateLimit: {
      windowMs: number;
      max: number;
    };
  };
  webhook: {
    url?: string;
    secret?: string;
  };
}

const DEFAULT_MODELS: Record<ProviderName, string> = {
  gemini: 'gemini-2.0-flash',
  mistral: 'mistral-medium-2505',
  openrouter: 'openai/gpt-oss-120b:free',
};

const DEFAULT_BASE_URLS: Record<ProviderName, string> = {
  gemini: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  mistral: 'https://api.mistral.ai/v1',
  openrouter: 'https://openrouter.ai/api/v1',
};

function trimmed(value: string | undefined): string | undefined {
  const result = value?.trim();
  return result ? result : undefined;
}

function parseOrigins(raw: string | undefined, environment: string): string[] {
  const source = raw ?? (environment === 'production' ? '' : 'http://localhost:5173');
  return source
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export function loadConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const env = parsed.data;
  const environment = trimmed(env.NODE_ENV) ?? 'development';
  const primary = env.AI_PRIMARY_PROVIDER ?? 'gemini';
  const fallback = env.AI_FALLBACK_PROVIDER ?? (primary === 'mistral' ? 'gemini' : 'mistral');

  const providers: Record<ProviderName, ProviderSettings> = {
    gemini: {
      name: 'gemini',
      apiKey: trimmed(env.GEMINI_API_KEY),
      model: trimmed(env.GEMINI_MODEL) ?? DEFAULT_MODELS.gemini,
      baseUrl: env.GEMINI_BASE_URL ?? DEFAULT_BASE_URLS.gemini,
    },
    mistral: {
      name: 'mistral',
      apiKey: trimmed(env.MISTRAL_API_KEY),
      model: trimmed(env.MISTRAL_MODEL) ?? DEFAULT_MODELS.mistral,
      baseUrl: env.MISTRAL_BASE_URL ?? DEFAULT_BASE_URLS.mistral,
    },
    openrouter: {
      name: 'openrouter',
      apiKey: trimmed(env.OPENROUTER_API_KEY),
      model: trimmed(env.OPENROUTER_MODEL) ?? DEFAULT_MODELS.openrouter,
      baseUrl: env.OPENROUTER_BASE_URL ?? DEFAULT_BASE_URLS.openrouter,
    },
  };

  return {
    environment,
    server: {
      port: parseIntegerInRange(env.PORT, 'PORT', { min: 1, max: 65535, defaultValue: 8001 }),
      publicBaseUrl: env.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
      clientOrigins: parseOrigins(env.CLIENT_ORIGIN, environment),
    },
    storage: {
      dataDir: trimmed(env.DATA_DIR) ?? 'data',
      outputDir: trimmed(env.OUTPUT_DIR) ?? 'outputs',
    },
    formats: {
      baseUrl: (env.FORMATS_API_BASE_URL ?? 'http://localhost:8000/api/v1').replace(/\/+$/, ''),
      timeoutMs: parseIntegerInRange(env.FORMATS_API_TIMEOUT_MS, 'FORMATS_API_TIMEOUT_MS', {
        min: 1000,
        max: 60000,
        defaultValue: 8000,
      }),
      cacheTtlMs: parseIntegerInRange(env.FORMATS_CACHE_TTL_MS, 'FORMATS_CACHE_TTL_MS', {
        min: 0,
        max: 86_400_000,
        defaultValue: 300_000,
      }),
    },
    ai: {
      primary,
      fallback,
      fallbackOnQuota: parseBoolean(env.AI_FALLBACK_ON_QUOTA, 'AI_FALLBACK_ON_QUOTA', true),
      simulationMode: env.AI_SIMULATION_MODE ?? 'auto',
      requestTimeoutMs: parseIntegerInRange(env.AI_REQUEST_TIMEOUT_MS, 'AI_REQUEST_TIMEOUT_MS', {
        min: 1000,
        max: 600_000,
        defaultValue: 60_000,
      }),
      providers,
    },
    generation: {
      concurrency: parseIntegerInRange(env.GENERATION_CONCURRENCY, 'GENERATION_CONCURRENCY', {
        min: 1,
        max: 16,
        defaultValue: 2,
      }),
      persistEvery: parseIntegerInRange(env.GENERATION_PERSIST_EVERY, 'GENERATION_PERSIST_EVERY', {
        min: 1,
        max: 50,
        defaultValue: 1,
      }),
      sseHeartbeatMs: parseIntegerInRange(env.SSE_HEARTBEAT_MS, 'SSE_HEARTBEAT_MS', {
        min: 1000,
        max: 60000,
        defaultValue: 15000,
      }),
      rateLimit: {
        windowMs: parseIntegerInRange(env.GENERATION_RATE_LIMIT_WINDOW_MS, 'GENERATION_RATE_LIMIT_WINDOW_MS', {
          min: 1000,
          max: 3_600_000,
          defaultValue: 5 * 60 * 1000,
        }),
        max: parseIntegerInRange(env.GENERATION_RATE_LIMIT_MAX, 'GENERATION_RATE_LIMIT_MAX', {
          min: 1,
          max: 10000,
          defaultValue: 30,
        }),
      },
    },
    webhook: {
      url: env.WEBHOOK_URL,
      secret: trimmed(env.WEBHOOK_SECRET),
    },
  };
}

export const appConfig = loadConfig(process.env);

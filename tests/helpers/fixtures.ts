import { EventEmitter } from 'events';
import { Response } from 'express';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CatalogVersion, FormatDetail, FormatSummary } from '../../src/models/Format';
import { PromptTemplate } from '../../src/models/Prompt';
import { ProviderError } from '../../src/services/ai/errors';
import { GenerateRequest, GenerateResult, TextProvider } from '../../src/services/ai/providers/types';
import { FormatCatalog, FormatListResult } from '../../src/services/formats/formatService';

export async function createTempDir(prefix = 'thesis-bff-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function waitFor<T>(
  read: () => Promise<T | null | undefined> | T | null | undefined,
  { timeoutMs = 3000, intervalMs = 20 }: { timeoutMs?: number; intervalMs?: number } = {}
): Promise<T> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    const value = await read();
    if (value !== null && value !== undefined) {
      return value;
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
  throw new Error(`Timed out after ${timeoutMs}ms`);
}

type ScriptStep = string | ProviderError | ((request: GenerateRequest) => Promise<string> | string);

/**
 * Provider whose answers are scripted per call; once the script runs out
 * every call answers with `fallbackText`.
 */
export class ScriptedProvider implements TextProvider {
  readonly model: string;

  readonly calls: GenerateRequest[] = [];

  private readonly script: ScriptStep[];

  constructor(
    readonly name: string,
    script: ScriptStep[] = [],
    private readonly fallbackText = 'Parrafo generado para la seccion.'
  ) {
    this.model = `${name}-model`;
    this.script = [...script];
  }

  isConfigured(): boolean {
    return true;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.calls.push(request);
    const step = this.script.shift();
    if (step instanceof ProviderError) {
      throw step;
    }
    const text = typeof step === 'function' ? await step(request) : step ?? this.fallbackText;
    return { text, provider: this.name, model: this.model };
  }
}

export class MockSseResponse extends EventEmitter {
  public headers: Record<string, string> = {};

  public chunks: string[] = [];

  public writableEnded = false;

  public statusCode = 200;

  setHeader(name: string, value: string): void {
    this.headers[name.toLowerCase()] = value;
  }

  getHeader(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  flushHeaders(): void {
    // headers are kept in memory
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  end(): void {
    this.writableEnded = true;
    this.emit('close');
  }
}

export function asResponse(mock: MockSseResponse): Response {
  return mock as unknown as Response;
}

/** Event names in write order, one per SSE message. */
export function parseSse(chunks: string[]): Array<{ event: string; data: unknown }> {
  return chunks.map((chunk) => {
    const event = /^event: (\S+)/m.exec(chunk)?.[1] ?? '';
    const raw = /^data: (.*)$/m.exec(chunk)?.[1] ?? '';
    return { event, data: raw ? JSON.parse(raw) : null };
  });
}

export const thesisDefinition = {
  preliminares: {
    indices: { contenido: 'ÍNDICE', tablas: 'ÍNDICE DE TABLAS' },
  },
  cuerpo: [
    {
      titulo: 'I. PLANTEAMIENTO DEL PROBLEMA',
      instruccion_detallada: 'Describe la realidad problematica.',
      contenido: [{ titulo: '1.1 Descripcion del problema' }, { titulo: '1.2 Formulacion del problema' }],
    },
    { titulo: 'II. MARCO TEORICO' },
  ],
};

export function makeFormat(id: string, definition: Record<string, unknown> | null = thesisDefinition): FormatDetail {
  return {
    id,
    title: `Formato ${id}`,
    university: 'Universidad de Prueba',
    category: 'tesis',
    documentType: 'tesis',
    version: '1.0.0',
    fields: [],
    assets: [],
    definition,
  };
}

export class StubFormatCatalog implements FormatCatalog {
  readonly formats = new Map<string, FormatDetail>();

  listCalls = 0;

  constructor(formats: FormatDetail[] = []) {
    formats.forEach((format) => this.formats.set(format.id, format));
  }

  async listFormats(): Promise<FormatListResult> {
    this.listCalls += 1;
    const formats: FormatSummary[] = [...this.formats.values()].map((format) => ({
      id: format.id,
      title: format.title,
      university: format.university,
      category: format.category,
      documentType: format.documentType,
      version: format.version,
    }));
    return { formats, stale: false, cachedAt: '2025-01-01T00:00:00.000Z' };
  }

  async getFormat(formatId: string): Promise<FormatDetail | null> {
    return this.formats.get(formatId) ?? null;
  }

  async getVersion(): Promise<CatalogVersion> {
    return { version: '7', generatedAt: '2025-01-01T00:00:00.000Z' };
  }
}

export function makePrompt(overrides: Partial<PromptTemplate> = {}): PromptTemplate {
  return {
    id: 'prompt_test',
    name: 'Prompt de prueba',
    docType: 'tesis',
    isActive: true,
    template: 'Tesis "{{title}}" sobre {{topic}}.',
    variables: ['title', 'topic'],
    createdAt: '2025-01-01T00:00:00.000Z',
    updatedAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export async function writePrompts(dataDir: string, prompts: PromptTemplate[]): Promise<void> {
  await fs.mkdir(dataDir, { recursive: true });
  await fs.writeFile(path.join(dataDir, 'prompts.json'), JSON.stringify(prompts, null, 2), 'utf-8');
}

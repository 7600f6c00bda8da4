import { nanoid } from 'nanoid';
import { Logger } from 'pino';
import { JsonFileStore } from '../../storage/jsonFileStore';
import { PromptTemplate, promptRecordSchema } from '../../models/Prompt';
import { PromptCreateInput, PromptUpdateInput } from '../../validators/prompt';
import { extractVariables } from '../ai/promptRenderer';
import baseLogger from '../../utils/logger';

/**
 * Prompt templates kept as a single JSON array, newest first.
 */
class PromptService {
  private readonly files: JsonFileStore;

  private readonly filePath: string;

  private readonly logger: Logger;

  constructor({ dataDir, logger }: { dataDir: string; logger?: Logger }) {
    this.logger = logger ?? baseLogger.child({ module: 'prompt-service' });
    this.files = new JsonFileStore(dataDir, this.logger);
    this.filePath = this.files.resolve('prompts.json');
  }

  private parseList(raw: unknown): PromptTemplate[] {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      this.logger.error({ filePath: this.filePath }, 'prompt store is not a JSON array; treating as empty');
      return [];
    }
    const prompts: PromptTemplate[] = [];
    raw.forEach((item, index) => {
      const parsed = promptRecordSchema.safeParse(item);
      if (parsed.success) {
        prompts.push(parsed.data);
      } else {
        this.logger.warn({ index, issues: parsed.error.issues.length }, 'skipping invalid prompt record');
      }
    });
    return prompts;
  }

  async list(): Promise<PromptTemplate[]> {
    return this.parseList(await this.files.read(this.filePath));
  }

  async get(id: string): Promise<PromptTemplate | null> {
    const prompts = await this.list();
    return prompts.find((prompt) => prompt.id === id) ?? null;
  }

  async create(input: PromptCreateInput): Promise<PromptTemplate> {
    const now = new Date().toISOString();
    const prompt: PromptTemplate = {
      id: `prompt_${nanoid(12)}`,
      name: input.name,
      docType: input.docType ?? 'general',
      isActive: input.isActive ?? true,
      template: input.template,
      variables: input.variables ?? extractVariables(input.template),
      createdAt: now,
      updatedAt: now,
    };

    await this.files.mutate(
      this.filePath,
      (raw) => [prompt, ...this.parseList(raw)],
      (prompts) => prompts
    );
    this.logger.info({ promptId: prompt.id }, 'prompt template created');
    return prompt;
  }

  async update(id: string, input: PromptUpdateInput): Promise<PromptTemplate | null> {
    const result = await this.files.mutate<{ prompts: PromptTemplate[]; updated: PromptTemplate | null }>(
      this.filePath,
      (raw) => {
        const prompts = this.parseList(raw);
        const index = prompts.findIndex((prompt) => prompt.id === id);
        if (index < 0) {
          return { prompts, updated: null };
        }
        const current = prompts[index];
        const template = input.template ?? current.template;
        const updated: PromptTemplate = {
          ...current,
          name: input.name ?? current.name,
          docType: input.docType ?? current.docType,
          isActive: input.isActive ?? current.isActive,
          template,
          variables: input.variables ?? (input.template ? extractVariables(template) : current.variables),
          updatedAt: new Date().toISOString(),
        };
        prompts[index] = updated;
        return { prompts, updated };
      },
      ({ prompts }) => prompts
    );
    return result.updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.files.mutate(
      this.filePath,
      (raw) => {
        const prompts = this.parseList(raw);
        const remaining = prompts.filter((prompt) => prompt.id !== id);
        return { prompts: remaining, removed: remaining.length !== prompts.length };
      },
      ({ prompts }) => prompts
    );
    return result.removed;
  }
}

export default PromptService;

import { customAlphabet } from 'nanoid';
import { Logger } from 'pino';
import { JsonFileStore } from '../../storage/jsonFileStore';
import { Project, ProjectEvent, ProjectStatus, projectRecordSchema } from '../../models/Project';
import ApiError from '../../utils/ApiError';
import baseLogger from '../../utils/logger';
import { appendEvents, emptyProgress } from './eventLog';

const generateId = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 12);
const PROJECT_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface NewProjectInput {
  title: string;
  formatId: string;
  formatName?: string | null;
  formatVersion?: string | null;
  promptId: string;
  promptName?: string | null;
  values?: Record<string, string>;
}

export type ProjectMutator = (project: Project) => void;

export class ProjectStore {
  private readonly files: JsonFileStore;

  private readonly logger: Logger;

  constructor({ dataDir, logger }: { dataDir: string; logger?: Logger }) {
    this.logger = logger ?? baseLogger.child({ module: 'project-store' });
    this.files = new JsonFileStore(dataDir, this.logger);
  }

  private pathFor(id: string): string | null {
    return PROJECT_ID_PATTERN.test(id) ? this.files.resolve('projects', `${id}.json`) : null;
  }

  private parse(raw: unknown, source: string): Project {
    const result = projectRecordSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`Stored project at ${source} does not match the project schema`);
    }
    return result.data;
  }

  async create(input: NewProjectInput): Promise<Project> {
    const now = new Date().toISOString();
    const project: Project = {
      id: `proj_${generateId()}`,
      title: input.title,
      formatId: input.formatId,
      formatName: input.formatName ?? null,
      formatVersion: input.formatVersion ?? null,
      promptId: input.promptId,
      promptName: input.promptName ?? null,
      values: input.values ?? {},
      status: 'draft',
      progress: emptyProgress(),
      events: [],
      aiResult: null,
      incidents: [],
      artifacts: [],
      error: null,
      runId: null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
    };

    const filePath = this.pathFor(project.id);
    if (!filePath) {
      throw new Error(`Generated project id ${project.id} is not storable`);
    }
    await this.files.withLock(filePath, () => this.files.write(filePath, project));
    this.logger.info({ projectId: project.id, formatId: project.formatId }, 'project draft created');
    return project;
  }

  async get(id: string): Promise<Project | null> {
    const filePath = this.pathFor(id);
    if (!filePath) {
      return null;
    }
    const raw = await this.files.read(filePath);
    return raw === undefined ? null : this.parse(raw, filePath);
  }

  async require(id: string): Promise<Project> {
    const project = await this.get(id);
    if (!project) {
      throw ApiError.notFound('Project', id);
    }
    return project;
  }

  /** Newest first; unreadable records are skipped. */
  async list(): Promise<Project[]> {
    const files = await this.files.list(this.files.resolve('projects'));
    const projects: Project[] = [];
    for (const filePath of files) {
      try {
        const raw = await this.files.read(filePath);
        if (raw !== undefined) {
          projects.push(this.parse(raw, filePath));
        }
      } catch (error) {
        this.logger.warn({ err: error, filePath }, 'skipping unreadable project record');
      }
    }
    return projects.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async findByStatus(statuses: readonly ProjectStatus[]): Promise<Project[]> {
    const projects = await this.list();
    return projects.filter((project) => statuses.includes(project.status));
  }

  /**
   * Applies `mutate` to the latest stored copy under the per-project lock.
   */
  async update(id: string, mutate: ProjectMutator): Promise<Project> {
    const filePath = this.pathFor(id);
    if (!filePath) {
      throw ApiError.notFound('Project', id);
    }
    return this.files.withLock(filePath, async () => {
      const raw = await this.files.read(filePath);
      if (raw === undefined) {
        throw ApiError.notFound('Project', id);
      }
      const current = this.parse(raw, filePath);
      const next = structuredClone(current);
      mutate(next);
      next.id = current.id;
      next.createdAt = current.createdAt;
      next.updatedAt = new Date().toISOString();
      await this.files.write(filePath, next);
      return next;
    });
  }

  appendEvents(id: string, events: readonly ProjectEvent[]): Promise<Project> {
    return this.update(id, (project) => {
      project.events = appendEvents(project.events, events);
    });
  }

  async delete(id: string): Promise<boolean> {
    const filePath = this.pathFor(id);
    if (!filePath) {
      return false;
    }
    return this.files.withLock(filePath, () => this.files.remove(filePath));
  }
}

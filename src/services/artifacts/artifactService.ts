import { promises as fs } from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { Logger } from 'pino';
import { FormatDefinition } from '../../models/Format';
import { Artifact, Project } from '../../models/Project';
import { safeFileName } from '../../utils/exportUtils';
import baseLogger from '../../utils/logger';
import { extractTocDirectives } from '../outline/indicesNormalizer';
import { renderDocx } from './docxDocument';

export type ArtifactType = Artifact['type'];

export interface ArtifactServiceOptions {
  outputDir: string;
  publicBaseUrl?: string;
  logger?: Logger;
}

export interface StoredArtifact {
  filePath: string;
  fileName: string;
  contentType: string;
}

const CONTENT_TYPES: Record<ArtifactType, string> = {
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  pdf: 'application/pdf',
};

const ARTIFACT_TYPES: ArtifactType[] = ['docx', 'pdf'];

const SAFE_ID = /^[A-Za-z0-9_-]{1,64}$/;

export default class ArtifactService {
  private readonly outputDir: string;

  private readonly publicBaseUrl: string;

  private readonly logger: Logger;

  constructor({ outputDir, publicBaseUrl, logger }: ArtifactServiceOptions) {
    this.outputDir = outputDir;
    this.publicBaseUrl = publicBaseUrl ?? '';
    this.logger = logger ?? baseLogger.child({ module: 'artifact-service' });
  }

  artifactPath(projectId: string, type: ArtifactType): string {
    return path.join(this.outputDir, `${projectId}.${type}`);
  }

  downloadUrl(projectId: string, type: ArtifactType): string {
    return `${this.publicBaseUrl}/api/projects/${encodeURIComponent(projectId)}/artifacts/${type}`;
  }

  async buildDocx(project: Project, definition: FormatDefinition | null): Promise<Artifact> {
    const sections = project.aiResult?.sections ?? [];
    const buffer = await renderDocx({
      title: project.title,
      sections,
      tocDirectives: definition ? extractTocDirectives(definition) : [],
    });

    const filePath = this.artifactPath(project.id, 'docx');
    await fs.mkdir(this.outputDir, { recursive: true });
    const tempPath = `${filePath}.${nanoid(8)}.tmp`;
    try {
      await fs.writeFile(tempPath, buffer);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    const artifact: Artifact = {
      type: 'docx',
      downloadUrl: this.downloadUrl(project.id, 'docx'),
      fileName: safeFileName(project.title, project.id, 'docx'),
    };
    this.logger.info({ projectId: project.id, sections: sections.length, filePath }, 'docx artifact written');
    return artifact;
  }

  /** Null when the project has no such artifact on disk. */
  async locate(project: Project, type: ArtifactType): Promise<StoredArtifact | null> {
    const recorded = project.artifacts.find((artifact) => artifact.type === type);
    if (!recorded || !SAFE_ID.test(project.id)) {
      return null;
    }
    const filePath = this.artifactPath(project.id, type);
    try {
      await fs.access(filePath);
    } catch {
      return null;
    }
    return { filePath: path.resolve(filePath), fileName: recorded.fileName, contentType: CONTENT_TYPES[type] };
  }

  async remove(projectId: string): Promise<void> {
    if (!SAFE_ID.test(projectId)) {
      return;
    }
    await Promise.all(
      ARTIFACT_TYPES.map((type) => fs.rm(this.artifactPath(projectId, type), { force: true }))
    );
  }
}

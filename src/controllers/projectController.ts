import { Request, Response, NextFunction } from 'express';
import { isActiveStatus, toProjectSummary } from '../models/Project';
import { FormatsServiceError } from '../services/formats/errors';
import ApiError from '../utils/ApiError';
import { getService } from '../utils/appServices';
import { getRequestLogger } from '../utils/httpLogger';
import { ProjectCreateInput, ProjectUpdateInput } from '../validators/project';

type ProjectParams = { projectId: string };

type ArtifactParams = ProjectParams & { type: string };

export const listProjects = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const projects = await getService(req, 'projectStore').list();
    res.json({ projects: projects.map(toProjectSummary) });
  } catch (error) {
    next(error);
  }
};

export const createProject = async (
  req: Request<Record<string, string>, unknown, ProjectCreateInput>,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = req.body;
    const logger = getRequestLogger(req);

    const prompt = await getService(req, 'promptService').get(payload.promptId);
    if (!prompt) {
      throw ApiError.notFound('Prompt', payload.promptId);
    }

    let formatName = payload.formatName ?? null;
    let formatVersion = payload.formatVersion ?? null;
    try {
      const format = await getService(req, 'formatService').getFormat(payload.formatId);
      if (!format) {
        throw ApiError.notFound('Format', payload.formatId);
      }
      formatName = formatName ?? format.title;
      formatVersion = formatVersion ?? (format.version || null);
    } catch (error) {
      // The draft can be stored without the upstream; the run checks the format again.
      if (!(error instanceof FormatsServiceError)) {
        throw error;
      }
      logger.warn({ err: error, formatId: payload.formatId }, 'formats service unavailable while creating project');
    }

    const project = await getService(req, 'projectStore').create({
      title: payload.title,
      formatId: payload.formatId,
      formatName,
      formatVersion,
      promptId: prompt.id,
      promptName: payload.promptName ?? prompt.name,
      values: payload.values ?? {},
    });
    res.status(201).json({ project });
  } catch (error) {
    next(error);
  }
};

export const getProject = async (req: Request<ProjectParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const project = await getService(req, 'projectStore').require(req.params.projectId);
    res.json({ project });
  } catch (error) {
    next(error);
  }
};

export const updateProject = async (
  req: Request<ProjectParams, unknown, ProjectUpdateInput>,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const { projectId } = req.params;
    const changes = req.body;

    if (changes.promptId) {
      const prompt = await getService(req, 'promptService').get(changes.promptId);
      if (!prompt) {
        throw ApiError.notFound('Prompt', changes.promptId);
      }
    }

    const project = await getService(req, 'projectStore').update(projectId, (current) => {
      if (isActiveStatus(current.status)) {
        throw ApiError.conflict('Project cannot be edited while generating', 'GENERATION_IN_PROGRESS', {
          projectId,
          status: current.status,
        });
      }
      if (current.status !== 'draft') {
        throw ApiError.conflict('Project is locked once generation has finished', 'PROJECT_LOCKED', {
          projectId,
          status: current.status,
        });
      }
      if (changes.title !== undefined) {
        current.title = changes.title;
      }
      if (changes.values !== undefined) {
        current.values = changes.values;
      }
      if (changes.formatId !== undefined && changes.formatId !== current.formatId) {
        current.formatId = changes.formatId;
        current.formatName = changes.formatName ?? null;
        current.formatVersion = changes.formatVersion ?? null;
      } else {
        current.formatName = changes.formatName ?? current.formatName;
        current.formatVersion = changes.formatVersion ?? current.formatVersion;
      }
      if (changes.promptId !== undefined && changes.promptId !== current.promptId) {
        current.promptId = changes.promptId;
        current.promptName = changes.promptName ?? null;
      } else {
        current.promptName = changes.promptName ?? current.promptName;
      }
    });
    res.json({ project });
  } catch (error) {
    next(error);
  }
};

export const deleteProject = async (req: Request<ProjectParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { projectId } = req.params;
    const store = getService(req, 'projectStore');
    const project = await store.require(projectId);
    if (isActiveStatus(project.status) || getService(req, 'generationService').isRunActive(projectId)) {
      throw ApiError.conflict('Project cannot be deleted while generating', 'GENERATION_IN_PROGRESS', {
        projectId,
        status: project.status,
      });
    }
    await store.delete(projectId);
    await getService(req, 'artifactService').remove(projectId);
    getRequestLogger(req).info({ projectId }, 'project deleted');
    res.status(204).end();
  } catch (error) {
    next(error);
  }
};

export const triggerGeneration = async (req: Request<ProjectParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { projectId } = req.params;
    const project = await getService(req, 'generationService').trigger(projectId, {
      requestId: typeof req.id === 'string' ? req.id : undefined,
    });
    getRequestLogger(req).info({ projectId, runId: project.runId }, 'generation accepted');
    res.status(202).json({ code: 'GENERATION_ACCEPTED', project });
  } catch (error) {
    next(error);
  }
};

export const cancelGeneration = async (req: Request<ProjectParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { projectId } = req.params;
    const project = await getService(req, 'generationService').cancel(projectId);
    res.status(202).json({ code: 'GENERATION_CANCELLING', status: project.status, runId: project.runId });
  } catch (error) {
    next(error);
  }
};

export const downloadArtifact = async (req: Request<ArtifactParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { projectId, type } = req.params;
    if (type !== 'docx' && type !== 'pdf') {
      throw new ApiError(400, 'Unsupported artifact type', { type, supported: ['docx', 'pdf'] }, 'BAD_REQUEST');
    }
    const project = await getService(req, 'projectStore').require(projectId);
    const artifact = await getService(req, 'artifactService').locate(project, type);
    if (!artifact) {
      throw new ApiError(404, 'Artifact not found', { projectId, type }, 'ARTIFACT_NOT_FOUND');
    }

    res.type(artifact.contentType);
    res.download(artifact.filePath, artifact.fileName, (error) => {
      if (!error) {
        return;
      }
      if (res.headersSent) {
        getRequestLogger(req).warn({ err: error, projectId, type }, 'artifact download interrupted');
        return;
      }
      next(error);
    });
  } catch (error) {
    next(error);
  }
};

import { Request, Response, NextFunction } from 'express';
import { isActiveStatus, toProjectSummary } from '../models/Project';
import { formatSseMessage } from '../services/generation/streamHub';
import { getService } from '../utils/appServices';
import { getRequestLogger } from '../utils/httpLogger';

type ProjectParams = { projectId: string };

/**
 * Opens an event stream for a project. Finished projects get their
 * snapshot and a `done` event straight away.
 */
export const streamProject = async (req: Request<ProjectParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { projectId } = req.params;
    const logger = getRequestLogger(req);
    const project = await getService(req, 'projectStore').require(projectId);
    const generationService = getService(req, 'generationService');

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders?.();

    res.write(
      formatSseMessage('snapshot', {
        project: toProjectSummary(project),
        progress: project.progress,
        events: project.events,
      })
    );

    if (!isActiveStatus(project.status) || !generationService.isRunActive(projectId)) {
      res.write(
        formatSseMessage('done', {
          projectId,
          runId: project.runId,
          status: project.status,
          error: project.error,
        })
      );
      res.end();
      logger.info({ projectId, status: project.status }, 'project stream closed (not generating)');
      return;
    }

    generationService.registerStream(projectId, res);
    logger.info({ projectId, runId: project.runId }, 'project stream opened');
  } catch (error) {
    next(error);
  }
};

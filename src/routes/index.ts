import { Router } from 'express';
import { getAiHealth } from '../controllers/aiController';
import { getCatalogVersion, getFormat, getFormatOutline, listFormats } from '../controllers/formatController';
import {
  cancelGeneration,
  createProject,
  deleteProject,
  downloadArtifact,
  getProject,
  listProjects,
  triggerGeneration,
  updateProject,
} from '../controllers/projectController';
import { createPrompt, deletePrompt, getPrompt, listPrompts, updatePrompt } from '../controllers/promptController';
import { streamProject } from '../controllers/streamController';
import { createGenerationLimiter, GenerationLimiterOptions } from '../middleware/rateLimiters';
import { validateBody } from '../middleware/validate';
import { projectCreateSchema, projectUpdateSchema } from '../validators/project';
import { promptCreateSchema, promptUpdateSchema } from '../validators/prompt';

export function createRoutes({ rateLimit }: { rateLimit: GenerationLimiterOptions }): Router {
  const router = Router();
  const generationLimiter = createGenerationLimiter('project-generate', rateLimit);

  router.get('/formats/version', getCatalogVersion);
  router.get('/formats', listFormats);
  router.get('/formats/:formatId', getFormat);
  router.get('/formats/:formatId/outline', getFormatOutline);

  router.get('/prompts', listPrompts);
  router.post('/prompts', validateBody(promptCreateSchema), createPrompt);
  router.get('/prompts/:promptId', getPrompt);
  router.put('/prompts/:promptId', validateBody(promptUpdateSchema), updatePrompt);
  router.delete('/prompts/:promptId', deletePrompt);

  router.get('/projects', listProjects);
  router.post('/projects', validateBody(projectCreateSchema), createProject);
  router.get('/projects/:projectId', getProject);
  router.patch('/projects/:projectId', validateBody(projectUpdateSchema), updateProject);
  router.delete('/projects/:projectId', deleteProject);
  router.post('/projects/:projectId/generate', generationLimiter, triggerGeneration);
  router.post('/projects/:projectId/cancel', cancelGeneration);
  router.get('/projects/:projectId/stream', streamProject);
  router.get('/projects/:projectId/artifacts/:type', downloadArtifact);

  router.get('/ai/health', getAiHealth);

  return router;
}

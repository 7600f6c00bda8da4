import { Request, Response, NextFunction } from 'express';
import ApiError from '../utils/ApiError';
import { getService } from '../utils/appServices';
import { getRequestLogger } from '../utils/httpLogger';
import { PromptCreateInput, PromptUpdateInput } from '../validators/prompt';

type PromptParams = { promptId: string };

export const listPrompts = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const prompts = await getService(req, 'promptService').list();
    res.json({ prompts });
  } catch (error) {
    next(error);
  }
};

export const getPrompt = async (req: Request<PromptParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const prompt = await getService(req, 'promptService').get(req.params.promptId);
    if (!prompt) {
      throw ApiError.notFound('Prompt', req.params.promptId);
    }
    res.json({ prompt });
  } catch (error) {
    next(error);
  }
};

export const createPrompt = async (
  req: Request<Record<string, string>, unknown, PromptCreateInput>,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const prompt = await getService(req, 'promptService').create(req.body);
    getRequestLogger(req).info({ promptId: prompt.id }, 'prompt template created');
    res.status(201).json({ prompt });
  } catch (error) {
    next(error);
  }
};

export const updatePrompt = async (
  req: Request<PromptParams, unknown, PromptUpdateInput>,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const { promptId } = req.params;
    const prompt = await getService(req, 'promptService').update(promptId, req.body);
    if (!prompt) {
      throw ApiError.notFound('Prompt', promptId);
    }
    res.json({ prompt });
  } catch (error) {
    next(error);
  }
};

export const deletePrompt = async (req: Request<PromptParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { promptId } = req.params;
    const removed = await getService(req, 'promptService').delete(promptId);
    if (!removed) {
      throw ApiError.notFound('Prompt', promptId);
    }
    res.status(204).end();
  } catch (error) {
    next(error);
  }
};

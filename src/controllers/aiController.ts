import { Request, Response, NextFunction } from 'express';
import { getService } from '../utils/appServices';

export const getAiHealth = (req: Request, res: Response, next: NextFunction): void => {
  try {
    const health = getService(req, 'providerRegistry').health();
    res.json({
      code: health.simulation ? 'AI_SIMULATION' : 'AI_READY',
      ...health,
    });
  } catch (error) {
    next(error);
  }
};

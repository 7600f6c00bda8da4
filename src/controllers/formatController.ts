import { Request, Response, NextFunction } from 'express';
import { compileOutline, isFormatDefinition } from '../services/outline/outlineCompiler';
import ApiError from '../utils/ApiError';
import { getService } from '../utils/appServices';
import { getRequestLogger } from '../utils/httpLogger';
import { parseValidationError } from '../middleware/validate';
import { formatQuerySchema } from '../validators/project';

type FormatParams = { formatId: string };

export const getCatalogVersion = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const version = await getService(req, 'formatService').getVersion();
    res.json(version);
  } catch (error) {
    next(error);
  }
};

export const listFormats = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const query = formatQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new ApiError(400, 'Invalid format filters', parseValidationError(query.error), 'VALIDATION_FAILED');
    }
    const result = await getService(req, 'formatService').listFormats(query.data);
    if (result.stale) {
      getRequestLogger(req).warn({ cachedAt: result.cachedAt }, 'serving stale format catalogue');
    }
    res.json(result);
  } catch (error) {
    next(error);
  }
};

export const getFormat = async (req: Request<FormatParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { formatId } = req.params;
    const format = await getService(req, 'formatService').getFormat(formatId);
    if (!format) {
      throw ApiError.notFound('Format', formatId);
    }
    res.json(format);
  } catch (error) {
    next(error);
  }
};

export const getFormatOutline = async (req: Request<FormatParams>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const { formatId } = req.params;
    const format = await getService(req, 'formatService').getFormat(formatId);
    if (!format) {
      throw ApiError.notFound('Format', formatId);
    }
    const sections = isFormatDefinition(format.definition)
      ? compileOutline(format.definition, getRequestLogger(req))
      : [];
    res.json({ formatId, version: format.version, sections });
  } catch (error) {
    next(error);
  }
};

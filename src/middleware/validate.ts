import { RequestHandler } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import ApiError from '../utils/ApiError';

export function validateBody<T extends ZodTypeAny>(schema: T): RequestHandler {
  return (req, _res, next) => {
    const parseResult = schema.safeParse(req.body ?? {});
    if (!parseResult.success) {
      next(new ApiError(400, 'Request validation failed', parseValidationError(parseResult.error), 'VALIDATION_FAILED'));
      return;
    }
    req.body = parseResult.data;
    next();
  };
}

export function parseValidationError(error: ZodError) {
  return {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
      code: issue.code,
    })),
  };
}

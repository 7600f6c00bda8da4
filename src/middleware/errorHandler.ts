import { NextFunction, Request, Response } from 'express';
import ApiError from '../utils/ApiError';
import { getRequestLogger } from '../utils/httpLogger';
import { FormatsServiceError } from '../services/formats/errors';

function resolveErrorCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 429:
      return 'RATE_LIMITED';
    case 502:
      return 'BAD_GATEWAY';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    case 504:
      return 'GATEWAY_TIMEOUT';
    default:
      return statusCode >= 500 ? 'INTERNAL_ERROR' : 'UNKNOWN_ERROR';
  }
}

function readStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const candidate = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof candidate === 'number' && candidate >= 400 && candidate < 600 ? candidate : undefined;
}

function toApiError(err: unknown): ApiError | null {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof FormatsServiceError) {
    return new ApiError(err.statusCode, err.message, { upstream: 'formats' }, err.code);
  }
  return null;
}

function wantsEventStream(req: Request, res: Response): boolean {
  const contentType = res.getHeader('Content-Type');
  if (contentType && contentType.toString().includes('text/event-stream')) {
    return true;
  }
  const acceptHeader = req.headers.accept;
  return Boolean(acceptHeader && acceptHeader.includes('text/event-stream') && req.path.endsWith('/stream'));
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, 'Route not found', undefined, 'NOT_FOUND'));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = toApiError(err);
  const statusCode = apiError ? apiError.statusCode : readStatus(err) ?? 500;
  const code = apiError?.code ?? resolveErrorCode(statusCode);

  const payload: Record<string, unknown> = {
    code,
    message: apiError ? apiError.message : statusCode < 500 && err instanceof Error ? err.message : 'Internal Server Error',
  };

  if (apiError && apiError.details !== undefined) {
    payload.details = apiError.details;
  }

  if (!apiError && statusCode >= 500 && err instanceof Error && process.env.NODE_ENV !== 'production') {
    payload.details = {
      message: err.message,
      stack: err.stack,
    };
  }

  const requestLogger = getRequestLogger(req);
  const level = statusCode >= 500 ? 'error' : 'warn';
  if (err instanceof Error) {
    requestLogger[level]({ err, requestId: req.id, code, statusCode }, err.message);
  } else {
    requestLogger[level]({ requestId: req.id, code, statusCode, err }, 'Unhandled error');
  }

  if (res.headersSent && !wantsEventStream(req, res)) {
    return;
  }

  if (wantsEventStream(req, res)) {
    if (!res.headersSent) {
      res.statusCode = statusCode;
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
    }
    if (!res.writableEnded) {
      res.write(`event: error\ndata: ${JSON.stringify(payload)}\n\n`);
      res.write(`event: done\ndata: ${JSON.stringify({ status: 'failed', code })}\n\n`);
      res.end();
    }
    return;
  }

  res.status(statusCode).json(payload);
}

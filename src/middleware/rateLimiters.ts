import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import type { Request, Response } from 'express';

export interface GenerationLimiterOptions {
  windowMs: number;
  max: number;
}

function getRetryAfterSeconds(req: Request, windowMs: number): number {
  const state: unknown = Reflect.get(req, 'rateLimit');
  if (typeof state === 'object' && state !== null && 'resetTime' in state && state.resetTime instanceof Date) {
    const diffMs = state.resetTime.getTime() - Date.now();
    if (diffMs > 0) {
      return Math.ceil(diffMs / 1000);
    }
  }
  return Math.ceil(windowMs / 1000);
}

function rateLimitHandler(routeName: string, { windowMs, max }: GenerationLimiterOptions) {
  return (req: Request, res: Response): void => {
    const retryAfter = getRetryAfterSeconds(req, windowMs);
    res.setHeader('Retry-After', retryAfter.toString());
    res.status(429).json({
      code: 'RATE_LIMITED',
      message: 'Too many generation requests, please retry later.',
      details: {
        retryAfter,
        limit: max,
        windowSeconds: Math.ceil(windowMs / 1000),
        route: routeName,
      },
    });
  };
}

export function createGenerationLimiter(routeName: string, options: GenerationLimiterOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    legacyHeaders: false,
    standardHeaders: true,
    handler: rateLimitHandler(routeName, options),
  });
}

import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import { nanoid } from 'nanoid';
import { Logger } from 'pino';
import { AppConfig } from './config/appConfig';
import { createRoutes } from './routes';
import { AppServices } from './services/container';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import baseLogger from './utils/logger';
import ApiError from './utils/ApiError';

function readRequestId(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  const trimmed = value?.trim();
  return trimmed && trimmed.length <= 128 ? trimmed : undefined;
}

export function createApp(
  services: AppServices,
  config: Pick<AppConfig, 'server' | 'generation'>,
  logger: Logger = baseLogger.child({ module: 'app' })
): Express {
  const app = express();
  app.disable('x-powered-by');

  const requestLogger = pinoHttp({
    logger,
    genReqId(req, res) {
      const requestId = readRequestId(req.headers['x-request-id']) ?? nanoid(16);
      res.setHeader('X-Request-Id', requestId);
      return requestId;
    },
    customLogLevel(_req, res, err) {
      if (err) {
        return 'error';
      }
      if (res.statusCode >= 500) {
        return 'error';
      }
      if (res.statusCode >= 400) {
        return 'warn';
      }
      return 'info';
    },
    customSuccessMessage(req, res) {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },
    customErrorMessage(req, res, err) {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },
  });

  app.use(requestLogger);

  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  const allowedOrigins = config.server.clientOrigins;
  const allowAllOrigins = allowedOrigins.includes('*');

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || allowAllOrigins || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(new ApiError(403, 'Origin not allowed', { origin }, 'CORS_NOT_ALLOWED'));
      },
      credentials: true,
      exposedHeaders: ['X-Request-Id', 'Content-Disposition'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  Object.entries(services).forEach(([key, service]) => {
    app.set(key, service);
  });

  app.get('/health', (_req, res) => {
    const providers = services.providerRegistry.health();
    res.json({
      code: 'SERVICE_HEALTHY',
      status: 'ok',
      engine: providers.simulation ? 'simulation' : providers.primary.name,
      providers,
    });
  });

  app.use('/api', createRoutes({ rateLimit: config.generation.rateLimit }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

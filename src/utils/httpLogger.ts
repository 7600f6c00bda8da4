import { Request } from 'express';
import { Logger } from 'pino';
import logger from './logger';

export function getRequestLogger(req: Pick<Request, 'log'>): Logger {
  return req.log ?? logger;
}

import { Request } from 'express';
import { AppServices } from '../services/container';
import ApiError from './ApiError';

export function getService<K extends keyof AppServices>(req: Pick<Request, 'app'>, key: K): AppServices[K] {
  const service: AppServices[K] | undefined = req.app.get(key);
  if (!service) {
    throw new ApiError(500, `${key} not available`);
  }
  return service;
}

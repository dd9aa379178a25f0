import type { NextFunction, Request, Response } from 'express';
import { UnauthorizedError, NotConfiguredError } from '../utils/errors';

/** Require `X-API-KEY` to equal the configured key */
export function requireApiKey(expectedKey: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      req.log.fatal('API_KEY environment variable is not set, cannot authenticate requests');
      return next(new NotConfiguredError('Server configuration error'));
    }

    const apiKey = req.get('X-API-KEY');
    if (!apiKey || apiKey !== expectedKey) {
      req.log.warn({ ip: req.ip }, 'Unauthorized access attempt');
      return next(new UnauthorizedError());
    }

    next();
  };
}

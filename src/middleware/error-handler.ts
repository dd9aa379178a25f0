import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function exposedClientStatus(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('status' in error) || !('expose' in error)) return undefined;
  const { status, expose } = error;
  if (expose !== true || typeof status !== 'number' || status < 400 || status > 499) return undefined;
  return status;
}

/** Single place where thrown errors become JSON responses */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const log = req.log ?? logger;

  if (error instanceof ZodError) {
    res.status(400).json({ success: false, error: describeZodError(error), code: 'VALIDATION_FAILED' });
    return;
  }

  if (error instanceof AppError) {
    if (error.status >= 500) {
      log.error({ err: error, cause: error.cause }, error.message);
    }
    res.status(error.status).json({ success: false, error: error.message, code: error.code });
    return;
  }

  // body-parser raises http-errors with their own 4xx status (bad JSON, 413, 415)
  const clientStatus = exposedClientStatus(error);
  if (clientStatus !== undefined && error instanceof Error) {
    const message = error instanceof SyntaxError ? 'Malformed JSON body' : error.message;
    res.status(clientStatus).json({ success: false, error: message, code: 'VALIDATION_FAILED' });
    return;
  }

  log.error({ err: error }, 'An unexpected error occurred');
  res.status(500).json({ success: false, error: 'An unexpected server error occurred.' });
}

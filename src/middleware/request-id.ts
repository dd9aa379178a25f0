import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

const HEADER = 'X-Request-Id';
const VALID_ID = /^[A-Za-z0-9._-]{1,128}$/;

/** Tag each request with an id (caller-supplied or fresh) and a child logger */
export function requestId(req: Request, res: Response, next: NextFunction): void {
  const supplied = req.get(HEADER);
  const id = supplied && VALID_ID.test(supplied) ? supplied : uuidv4();

  req.id = id;
  req.log = logger.child({ requestId: id });
  res.setHeader(HEADER, id);
  next();
}

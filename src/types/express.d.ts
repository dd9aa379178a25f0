import type { Logger } from 'pino';

declare global {
  namespace Express {
    interface Request {
      /** Set by the request-id middleware */
      id: string;
      log: Logger;
    }
  }
}

export {};

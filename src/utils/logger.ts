import pino from 'pino';
import { config } from '../config';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'contract-stamper',
  level: config.logLevel,
});

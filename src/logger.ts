import pino, { Logger } from 'pino';
import { config } from './config/env';

export type { Logger };

export const logger: Logger = pino({
  name: 'search',
  level: config.LOG_LEVEL,
  transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined
});

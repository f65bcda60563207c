import pino, { Logger } from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

export const logger = pino({
  level,
  base: undefined,
  name: 'statement-analysis',
});

export const componentLogger = (component: string): Logger => logger.child({ component });

export type { Logger };

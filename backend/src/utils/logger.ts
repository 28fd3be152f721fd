import pino from 'pino';

/**
 * Application logger using Pino
 *
 * JSON lines in production, pino-pretty otherwise.
 * Silent under vitest unless LOG_LEVEL asks for output.
 */

const env = process.env.NODE_ENV || 'development';
const isTest = env === 'test' || process.env.VITEST !== undefined;
const isDevelopment = env !== 'production' && !isTest;

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),

  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env,
  },
});

/**
 * Create a child logger carrying consistent metadata (component name, project, ...)
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export type Logger = ReturnType<typeof createLogger>;

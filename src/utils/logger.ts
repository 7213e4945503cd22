import pino from 'pino';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export function loggerOptions(): pino.LoggerOptions {
  return {
    level: process.env.LOG_LEVEL || 'info',
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

let root: pino.Logger | undefined;

function rootLogger(): pino.Logger {
  if (!root) {
    root = pino(loggerOptions());
  }
  return root;
}

export function createLogger(scope: string): Logger {
  const child = rootLogger().child({ scope });
  return {
    error: (msg, ctx) => child.error(ctx ?? {}, msg),
    warn: (msg, ctx) => child.warn(ctx ?? {}, msg),
    info: (msg, ctx) => child.info(ctx ?? {}, msg),
    debug: (msg, ctx) => child.debug(ctx ?? {}, msg),
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

import pino from 'pino';

function resolveLevel(): string {
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.LOG_LEVEL || 'info';
}

function buildOptions(): pino.LoggerOptions {
  const level = resolveLevel();
  if (process.env.NODE_ENV === 'development') {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level };
}

let baseLogger: pino.Logger | undefined;

function getBaseLogger(): pino.Logger {
  if (!baseLogger) {
    baseLogger = pino(buildOptions());
  }
  return baseLogger;
}

/** Child logger bound to a component, adapter or job context. */
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({ ...context });
}

export type Logger = pino.Logger;

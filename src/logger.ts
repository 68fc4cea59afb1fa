import pino, { Logger, LoggerOptions } from 'pino';

const APP_NAME = 'vocab-gender-quiz';
const DEFAULT_LOG_LEVEL = 'info';

const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_TEST = NODE_ENV === 'test';
const LOG_LEVEL = process.env.LOG_LEVEL || (IS_TEST ? 'silent' : DEFAULT_LOG_LEVEL);

function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,
    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export const logger: Logger = pino(buildLoggerOptions());

/** Child logger tagged with the owning module, e.g. `createModuleLogger('session')`. */
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };

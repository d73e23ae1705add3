/**
 * Logger
 *
 * One pino instance for the workspace. Level comes from LOG_LEVEL;
 * development output goes through pino-pretty.
 */

import { pino, stdSerializers } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'docbinder',
    env: NODE_ENV,
  },
  serializers: {
    err: stdSerializers.err,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = typeof logger;

export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}

export interface RunContext {
  project: string;
  version: string;
}

/**
 * Child logger for one packaging run, bound to the project and version
 */
export function createRunLogger(run: RunContext, parent?: Logger): Logger {
  return createLogger({ project: run.project, version: run.version }, parent);
}

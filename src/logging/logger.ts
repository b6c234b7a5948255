import pino from 'pino';
import type { Level, Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const LEVELS: ReadonlySet<string> = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function isLevel(value: string): value is Level | 'silent' {
  return LEVELS.has(value);
}

export interface LoggerFileOptions {
  /** Also append JSON lines to this file; the directory is created */
  file?: string | undefined;
}

/**
 * Create logger instance based on environment
 */
export function createLogger(level?: string, options: LoggerFileOptions = {}): Logger {
  const env = process.env['NODE_ENV'] ?? 'development';
  const isTest = env === 'test' || process.env['VITEST'] !== undefined;
  const isDevelopment = env !== 'production' && !isTest;
  const requested = level ?? process.env['LOG_LEVEL'] ?? (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');
  const resolved = isLevel(requested) ? requested : 'info';

  const base: LoggerOptions = {
    level: resolved,
    base: {
      env,
      service: 'bibgraph',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // a file destination rules out the pretty transport; both streams get JSON
  if (options.file && resolved !== 'silent') {
    return pino(base, pino.multistream([
      { level: resolved, stream: process.stdout },
      { level: resolved, stream: pino.destination({ dest: options.file, mkdir: true }) },
    ]));
  }

  return pino({
    ...base,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

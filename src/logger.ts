/**
 * Logger Module
 *
 * Structured logging with file and console transports.
 * Reads its settings straight from the environment so that the config
 * module can log through it without an import cycle.
 */

import winston from 'winston';
import chalk from 'chalk';
import path from 'path';

const LOG_DIR = process.env.LOG_DIR || '.';
const LOG_FILE = path.join(LOG_DIR, 'semantic-match.log');
const ERROR_LOG_FILE = path.join(LOG_DIR, 'semantic-match-error.log');

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const LOG_TO_CONSOLE = process.env.LOG_TO_CONSOLE !== 'false';
// files only on request; importing the package must not touch the working directory
const LOG_TO_FILE = process.env.LOG_TO_FILE === 'true';

/**
 * Custom format for console output with colors
 */
const consoleFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const ts = chalk.dim(`[${new Date(String(timestamp)).toLocaleTimeString()}]`);

  let levelStr: string;
  switch (level) {
    case 'error':
      levelStr = chalk.red.bold('ERROR');
      break;
    case 'warn':
      levelStr = chalk.yellow.bold('WARN');
      break;
    case 'info':
      levelStr = chalk.blue('INFO');
      break;
    case 'debug':
      levelStr = chalk.gray('DEBUG');
      break;
    case 'verbose':
      levelStr = chalk.cyan('VERBOSE');
      break;
    default:
      levelStr = level.toUpperCase();
  }

  const metaStr = Object.keys(meta).length > 0
    ? chalk.dim(` ${JSON.stringify(meta)}`)
    : '';

  return `${ts} ${levelStr} ${message}${metaStr}`;
});

/**
 * JSON structured output for log files
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const createLogger = () => {
  const transports: winston.transport[] = [];

  if (LOG_TO_FILE) {
    transports.push(
      new winston.transports.File({
        filename: LOG_FILE,
        level: LOG_LEVEL,
        format: fileFormat,
        maxsize: 5 * 1024 * 1024, // 5MB
        maxFiles: 3,
      }),
      new winston.transports.File({
        filename: ERROR_LOG_FILE,
        level: 'error',
        format: fileFormat,
        maxsize: 5 * 1024 * 1024,
        maxFiles: 3,
      })
    );
  }

  // winston complains when it has nowhere to write, so a muted console stays behind
  transports.push(
    new winston.transports.Console({
      level: LOG_LEVEL,
      silent: !LOG_TO_CONSOLE,
      format: winston.format.combine(
        winston.format.timestamp(),
        consoleFormat
      ),
    })
  );

  return winston.createLogger({
    level: LOG_LEVEL,
    transports,
    exitOnError: false,
  });
};

const logger = createLogger();

export const logCategories = {
  SEARCH: 'search',
  MATCHER: 'matcher',
  EMBEDDING: 'embedding',
  CONFIG: 'config',
} as const;

export type LogCategory = typeof logCategories[keyof typeof logCategories];

export interface CategoryLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: Error | unknown) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  verbose: (message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Create a child logger with a specific category
 */
export const createCategoryLogger = (category: LogCategory): CategoryLogger => {
  return {
    info: (message, meta) =>
      logger.info(`[${category}] ${message}`, meta),
    warn: (message, meta) =>
      logger.warn(`[${category}] ${message}`, meta),
    error: (message, error) => {
      if (error instanceof Error) {
        logger.error(`[${category}] ${message}`, { error: error.message, stack: error.stack });
      } else {
        logger.error(`[${category}] ${message}`, { error });
      }
    },
    debug: (message, meta) =>
      logger.debug(`[${category}] ${message}`, meta),
    verbose: (message, meta) =>
      logger.verbose(`[${category}] ${message}`, meta),
  };
};

export const searchLogger = createCategoryLogger(logCategories.SEARCH);
export const matcherLogger = createCategoryLogger(logCategories.MATCHER);
export const embeddingLogger = createCategoryLogger(logCategories.EMBEDDING);
export const configLogger = createCategoryLogger(logCategories.CONFIG);

export default logger;

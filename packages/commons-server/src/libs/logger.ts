import { mkdirSync } from 'fs';
import { join } from 'path';
import { Logger, createLogger, format, transports } from 'winston';

export interface LoggerOptions {
  level?: string;
  /** directory of the rotating `api.log` file, console only when missing */
  logDir?: string;
  /** one JSON object per line instead of colorized text */
  json?: boolean;
}

const logFileName = 'api.log';
const logFileMaxSize = 10 * 1024 * 1024;
const logFileMaxFiles = 5;

const textFormat = format.printf(({ timestamp, level, message, ...meta }) => {
  const metaKeys = Object.keys(meta);

  return `${String(timestamp)} [${level}] ${String(message)}${
    metaKeys.length > 0 ? ` ${JSON.stringify(meta)}` : ''
  }`;
});

/**
 * Create the application logger: console output and, when a directory is
 * given, a size rotated log file always written as JSON
 */
export const createServerLogger = (options: LoggerOptions = {}): Logger => {
  const logger = createLogger({
    level: options.level ?? 'info',
    format: format.combine(format.timestamp(), format.errors({ stack: true })),
    transports: [
      new transports.Console({
        format: options.json
          ? format.json()
          : format.combine(format.colorize(), textFormat)
      })
    ]
  });

  if (options.logDir) {
    mkdirSync(options.logDir, { recursive: true });

    logger.add(
      new transports.File({
        filename: join(options.logDir, logFileName),
        maxsize: logFileMaxSize,
        maxFiles: logFileMaxFiles,
        tailable: true,
        format: format.json()
      })
    );
  }

  return logger;
};

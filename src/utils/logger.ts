import winston from "winston";
import {
  LOG_FILE_MAX_FILES,
  LOG_FILE_MAX_SIZE_BYTES,
} from "@core/constants/defaults";

/**
 * Extended logger interface that includes timing functionality
 */
export interface Logger extends winston.Logger {
  time(label: string): void;
  timeEnd(label: string): void;
}

/**
 * Prefixes named in LOG_ONLY, or null when every prefix may log
 */
const getAllowedLoggers = (): Set<string> | null => {
  const logOnly = process.env.LOG_ONLY;
  if (!logOnly) return null;
  return new Set(logOnly.split(",").map((s) => s.trim()));
};

/**
 * Size-rotated file transport when LOG_FILE is set
 */
const getFileTransports = (): winston.transport[] => {
  const filename = process.env.LOG_FILE;
  if (!filename) return [];
  return [
    new winston.transports.File({
      filename,
      maxsize: LOG_FILE_MAX_SIZE_BYTES,
      maxFiles: LOG_FILE_MAX_FILES,
      tailable: true,
    }),
  ];
};

/**
 * Labelled logger for one service or module.
 *
 * Lines read `<ISO time> <LEVEL> [<prefix>] <message>`. Console always,
 * plus a size-rotated file when LOG_FILE is set. `LOG_LEVEL` sets the
 * threshold (default `info`); `LOG_ONLY=DisplayOrchestrator,RefreshScheduler`
 * silences every other prefix.
 *
 * @param transport extra transport, used by tests to capture output
 *
 * @example
 * const logger = getLogger("WeatherModule");
 * logger.time("forecast");
 * // ...
 * logger.timeEnd("forecast"); // forecast: 184ms
 */
export const getLogger = (
  prefix: string,
  transport?: winston.transport,
): Logger => {
  const allowedLoggers = getAllowedLoggers();

  const filterFormat = winston.format((info) => {
    if (allowedLoggers && !allowedLoggers.has(String(info.label))) {
      return false;
    }
    return info;
  });

  const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(
      winston.format.label({ label: prefix }),
      winston.format.timestamp(),
      filterFormat(),
      winston.format.printf(({ label, level, message, timestamp }) => {
        return `${timestamp} ${level.toUpperCase()} [${label}] ${message}`;
      }),
    ),

    transports: [
      new winston.transports.Console(),
      ...getFileTransports(),
      ...(transport ? [transport] : []),
    ],
  });

  const timers = new Map<string, number>();

  const extendedLogger = baseLogger as Logger;

  extendedLogger.time = (label: string): void => {
    timers.set(label, Date.now());
  };

  extendedLogger.timeEnd = (label: string): void => {
    const startTime = timers.get(label);
    if (startTime === undefined) {
      extendedLogger.warn(`Timer '${label}' does not exist`);
      return;
    }

    const duration = Date.now() - startTime;
    extendedLogger.info(`${label}: ${duration}ms`);
    timers.delete(label);
  };

  return extendedLogger;
};

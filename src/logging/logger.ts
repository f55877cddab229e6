import pino from 'pino';
import { z } from 'zod';

export const LOGGER_NAME = 'k8s-limits-checker';

export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// What every component needs from a logger; a pino logger satisfies it
export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  level: LogLevel;
  // Log file path; omitted means console only
  file?: string | undefined;
  // Console sink, stderr when omitted
  console?: pino.DestinationStream | undefined;
}

const PINO_LEVELS: Record<LogLevel, pino.Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error'
};

export function toPinoLevel(level: LogLevel): pino.Level {
  return PINO_LEVELS[level];
}

// Same formatted line goes to the console and to the log file, both filtered by `level`
export function createLogger(options: LoggerOptions): pino.Logger {
  const level = toPinoLevel(options.level);
  const streams: pino.StreamEntry[] = [{ level, stream: options.console ?? pino.destination({ fd: 2, sync: true }) }];

  let fileError: string | undefined;
  if (options.file) {
    try {
      streams.push({ level, stream: pino.destination({ dest: options.file, mkdir: true, sync: true }) });
    } catch (error: unknown) {
      fileError = error instanceof Error ? error.message : String(error);
    }
  }

  const logger = pino(
    { name: LOGGER_NAME, level, timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream(streams)
  );

  if (fileError !== undefined) {
    logger.warn(`Could not open log file ${options.file}, logging to console only: ${fileError}`);
  }

  return logger;
}

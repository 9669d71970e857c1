import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string | undefined;
  name: string;
  logFile?: string | undefined;
  silent?: boolean | undefined;
}

export interface LogRecord {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

const LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
const LOG_FILE_MAX_FILES = 5;

// stdout is reserved for scan results
const STDERR_LEVELS = Object.keys(winston.config.npm.levels);

/**
 * Renders one diagnostic line:
 * `<timestamp> LEVEL [name] [workerId] [port N] message {meta}`.
 * The worker tag comes from child-logger metadata, the port tag from call metadata.
 */
export function formatLogLine(name: string, record: LogRecord): string {
  const { timestamp, level, message, workerId, port, ...meta } = record;

  const tags = [`[${name}]`];
  if (workerId !== undefined) tags.push(`[${String(workerId)}]`);
  if (port !== undefined) tags.push(`[port ${String(port)}]`);

  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level.toUpperCase()} ${tags.join(' ')} ${String(message)}${metaStr}`;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = 'info', name, logFile, silent = false } = options;

  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: STDERR_LEVELS }),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: LOG_FILE_MAX_BYTES,
        maxFiles: LOG_FILE_MAX_FILES,
        tailable: true,
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf((info) => formatLogLine(name, info))
    ),
    transports,
  });
}

/** Scan workers log through a child of the run's logger, tagged with their id. */
export function createScannerWorkerLogger(workerId: string, parent: winston.Logger): winston.Logger {
  return parent.child({ workerId });
}

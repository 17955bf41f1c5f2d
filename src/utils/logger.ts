import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const { level = process.env['LOG_LEVEL'] ?? 'info', name, logFile } = options;

  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level.toUpperCase()} [${name}] ${message}${metaStr}`;
      })
    ),
    transports,
  });
}

/**
 * Logger for a single sync/index run. Lines carry the page being processed
 * (`pageId` meta) as a tag instead of a JSON suffix.
 */
export function createSyncLogger(label: string, level?: string, logFile?: string): winston.Logger {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, pageId, error }) => {
        const pageTag = typeof pageId === 'string' ? ` [${pageId.substring(0, 8)}]` : '';
        const errorTag = error ? ` ERROR: ${String(error)}` : '';
        return `${timestamp} ${level.toUpperCase()} [sync:${label}]${pageTag} ${message}${errorTag}`;
      })
    ),
    defaultMeta: { label },
    transports,
  });
}

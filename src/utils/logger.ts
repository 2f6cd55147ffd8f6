import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

type LogMeta = Record<string, unknown>;

const TIMESTAMP = 'YYYY-MM-DD HH:mm:ss.SSS';

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.printf(({ timestamp, level, message, context, stack, ...meta }) => {
    const prefix = context ? `[${context}] ` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}] ${prefix}${message}${extra}${stack ? `\n${stack}` : ''}`;
  }),
);

/**
 * Wire-level logger shared by codecs and relay transports, which live outside
 * the Nest container. Frame dumps go to logs/wire-*.log in production.
 */
function createWireLogger(): winston.Logger {
  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

  if (process.env.NODE_ENV === 'production') {
    transports.push(
      new DailyRotateFile({
        filename: 'logs/wire-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '50m',
        maxFiles: '14d',
        format: fileFormat,
      }),
    );
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    transports,
    exitOnError: false,
    silent: process.env.NODE_ENV === 'test' || process.env.LOG_ENABLED === 'false',
  });
}

let wireLogger: winston.Logger | null = null;

export class Logger {
  private readonly logger: winston.Logger;

  constructor(private readonly context: string) {
    wireLogger ??= createWireLogger();
    this.logger = wireLogger;
  }

  log(message: string, meta?: LogMeta): void {
    this.logger.info(message, { context: this.context, ...meta });
  }

  error(message: string, stack?: string, meta?: LogMeta): void {
    this.logger.error(message, { context: this.context, stack, ...meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, { context: this.context, ...meta });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, { context: this.context, ...meta });
  }
}

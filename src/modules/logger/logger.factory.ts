import { LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { utilities as nestWinston, WinstonLogger } from 'nest-winston';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ExtendedLoggerService } from './logger.interface';

const LOG_DIR = 'logs';

const rotatingFile = (filename: string, format?: winston.Logform.Format): DailyRotateFile =>
  new DailyRotateFile({
    dirname: LOG_DIR,
    filename,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: false,
    maxSize: '20m',
    maxFiles: '14d',
    format,
    auditFile: `${LOG_DIR}/.audit.json`,
  });

/**
 * Winston logger for the Nest application, or a silent one when LOG_ENABLED=false.
 */
export function createWinstonLogger(configService: ConfigService): LoggerService {
  const logEnabled = configService.get<boolean>('app.logs.enabled', true);
  const logLevel = configService.get<string>('app.logs.level', 'info');

  if (!logEnabled) {
    return createSilentLogger();
  }

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json(),
  );

  const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.ms(),
    nestWinston.format.nestLike('GT06-Gateway', {
      colors: true,
      prettyPrint: true,
    }),
  );

  return new WinstonLogger(
    winston.createLogger({
      level: logLevel,
      format: logFormat,
      transports: [new winston.transports.Console({ format: consoleFormat }), rotatingFile('gateway-%DATE%.log', logFormat)],
      exceptionHandlers: [rotatingFile('gateway-%DATE%-exceptions.log')],
      rejectionHandlers: [rotatingFile('gateway-%DATE%-rejections.log')],
    }),
  );
}

function createSilentLogger(): ExtendedLoggerService {
  const noop = (): void => undefined;
  return {
    log: noop,
    error: noop,
    warn: noop,
    debug: noop,
    verbose: noop,
  };
}

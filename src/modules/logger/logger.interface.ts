import { LoggerService } from '@nestjs/common';

/**
 * LoggerService with the optional methods winston always provides.
 */
export interface ExtendedLoggerService extends LoggerService {
  debug(message: unknown, ...optionalParams: unknown[]): void;
  verbose(message: unknown, ...optionalParams: unknown[]): void;
}

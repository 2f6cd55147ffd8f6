import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWinstonLogger } from './logger.factory';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';

/**
 * Global logger module.
 *
 * Console output in Nest format plus daily rotated JSON files under ./logs.
 * LOG_ENABLED=false silences everything; LOG_LEVEL picks the threshold.
 */
@Global()
@Module({
  providers: [
    {
      provide: WINSTON_MODULE_NEST_PROVIDER,
      useFactory: (configService: ConfigService) => createWinstonLogger(configService),
      inject: [ConfigService],
    },
  ],
  exports: [WINSTON_MODULE_NEST_PROVIDER],
})
export class LoggerModule {}

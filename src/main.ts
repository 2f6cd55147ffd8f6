import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { ExtendedLoggerService } from './modules/logger/logger.interface';

async function bootstrap() {
  const logEnabled = process.env.LOG_ENABLED !== 'false';

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({
      logger: false,
      trustProxy: true,
    }),
    {
      logger: logEnabled ? ['log', 'error', 'warn', 'debug', 'verbose'] : false,
    },
  );

  // Replace NestJS logger with Winston logger
  const winstonLogger = app.get<ExtendedLoggerService>(WINSTON_MODULE_NEST_PROVIDER);
  app.useLogger(winstonLogger);

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Disconnects the tracker session and closes the relay on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const apiPort = configService.get<number>('app.api.port', 5055);
  const serverHost = configService.get<string>('app.tracker.serverAddress', '');
  const serverPort = configService.get<number>('app.tracker.serverPort', 5023);
  const relayTransport = configService.get<string>('app.relay.transport', 'none');
  const nodeEnv = configService.get<string>('app.nodeEnv', 'development');

  await app.listen(apiPort, '0.0.0.0');

  winstonLogger.log(`🚀 API Server started on http://0.0.0.0:${apiPort}`);
  winstonLogger.log(`📊 Status: http://0.0.0.0:${apiPort}/api/status`);
  winstonLogger.log(`📈 Metrics: http://0.0.0.0:${apiPort}/api/metrics`);
  winstonLogger.log(`🛰️ Tracking server: ${serverHost || '(not configured)'}:${serverPort}`);
  winstonLogger.log(`🔌 Relay transport: ${relayTransport}`);
  winstonLogger.log(`🎯 Environment: ${nodeEnv}`);
}

bootstrap().catch((error: unknown) => {
  if (process.env.LOG_ENABLED !== 'false') {
    console.error('❌ Failed to start application:', error);
  }
  process.exit(1);
});

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { validationSchema } from './config/validation.schema';
import { LoggerModule } from './modules/logger/logger.module';
import { LocationModule } from './modules/location/location.module';
import { RelayModule } from './modules/relay/relay.module';
import { TrackerSessionModule } from './modules/tracker-session/tracker-session.module';
import { ApiModule } from './modules/api/api.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validationSchema,
      envFilePath: '.env',
    }),
    LoggerModule, // Global logger module - load first
    ScheduleModule.forRoot(),
    LocationModule,
    RelayModule,
    TrackerSessionModule,
    ApiModule,
  ],
})
export class AppModule {}

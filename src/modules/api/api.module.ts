import { Module } from '@nestjs/common';
import { ApiController } from './api.controller';
import { ApiService } from './api.service';
import { LocationModule } from '../location/location.module';
import { RelayModule } from '../relay/relay.module';
import { TrackerSessionModule } from '../tracker-session/tracker-session.module';

@Module({
  imports: [TrackerSessionModule, LocationModule, RelayModule],
  controllers: [ApiController],
  providers: [ApiService],
})
export class ApiModule {}

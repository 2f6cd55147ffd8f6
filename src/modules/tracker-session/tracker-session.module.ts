import { Module } from '@nestjs/common';
import { LocationModule } from '../location/location.module';
import { RelayModule } from '../relay/relay.module';
import { connectTcp } from './tcp-connector';
import { TrackerSessionService } from './tracker-session.service';
import { SOCKET_CONNECTOR } from './tracker-session.types';

@Module({
  imports: [LocationModule, RelayModule],
  providers: [TrackerSessionService, { provide: SOCKET_CONNECTOR, useValue: connectTcp }],
  exports: [TrackerSessionService],
})
export class TrackerSessionModule {}

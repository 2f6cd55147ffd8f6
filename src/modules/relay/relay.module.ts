import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RelayConfig } from '../../config/configuration';
import { RelayDispatcherService } from './relay-dispatcher.service';
import { RELAY_DISPATCHER, RELAY_TRANSPORT } from './relay.types';
import { createRelayTransport } from './transports/relay-transport.factory';

@Module({
  providers: [
    {
      provide: RELAY_TRANSPORT,
      useFactory: (configService: ConfigService) => createRelayTransport(configService.get<RelayConfig>('app.relay')),
      inject: [ConfigService],
    },
    RelayDispatcherService,
    { provide: RELAY_DISPATCHER, useExisting: RelayDispatcherService },
  ],
  exports: [RelayDispatcherService, RELAY_DISPATCHER],
})
export class RelayModule {}

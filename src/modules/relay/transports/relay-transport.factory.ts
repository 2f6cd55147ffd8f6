import { RelayConfig } from '../../../config/configuration';
import { RelayTransport } from '../relay.types';
import { NullRelayTransport } from './null-relay.transport';
import { SerialRelayTransport } from './serial-relay.transport';
import { TcpRelayTransport } from './tcp-relay.transport';

export function createRelayTransport(config: RelayConfig | undefined): RelayTransport {
  switch (config?.transport) {
    case 'serial':
      return new SerialRelayTransport({ path: config.serialPath, baudRate: config.baudRate });
    case 'tcp':
      return new TcpRelayTransport({ host: config.host, port: config.port });
    default:
      return new NullRelayTransport();
  }
}

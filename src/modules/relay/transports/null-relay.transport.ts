import { EMPTY, Observable } from 'rxjs';
import { RelayUnavailableError } from '../relay.errors';
import { RelayTransport } from '../relay.types';

export class NullRelayTransport implements RelayTransport {
  readonly name = 'none';
  readonly messages$: Observable<string> = EMPTY;

  isOpen(): boolean {
    return false;
  }

  async open(): Promise<void> {
    throw new RelayUnavailableError();
  }

  async close(): Promise<void> {
    return;
  }

  async write(): Promise<void> {
    throw new RelayUnavailableError();
  }
}

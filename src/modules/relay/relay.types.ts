import { Observable } from 'rxjs';

export enum RelayCommand {
  ENGINE_STOP = 'ENGINE_STOP',
  ENGINE_RESUME = 'ENGINE_RESUME',
  GET_POSITION = 'GET_POSITION',
  GET_STATUS = 'GET_STATUS',
}

export const SUPPORTED_BAUD_RATES = [9600, 19200, 38400, 57600, 115200] as const;

const CANONICAL = new Set<string>(Object.values(RelayCommand));

export function isRelayCommand(value: string): value is RelayCommand {
  return CANONICAL.has(value);
}

/**
 * Newline delimited text link to the relay controller.
 */
export interface RelayTransport {
  readonly name: string;
  /** Lines received from the controller, without the terminator. */
  readonly messages$: Observable<string>;
  isOpen(): boolean;
  open(): Promise<void>;
  /** Idempotent. */
  close(): Promise<void>;
  /** Writes `line` followed by `\n` and waits until it is flushed. */
  write(line: string): Promise<void>;
}

/**
 * What the tracker session needs from the relay side. `send` resolves to
 * `false` instead of rejecting when the command could not be delivered.
 */
export interface RelayDispatcher {
  send(command: string): Promise<boolean>;
  isConnected(): boolean;
}

export interface LostCommand {
  command: string;
  attempts: number;
  reason: string;
  timestamp: Date;
}

export const RELAY_TRANSPORT = Symbol('RELAY_TRANSPORT');
export const RELAY_DISPATCHER = Symbol('RELAY_DISPATCHER');

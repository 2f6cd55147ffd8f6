import { Duplex } from 'stream';
import { FrameIssue, GT06Command, ServerPacket } from '../protocols/gt06/gt06.types';

export enum SessionState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  LOGGING_IN = 'LOGGING_IN',
  ONLINE = 'ONLINE',
  ERROR = 'ERROR',
}

/** Largest interval Node timers accept (2^31 - 1 ms), in whole seconds. */
export const MAX_INTERVAL_SECONDS = 2147483;

export interface SessionConfig {
  serverAddress: string;
  serverPort: number;
  imei: string;
  heartbeatIntervalSeconds: number;
  locationIntervalSeconds: number;
}

export interface SessionStats {
  packetsSent: number;
  packetsReceived: number;
  heartbeatsSent: number;
  locationsSent: number;
  commandsReceived: number;
  connectedSince: Date | null;
  lastActivity: Date | null;
}

export type SessionEvent =
  | { type: 'state'; state: SessionState; previous: SessionState }
  | { type: 'packetSent'; packetType: string; serialNumber: number; hex: string }
  | { type: 'packetReceived'; packetType: string; packet: ServerPacket }
  | { type: 'checksumMismatch'; packet: ServerPacket }
  | { type: 'malformedFrame'; issue: FrameIssue }
  | { type: 'command'; command: GT06Command }
  | { type: 'connectionError'; error: Error }
  | { type: 'reconnectScheduled'; attempt: number; delayMs: number }
  | { type: 'relayDispatch'; command: string; success: boolean };

/**
 * Opens the byte stream to the tracking server. Resolves once connected.
 */
export type SocketConnector = (host: string, port: number, timeoutMs: number) => Promise<Duplex>;

export const SOCKET_CONNECTOR = Symbol('SOCKET_CONNECTOR');

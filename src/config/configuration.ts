import { registerAs } from '@nestjs/config';
import { ChecksumVariant, CourseStatusLayout, GT06MessageType, LocationProtocol } from '../modules/protocols/gt06/gt06.types';

export type RelayTransportKind = 'none' | 'serial' | 'tcp';

export interface TrackerConfig {
  serverAddress: string;
  serverPort: number;
  imei?: string;
  heartbeatIntervalSeconds: number;
  locationIntervalSeconds: number;
  autoConnect: boolean;
  connectTimeoutMs: number;
  loginTimeoutSeconds: number;
  replyWithCommandResponse: boolean;
}

export interface ReconnectConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface ProtocolConfig {
  checksum: ChecksumVariant;
  locationProtocol: LocationProtocol;
  courseLayout: CourseStatusLayout;
}

export interface DeviceConfig {
  accOn: boolean;
  voltageLevel: number;
  gsmSignal: number;
}

export interface LocationConfig {
  fixedLatitude?: number;
  fixedLongitude?: number;
}

export interface RelayConfig {
  transport: RelayTransportKind;
  serialPath: string;
  baudRate: number;
  host: string;
  port: number;
  retryDelayMs: number;
  maxAttempts: number;
  forwardUnknown: boolean;
}

export interface AppConfig {
  tracker: TrackerConfig;
  reconnect: ReconnectConfig;
  protocol: ProtocolConfig;
  device: DeviceConfig;
  location: LocationConfig;
  relay: RelayConfig;
  security: { secretKey?: string };
  api: { port: number };
  nodeEnv: string;
  logs: { enabled: boolean; level: string };
}

const int = (value: string | undefined, fallback: number): number => parseInt(value || String(fallback), 10);
const float = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : parseFloat(value);
const bool = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined || value === '' ? fallback : value === 'true';

const relayTransport = (value: string | undefined): RelayTransportKind =>
  value === 'serial' || value === 'tcp' ? value : 'none';

export default registerAs('app', (): AppConfig => ({
  // Tracking server session
  tracker: {
    serverAddress: process.env.TRACKER_SERVER_HOST || '',
    serverPort: int(process.env.TRACKER_SERVER_PORT, 5023),
    imei: process.env.TRACKER_IMEI || undefined,
    heartbeatIntervalSeconds: int(process.env.TRACKER_HEARTBEAT_INTERVAL, 30),
    locationIntervalSeconds: int(process.env.TRACKER_LOCATION_INTERVAL, 10),
    autoConnect: bool(process.env.TRACKER_AUTO_CONNECT, true),
    connectTimeoutMs: int(process.env.CONNECT_TIMEOUT_MS, 15000),
    loginTimeoutSeconds: int(process.env.LOGIN_TIMEOUT_SECONDS, 30),
    replyWithCommandResponse: bool(process.env.GT06_COMMAND_RESPONSE, false),
  },

  // Capped exponential backoff
  reconnect: {
    initialDelayMs: int(process.env.RECONNECT_INITIAL_DELAY_MS, 5000),
    maxDelayMs: int(process.env.RECONNECT_MAX_DELAY_MS, 60000),
    multiplier: parseFloat(process.env.RECONNECT_MULTIPLIER || '2'),
  },

  // Wire profile, must match the server's decoder
  protocol: {
    checksum: process.env.GT06_CHECKSUM === 'crc16' ? 'crc16' : 'xor',
    locationProtocol: process.env.GT06_LOCATION_PROTOCOL === '0x22' ? GT06MessageType.LOCATION_2 : GT06MessageType.LOCATION,
    courseLayout: process.env.GT06_COURSE_LAYOUT === 'hemisphere' ? 'hemisphere' : 'sign-bits',
  },

  device: {
    accOn: bool(process.env.DEVICE_ACC_ON, true),
    voltageLevel: int(process.env.DEVICE_VOLTAGE_LEVEL, 4),
    gsmSignal: int(process.env.DEVICE_GSM_SIGNAL, 4),
  },

  location: {
    fixedLatitude: float(process.env.FIXED_LATITUDE),
    fixedLongitude: float(process.env.FIXED_LONGITUDE),
  },

  // Relay controller
  relay: {
    transport: relayTransport(process.env.RELAY_TRANSPORT),
    serialPath: process.env.RELAY_SERIAL_PATH || '',
    baudRate: int(process.env.RELAY_BAUD_RATE, 9600),
    host: process.env.RELAY_HOST || '',
    port: int(process.env.RELAY_PORT, 8888),
    retryDelayMs: int(process.env.RELAY_RETRY_DELAY_MS, 500),
    maxAttempts: int(process.env.RELAY_MAX_ATTEMPTS, 2),
    forwardUnknown: bool(process.env.RELAY_FORWARD_UNKNOWN, false),
  },

  // Security
  security: {
    secretKey: process.env.SECRET_KEY,
  },

  // API Configuration
  api: {
    port: int(process.env.API_PORT, 5055),
  },

  // Application Configuration
  nodeEnv: process.env.NODE_ENV || 'development',
  logs: {
    enabled: process.env.LOG_ENABLED !== 'false',
    level: process.env.LOG_LEVEL || 'info',
  },
}));

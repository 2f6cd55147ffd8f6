export enum GT06MessageType {
  LOGIN = 0x01,
  LOCATION = 0x12,
  HEARTBEAT = 0x13,
  STRING_INFO = 0x15,
  ALARM = 0x16,
  COMMAND_RESPONSE = 0x21,
  LOCATION_2 = 0x22,
  TIME_REQUEST = 0x32,
  COMMAND_INFO = 0x80,
  INFO = 0x98,
}

export enum GT06AlarmType {
  NORMAL = 0x00,
  SOS = 0x01,
  POWER_CUT = 0x02,
  VIBRATION = 0x03,
  GEOFENCE_IN = 0x04,
  GEOFENCE_OUT = 0x05,
  OVERSPEED = 0x06,
  ACC_ON = 0x09,
  ACC_OFF = 0x0a,
  LOW_BATTERY = 0x0e,
}

export const GT06_START_BIT = 0x7878;
export const GT06_STOP_BIT = 0x0d0a;

/** start(2) + length(1) */
export const GT06_HEADER_LENGTH = 3;
/** protocol(1) + serial(2) */
export const GT06_MIN_CONTENT_LENGTH = 3;
export const GT06_MAX_CONTENT_LENGTH = 0xff;

/** Reported when the fix does not carry a satellite count. */
export const DEFAULT_SATELLITES = 8;

export type ChecksumVariant = 'xor' | 'crc16';

/**
 * Course/status word bit assignment.
 *
 * - `sign-bits`: bit10 = latitude negative, bit11 = longitude negative, bit12 = GPS valid
 * - `hemisphere`: bit10 = North, bit11 = West, bit12 = GPS valid,
 *   bit14 = ignition info present, bit15 = ignition on
 */
export type CourseStatusLayout = 'sign-bits' | 'hemisphere';

export type LocationProtocol = GT06MessageType.LOCATION | GT06MessageType.LOCATION_2;

/**
 * Wire contract agreed with the server. Encoding and decoding of one session
 * must use the same profile.
 */
export interface WireProfile {
  checksum: ChecksumVariant;
  locationProtocol: LocationProtocol;
  courseLayout: CourseStatusLayout;
}

export const DEFAULT_WIRE_PROFILE: Readonly<WireProfile> = {
  checksum: 'xor',
  locationProtocol: GT06MessageType.LOCATION,
  courseLayout: 'sign-bits',
};

/**
 * A complete frame received from the server.
 */
export interface ServerPacket {
  readonly protocolNumber: number;
  readonly payload: Buffer;
  readonly serialNumber: number;
  readonly checksumValid: boolean;
  readonly rawFrame: Buffer;
}

export type FrameIssueKind = 'MALFORMED_FRAME' | 'DISCARDED_BYTES';

export interface FrameIssue {
  kind: FrameIssueKind;
  reason: string;
  byteCount: number;
  hex: string;
}

export interface DecodeResult {
  packets: ServerPacket[];
  /** Unconsumed tail of the receive buffer; must be prepended to the next chunk. */
  remaining: Buffer;
  issues: FrameIssue[];
}

export enum CommandKind {
  ENGINE_STOP = 'ENGINE_STOP',
  ENGINE_RESUME = 'ENGINE_RESUME',
  UNKNOWN = 'UNKNOWN',
}

export interface GT06Command {
  rawText: string;
  kind: CommandKind;
  serialNumber: number;
}

export interface HeartbeatInfo {
  accOn: boolean;
  gpsPositioned: boolean;
  /** 0..6 */
  voltageLevel: number;
  /** 0..4 */
  gsmSignal: number;
  alarmType: number;
}

export interface LocationInfo {
  latitude: number;
  longitude: number;
  speedKmh: number;
  courseDeg: number;
  timestamp: Date;
  satellites: number;
  gpsValid: boolean;
  /** Only encoded by the `hemisphere` course layout. */
  accOn?: boolean;
}

export interface AlarmInfo {
  alarmType: number;
  latitude: number;
  longitude: number;
  speedKmh: number;
  courseDeg: number;
  timestamp: Date;
  satellites?: number;
}

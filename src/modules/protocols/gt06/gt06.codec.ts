import { InvalidImeiError } from './gt06.errors';
import { ChecksumVariant, CourseStatusLayout } from './gt06.types';

const IMEI_PATTERN = /^\d{15}$/;

/**
 * Seconds of arc * 500, i.e. degrees * 60 minutes * 30000.
 */
export const COORDINATE_SCALE = 60 * 30000;

export function isValidImei(imei: string): boolean {
  return IMEI_PATTERN.test(imei);
}

/**
 * Pack a 15-digit IMEI into 8 BCD bytes, left-padded with one zero digit.
 * Example: 357152040915004 -> 03 57 15 20 40 91 50 04
 */
export function imeiToBcd(imei: string): Buffer {
  if (!isValidImei(imei)) {
    throw new InvalidImeiError(imei);
  }

  const padded = `0${imei}`;
  const bytes = Buffer.alloc(8);

  for (let i = 0; i < 8; i++) {
    const high = padded.charCodeAt(i * 2) - 0x30;
    const low = padded.charCodeAt(i * 2 + 1) - 0x30;
    bytes[i] = (high << 4) | low;
  }

  return bytes;
}

/**
 * Expand 8 BCD bytes back to the 15-digit IMEI (drops the pad digit).
 */
export function bcdToImei(bytes: Buffer): string {
  return bytes.subarray(0, 8).toString('hex').slice(1);
}

/**
 * XOR-fold of all bytes.
 */
export function xorChecksum(bytes: Uint8Array): number {
  let checksum = 0;
  for (const byte of bytes) {
    checksum ^= byte;
  }
  return checksum;
}

/**
 * CRC16/X25 (CRC-ITU): reflected polynomial 0x8408, init 0xFFFF, final XOR 0xFFFF.
 */
export function crc16X25(bytes: Uint8Array): number {
  let crc = 0xffff;
  for (const byte of bytes) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x0001 ? (crc >>> 1) ^ 0x8408 : crc >>> 1;
    }
  }
  return ~crc & 0xffff;
}

export function checksumWidth(variant: ChecksumVariant): 1 | 2 {
  return variant === 'crc16' ? 2 : 1;
}

export function computeChecksum(variant: ChecksumVariant, bytes: Uint8Array): number {
  return variant === 'crc16' ? crc16X25(bytes) : xorChecksum(bytes);
}

export function writeChecksum(variant: ChecksumVariant, target: Buffer, value: number, offset: number): void {
  if (variant === 'crc16') {
    target.writeUInt16BE(value, offset);
  } else {
    target.writeUInt8(value, offset);
  }
}

export function readChecksum(variant: ChecksumVariant, source: Buffer, offset: number): number {
  return variant === 'crc16' ? source.readUInt16BE(offset) : source.readUInt8(offset);
}

/**
 * GT06 coordinate field. The sign is not part of this value; it travels in the
 * course/status word.
 */
export function coordinateToFixedPoint(degrees: number): number {
  return Math.round(Math.abs(degrees) * COORDINATE_SCALE);
}

export function fixedPointToCoordinate(value: number): number {
  return value / COORDINATE_SCALE;
}

/**
 * Date/time as 6 raw binary bytes (UTC): YY MM DD HH MM SS, year offset -2000.
 */
export function encodeDateTime(date: Date): Buffer {
  return Buffer.from([
    date.getUTCFullYear() - 2000,
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ]);
}

export function normalizeCourse(courseDeg: number): number {
  if (!Number.isFinite(courseDeg)) {
    return 0;
  }
  const rounded = Math.round(courseDeg) % 360;
  return rounded < 0 ? rounded + 360 : rounded;
}

export interface CourseStatusInput {
  courseDeg: number;
  latitude: number;
  longitude: number;
  gpsValid: boolean;
  accOn?: boolean;
}

export function encodeCourseStatus(layout: CourseStatusLayout, input: CourseStatusInput): number {
  let word = normalizeCourse(input.courseDeg) & 0x03ff;

  if (input.gpsValid) {
    word |= 0x1000;
  }

  if (layout === 'hemisphere') {
    if (input.latitude >= 0) word |= 0x0400; // North
    if (input.longitude < 0) word |= 0x0800; // West
    if (input.accOn !== undefined) {
      word |= 0x4000;
      if (input.accOn) word |= 0x8000;
    }
  } else {
    if (input.latitude < 0) word |= 0x0400;
    if (input.longitude < 0) word |= 0x0800;
  }

  return word;
}

export interface CourseStatus {
  courseDeg: number;
  latitudeNegative: boolean;
  longitudeNegative: boolean;
  gpsValid: boolean;
  accOn?: boolean;
}

export function decodeCourseStatus(layout: CourseStatusLayout, word: number): CourseStatus {
  const status: CourseStatus = {
    courseDeg: word & 0x03ff,
    latitudeNegative: layout === 'hemisphere' ? (word & 0x0400) === 0 : (word & 0x0400) !== 0,
    longitudeNegative: (word & 0x0800) !== 0,
    gpsValid: (word & 0x1000) !== 0,
  };

  if (layout === 'hemisphere' && (word & 0x4000) !== 0) {
    status.accOn = (word & 0x8000) !== 0;
  }

  return status;
}

export function clampByte(value: number, max = 0xff): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(Math.max(Math.round(value), 0), max);
}

/**
 * Uppercase hex dump with single-space separators, used in logs and events.
 */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    .toString('hex')
    .toUpperCase()
    .replace(/(..)(?!$)/g, '$1 ');
}

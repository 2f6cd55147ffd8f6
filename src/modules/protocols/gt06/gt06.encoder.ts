import { BaseCodec } from '../base/base-codec.abstract';
import {
  clampByte,
  computeChecksum,
  coordinateToFixedPoint,
  encodeCourseStatus,
  encodeDateTime,
  imeiToBcd,
  toHex,
  writeChecksum,
} from './gt06.codec';
import { FrameTooLargeError } from './gt06.errors';
import {
  AlarmInfo,
  DEFAULT_SATELLITES,
  GT06_MAX_CONTENT_LENGTH,
  GT06_START_BIT,
  GT06_STOP_BIT,
  GT06MessageType,
  HeartbeatInfo,
  LocationInfo,
  WireProfile,
} from './gt06.types';
import { SerialCounter } from './serial-counter';

/**
 * Builds client -> server GT06 frames.
 *
 * Every build method except {@link buildCommandAck} embeds the current serial
 * of the shared counter and advances it exactly once.
 */
export class GT06Encoder extends BaseCodec {
  readonly protocolName = 'GT06';

  constructor(
    private readonly serialCounter: SerialCounter,
    profile: Partial<WireProfile> = {},
  ) {
    super(profile);
  }

  /**
   * LOGIN (0x01)
   * Format: 78 78 0B 01 [IMEI BCD 8 bytes] [Serial 2 bytes] [Check] 0D 0A
   */
  buildLogin(imei: string): Buffer {
    return this.frame(GT06MessageType.LOGIN, imeiToBcd(imei));
  }

  /**
   * HEARTBEAT / status (0x13)
   * Format: 78 78 08 13 [Terminal Info] [Voltage] [GSM Signal] [Alarm] [Language] [Serial] [Check] 0D 0A
   */
  buildHeartbeat(info: HeartbeatInfo): Buffer {
    let terminalInfo = 0x40;
    if (info.accOn) terminalInfo |= 0x01;
    if (info.gpsPositioned) terminalInfo |= 0x02;

    const payload = Buffer.from([
      terminalInfo,
      clampByte(info.voltageLevel, 6),
      clampByte(info.gsmSignal, 4),
      info.alarmType & 0xff,
      0x00,
    ]);

    return this.frame(GT06MessageType.HEARTBEAT, payload);
  }

  /**
   * LOCATION (0x12, or 0x22 under the LBS-extended profile)
   * Format: [Date Time 6] [Satellites 1] [Latitude 4] [Longitude 4] [Speed 1] [Course/Status 2]
   */
  buildLocation(info: LocationInfo): Buffer {
    const payload = Buffer.concat([
      encodeDateTime(info.timestamp),
      Buffer.from([clampByte(info.satellites)]),
      this.encodeGeo(info.latitude, info.longitude, info.speedKmh),
      this.encodeCourse(info),
    ]);

    return this.frame(this.profile.locationProtocol, payload);
  }

  /**
   * ALARM (0x16)
   * Format: [Date Time 6] [Alarm 1] [Satellites 1] [Latitude 4] [Longitude 4] [Speed 1] [Reserved 4] [Course/Status 2]
   */
  buildAlarm(info: AlarmInfo): Buffer {
    const payload = Buffer.concat([
      encodeDateTime(info.timestamp),
      Buffer.from([info.alarmType & 0xff, clampByte(info.satellites ?? DEFAULT_SATELLITES)]),
      this.encodeGeo(info.latitude, info.longitude, info.speedKmh),
      Buffer.alloc(4),
      this.encodeCourse({ ...info, gpsValid: true }),
    ]);

    return this.frame(GT06MessageType.ALARM, payload);
  }

  /**
   * Command acknowledgement (0x80). Echoes the server's serial and leaves the
   * session counter untouched.
   */
  buildCommandAck(serialNumber: number): Buffer {
    return this.assemble(GT06MessageType.COMMAND_INFO, Buffer.alloc(0), serialNumber & 0xffff);
  }

  /**
   * Command response (0x21), free text reported back to the server.
   * Format: [Server Flag 1] [Type 1 = text] [Text Length 2] [Text]
   */
  buildCommandResponse(text: string): Buffer {
    const textBytes = Buffer.from(text, 'utf8');
    const header = Buffer.alloc(4);
    header.writeUInt8(0x00, 0);
    header.writeUInt8(0x01, 1);
    header.writeUInt16BE(textBytes.length, 2);

    return this.frame(GT06MessageType.COMMAND_RESPONSE, Buffer.concat([header, textBytes]));
  }

  private encodeGeo(latitude: number, longitude: number, speedKmh: number): Buffer {
    const geo = Buffer.alloc(9);
    geo.writeUInt32BE(coordinateToFixedPoint(latitude), 0);
    geo.writeUInt32BE(coordinateToFixedPoint(longitude), 4);
    geo.writeUInt8(clampByte(speedKmh), 8);
    return geo;
  }

  private encodeCourse(info: Pick<LocationInfo, 'courseDeg' | 'latitude' | 'longitude' | 'gpsValid' | 'accOn'>): Buffer {
    const word = Buffer.alloc(2);
    word.writeUInt16BE(encodeCourseStatus(this.profile.courseLayout, info), 0);
    return word;
  }

  private frame(protocolNumber: number, payload: Buffer): Buffer {
    // Size check before the serial is consumed
    this.assertFits(protocolNumber, payload);
    return this.assemble(protocolNumber, payload, this.serialCounter.next());
  }

  private assertFits(protocolNumber: number, payload: Buffer): void {
    const contentLength = 1 + payload.length + 2;
    if (contentLength > GT06_MAX_CONTENT_LENGTH) {
      throw new FrameTooLargeError(protocolNumber, contentLength);
    }
  }

  /**
   * [78 78] [Length] [Protocol] [Payload] [Serial 2] [Check 1|2] [0D 0A]
   * Length counts protocol + payload + serial; the check covers Length..Serial.
   */
  private assemble(protocolNumber: number, payload: Buffer, serialNumber: number): Buffer {
    this.assertFits(protocolNumber, payload);

    const contentLength = 1 + payload.length + 2;
    const buffer = Buffer.alloc(2 + 1 + contentLength + this.checksumWidth + 2);
    let offset = 0;

    buffer.writeUInt16BE(GT06_START_BIT, offset);
    offset += 2;

    buffer.writeUInt8(contentLength, offset);
    offset += 1;

    buffer.writeUInt8(protocolNumber, offset);
    offset += 1;

    payload.copy(buffer, offset);
    offset += payload.length;

    buffer.writeUInt16BE(serialNumber, offset);
    offset += 2;

    const checksum = computeChecksum(this.profile.checksum, buffer.subarray(2, offset));
    writeChecksum(this.profile.checksum, buffer, checksum, offset);
    offset += this.checksumWidth;

    buffer.writeUInt16BE(GT06_STOP_BIT, offset);

    this.logger.debug('Encoded GT06 frame', {
      protocol: `0x${protocolNumber.toString(16).padStart(2, '0')}`,
      serial: serialNumber,
      hex: toHex(buffer),
    });

    return buffer;
  }
}

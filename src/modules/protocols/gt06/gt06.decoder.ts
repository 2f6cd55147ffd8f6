import { BaseCodec } from '../base/base-codec.abstract';
import { computeChecksum, readChecksum, toHex } from './gt06.codec';
import {
  DecodeResult,
  FrameIssue,
  GT06_HEADER_LENGTH,
  GT06_MIN_CONTENT_LENGTH,
  GT06_STOP_BIT,
  GT06MessageType,
  ServerPacket,
} from './gt06.types';

const START_MARKER = Buffer.from([0x78, 0x78]);

const PROTOCOL_NAMES: Record<number, string> = {
  [GT06MessageType.LOGIN]: 'LOGIN',
  [GT06MessageType.LOCATION]: 'LOCATION',
  [GT06MessageType.HEARTBEAT]: 'HEARTBEAT',
  [GT06MessageType.STRING_INFO]: 'STRING_INFO',
  [GT06MessageType.ALARM]: 'ALARM',
  [GT06MessageType.COMMAND_RESPONSE]: 'COMMAND_RESPONSE',
  [GT06MessageType.LOCATION_2]: 'LOCATION_2',
  [GT06MessageType.TIME_REQUEST]: 'TIME_REQUEST',
  [GT06MessageType.COMMAND_INFO]: 'COMMAND',
  [GT06MessageType.INFO]: 'INFO',
};

export function protocolName(protocolNumber: number): string {
  return PROTOCOL_NAMES[protocolNumber] ?? `UNKNOWN(0x${protocolNumber.toString(16).padStart(2, '0')})`;
}

/**
 * Extracts server -> client GT06 frames from an arbitrarily chunked byte stream.
 *
 * The decoder holds no stream state: the caller owns the receive buffer, appends
 * each chunk to it, and keeps {@link DecodeResult.remaining} for the next call.
 * Frames with a bad check are still returned with `checksumValid: false`.
 */
export class GT06Decoder extends BaseCodec {
  readonly protocolName = 'GT06';

  decode(buffer: Buffer): DecodeResult {
    const packets: ServerPacket[] = [];
    const issues: FrameIssue[] = [];
    let offset = 0;

    while (offset < buffer.length) {
      const start = buffer.indexOf(START_MARKER, offset);

      if (start === -1) {
        // Keep a trailing 0x78, it may be the first half of a split marker
        const keepFrom = buffer[buffer.length - 1] === START_MARKER[0] ? buffer.length - 1 : buffer.length;
        if (keepFrom > offset) {
          issues.push(this.issue('DISCARDED_BYTES', 'No start marker', buffer.subarray(offset, keepFrom)));
        }
        offset = keepFrom;
        break;
      }

      if (start > offset) {
        issues.push(this.issue('DISCARDED_BYTES', 'Bytes before start marker', buffer.subarray(offset, start)));
        offset = start;
      }

      if (buffer.length - start < GT06_HEADER_LENGTH) {
        break;
      }

      const contentLength = buffer.readUInt8(start + 2);
      if (contentLength < GT06_MIN_CONTENT_LENGTH) {
        issues.push(
          this.issue('MALFORMED_FRAME', `Length ${contentLength} below minimum`, buffer.subarray(start, start + GT06_HEADER_LENGTH)),
        );
        offset = start + 1;
        continue;
      }

      const frameLength = GT06_HEADER_LENGTH + contentLength + this.checksumWidth + 2;
      if (buffer.length - start < frameLength) {
        // Incomplete: wait for more data, consume nothing
        break;
      }

      const frame = buffer.subarray(start, start + frameLength);
      if (frame.readUInt16BE(frameLength - 2) !== GT06_STOP_BIT) {
        issues.push(this.issue('MALFORMED_FRAME', 'Invalid stop bytes', frame));
        offset = start + 1;
        continue;
      }

      packets.push(this.parseFrame(frame, contentLength));
      offset = start + frameLength;
    }

    for (const issue of issues) {
      this.logger.warn(`GT06 stream issue: ${issue.reason}`, {
        kind: issue.kind,
        byteCount: issue.byteCount,
        hex: issue.hex,
      });
    }

    return {
      packets,
      remaining: Buffer.from(buffer.subarray(offset)),
      issues,
    };
  }

  /**
   * Frame layout: [78 78] [Length] [Protocol] [Payload] [Serial 2] [Check] [0D 0A]
   */
  private parseFrame(frame: Buffer, contentLength: number): ServerPacket {
    const serialOffset = GT06_HEADER_LENGTH + contentLength - 2;
    const checksumOffset = GT06_HEADER_LENGTH + contentLength;

    const expected = readChecksum(this.profile.checksum, frame, checksumOffset);
    const calculated = computeChecksum(this.profile.checksum, frame.subarray(2, checksumOffset));

    const packet: ServerPacket = {
      protocolNumber: frame.readUInt8(3),
      payload: Buffer.from(frame.subarray(4, serialOffset)),
      serialNumber: frame.readUInt16BE(serialOffset),
      checksumValid: expected === calculated,
      rawFrame: Buffer.from(frame),
    };

    if (!packet.checksumValid) {
      this.logger.warn('Checksum mismatch in GT06 frame', {
        protocol: this.protocolName,
        variant: this.profile.checksum,
        expected: expected.toString(16),
        calculated: calculated.toString(16),
        hex: toHex(frame),
      });
    }

    this.logger.debug('Frame decoded', {
      type: protocolName(packet.protocolNumber),
      serial: packet.serialNumber,
      payloadLength: packet.payload.length,
    });

    return packet;
  }

  private issue(kind: FrameIssue['kind'], reason: string, bytes: Buffer): FrameIssue {
    return { kind, reason, byteCount: bytes.length, hex: toHex(bytes) };
  }
}

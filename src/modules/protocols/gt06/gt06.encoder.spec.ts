import { toHex } from './gt06.codec';
import { GT06Encoder } from './gt06.encoder';
import { FrameTooLargeError, InvalidImeiError } from './gt06.errors';
import { GT06AlarmType, GT06MessageType, LocationInfo } from './gt06.types';
import { SerialCounter } from './serial-counter';

const IMEI = '357152040915004';

const saoPaulo: LocationInfo = {
  latitude: -23.5505,
  longitude: -46.6333,
  speedKmh: 60,
  courseDeg: 90,
  timestamp: new Date('2024-03-15T12:30:45Z'),
  satellites: 9,
  gpsValid: true,
};

describe('GT06Encoder', () => {
  let counter: SerialCounter;
  let encoder: GT06Encoder;

  beforeEach(() => {
    counter = new SerialCounter();
    encoder = new GT06Encoder(counter);
  });

  it('builds a login frame with the BCD IMEI and serial 1', () => {
    expect(toHex(encoder.buildLogin(IMEI))).toBe('78 78 0B 01 03 57 15 20 40 91 50 04 00 01 EF 0D 0A');
    expect(counter.peek()).toBe(2);
  });

  it('uses a 2-byte CRC16/X25 check under the crc16 profile', () => {
    const crcEncoder = new GT06Encoder(counter, { checksum: 'crc16' });
    expect(toHex(crcEncoder.buildLogin(IMEI))).toBe('78 78 0B 01 03 57 15 20 40 91 50 04 00 01 03 D5 0D 0A');
  });

  it('rejects an invalid IMEI without consuming a serial', () => {
    expect(() => encoder.buildLogin('12345')).toThrow(InvalidImeiError);
    expect(counter.peek()).toBe(1);
  });

  it('builds a heartbeat with status, voltage, signal and alarm bytes', () => {
    encoder.buildLogin(IMEI);
    const frame = encoder.buildHeartbeat({
      accOn: true,
      gpsPositioned: false,
      voltageLevel: 4,
      gsmSignal: 4,
      alarmType: GT06AlarmType.NORMAL,
    });
    expect(toHex(frame)).toBe('78 78 08 13 41 04 04 00 00 00 02 58 0D 0A');
  });

  it('clamps heartbeat voltage and signal levels', () => {
    const frame = encoder.buildHeartbeat({
      accOn: false,
      gpsPositioned: true,
      voltageLevel: 9,
      gsmSignal: 7,
      alarmType: GT06AlarmType.SOS,
    });
    expect([...frame.subarray(4, 9)]).toEqual([0x42, 6, 4, 0x01, 0x00]);
  });

  it('builds a location frame', () => {
    encoder.buildLogin(IMEI);
    encoder.buildLogin(IMEI);
    expect(toHex(encoder.buildLocation(saoPaulo))).toBe(
      '78 78 15 12 18 03 0F 0C 1E 2D 09 02 86 D5 74 05 00 D2 64 3C 1C 5A 00 03 CA 0D 0A',
    );
  });

  it('uses protocol 0x22 under the LBS-extended profile', () => {
    const frame = new GT06Encoder(counter, { locationProtocol: GT06MessageType.LOCATION_2 }).buildLocation(saoPaulo);
    expect(frame[3]).toBe(0x22);
  });

  it('clamps speed to one byte', () => {
    const frame = encoder.buildLocation({ ...saoPaulo, speedKmh: 400 });
    expect(frame[19]).toBe(0xff);
  });

  it('builds an alarm frame with reserved bytes before the course word', () => {
    const frame = encoder.buildAlarm({
      alarmType: GT06AlarmType.SOS,
      latitude: saoPaulo.latitude,
      longitude: saoPaulo.longitude,
      speedKmh: 60,
      courseDeg: 90,
      timestamp: saoPaulo.timestamp,
    });

    expect(frame[2]).toBe(26);
    expect(frame[3]).toBe(GT06MessageType.ALARM);
    expect(frame[10]).toBe(0x01);
    expect(frame[11]).toBe(8);
    expect([...frame.subarray(21, 25)]).toEqual([0, 0, 0, 0]);
    expect(frame.readUInt16BE(25)).toBe(0x1c5a);
    expect(frame.readUInt16BE(27)).toBe(1);
    expect(frame).toHaveLength(3 + 26 + 1 + 2);
  });

  it('echoes the server serial in the command ack and leaves the counter alone', () => {
    encoder.buildLogin(IMEI);
    expect(toHex(encoder.buildCommandAck(0x1234))).toBe('78 78 03 80 12 34 A5 0D 0A');
    expect(counter.peek()).toBe(2);
  });

  it('builds a text command response', () => {
    for (let i = 0; i < 4; i++) counter.next();
    expect(toHex(encoder.buildCommandResponse('ENGINE_STOP OK'))).toBe(
      '78 78 15 21 00 01 00 0E 45 4E 47 49 4E 45 5F 53 54 4F 50 20 4F 4B 00 05 53 0D 0A',
    );
  });

  it('refuses content that does not fit the length byte', () => {
    expect(() => encoder.buildCommandResponse('x'.repeat(250))).toThrow(FrameTooLargeError);
    expect(counter.peek()).toBe(1);
  });

  it('advances the serial exactly once per frame and skips 0 on wrap', () => {
    for (let i = 1; i < 0xffff; i++) counter.next();
    expect(counter.peek()).toBe(0xffff);

    const last = encoder.buildHeartbeat({ accOn: false, gpsPositioned: false, voltageLevel: 0, gsmSignal: 0, alarmType: 0 });
    const wrapped = encoder.buildHeartbeat({ accOn: false, gpsPositioned: false, voltageLevel: 0, gsmSignal: 0, alarmType: 0 });

    expect(last.readUInt16BE(9)).toBe(0xffff);
    expect(wrapped.readUInt16BE(9)).toBe(1);
  });
});

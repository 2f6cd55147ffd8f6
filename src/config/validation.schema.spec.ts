import { validationSchema } from './validation.schema';

describe('validationSchema', () => {
  it('fills in defaults when only the secret is given', () => {
    const { error, value } = validationSchema.validate({ SECRET_KEY: 'test-secret' });

    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      TRACKER_SERVER_PORT: 5023,
      TRACKER_HEARTBEAT_INTERVAL: 30,
      TRACKER_LOCATION_INTERVAL: 10,
      GT06_CHECKSUM: 'xor',
      GT06_LOCATION_PROTOCOL: '0x12',
      GT06_COURSE_LAYOUT: 'sign-bits',
      RELAY_TRANSPORT: 'none',
      RELAY_BAUD_RATE: 9600,
      RELAY_PORT: 8888,
      API_PORT: 5055,
    });
  });

  it('requires SECRET_KEY', () => {
    const { error } = validationSchema.validate({});
    expect(error?.message).toBe('"SECRET_KEY" is required');
  });

  it('requires a serial path for the serial transport', () => {
    const { error } = validationSchema.validate({ SECRET_KEY: 'test-secret', RELAY_TRANSPORT: 'serial' });
    expect(error?.message).toBe('"RELAY_SERIAL_PATH" is required');
  });

  it('requires a host for the tcp transport', () => {
    const missing = validationSchema.validate({ SECRET_KEY: 'test-secret', RELAY_TRANSPORT: 'tcp' });
    const given = validationSchema.validate({
      SECRET_KEY: 'test-secret',
      RELAY_TRANSPORT: 'tcp',
      RELAY_HOST: 'relay.local',
    });

    expect(missing.error?.message).toBe('"RELAY_HOST" is required');
    expect(given.error).toBeUndefined();
  });

  it('rejects unsupported baud rates and IMEIs of the wrong length', () => {
    expect(validationSchema.validate({ SECRET_KEY: 'test-secret', RELAY_BAUD_RATE: 12345 }).error).toBeDefined();
    expect(validationSchema.validate({ SECRET_KEY: 'test-secret', TRACKER_IMEI: '12345' }).error).toBeDefined();
  });

  it('caps intervals at what a Node timer can hold', () => {
    expect(validationSchema.validate({ SECRET_KEY: 'test-secret', TRACKER_LOCATION_INTERVAL: 2147483 }).error).toBeUndefined();
    expect(validationSchema.validate({ SECRET_KEY: 'test-secret', TRACKER_HEARTBEAT_INTERVAL: 2147484 }).error?.message).toBe(
      '"TRACKER_HEARTBEAT_INTERVAL" must be less than or equal to 2147483',
    );
  });

  it('coerces numeric strings from the environment', () => {
    const { error, value } = validationSchema.validate({
      SECRET_KEY: 'test-secret',
      TRACKER_SERVER_PORT: '5013',
      RELAY_TRANSPORT: 'serial',
      RELAY_SERIAL_PATH: '/dev/ttyUSB0',
      RELAY_BAUD_RATE: '115200',
    });

    expect(error).toBeUndefined();
    expect(value).toMatchObject({ TRACKER_SERVER_PORT: 5013, RELAY_BAUD_RATE: 115200 });
  });
});

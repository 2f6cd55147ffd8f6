import { RelayTransportError } from '../relay.errors';
import { SerialRelayTransport } from './serial-relay.transport';

type Callback = (error: Error | null) => void;

interface StubPort {
  options: { path: string; baudRate: number };
  isOpen: boolean;
  closeCalls: number;
  written: string[];
}

interface StubSerialModule {
  SerialPort: { instances: StubPort[]; setError: Error | null };
}

jest.mock('serialport', () => {
  class SerialPort {
    static instances: SerialPort[] = [];
    static setError: Error | null = null;
    isOpen = false;
    closeCalls = 0;
    written: string[] = [];

    constructor(readonly options: { path: string; baudRate: number }) {
      SerialPort.instances.push(this);
    }

    open(callback: Callback): void {
      this.isOpen = true;
      callback(null);
    }

    set(_signals: Record<string, boolean>, callback: Callback): void {
      callback(SerialPort.setError);
    }

    close(callback: Callback): void {
      this.closeCalls++;
      this.isOpen = false;
      callback(null);
    }

    write(data: string, callback: Callback): void {
      this.written.push(data);
      callback(null);
    }

    drain(callback: Callback): void {
      callback(null);
    }

    pipe<T>(destination: T): T {
      return destination;
    }

    on(): this {
      return this;
    }
  }

  class ReadlineParser {
    on(): this {
      return this;
    }
  }

  return { SerialPort, ReadlineParser };
});

const { SerialPort: stubPorts } = jest.requireMock<StubSerialModule>('serialport');

describe('SerialRelayTransport', () => {
  beforeEach(() => {
    stubPorts.instances.length = 0;
    stubPorts.setError = null;
  });

  it('opens the port and writes newline terminated commands', async () => {
    const transport = new SerialRelayTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });

    await transport.open();
    await transport.write('ENGINE_STOP');

    expect(transport.isOpen()).toBe(true);
    expect(stubPorts.instances).toHaveLength(1);
    expect(stubPorts.instances[0].options).toMatchObject({ path: '/dev/ttyUSB0', baudRate: 9600 });
    expect(stubPorts.instances[0].written).toEqual(['ENGINE_STOP\n']);
  });

  it('releases the port when the control lines cannot be set', async () => {
    const transport = new SerialRelayTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });
    stubPorts.setError = new Error('EIO');

    await expect(transport.open()).rejects.toThrow(RelayTransportError);

    const [failed] = stubPorts.instances;
    expect(failed.isOpen).toBe(false);
    expect(failed.closeCalls).toBe(1);
    expect(transport.isOpen()).toBe(false);

    stubPorts.setError = null;
    await transport.open();

    expect(stubPorts.instances).toHaveLength(2);
    expect(transport.isOpen()).toBe(true);
  });

  it('refuses to write while closed', async () => {
    const transport = new SerialRelayTransport({ path: '/dev/ttyUSB0', baudRate: 9600 });

    await expect(transport.write('ENGINE_RESUME')).rejects.toThrow('serial:/dev/ttyUSB0@9600: port is not open');
  });
});

import { Observable, Subject } from 'rxjs';
import { ReadlineParser, SerialPort } from 'serialport';
import { Logger } from '../../../utils/logger';
import { RelayTransportError } from '../relay.errors';
import { RelayTransport } from '../relay.types';

export interface SerialRelayOptions {
  path: string;
  baudRate: number;
}

/**
 * Relay controller on a serial line, 8N1 with DTR and RTS asserted
 * (most USB boards reset or stay silent otherwise).
 */
export class SerialRelayTransport implements RelayTransport {
  readonly name: string;
  private readonly logger = new Logger(SerialRelayTransport.name);
  private readonly messages = new Subject<string>();
  private port: SerialPort | null = null;

  constructor(private readonly options: SerialRelayOptions) {
    this.name = `serial:${options.path}@${options.baudRate}`;
  }

  get messages$(): Observable<string> {
    return this.messages.asObservable();
  }

  isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }

    const port = new SerialPort({
      path: this.options.path,
      baudRate: this.options.baudRate,
      dataBits: 8,
      parity: 'none',
      stopBits: 1,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(new RelayTransportError(this.name, 'open failed', error)) : resolve()));
    });

    try {
      await new Promise<void>((resolve, reject) => {
        port.set({ dtr: true, rts: true }, (error) =>
          error ? reject(new RelayTransportError(this.name, 'control lines failed', error)) : resolve(),
        );
      });
    } catch (error) {
      // Release the OS lock so the next open() can claim the path
      await this.release(port);
      throw error;
    }

    const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
    parser.on('data', (line: string) => {
      const text = line.trim();
      if (text.length > 0) {
        this.logger.debug('Relay controller message', { transport: this.name, text });
        this.messages.next(text);
      }
    });

    port.on('error', (error: Error) => {
      this.logger.error(`Serial port error on ${this.name}`, error.stack);
    });

    port.on('close', () => {
      this.logger.warn('Serial port closed', { transport: this.name });
      if (this.port === port) {
        this.port = null;
      }
    });

    this.port = port;
    this.logger.log(`Serial relay opened: ${this.name} (8N1)`);
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port || !port.isOpen) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(new RelayTransportError(this.name, 'close failed', error)) : resolve()));
    });
  }

  private release(port: SerialPort): Promise<void> {
    return new Promise<void>((resolve) => {
      if (!port.isOpen) {
        resolve();
        return;
      }
      port.close((error) => {
        if (error) {
          this.logger.warn('Could not release serial port', { transport: this.name, reason: error.message });
        }
        resolve();
      });
    });
  }

  async write(line: string): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new RelayTransportError(this.name, 'port is not open');
    }

    await new Promise<void>((resolve, reject) => {
      port.write(`${line}\n`, (error) => {
        if (error) {
          reject(new RelayTransportError(this.name, 'write failed', error));
          return;
        }
        port.drain((drainError) =>
          drainError ? reject(new RelayTransportError(this.name, 'drain failed', drainError)) : resolve(),
        );
      });
    });
  }
}

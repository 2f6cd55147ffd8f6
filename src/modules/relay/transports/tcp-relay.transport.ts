import * as net from 'net';
import { Observable, Subject } from 'rxjs';
import { Logger } from '../../../utils/logger';
import { RelayTransportError } from '../relay.errors';
import { RelayTransport } from '../relay.types';

export interface TcpRelayOptions {
  host: string;
  port: number;
  connectTimeoutMs?: number;
}

/**
 * Relay controller behind a TCP bridge (e.g. ser2net), same line format as serial.
 */
export class TcpRelayTransport implements RelayTransport {
  readonly name: string;
  private readonly logger = new Logger(TcpRelayTransport.name);
  private readonly messages = new Subject<string>();
  private socket: net.Socket | null = null;
  private pending = '';

  constructor(private readonly options: TcpRelayOptions) {
    this.name = `tcp:${options.host}:${options.port}`;
  }

  get messages$(): Observable<string> {
    return this.messages.asObservable();
  }

  isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const candidate = net.createConnection({ host: this.options.host, port: this.options.port });
      candidate.setTimeout(this.options.connectTimeoutMs ?? 5000);
      candidate.once('connect', () => {
        candidate.setTimeout(0);
        resolve(candidate);
      });
      candidate.once('timeout', () => {
        candidate.destroy();
        reject(new RelayTransportError(this.name, 'connect timed out'));
      });
      candidate.once('error', (error) => reject(new RelayTransportError(this.name, 'connect failed', error)));
    });

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (error) => {
      this.logger.error(`Relay socket error on ${this.name}`, error.stack);
    });
    socket.on('close', () => {
      this.logger.warn('Relay socket closed', { transport: this.name });
      if (this.socket === socket) {
        this.socket = null;
      }
    });

    this.pending = '';
    this.socket = socket;
    this.logger.log(`TCP relay connected: ${this.name}`);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.pending = '';
    if (socket && !socket.destroyed) {
      socket.destroy();
    }
  }

  async write(line: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      throw new RelayTransportError(this.name, 'socket is not connected');
    }

    await new Promise<void>((resolve, reject) => {
      socket.write(`${line}\n`, (error) =>
        error ? reject(new RelayTransportError(this.name, 'write failed', error)) : resolve(),
      );
    });
  }

  private onData(chunk: string): void {
    this.pending += chunk;
    let newline = this.pending.indexOf('\n');
    while (newline !== -1) {
      const text = this.pending.slice(0, newline).trim();
      this.pending = this.pending.slice(newline + 1);
      if (text.length > 0) {
        this.messages.next(text);
      }
      newline = this.pending.indexOf('\n');
    }
  }
}

import * as net from 'net';
import { ConnectionError } from '../protocols/gt06/gt06.errors';
import { SocketConnector } from './tracker-session.types';

const KEEP_ALIVE_DELAY_MS = 60000;

export const connectTcp: SocketConnector = (host, port, timeoutMs) =>
  new Promise<net.Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const fail = (error: ConnectionError): void => {
      socket.removeAllListeners('connect');
      socket.destroy();
      reject(error);
    };

    socket.setTimeout(timeoutMs);

    socket.once('connect', () => {
      socket.removeAllListeners('timeout');
      socket.removeAllListeners('error');
      socket.setTimeout(0);
      socket.setNoDelay(true);
      socket.setKeepAlive(true, KEEP_ALIVE_DELAY_MS);
      resolve(socket);
    });

    socket.once('timeout', () => {
      fail(new ConnectionError(`Connection to ${host}:${port} timed out after ${timeoutMs} ms`));
    });

    socket.once('error', (error: Error) => {
      fail(new ConnectionError(`Connection to ${host}:${port} failed: ${error.message}`, error));
    });
  });

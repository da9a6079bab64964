import { Socket } from 'node:net';

export type SocketFactory = () => Socket;

export const createTcpSocket: SocketFactory = () => new Socket();

export interface ConnectSocketOptions {
  host: string;
  port: number;
  timeoutMs: number;
}

/**
 * One connection attempt. Nagle is disabled so single-line commands leave
 * immediately; keep-alive is on so a dead controller is eventually noticed.
 * On failure the socket is destroyed before the promise rejects.
 */
export function connectSocket(socket: Socket, options: ConnectSocketOptions): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.off('connect', onConnect);
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(error);
    };

    const onConnect = (): void => {
      cleanup();
      resolve();
    };

    const timer = setTimeout(() => {
      onError(new Error(`Connect timeout after ${options.timeoutMs}ms (${options.host}:${options.port})`));
    }, options.timeoutMs);

    socket.setNoDelay(true);
    socket.setKeepAlive(true);
    socket.on('error', onError);
    socket.on('connect', onConnect);
    socket.connect({ host: options.host, port: options.port });
  });
}

/**
 * Writes the whole string and resolves once it has been handed to the kernel.
 * Rejects when the write callback has not fired within `timeoutMs`; the
 * bytes may still go out later.
 */
export function writeAll(socket: Socket, data: string, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || !socket.writable) {
      reject(new Error('Socket is not writable'));
      return;
    }

    const timer = setTimeout(() => {
      reject(new Error(`Write timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.write(data, 'utf8', (error) => {
      clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

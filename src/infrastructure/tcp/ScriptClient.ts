import type { Socket } from 'node:net';
import type { IScriptClient } from '../../domain/ports/IScriptClient.js';
import type { ConnectionState } from '../../domain/entities/ConnectionState.js';
import { RESET_STATUS_BITS_PROGRAM, wrapWithStatusBits } from '../../domain/entities/ScriptProgram.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { AsyncMutex } from '../../application/AsyncMutex.js';
import { connectSocket, createTcpSocket, writeAll, type SocketFactory } from './SocketConnector.js';
import { remainingUntil, sleep } from '../utils/timing.js';

export const DEFAULT_SCRIPT_PORT = 30003;

export interface ScriptClientConfig {
  host: string;
  port?: number;
  /** Budget for connecting, and for one send including any reconnect */
  reconnectTimeout?: number;
  ioTimeout?: number;
  settleDelay?: number;
  retryDelay?: number;
  createSocket?: SocketFactory;
}

/**
 * Client for the controller's real-time script port.
 *
 * Write-only: the controller streams binary state on this port, which is read
 * and dropped. There is no worker loop; the first send connects, and a send
 * that finds the socket broken reconnects within its own budget.
 */
export class ScriptClient implements IScriptClient {
  private readonly config: Required<ScriptClientConfig>;
  private readonly mutex = new AsyncMutex();
  private socket: Socket | null = null;
  private _connectionState: ConnectionState = 'DISCONNECTED';
  private closed = false;

  constructor(
    config: ScriptClientConfig,
    private readonly logger: ILogger
  ) {
    this.config = {
      port: DEFAULT_SCRIPT_PORT,
      reconnectTimeout: 2000,
      ioTimeout: 1000,
      settleDelay: 500,
      retryDelay: 100,
      createSocket: createTcpSocket,
      ...config,
    };
  }

  get connectionState(): ConnectionState {
    return this._connectionState;
  }

  isConnected(): boolean {
    return this._connectionState === 'CONNECTED' && this.socket !== null && !this.socket.destroyed;
  }

  connect(): Promise<boolean> {
    return this.mutex.runExclusive(() =>
      this.connectExclusive(Date.now() + this.config.reconnectTimeout)
    );
  }

  send(script: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.sendExclusive(script));
  }

  async sendProgram(program: string): Promise<boolean> {
    return this.send(wrapWithStatusBits(program));
  }

  resetStatusBits(): Promise<boolean> {
    return this.send(RESET_STATUS_BITS_PROGRAM);
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.logger.info('Closing script client');
    }
    this.discardSocket();
    this.setConnectionState('DISCONNECTED');
  }

  private async sendExclusive(script: string): Promise<boolean> {
    const payload = script.endsWith('\n') ? script : `${script}\n`;
    const deadline = Date.now() + this.config.reconnectTimeout;

    while (!this.closed && remainingUntil(deadline) > 0) {
      if (!(await this.connectExclusive(deadline))) {
        break;
      }
      const socket = this.socket;
      if (!socket) {
        continue;
      }

      try {
        await writeAll(socket, payload, Math.max(1, remainingUntil(deadline)));
        this.logger.debug('Script sent', { length: payload.length });
        return true;
      } catch (error) {
        this.logger.warn('Script write failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        this.setConnectionState('ERROR');
        this.discardSocket();
      }
    }

    this.logger.warn('Script not delivered', { state: this._connectionState, closed: this.closed });
    return false;
  }

  private async connectExclusive(deadline: number): Promise<boolean> {
    if (this.socket && !this.socket.destroyed) {
      return true;
    }

    const { host, port } = this.config;
    let attempt = 0;

    while (!this.closed && remainingUntil(deadline) > 0) {
      attempt++;
      const socket = this.config.createSocket();
      this.watch(socket);

      try {
        this.logger.debug('Connecting to script port', { host, port, attempt });
        await connectSocket(socket, {
          host,
          port,
          timeoutMs: Math.min(this.config.ioTimeout, remainingUntil(deadline)),
        });
      } catch (error) {
        this.logger.debug('Script connect attempt failed', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(Math.min(this.config.retryDelay, remainingUntil(deadline)));
        continue;
      }

      this.socket = socket;
      this.setConnectionState('CONNECTED');
      this.logger.info('Connected to script port', { host, port, attempt });
      await sleep(this.config.settleDelay);
      return !this.closed;
    }

    if (!this.closed) {
      this.logger.warn('Could not connect to script port within reconnect budget', {
        host,
        port,
        attempts: attempt,
      });
    }
    return false;
  }

  private watch(socket: Socket): void {
    // State stream of the real-time interface; not interpreted here
    socket.on('data', () => undefined);

    socket.on('error', (error: Error) => {
      this.logger.debug('Script socket error', { error: error.message });
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.setConnectionState(this.closed ? 'DISCONNECTED' : 'ERROR');
    });
  }

  private discardSocket(): void {
    if (!this.socket) return;
    const socket = this.socket;
    this.socket = null;
    socket.destroy();
  }

  private setConnectionState(state: ConnectionState): void {
    const previousState = this._connectionState;
    if (previousState === state) return;
    this._connectionState = state;
    this.logger.debug('Script connection state changed', { from: previousState, to: state });
  }
}

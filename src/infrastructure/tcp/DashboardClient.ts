import type { Socket } from 'node:net';
import type {
  IDashboardClient,
  ConnectionStateHandler,
  ReplyHandler,
} from '../../domain/ports/IDashboardClient.js';
import type { ConnectionState } from '../../domain/entities/ConnectionState.js';
import { isConnectedState, isRunningState } from '../../domain/entities/ConnectionState.js';
import type { PublishedReply } from '../../domain/entities/DashboardReply.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { AsyncMutex } from '../../application/AsyncMutex.js';
import { ReplyGate } from '../../application/ReplyGate.js';
import { connectSocket, createTcpSocket, writeAll, type SocketFactory } from './SocketConnector.js';
import { SocketReader } from './SocketReader.js';
import { ReplyDecoder } from './ReplyDecoder.js';
import { remainingUntil, sleep } from '../utils/timing.js';

export const DEFAULT_DASHBOARD_PORT = 29999;

export interface DashboardClientConfig {
  host: string;
  port?: number;
  /** Wall-clock budget for (re)establishing a connection, and for a send to find one */
  reconnectTimeout?: number;
  /** Per connect attempt, and per receive wait in the worker loop */
  ioTimeout?: number;
  /** Default wait for a reply after a send */
  replyTimeout?: number;
  /** Pause after connecting before the controller accepts input */
  settleDelay?: number;
  /** Pause between failed connect attempts */
  retryDelay?: number;
  maxReplyLength?: number;
  createSocket?: SocketFactory;
}

type ResolvedConfig = Required<DashboardClientConfig>;

interface Connection {
  socket: Socket;
  reader: SocketReader;
}

/**
 * Client for the robot controller's dashboard server.
 *
 * A single worker loop owns the socket: it connects, reads reply lines,
 * publishes them through the reply gate and reconnects after a failure. Only
 * the worker loop changes the connection state. Callers write commands with
 * `send` and pick up the answer with `waitForReply`, or use `request` for both.
 *
 * Once closed, or once a reconnect budget is exhausted, the instance is done;
 * build a new one to connect again.
 */
export class DashboardClient implements IDashboardClient {
  private readonly config: ResolvedConfig;
  private readonly gate = new ReplyGate();
  private readonly sendMutex = new AsyncMutex();
  private readonly requestMutex = new AsyncMutex();

  private _connectionState: ConnectionState = 'DISCONNECTED';
  private connection: Connection | null = null;
  private writable = false;
  private stopRequested = false;
  private loop: Promise<void> | null = null;
  private exited = false;
  private sendMarker = 0;

  private readinessWaiters = new Set<() => void>();
  private connectionStateHandlers = new Set<ConnectionStateHandler>();
  private replyHandlers = new Set<ReplyHandler>();

  constructor(
    config: DashboardClientConfig,
    private readonly logger: ILogger
  ) {
    this.config = {
      port: DEFAULT_DASHBOARD_PORT,
      reconnectTimeout: 10000,
      ioTimeout: 1000,
      replyTimeout: 1000,
      settleDelay: 500,
      retryDelay: 100,
      maxReplyLength: 1024,
      createSocket: createTcpSocket,
      ...config,
    };
  }

  get connectionState(): ConnectionState {
    return this._connectionState;
  }

  get lastReply(): PublishedReply | null {
    return this.gate.lastReply;
  }

  /** True while the worker loop is alive */
  get active(): boolean {
    return this.loop !== null && !this.exited;
  }

  isRunning(): boolean {
    return isRunningState(this._connectionState);
  }

  start(): boolean {
    if (this.stopRequested || this.exited) {
      this.logger.warn('Dashboard client is stopped; create a new instance to reconnect');
      return false;
    }
    if (this.loop) {
      this.logger.warn('Worker loop already started');
      return false;
    }

    this.logger.info('Starting dashboard worker loop', {
      host: this.config.host,
      port: this.config.port,
    });
    this.loop = this.run().catch((error) => {
      this.logger.error('Worker loop crashed', error);
    });
    return true;
  }

  async close(): Promise<void> {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.logger.info('Closing dashboard client');
      this.signalReadiness();
    }

    if (this.loop) {
      await this.loop;
    }

    // The loop is gone (or never ran); nothing else touches the state now
    this.discardConnection();
    this.setConnectionState('DISCONNECTED');
  }

  async send(command: string): Promise<boolean> {
    const release = await this.sendMutex.acquire();
    try {
      return await this.sendExclusive(command);
    } finally {
      release();
    }
  }

  async waitForReply(timeoutMs: number = this.config.replyTimeout): Promise<string | null> {
    const result = await this.gate.waitForReply(this.sendMarker, timeoutMs);

    if (result.outcome === 'reply' && result.reply) {
      // A second wait without a new send blocks for yet another reply
      this.sendMarker = result.reply.sequence;
    } else {
      this.logger.debug('No new reply', { outcome: result.outcome, timeoutMs });
    }

    return result.reply?.text ?? null;
  }

  request(command: string, timeoutMs?: number): Promise<string | null> {
    return this.requestMutex.runExclusive(async () => {
      const delivered = await this.send(command);
      if (!delivered) {
        return null;
      }
      return this.waitForReply(timeoutMs);
    });
  }

  onConnectionStateChange(handler: ConnectionStateHandler): void {
    this.connectionStateHandlers.add(handler);
  }

  offConnectionStateChange(handler: ConnectionStateHandler): void {
    this.connectionStateHandlers.delete(handler);
  }

  onReply(handler: ReplyHandler): void {
    this.replyHandlers.add(handler);
  }

  offReply(handler: ReplyHandler): void {
    this.replyHandlers.delete(handler);
  }

  // ---------------------------------------------------------------------------
  // Worker loop
  // ---------------------------------------------------------------------------

  private async run(): Promise<void> {
    try {
      while (!this.stopRequested) {
        if (!this.connection) {
          if (!(await this.connect())) {
            break;
          }
          continue;
        }

        const result = await this.connection.reader.next(this.config.ioTimeout);
        if (this.stopRequested) {
          break;
        }

        switch (result.kind) {
          case 'idle':
            break;

          case 'reply':
            this.publish(result.text);
            break;

          case 'closed':
          case 'error':
            if (result.kind === 'error') {
              this.logger.warn('Dashboard connection failed', { error: result.error.message });
            } else {
              this.logger.warn('Dashboard server closed the connection');
            }
            this.setConnectionState('ERROR');
            this.discardConnection();
            if (!(await this.connect())) {
              return;
            }
            break;
        }
      }
    } finally {
      this.exited = true;
      this.writable = false;
      this.gate.release();
      this.discardConnection();
      if (this.stopRequested) {
        this.setConnectionState('DISCONNECTED');
        this.logger.info('Worker loop stopped');
      } else {
        this.logger.error('Worker loop exited: dashboard server unreachable', undefined, {
          state: this._connectionState,
          reconnectTimeout: this.config.reconnectTimeout,
        });
      }
      this.signalReadiness();
    }
  }

  /**
   * Returns at once when a socket is held. Otherwise retries until connected
   * or until the reconnect budget runs out.
   */
  private async connect(): Promise<boolean> {
    if (this.connection) {
      return true;
    }

    const { host, port } = this.config;
    const deadline = Date.now() + this.config.reconnectTimeout;
    let attempt = 0;

    while (!this.stopRequested && remainingUntil(deadline) > 0) {
      attempt++;
      const socket = this.config.createSocket();
      const reader = new SocketReader(socket, new ReplyDecoder(this.config.maxReplyLength));

      try {
        this.logger.debug('Connecting to dashboard server', { host, port, attempt });
        await connectSocket(socket, {
          host,
          port,
          timeoutMs: Math.min(this.config.ioTimeout, remainingUntil(deadline)),
        });
      } catch (error) {
        this.logger.debug('Connect attempt failed', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(Math.min(this.config.retryDelay, remainingUntil(deadline)));
        continue;
      }

      this.connection = { socket, reader };
      this.setConnectionState('CONNECTED');
      this.logger.info('Connected to dashboard server', { host, port, attempt });

      await sleep(this.config.settleDelay);

      // Greeting and anything else sent during the settle delay is published
      // before callers may write, so it cannot be taken for a command's reply
      for (const text of reader.drain()) {
        this.publish(text);
      }

      if (this.stopRequested) {
        return false;
      }

      this.writable = true;
      this.signalReadiness();
      return true;
    }

    if (!this.stopRequested) {
      this.logger.warn('Could not connect within reconnect budget', {
        host,
        port,
        attempts: attempt,
        reconnectTimeout: this.config.reconnectTimeout,
      });
    }
    return false;
  }

  private publish(text: string): void {
    const reply = this.gate.publish(text);
    this.logger.trace('Reply received', { sequence: reply.sequence, text });
    this.setConnectionState('STARTED');

    this.replyHandlers.forEach((handler) => {
      try {
        handler(reply);
      } catch (error) {
        this.logger.error('Reply handler threw', error);
      }
    });
  }

  private discardConnection(): void {
    this.writable = false;
    if (!this.connection) {
      return;
    }
    this.connection.socket.destroy();
    this.connection = null;
  }

  private setConnectionState(state: ConnectionState): void {
    const previousState = this._connectionState;
    this._connectionState = state;
    if (previousState === state) {
      return;
    }

    this.logger.debug('Connection state changed', { from: previousState, to: state });
    this.connectionStateHandlers.forEach((handler) => {
      try {
        handler(state);
      } catch (error) {
        this.logger.error('Connection state handler threw', error);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Send path
  // ---------------------------------------------------------------------------

  private async sendExclusive(command: string): Promise<boolean> {
    if (!this.loop) {
      this.logger.warn('Send before start(); command dropped', { command: command.trim() });
      return false;
    }

    const deadline = Date.now() + this.config.reconnectTimeout;
    let failedSocket: Socket | null = null;

    for (;;) {
      if (this.stopRequested || this.exited) {
        this.logger.debug('Send refused: client stopped', { command: command.trim() });
        return false;
      }

      const socket = this.writableSocket();
      if (socket && socket !== failedSocket) {
        const marker = this.gate.mark();
        try {
          await writeAll(socket, command, Math.max(1, remainingUntil(deadline)));
          this.sendMarker = marker;
          this.logger.trace('Command sent', { command: command.trim() });
          return true;
        } catch (error) {
          // A broken socket is replaced by the worker; retry only on the new one.
          // A stalled one is never retried, so the budget bounds the wait.
          this.logger.warn('Write failed', {
            command: command.trim(),
            error: error instanceof Error ? error.message : String(error),
          });
          failedSocket = socket;
        }
      }

      const remaining = remainingUntil(deadline);
      if (remaining <= 0) {
        this.logger.warn('Send timed out waiting for a connection', {
          command: command.trim(),
          state: this._connectionState,
        });
        return false;
      }
      await this.waitForReadiness(remaining);
    }
  }

  private writableSocket(): Socket | null {
    if (!this.writable || !this.connection || !isConnectedState(this._connectionState)) {
      return null;
    }
    const { socket } = this.connection;
    return socket.destroyed || !socket.writable ? null : socket;
  }

  private waitForReadiness(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.readinessWaiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.readinessWaiters.add(done);
    });
  }

  private signalReadiness(): void {
    [...this.readinessWaiters].forEach((done) => done());
  }
}

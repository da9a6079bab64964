import type { ConnectionState } from '../entities/ConnectionState.js';
import type { PublishedReply } from '../entities/DashboardReply.js';

export type ConnectionStateHandler = (state: ConnectionState) => void;
export type ReplyHandler = (reply: PublishedReply) => void;

/**
 * Port for a half-duplex dashboard connection: one command in flight, the
 * next reply line belongs to it.
 *
 * Callers pair every `send` with exactly one `waitForReply` before the next
 * `send`. Concurrent callers must serialize themselves (or use `request`,
 * which does so); otherwise replies may be read by the wrong caller.
 */
export interface IDashboardClient {
  readonly connectionState: ConnectionState;
  readonly lastReply: PublishedReply | null;

  /** Spawns the worker loop. False when this instance was already stopped. */
  start(): boolean;

  /** Stops the worker loop for good and releases the socket. */
  close(): Promise<void>;

  isRunning(): boolean;

  /** Writes a raw command. False means it was not delivered. */
  send(command: string): Promise<boolean>;

  /**
   * Next reply published after the last successful `send`; on timeout the
   * current last reply (possibly stale, possibly null).
   */
  waitForReply(timeoutMs?: number): Promise<string | null>;

  /** `send` + `waitForReply` as one exclusive step. Null when not delivered. */
  request(command: string, timeoutMs?: number): Promise<string | null>;

  onConnectionStateChange(handler: ConnectionStateHandler): void;
  offConnectionStateChange(handler: ConnectionStateHandler): void;
  onReply(handler: ReplyHandler): void;
  offReply(handler: ReplyHandler): void;
}

import type { ConnectionState } from '../entities/ConnectionState.js';

/**
 * Port for the controller's script interface: URScript goes in, nothing is
 * read back. Connections are made on demand.
 */
export interface IScriptClient {
  readonly connectionState: ConnectionState;

  isConnected(): boolean;

  connect(): Promise<boolean>;

  /** Sends one statement or a whole program. False means it was not delivered. */
  send(script: string): Promise<boolean>;

  /** Like `send`, with the program wrapped in status bits first */
  sendProgram(program: string): Promise<boolean>;

  /** Lowers the status bits raised by a wrapped program */
  resetStatusBits(): Promise<boolean>;

  close(): Promise<void>;
}

import type { Socket } from 'node:net';
import { ReplyDecoder } from './ReplyDecoder.js';

export type ReadResult =
  | { kind: 'reply'; text: string }
  | { kind: 'idle' }
  | { kind: 'closed' }
  | { kind: 'error'; error: Error };

/**
 * Pull-style view of a socket for a single consumer: `next()` resolves with
 * the next reply line, `idle` when the I/O timeout passes without one, or the
 * terminal `closed` / `error` result once the stream is gone.
 *
 * Listeners are attached on construction, before the socket connects, so no
 * socket error is ever emitted without a listener.
 */
export class SocketReader {
  private readonly decoder: ReplyDecoder;
  private queue: string[] = [];
  private terminal: ReadResult | null = null;
  private waiter: ((result: ReadResult) => void) | null = null;

  constructor(socket: Socket, decoder: ReplyDecoder = new ReplyDecoder()) {
    this.decoder = decoder;

    socket.on('data', (chunk: Buffer) => {
      for (const text of this.decoder.push(chunk)) {
        this.deliver({ kind: 'reply', text });
      }
    });

    // Zero-byte read: the peer closed its side
    socket.on('end', () => this.finish({ kind: 'closed' }));

    socket.on('error', (error: Error) => this.finish({ kind: 'error', error }));

    socket.on('close', () => this.finish({ kind: 'closed' }));
  }

  get isFinished(): boolean {
    return this.terminal !== null;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  next(timeoutMs: number): Promise<ReadResult> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve({ kind: 'reply', text: queued });
    }
    if (this.terminal) {
      return Promise.resolve(this.terminal);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: 'idle' });
      }, timeoutMs);

      this.waiter = (result) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(result);
      };
    });
  }

  /** Takes every reply line received so far without waiting. */
  drain(): string[] {
    const lines = this.queue;
    this.queue = [];
    return lines;
  }

  private deliver(result: ReadResult): void {
    if (this.waiter) {
      this.waiter(result);
    } else if (result.kind === 'reply') {
      this.queue.push(result.text);
    }
  }

  private finish(result: ReadResult): void {
    if (this.terminal) return;
    this.terminal = result;
    this.decoder.reset();
    if (this.waiter) {
      this.waiter(result);
    }
  }
}

import type { PublishedReply } from '../domain/entities/DashboardReply.js';

export type ReplyWaitOutcome = 'reply' | 'timeout' | 'released';

export interface ReplyWaitResult {
  outcome: ReplyWaitOutcome;
  /** Fresh reply for `reply`; whatever was last published otherwise */
  reply: PublishedReply | null;
}

interface Waiter {
  after: number;
  settle: (result: ReplyWaitResult) => void;
}

/**
 * Hands replies published by the worker loop to callers waiting on them.
 *
 * Each reply carries a sequence number. A caller records `mark()` before it
 * writes a command and then waits for a sequence greater than that mark, so a
 * reply that was already there before the command can never be mistaken for
 * the answer to it.
 */
export class ReplyGate {
  private last: PublishedReply | null = null;
  private waiters = new Set<Waiter>();
  private released = false;

  get lastReply(): PublishedReply | null {
    return this.last;
  }

  get sequence(): number {
    return this.last?.sequence ?? 0;
  }

  get pendingCount(): number {
    return this.waiters.size;
  }

  get isReleased(): boolean {
    return this.released;
  }

  mark(): number {
    return this.sequence;
  }

  /**
   * Worker loop only.
   */
  publish(text: string, receivedAt: Date = new Date()): PublishedReply {
    const reply: PublishedReply = { sequence: this.sequence + 1, text, receivedAt };
    this.last = reply;

    for (const waiter of [...this.waiters]) {
      if (reply.sequence > waiter.after) {
        waiter.settle({ outcome: 'reply', reply });
      }
    }

    return reply;
  }

  waitForReply(after: number, timeoutMs: number): Promise<ReplyWaitResult> {
    if (this.last && this.last.sequence > after) {
      return Promise.resolve({ outcome: 'reply', reply: this.last });
    }
    if (this.released) {
      return Promise.resolve({ outcome: 'released', reply: this.last });
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        after,
        settle: (result) => {
          clearTimeout(timer);
          this.waiters.delete(waiter);
          resolve(result);
        },
      };
      const timer = setTimeout(() => {
        waiter.settle({ outcome: 'timeout', reply: this.last });
      }, timeoutMs);

      this.waiters.add(waiter);
    });
  }

  /**
   * Wakes every waiter with the current reply. Later waits return at once.
   */
  release(): void {
    this.released = true;
    for (const waiter of [...this.waiters]) {
      waiter.settle({ outcome: 'released', reply: this.last });
    }
  }
}

import { StringDecoder } from 'node:string_decoder';

/** Size of one receive on the controller side; longer unterminated text is cut here. */
export const MAX_REPLY_LENGTH = 1024;

// C0 controls except tab, plus DEL
const NON_PRINTABLE = /[\u0000-\u0008\u000A-\u001F\u007F]/g;

/** Removes control characters (the `\r` of `\r\n` included); spaces and tabs are kept as received. */
export function cleanReplyLine(raw: string): string {
  return raw.replace(NON_PRINTABLE, '');
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits the dashboard byte stream into reply lines.
 *
 * Replies are UTF-8 text terminated by `\n` (optionally `\r\n`). No length
 * prefix is expected or stripped. Multibyte characters split across chunks are
 * reassembled; lines that are blank once cleaned are dropped.
 */
export class ReplyDecoder {
  private pending = '';
  private decoder = new StringDecoder('utf8');

  constructor(private readonly maxLineLength: number = MAX_REPLY_LENGTH) {}

  get pendingLength(): number {
    return this.pending.length;
  }

  push(chunk: Buffer): string[] {
    this.pending += this.decoder.write(chunk);
    const lines: string[] = [];

    let newline = this.pending.indexOf('\n');
    while (newline !== -1) {
      this.collect(this.pending.slice(0, newline), lines);
      this.pending = this.pending.slice(newline + 1);
      newline = this.pending.indexOf('\n');
    }

    while (this.pending.length >= this.maxLineLength) {
      const cut = this.cutIndex();
      this.collect(this.pending.slice(0, cut), lines);
      this.pending = this.pending.slice(cut);
    }

    return lines;
  }

  /** Drops any partial line, e.g. when the connection goes away mid-reply. */
  reset(): void {
    this.pending = '';
    this.decoder = new StringDecoder('utf8');
  }

  // Never split a surrogate pair
  private cutIndex(): number {
    const max = this.maxLineLength;
    return max > 1 && isHighSurrogate(this.pending.charCodeAt(max - 1)) ? max - 1 : max;
  }

  private collect(raw: string, into: string[]): void {
    const line = cleanReplyLine(raw);
    if (line.trim().length > 0) {
      into.push(line);
    }
  }
}

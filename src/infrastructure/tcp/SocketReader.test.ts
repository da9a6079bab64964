import { Socket } from 'node:net';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SocketReader } from './SocketReader.js';

describe('SocketReader', () => {
  let socket: Socket;
  let reader: SocketReader;

  beforeEach(() => {
    socket = new Socket();
    reader = new SocketReader(socket);
  });

  afterEach(() => {
    socket.destroy();
  });

  it('should resolve a pending read with the next line', async () => {
    const pending = reader.next(1000);
    socket.emit('data', Buffer.from('Robotmode: IDLE\n'));

    expect(await pending).toEqual({ kind: 'reply', text: 'Robotmode: IDLE' });
  });

  it('should queue lines that arrive with no reader waiting', async () => {
    socket.emit('data', Buffer.from('first\nsecond\n'));

    expect(reader.queuedCount).toBe(2);
    expect(await reader.next(10)).toEqual({ kind: 'reply', text: 'first' });
    expect(reader.drain()).toEqual(['second']);
    expect(reader.queuedCount).toBe(0);
  });

  it('should report idle when nothing arrives in time', async () => {
    expect(await reader.next(20)).toEqual({ kind: 'idle' });
  });

  it('should serve queued lines before reporting the close', async () => {
    socket.emit('data', Buffer.from('last words\n'));
    socket.emit('end');

    expect(reader.isFinished).toBe(true);
    expect(await reader.next(10)).toEqual({ kind: 'reply', text: 'last words' });
    expect(await reader.next(10)).toEqual({ kind: 'closed' });
    expect(await reader.next(10)).toEqual({ kind: 'closed' });
  });

  it('should keep the first terminal result', async () => {
    const error = new Error('read ECONNRESET');
    socket.emit('error', error);
    socket.emit('close');

    expect(await reader.next(10)).toEqual({ kind: 'error', error });
  });

  it('should wake a pending read on close', async () => {
    const pending = reader.next(1000);
    socket.emit('end');

    expect(await pending).toEqual({ kind: 'closed' });
  });
});

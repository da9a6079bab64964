import net, { type Socket } from 'node:net';

/** Reply line(s) for a command, or null to stay silent */
export type FakeResponder = (command: string) => string | string[] | null;

export const echoResponder: FakeResponder = (command) => `echo: ${command}`;

/**
 * In-process stand-in for the controller's dashboard server on 127.0.0.1.
 */
export class FakeDashboardServer {
  readonly received: string[] = [];
  connections = 0;

  private readonly server: net.Server;
  private readonly sockets = new Set<Socket>();

  constructor(
    private readonly responder: FakeResponder = echoResponder,
    private readonly greeting: string | null = null
  ) {
    this.server = net.createServer((socket) => this.accept(socket));
  }

  get port(): number {
    const address = this.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Fake dashboard server is not listening');
    }
    return address.port;
  }

  get openConnections(): number {
    return this.sockets.size;
  }

  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(0, '127.0.0.1', () => resolve(this.port));
    });
  }

  /** Half-closes every client connection (the client reads zero bytes). */
  endClients(): void {
    for (const socket of this.sockets) {
      socket.end();
    }
  }

  close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private accept(socket: Socket): void {
    this.connections++;
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => this.sockets.delete(socket));

    if (this.greeting !== null) {
      socket.write(`${this.greeting}\n`);
    }

    let buffer = '';
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf8');
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const command = buffer.slice(0, newline);
        buffer = buffer.slice(newline + 1);
        this.received.push(command);

        const reply = this.responder(command);
        const lines = reply === null ? [] : Array.isArray(reply) ? reply : [reply];
        for (const line of lines) {
          socket.write(`${line}\n`);
        }
        newline = buffer.indexOf('\n');
      }
    });
  }
}

/** A port with nothing listening on it */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

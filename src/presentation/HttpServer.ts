import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { IDashboardClient } from '../domain/ports/IDashboardClient.js';
import type { IScriptClient } from '../domain/ports/IScriptClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { toHealthState } from '../domain/entities/ConnectionState.js';
import { DashboardCommands, isDashboardCommandName } from '../application/DashboardCommands.js';
import { GetRobotStatus } from '../application/use-cases/GetRobotStatus.js';
import { StartProgram } from '../application/use-cases/StartProgram.js';
import { RecoverFromProtectiveStop } from '../application/use-cases/RecoverFromProtectiveStop.js';

export interface HttpServerConfig {
  port: number;
  host?: string;
  version?: string;
}

class BadRequestError extends Error {
  readonly name = 'BadRequestError';
}

/**
 * HTTP API in front of the dashboard client: health probe, status snapshot
 * and one route per dashboard command.
 */
export class HttpServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly startTime: number = Date.now();
  private readonly getRobotStatus: GetRobotStatus;
  private readonly startProgram: StartProgram;
  private readonly recoverFromProtectiveStop: RecoverFromProtectiveStop;

  constructor(
    private readonly client: IDashboardClient,
    private readonly commands: DashboardCommands,
    private readonly logger: ILogger,
    private readonly config: HttpServerConfig,
    private readonly script: IScriptClient | null = null
  ) {
    this.getRobotStatus = new GetRobotStatus(client, commands, logger);
    this.startProgram = new StartProgram(commands, logger);
    this.recoverFromProtectiveStop = new RecoverFromProtectiveStop(commands, logger);
  }

  /** Bound port; differs from the configured one when that was 0 */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error) => {
          this.logger.error('Unhandled HTTP handler error', error);
        });
      });

      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        this.logger.info('HTTP Server started', {
          port: this.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.logger.info('HTTP Server stopped');
          resolve();
        });
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path });

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (path === '/health' && method === 'GET') {
        return this.handleHealth(res);
      }

      if (path === '/api/status' && method === 'GET') {
        return await this.handleStatus(res);
      }

      if (path === '/api/program/start' && method === 'POST') {
        return await this.handleStartProgram(req, res);
      }

      if (path === '/api/recover' && method === 'POST') {
        return await this.handleRecover(req, res);
      }

      if (path === '/api/script' && method === 'POST' && this.script) {
        return await this.handleScript(req, res, this.script);
      }

      if (path.startsWith('/api/commands/') && method === 'POST') {
        const name = decodeURIComponent(path.slice('/api/commands/'.length));
        return await this.handleCommand(req, res, name);
      }

      return this.sendJson(res, 404, { error: 'Not Found', path });
    } catch (error) {
      if (error instanceof BadRequestError || error instanceof TypeError) {
        return this.sendJson(res, 400, { error: error.message });
      }
      this.logger.error('HTTP Request error', error);
      return this.sendJson(res, 500, {
        error: 'Internal Server Error',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private handleHealth(res: ServerResponse): void {
    const healthy = this.client.isRunning();
    this.sendJson(res, healthy ? 200 : 503, {
      status: healthy ? 'healthy' : 'unhealthy',
      connection: this.client.connectionState,
      health: toHealthState(this.client.connectionState),
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    });
  }

  private async handleStatus(res: ServerResponse): Promise<void> {
    const robot = await this.getRobotStatus.execute();
    const lastReply = this.client.lastReply;

    this.sendJson(res, 200, {
      version: this.config.version,
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: new Date().toISOString(),
      lastReply: lastReply && {
        sequence: lastReply.sequence,
        text: lastReply.text,
        receivedAt: lastReply.receivedAt.toISOString(),
      },
      robot,
    });
  }

  private async handleCommand(req: IncomingMessage, res: ServerResponse, name: string): Promise<void> {
    if (!isDashboardCommandName(name)) {
      return this.sendJson(res, 404, { error: 'Unknown command', command: name });
    }

    const body = await this.parseBody(req);
    const argument = this.optionalString(body, 'argument');
    const reply = await this.commands.invoke(name, argument);

    if (reply === null) {
      return this.sendJson(res, 502, { error: 'Command not delivered', command: name });
    }
    this.sendJson(res, 200, { command: name, reply });
  }

  private async handleStartProgram(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.parseBody(req);
    const result = await this.startProgram.execute({ program: this.optionalString(body, 'program') });
    this.sendJson(res, result.started ? 200 : 409, result);
  }

  private async handleRecover(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.parseBody(req);
    const closePopup = body.closePopup === true;
    const result = await this.recoverFromProtectiveStop.execute({ closePopup });
    this.sendJson(res, result.recovered ? 200 : 409, result);
  }

  private async handleScript(req: IncomingMessage, res: ServerResponse, script: IScriptClient): Promise<void> {
    const body = await this.parseBody(req);
    const text = this.optionalString(body, 'script');
    if (text === undefined || text.trim() === '') {
      throw new BadRequestError('script is required');
    }

    const sent = body.wrap === true ? await script.sendProgram(text) : await script.send(text);
    if (!sent) {
      return this.sendJson(res, 502, { error: 'Script not delivered' });
    }
    this.sendJson(res, 200, { sent, wrapped: body.wrap === true });
  }

  private optionalString(body: Record<string, unknown>, key: string): string | undefined {
    const value = body[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      throw new BadRequestError(`${key} must be a string`);
    }
    return value;
  }

  private parseBody(req: IncomingMessage): Promise<Record<string, unknown>> {
    return new Promise((resolve, reject) => {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        if (!body) {
          resolve({});
          return;
        }
        try {
          const parsed: unknown = JSON.parse(body);
          if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            reject(new BadRequestError('JSON body must be an object'));
            return;
          }
          resolve({ ...parsed });
        } catch {
          reject(new BadRequestError('Invalid JSON body'));
        }
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }
}

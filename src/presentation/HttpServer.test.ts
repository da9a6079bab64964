import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { IScriptClient } from '../domain/ports/IScriptClient.js';
import { HttpServer } from './HttpServer.js';
import { DashboardCommands } from '../application/DashboardCommands.js';
import type { IDashboardClient } from '../domain/ports/IDashboardClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import {
  createMockClient,
  createMockLogger,
  createMockScriptClient,
  replyTable,
} from '../test-support/mocks.js';

describe('HttpServer', () => {
  let logger: ILogger;
  let client: IDashboardClient;
  let script: IScriptClient;
  let server: HttpServer;
  let baseUrl: string;

  const post = (path: string, body?: string): Promise<Response> =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

  beforeEach(async () => {
    logger = createMockLogger();
    client = createMockClient(
      replyTable({
        play: 'Starting program',
        'load pick.urp': 'Loading program: pick.urp',
        robotmode: 'Robotmode: IDLE',
        safetymode: 'Safetymode: PROTECTIVE_STOP',
        programState: 'STOPPED pick.urp',
        running: 'Program running: false',
        'close safety popup': 'closing safety popup',
        'unlock protective stop': 'Protective stop releasing',
      })
    );
    script = createMockScriptClient();
    server = new HttpServer(
      client,
      new DashboardCommands(client, logger),
      logger,
      { port: 0, host: '127.0.0.1', version: '1.0.0' },
      script
    );
    await server.start();
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('GET /health', () => {
    it('should report healthy while the client is running', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'healthy', connection: 'STARTED', health: 'CONNECTED' });
    });

    it('should report 503 while the client is not running', async () => {
      vi.mocked(client.isRunning).mockReturnValue(false);

      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({ status: 'unhealthy' });
    });
  });

  describe('GET /api/status', () => {
    it('should return the robot snapshot', async () => {
      const response = await fetch(`${baseUrl}/api/status`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        version: '1.0.0',
        lastReply: null,
        robot: {
          connection: 'STARTED',
          isRunning: true,
          robotMode: 'IDLE',
          safetyMode: 'PROTECTIVE_STOP',
          programState: { state: 'STOPPED', program: 'pick.urp' },
          programRunning: false,
        },
      });
    });
  });

  describe('POST /api/commands/:name', () => {
    it('should run a command with its argument', async () => {
      const response = await post('/api/commands/load', JSON.stringify({ argument: 'pick.urp' }));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ command: 'load', reply: 'Loading program: pick.urp' });
      expect(client.request).toHaveBeenCalledWith('load pick.urp\n');
    });

    it('should run a command without a body', async () => {
      const response = await post('/api/commands/play');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ command: 'play', reply: 'Starting program' });
    });

    it('should return 404 for an unknown command', async () => {
      const response = await post('/api/commands/selfDestruct');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Unknown command', command: 'selfDestruct' });
      expect(client.request).not.toHaveBeenCalled();
    });

    it('should return 400 when a required argument is missing', async () => {
      const response = await post('/api/commands/load', '{}');

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Command load requires an argument' });
    });

    it('should return 400 for a non-string argument', async () => {
      const response = await post('/api/commands/popup', JSON.stringify({ argument: 42 }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'argument must be a string' });
    });

    it('should return 400 for malformed JSON', async () => {
      const response = await post('/api/commands/play', '{not json');

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid JSON body' });
    });

    it('should return 502 when the command was not delivered', async () => {
      const response = await post('/api/commands/shutdown');

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({ error: 'Command not delivered', command: 'shutdown' });
    });
  });

  describe('POST /api/program/start', () => {
    it('should load and play the program', async () => {
      const response = await post('/api/program/start', JSON.stringify({ program: 'pick.urp' }));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ started: true, reply: 'Starting program' });
    });

    it('should return 409 when the program cannot be loaded', async () => {
      const response = await post('/api/program/start', JSON.stringify({ program: 'other.urp' }));

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ started: false, reply: null, failedStep: 'load' });
    });
  });

  describe('POST /api/recover', () => {
    it('should unlock the protective stop', async () => {
      const response = await post('/api/recover');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        recovered: true,
        steps: [
          { command: 'close safety popup', reply: 'closing safety popup' },
          { command: 'unlock protective stop', reply: 'Protective stop releasing' },
        ],
      });
    });
  });

  describe('POST /api/script', () => {
    it('should send the script as given', async () => {
      const response = await post('/api/script', JSON.stringify({ script: 'set_digital_out(0, True)' }));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ sent: true, wrapped: false });
      expect(script.send).toHaveBeenCalledWith('set_digital_out(0, True)');
      expect(script.sendProgram).not.toHaveBeenCalled();
    });

    it('should wrap the script in status bits when asked', async () => {
      const response = await post('/api/script', JSON.stringify({ script: 'sleep(1)', wrap: true }));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ sent: true, wrapped: true });
      expect(script.sendProgram).toHaveBeenCalledWith('sleep(1)');
    });

    it('should return 400 without a script', async () => {
      const response = await post('/api/script', '{}');

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'script is required' });
    });

    it('should return 502 when the script was not delivered', async () => {
      vi.mocked(script.send).mockResolvedValue(false);

      const response = await post('/api/script', JSON.stringify({ script: 'sleep(1)' }));

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({ error: 'Script not delivered' });
    });
  });

  it('should return 404 for an unknown route', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not Found', path: '/nowhere' });
  });
});

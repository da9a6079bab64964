import { vi } from 'vitest';
import type { IDashboardClient } from '../domain/ports/IDashboardClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { IScriptClient } from '../domain/ports/IScriptClient.js';

export function createMockLogger(): ILogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/** Client double whose `request` is the given function */
export function createMockClient(request: IDashboardClient['request']): IDashboardClient {
  return {
    connectionState: 'STARTED',
    lastReply: null,
    start: vi.fn().mockReturnValue(true),
    close: vi.fn().mockResolvedValue(undefined),
    isRunning: vi.fn().mockReturnValue(true),
    send: vi.fn().mockResolvedValue(true),
    waitForReply: vi.fn().mockResolvedValue(null),
    request: vi.fn(request),
    onConnectionStateChange: vi.fn(),
    offConnectionStateChange: vi.fn(),
    onReply: vi.fn(),
    offReply: vi.fn(),
  };
}

export function createMockScriptClient(): IScriptClient {
  return {
    connectionState: 'CONNECTED',
    isConnected: vi.fn().mockReturnValue(true),
    connect: vi.fn().mockResolvedValue(true),
    send: vi.fn().mockResolvedValue(true),
    sendProgram: vi.fn().mockResolvedValue(true),
    resetStatusBits: vi.fn().mockResolvedValue(true),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

/** Answers each command from a table; unknown commands get null (not delivered) */
export function replyTable(table: Record<string, string>): IDashboardClient['request'] {
  return async (command) => table[command.trim()] ?? null;
}

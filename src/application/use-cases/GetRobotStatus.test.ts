import { describe, it, expect, beforeEach } from 'vitest';
import { GetRobotStatus } from './GetRobotStatus.js';
import { DashboardCommands } from '../DashboardCommands.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { createMockClient, createMockLogger, replyTable } from '../../test-support/mocks.js';

describe('GetRobotStatus', () => {
  let logger: ILogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('should combine the status queries into one snapshot', async () => {
    const client = createMockClient(
      replyTable({
        robotmode: 'Robotmode: RUNNING',
        safetymode: 'Safetymode: NORMAL',
        programState: 'PLAYING pick.urp',
        running: 'Program running: true',
      })
    );
    const useCase = new GetRobotStatus(client, new DashboardCommands(client, logger), logger);

    const status = await useCase.execute();

    expect(status).toEqual({
      connection: 'STARTED',
      isRunning: true,
      robotMode: 'RUNNING',
      safetyMode: 'NORMAL',
      programState: { state: 'PLAYING', program: 'pick.urp' },
      programRunning: true,
    });
    expect(client.request).toHaveBeenNthCalledWith(1, 'robotmode\n');
    expect(client.request).toHaveBeenNthCalledWith(2, 'safetymode\n');
    expect(client.request).toHaveBeenNthCalledWith(3, 'programState\n');
    expect(client.request).toHaveBeenNthCalledWith(4, 'running\n');
  });

  it('should leave fields null for missing or unrecognised replies', async () => {
    const client = createMockClient(
      replyTable({
        robotmode: 'Robotmode: DANCING',
        programState: 'STOPPED',
      })
    );
    const useCase = new GetRobotStatus(client, new DashboardCommands(client, logger), logger);

    const status = await useCase.execute();

    expect(status.robotMode).toBeNull();
    expect(status.safetyMode).toBeNull();
    expect(status.programState).toEqual({ state: 'STOPPED', program: null });
    expect(status.programRunning).toBeNull();
  });
});

import type { DashboardCommands } from '../DashboardCommands.js';
import type { IDashboardClient } from '../../domain/ports/IDashboardClient.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ConnectionState } from '../../domain/entities/ConnectionState.js';
import {
  parseProgramState,
  parseRobotMode,
  parseRunning,
  parseSafetyMode,
  type ProgramState,
  type RobotMode,
  type SafetyMode,
} from '../../domain/entities/DashboardReply.js';

export interface RobotStatus {
  connection: ConnectionState;
  isRunning: boolean;
  robotMode: RobotMode | null;
  safetyMode: SafetyMode | null;
  programState: ProgramState | null;
  programRunning: boolean | null;
}

/**
 * Use case for a status snapshot. Queries run one after another; a field is
 * null when its reply was missing or unrecognised.
 */
export class GetRobotStatus {
  constructor(
    private readonly client: IDashboardClient,
    private readonly commands: DashboardCommands,
    private readonly logger: ILogger
  ) {}

  async execute(): Promise<RobotStatus> {
    this.logger.debug('Executing GetRobotStatus use case');

    const robotMode = parseRobotMode(await this.commands.robotmode());
    const safetyMode = parseSafetyMode(await this.commands.safetyMode());
    const programState = parseProgramState(await this.commands.programState());
    const programRunning = parseRunning(await this.commands.running());

    return {
      connection: this.client.connectionState,
      isRunning: this.client.isRunning(),
      robotMode,
      safetyMode,
      programState,
      programRunning,
    };
  }
}

import type { DashboardCommands } from '../DashboardCommands.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { matchesExpectedReply } from '../../domain/entities/DashboardReply.js';

export interface StartProgramInput {
  /** Program to load first; omit to play whatever is loaded */
  program?: string;
}

export interface StartProgramOutput {
  started: boolean;
  /** Last reply seen, null when a command was not delivered */
  reply: string | null;
  failedStep?: 'load' | 'play';
}

/**
 * Use case for loading (optionally) and playing a program
 */
export class StartProgram {
  constructor(
    private readonly commands: DashboardCommands,
    private readonly logger: ILogger
  ) {}

  async execute(input: StartProgramInput = {}): Promise<StartProgramOutput> {
    this.logger.info('Executing StartProgram use case', { program: input.program });

    if (input.program) {
      const loadReply = await this.commands.load(input.program);
      if (!matchesExpectedReply(loadReply, 'Loading program')) {
        this.logger.warn('Program could not be loaded', { program: input.program, reply: loadReply });
        return { started: false, reply: loadReply, failedStep: 'load' };
      }
    }

    const playReply = await this.commands.play();
    if (!matchesExpectedReply(playReply, 'Starting program')) {
      this.logger.warn('Program did not start', { reply: playReply });
      return { started: false, reply: playReply, failedStep: 'play' };
    }

    this.logger.info('Program started', { program: input.program });
    return { started: true, reply: playReply };
  }
}

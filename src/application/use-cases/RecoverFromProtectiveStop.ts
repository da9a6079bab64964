import type { DashboardCommands } from '../DashboardCommands.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { matchesExpectedReply } from '../../domain/entities/DashboardReply.js';

export interface RecoverFromProtectiveStopInput {
  /** Also dismiss an ordinary popup left on the teach pendant */
  closePopup?: boolean;
}

export interface RecoveryStep {
  command: string;
  reply: string | null;
}

export interface RecoverFromProtectiveStopOutput {
  recovered: boolean;
  steps: RecoveryStep[];
}

/**
 * Use case for clearing a protective stop: dismiss the safety popup, then
 * unlock. The controller refuses the unlock for the first few seconds after
 * the stop; the caller retries in that case.
 */
export class RecoverFromProtectiveStop {
  constructor(
    private readonly commands: DashboardCommands,
    private readonly logger: ILogger
  ) {}

  async execute(input: RecoverFromProtectiveStopInput = {}): Promise<RecoverFromProtectiveStopOutput> {
    this.logger.info('Executing RecoverFromProtectiveStop use case');
    const steps: RecoveryStep[] = [];

    if (input.closePopup) {
      steps.push({ command: 'close popup', reply: await this.commands.closePopup() });
    }

    steps.push({ command: 'close safety popup', reply: await this.commands.closeSafetyPopup() });

    const unlockReply = await this.commands.unlockProtectiveStop();
    steps.push({ command: 'unlock protective stop', reply: unlockReply });

    const recovered = matchesExpectedReply(unlockReply, 'Protective stop releasing');
    if (!recovered) {
      this.logger.warn('Protective stop not released', { reply: unlockReply });
    }

    return { recovered, steps };
  }
}

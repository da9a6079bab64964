import type { IDashboardClient } from '../domain/ports/IDashboardClient.js';
import type { ILogger } from '../domain/ports/ILogger.js';

export const USER_ROLES = ['programmer', 'operator', 'none', 'locked', 'restricted'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

/**
 * Names of the catalog operations, as exposed over HTTP.
 */
export const DASHBOARD_COMMAND_NAMES = [
  'load',
  'play',
  'stop',
  'pause',
  'shutdown',
  'running',
  'robotmode',
  'getLoadedProgram',
  'popup',
  'closePopup',
  'addLog',
  'setUserRole',
  'isProgramSaved',
  'programState',
  'polyscopeVersion',
  'powerOn',
  'powerOff',
  'brakeRelease',
  'safetyMode',
  'unlockProtectiveStop',
  'closeSafetyPopup',
  'loadInstallation',
] as const;

export type DashboardCommandName = (typeof DASHBOARD_COMMAND_NAMES)[number];

export function isDashboardCommandName(name: string): name is DashboardCommandName {
  return DASHBOARD_COMMAND_NAMES.some((known) => known === name);
}

/** Operations that take one text argument */
export const COMMANDS_WITH_ARGUMENT: ReadonlySet<DashboardCommandName> = new Set([
  'load',
  'popup',
  'addLog',
  'setUserRole',
  'loadInstallation',
]);

function assertSingleLine(value: string, what: string): void {
  if (/[\r\n]/.test(value)) {
    throw new TypeError(`${what} must not contain line breaks`);
  }
}

/**
 * The dashboard server's command set. Every method writes one line and
 * returns the controller's reply text, or null when the command could not be
 * delivered. Replies are not interpreted here; see DashboardReply parsers.
 */
export class DashboardCommands {
  constructor(
    private readonly client: IDashboardClient,
    private readonly logger: ILogger
  ) {}

  /** Reply: `Loading program: <program>` or `File not found: <program>` */
  load(program: string): Promise<string | null> {
    return this.withArgument('load', program, 'Program');
  }

  /** Reply: `Starting program` or `Failed to execute: play` */
  play(): Promise<string | null> {
    return this.execute('play');
  }

  /** Reply: `Stopped` */
  stop(): Promise<string | null> {
    return this.execute('stop');
  }

  /** Reply: `Pausing program` */
  pause(): Promise<string | null> {
    return this.execute('pause');
  }

  /** Reply: `Shutting down`. The controller powers down afterwards. */
  shutdown(): Promise<string | null> {
    return this.execute('shutdown');
  }

  /** Reply: `Program running: true|false` */
  running(): Promise<string | null> {
    return this.execute('running');
  }

  /** Reply: `Robotmode: <mode>` */
  robotmode(): Promise<string | null> {
    return this.execute('robotmode');
  }

  /** Reply: `Loaded program: <path>` or `No program loaded` */
  getLoadedProgram(): Promise<string | null> {
    return this.execute('get loaded program');
  }

  popup(text: string): Promise<string | null> {
    return this.withArgument('popup', text, 'Popup text');
  }

  closePopup(): Promise<string | null> {
    return this.execute('close popup');
  }

  /** Reply: `Added log message` */
  addLog(message: string): Promise<string | null> {
    return this.withArgument('addToLog', message, 'Log message');
  }

  setUserRole(role: UserRole): Promise<string | null> {
    if (!isUserRole(role)) {
      return Promise.reject(new TypeError(`Unknown user role: ${role}`));
    }
    return this.execute(`setUserRole ${role}`);
  }

  /** Reply: `true <program>` or `false <program>` */
  isProgramSaved(): Promise<string | null> {
    return this.execute('isProgramSaved');
  }

  /** Reply: `STOPPED|PLAYING|PAUSED <program>` */
  programState(): Promise<string | null> {
    return this.execute('programState');
  }

  polyscopeVersion(): Promise<string | null> {
    return this.execute('PolyscopeVersion');
  }

  powerOn(): Promise<string | null> {
    return this.execute('power on');
  }

  powerOff(): Promise<string | null> {
    return this.execute('power off');
  }

  brakeRelease(): Promise<string | null> {
    return this.execute('brake release');
  }

  /** Reply: `Safetymode: <mode>` */
  safetyMode(): Promise<string | null> {
    return this.execute('safetymode');
  }

  /** Reply: `Protective stop releasing` */
  unlockProtectiveStop(): Promise<string | null> {
    return this.execute('unlock protective stop');
  }

  closeSafetyPopup(): Promise<string | null> {
    return this.execute('close safety popup');
  }

  /** Reply: `Loading installation: <file>` */
  loadInstallation(file: string): Promise<string | null> {
    return this.withArgument('load installation', file, 'Installation file');
  }

  /**
   * Runs a catalog operation by name, for callers that route by string
   * (the HTTP API). The argument is required for `COMMANDS_WITH_ARGUMENT`.
   */
  invoke(name: DashboardCommandName, argument?: string): Promise<string | null> {
    if (COMMANDS_WITH_ARGUMENT.has(name) && (argument === undefined || argument.trim() === '')) {
      return Promise.reject(new TypeError(`Command ${name} requires an argument`));
    }
    const arg = argument ?? '';

    switch (name) {
      case 'load':
        return this.load(arg);
      case 'play':
        return this.play();
      case 'stop':
        return this.stop();
      case 'pause':
        return this.pause();
      case 'shutdown':
        return this.shutdown();
      case 'running':
        return this.running();
      case 'robotmode':
        return this.robotmode();
      case 'getLoadedProgram':
        return this.getLoadedProgram();
      case 'popup':
        return this.popup(arg);
      case 'closePopup':
        return this.closePopup();
      case 'addLog':
        return this.addLog(arg);
      case 'setUserRole':
        return isUserRole(arg)
          ? this.setUserRole(arg)
          : Promise.reject(new TypeError(`Unknown user role: ${arg}`));
      case 'isProgramSaved':
        return this.isProgramSaved();
      case 'programState':
        return this.programState();
      case 'polyscopeVersion':
        return this.polyscopeVersion();
      case 'powerOn':
        return this.powerOn();
      case 'powerOff':
        return this.powerOff();
      case 'brakeRelease':
        return this.brakeRelease();
      case 'safetyMode':
        return this.safetyMode();
      case 'unlockProtectiveStop':
        return this.unlockProtectiveStop();
      case 'closeSafetyPopup':
        return this.closeSafetyPopup();
      case 'loadInstallation':
        return this.loadInstallation(arg);
    }
  }

  private withArgument(command: string, argument: string, what: string): Promise<string | null> {
    try {
      assertSingleLine(argument, what);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.execute(`${command} ${argument}`);
  }

  private async execute(command: string): Promise<string | null> {
    this.logger.debug('Dashboard command', { command });
    const reply = await this.client.request(`${command}\n`);
    if (reply === null) {
      this.logger.warn('Dashboard command not delivered', { command });
    }
    return reply;
  }
}

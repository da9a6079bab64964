/**
 * A reply line published by the worker loop. Sequence numbers start at 1 and
 * grow by one per published reply, so a waiter can tell a fresh reply from
 * one it has already seen.
 */
export interface PublishedReply {
  sequence: number;
  text: string;
  receivedAt: Date;
}

export const ROBOT_MODES = [
  'NO_CONTROLLER',
  'DISCONNECTED',
  'CONFIRM_SAFETY',
  'BOOTING',
  'POWER_OFF',
  'POWER_ON',
  'IDLE',
  'BACKDRIVE',
  'RUNNING',
] as const;

export type RobotMode = (typeof ROBOT_MODES)[number];

export const SAFETY_MODES = [
  'NORMAL',
  'REDUCED',
  'PROTECTIVE_STOP',
  'RECOVERY',
  'SAFEGUARD_STOP',
  'SYSTEM_EMERGENCY_STOP',
  'ROBOT_EMERGENCY_STOP',
  'VIOLATION',
  'FAULT',
  'AUTOMATIC_MODE_SAFEGUARD_STOP',
  'SYSTEM_THREE_POSITION_ENABLING_STOP',
] as const;

export type SafetyMode = (typeof SAFETY_MODES)[number];

export const PROGRAM_STATES = ['STOPPED', 'PLAYING', 'PAUSED'] as const;

export type ProgramStateName = (typeof PROGRAM_STATES)[number];

export interface ProgramState {
  state: ProgramStateName;
  /** Program file name, null when the controller reports none */
  program: string | null;
}

export interface ProgramSavedStatus {
  saved: boolean;
  program: string | null;
}

function isOneOf<T extends string>(values: readonly T[], candidate: string): candidate is T {
  return values.some((value) => value === candidate);
}

/** Reads the value after a `Label: value` prefix, case-insensitive on the label. */
function valueAfterLabel(reply: string | null, label: string): string | null {
  if (reply === null) return null;
  const trimmed = reply.trim();
  const prefix = `${label.toLowerCase()}:`;
  if (!trimmed.toLowerCase().startsWith(prefix)) return null;
  const value = trimmed.slice(prefix.length).trim();
  return value.length > 0 ? value : null;
}

/**
 * `Robotmode: RUNNING` → `RUNNING`
 */
export function parseRobotMode(reply: string | null): RobotMode | null {
  const value = valueAfterLabel(reply, 'Robotmode');
  if (value === null) return null;
  const mode = value.toUpperCase();
  return isOneOf(ROBOT_MODES, mode) ? mode : null;
}

/**
 * `Safetymode: PROTECTIVE_STOP` → `PROTECTIVE_STOP`
 */
export function parseSafetyMode(reply: string | null): SafetyMode | null {
  const value = valueAfterLabel(reply, 'Safetymode');
  if (value === null) return null;
  const mode = value.toUpperCase();
  return isOneOf(SAFETY_MODES, mode) ? mode : null;
}

/**
 * `PLAYING pick.urp` → `{ state: 'PLAYING', program: 'pick.urp' }`
 */
export function parseProgramState(reply: string | null): ProgramState | null {
  if (reply === null) return null;
  const [head, ...rest] = reply.trim().split(/\s+/);
  const state = (head ?? '').toUpperCase();
  if (!isOneOf(PROGRAM_STATES, state)) return null;
  const program = rest.join(' ');
  return { state, program: program.length > 0 ? program : null };
}

/**
 * `Program running: true` → `true`
 */
export function parseRunning(reply: string | null): boolean | null {
  const value = valueAfterLabel(reply, 'Program running');
  if (value === null) return null;
  const normalized = value.toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return null;
}

/**
 * `true pick.urp` / `false pick.urp`
 */
export function parseProgramSaved(reply: string | null): ProgramSavedStatus | null {
  if (reply === null) return null;
  const [head, ...rest] = reply.trim().split(/\s+/);
  const flag = (head ?? '').toLowerCase();
  if (flag !== 'true' && flag !== 'false') return null;
  const program = rest.join(' ');
  return { saved: flag === 'true', program: program.length > 0 ? program : null };
}

/**
 * `Loaded program: /programs/pick.urp` → `/programs/pick.urp`;
 * `No program loaded` → null
 */
export function parseLoadedProgram(reply: string | null): string | null {
  return valueAfterLabel(reply, 'Loaded program');
}

export function matchesExpectedReply(reply: string | null, expectedPrefix: string): boolean {
  if (reply === null) return false;
  return reply.trim().toLowerCase().startsWith(expectedPrefix.toLowerCase());
}

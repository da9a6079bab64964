/**
 * Connection state of the dashboard link, as driven by the worker loop.
 *
 * DISCONNECTED = no socket (initial, and terminal after close);
 * CONNECTED = socket open, no reply seen yet on it;
 * STARTED = at least one reply received on the current socket;
 * PAUSED = reserved, never entered by the worker loop;
 * ERROR = socket failed, reconnecting or given up.
 */
export type ConnectionState = 'DISCONNECTED' | 'CONNECTED' | 'STARTED' | 'PAUSED' | 'ERROR';

/**
 * Coarse health vocabulary used by the HTTP layer and external watchdogs.
 */
export type ConnectionHealthState = 'CONNECTED' | 'DEGRADED' | 'OFFLINE';

/** Only STARTED counts as running for health checks. */
export function isRunningState(state: ConnectionState): boolean {
  return state === 'STARTED';
}

/** True when the worker holds a socket it can write to. */
export function isConnectedState(state: ConnectionState): boolean {
  return state === 'CONNECTED' || state === 'STARTED';
}

export function toHealthState(state: ConnectionState): ConnectionHealthState {
  switch (state) {
    case 'STARTED':
      return 'CONNECTED';
    case 'CONNECTED':
    case 'PAUSED':
      return 'DEGRADED';
    case 'DISCONNECTED':
    case 'ERROR':
    default:
      return 'OFFLINE';
  }
}

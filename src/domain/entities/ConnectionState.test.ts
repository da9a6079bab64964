import { describe, it, expect } from 'vitest';
import { isConnectedState, isRunningState, toHealthState } from './ConnectionState.js';

describe('ConnectionState', () => {
  it('should count only STARTED as running', () => {
    expect(isRunningState('STARTED')).toBe(true);
    expect(isRunningState('CONNECTED')).toBe(false);
    expect(isRunningState('PAUSED')).toBe(false);
  });

  it('should treat CONNECTED and STARTED as connected', () => {
    expect(isConnectedState('CONNECTED')).toBe(true);
    expect(isConnectedState('STARTED')).toBe(true);
    expect(isConnectedState('ERROR')).toBe(false);
  });

  it('should map onto health states', () => {
    expect(toHealthState('STARTED')).toBe('CONNECTED');
    expect(toHealthState('CONNECTED')).toBe('DEGRADED');
    expect(toHealthState('ERROR')).toBe('OFFLINE');
    expect(toHealthState('DISCONNECTED')).toBe('OFFLINE');
  });
});

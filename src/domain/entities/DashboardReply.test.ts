import { describe, it, expect } from 'vitest';
import {
  matchesExpectedReply,
  parseLoadedProgram,
  parseProgramSaved,
  parseProgramState,
  parseRobotMode,
  parseRunning,
  parseSafetyMode,
} from './DashboardReply.js';

describe('DashboardReply parsers', () => {
  describe('parseRobotMode', () => {
    it('should read the mode after the label', () => {
      expect(parseRobotMode('Robotmode: RUNNING')).toBe('RUNNING');
      expect(parseRobotMode('Robotmode: power_off')).toBe('POWER_OFF');
    });

    it('should return null for other replies', () => {
      expect(parseRobotMode('Safetymode: NORMAL')).toBeNull();
      expect(parseRobotMode('Robotmode: DANCING')).toBeNull();
      expect(parseRobotMode(null)).toBeNull();
    });
  });

  describe('parseSafetyMode', () => {
    it('should read the safety mode', () => {
      expect(parseSafetyMode('Safetymode: PROTECTIVE_STOP')).toBe('PROTECTIVE_STOP');
    });

    it('should reject an empty value', () => {
      expect(parseSafetyMode('Safetymode:')).toBeNull();
    });
  });

  describe('parseProgramState', () => {
    it('should split state and program name', () => {
      expect(parseProgramState('PLAYING pick and place.urp')).toEqual({
        state: 'PLAYING',
        program: 'pick and place.urp',
      });
    });

    it('should allow a missing program name', () => {
      expect(parseProgramState('STOPPED')).toEqual({ state: 'STOPPED', program: null });
    });

    it('should reject unknown states', () => {
      expect(parseProgramState('Starting program')).toBeNull();
    });
  });

  describe('parseRunning', () => {
    it('should read true and false', () => {
      expect(parseRunning('Program running: true')).toBe(true);
      expect(parseRunning('Program running: False')).toBe(false);
    });

    it('should return null for anything else', () => {
      expect(parseRunning('Program running: maybe')).toBeNull();
      expect(parseRunning('Stopped')).toBeNull();
    });
  });

  describe('parseProgramSaved', () => {
    it('should read the flag and the program', () => {
      expect(parseProgramSaved('true pick.urp')).toEqual({ saved: true, program: 'pick.urp' });
      expect(parseProgramSaved('false')).toEqual({ saved: false, program: null });
    });

    it('should reject other replies', () => {
      expect(parseProgramSaved('yes pick.urp')).toBeNull();
    });
  });

  describe('parseLoadedProgram', () => {
    it('should read the loaded path', () => {
      expect(parseLoadedProgram('Loaded program: /programs/pick.urp')).toBe('/programs/pick.urp');
    });

    it('should return null when nothing is loaded', () => {
      expect(parseLoadedProgram('No program loaded')).toBeNull();
    });
  });

  describe('matchesExpectedReply', () => {
    it('should compare prefixes without case', () => {
      expect(matchesExpectedReply('Starting program', 'starting program')).toBe(true);
      expect(matchesExpectedReply('Loading program: /a.urp', 'Loading program')).toBe(true);
      expect(matchesExpectedReply('Failed to execute: play', 'Starting program')).toBe(false);
      expect(matchesExpectedReply(null, 'Starting program')).toBe(false);
    });
  });
});

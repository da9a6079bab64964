import { describe, it, expect } from 'vitest';
import { RESET_STATUS_BITS_PROGRAM, wrapWithStatusBits } from './ScriptProgram.js';

describe('wrapWithStatusBits', () => {
  it('should wrap a bare statement in its own program', () => {
    expect(wrapWithStatusBits('set_digital_out(0, True)')).toBe(
      'def script():\n' +
        '  write_output_boolean_register(0, True)\n' +
        '  set_digital_out(0, True)\n' +
        '  write_output_boolean_register(1, True)\n' +
        'end\n'
    );
  });

  it('should add the bits inside an existing program', () => {
    const program = 'def pick():\n  movej([0, -1.57, 0, -1.57, 0, 0])\nend\n';

    expect(wrapWithStatusBits(program)).toBe(
      'def pick():\n' +
        '  write_output_boolean_register(0, True)\n' +
        '  movej([0, -1.57, 0, -1.57, 0, 0])\n' +
        '  write_output_boolean_register(1, True)\n' +
        'end\n'
    );
  });

  it('should put the finish bit before the end of the main program, not a nested one', () => {
    const program = [
      'def main():',
      '  def helper():',
      '    send_event()',
      '  end',
      '  helper()',
      'end',
      '',
    ].join('\n');

    expect(wrapWithStatusBits(program)).toBe(
      [
        'def main():',
        '  write_output_boolean_register(0, True)',
        '  def helper():',
        '    send_event()',
        '  end',
        '  helper()',
        '  write_output_boolean_register(1, True)',
        'end',
        '',
      ].join('\n')
    );
  });

  it('should reject a program without a header', () => {
    expect(() => wrapWithStatusBits('def broken\nend\n')).toThrow(
      'Script program has no "def name():" header'
    );
  });

  it('should reject a program without a closing end', () => {
    expect(() => wrapWithStatusBits('def open():\n  sleep(1)\n')).toThrow(
      'Script program has no closing "end"'
    );
  });
});

describe('RESET_STATUS_BITS_PROGRAM', () => {
  it('should lower both status bits', () => {
    expect(RESET_STATUS_BITS_PROGRAM).toBe(
      'def resetRegister():\n' +
        '  write_output_boolean_register(0, False)\n' +
        '  write_output_boolean_register(1, False)\n' +
        'end\n'
    );
  });
});

/** Output bit register raised when a wrapped program starts */
export const PROGRAM_STARTED_REGISTER = 0;
/** Output bit register raised when a wrapped program reaches its end */
export const PROGRAM_FINISHED_REGISTER = 1;

const STARTED = `write_output_boolean_register(${PROGRAM_STARTED_REGISTER}, True)`;
const FINISHED = `write_output_boolean_register(${PROGRAM_FINISHED_REGISTER}, True)`;

/** Lowers both status bits again once a wrapped program is done */
export const RESET_STATUS_BITS_PROGRAM = [
  'def resetRegister():',
  `  write_output_boolean_register(${PROGRAM_STARTED_REGISTER}, False)`,
  `  write_output_boolean_register(${PROGRAM_FINISHED_REGISTER}, False)`,
  'end',
  '',
].join('\n');

const DEF_LINE = /^\s*def\s/m;
const DEF_HEADER = /^[^\S\n]*def\s+\w+\([^)\n]*\):[^\S\n]*\n/m;
const END_LINE = /^[^\S\n]*end\b/gm;

/**
 * Adds the status bits to a URScript program so a watcher can tell when it
 * started and finished.
 *
 * A bare statement such as `set_digital_out(0, True)` is wrapped in its own
 * `def script():`. A program that already has a `def` header gets the start
 * bit right after the header and the finish bit just before its last `end`
 * line. Nested functions live inside the main program, so the last `end`
 * closes the main program.
 */
export function wrapWithStatusBits(program: string): string {
  if (!DEF_LINE.test(program)) {
    return `def script():\n  ${STARTED}\n  ${program.trim()}\n  ${FINISHED}\nend\n`;
  }

  const header = DEF_HEADER.exec(program);
  if (!header) {
    throw new TypeError('Script program has no "def name():" header');
  }
  const bodyStart = header.index + header[0].length;
  const started = `${program.slice(0, bodyStart)}  ${STARTED}\n${program.slice(bodyStart)}`;

  let lastEnd = -1;
  for (const match of started.matchAll(END_LINE)) {
    lastEnd = match.index ?? lastEnd;
  }
  if (lastEnd < bodyStart) {
    throw new TypeError('Script program has no closing "end"');
  }

  return `${started.slice(0, lastEnd)}  ${FINISHED}\n${started.slice(lastEnd)}`;
}

/**
 * CLI Result Interpreter
 *
 * The one place a CliResult turns into output plus an exit status.
 */

import type { CliResult } from './types/cli-result.js';
import { toExitStatus } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult, type OutputWriter } from './output-formatter.js';

/**
 * Print the result, then terminate if it is a failure.
 *
 * A success returns normally and the process ends once stdout has drained.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator, writer?: OutputWriter): void {
  printResult(result, writer);

  if (result.kind === 'failure') {
    terminator.terminate(toExitStatus(result.exitCode));
  }
}

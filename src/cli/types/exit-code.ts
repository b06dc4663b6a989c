import type { ExitStatus } from '../../runtime/ports/process-terminator.js';

/**
 * Why a command failed. Commands pick a kind; only {@link toExitStatus} knows the numbers.
 */
export type ExitCode =
  | { kind: 'general_error' } // bad configuration, crashes
  | { kind: 'misuse' } // conflicting or malformed flags
  | { kind: 'data_error' } // malformed base64 input
  | { kind: 'io_error' }; // open/read/write/close failed

/**
 * Shell status for a failure: 1, 2, then sysexits EX_DATAERR (65) and EX_IOERR (74).
 */
export function toExitStatus(exitCode: ExitCode): ExitStatus {
  switch (exitCode.kind) {
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    case 'data_error':
      return 65;
    case 'io_error':
      return 74;
  }
}

/**
 * CLI Result Types
 *
 * What a command hands back to the composition root. Commands never print or exit.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * `output: null` is a quiet success: the data went to stdout and nothing else may.
 */
export type CliResult =
  | { readonly kind: 'success'; readonly output: CliOutput | null }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export interface FailureOptions {
  readonly exitCode?: ExitCode;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export function success(output: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function quietSuccess(): CliResult {
  return { kind: 'success', output: null };
}

/** Defaults to a general error (exit 1). */
export function failure(message: string, options: FailureOptions = {}): CliResult {
  const { exitCode = { kind: 'general_error' }, ...rest } = options;
  return { kind: 'failure', exitCode, output: { message, ...rest } };
}

export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return failure(message, { exitCode: { kind: 'misuse' }, suggestions });
}

/**
 * Decode Command
 *
 * Decodes I2P base64 from a file, an inline string or stdin.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, quietSuccess, misuse } from '../types/cli-result.js';
import type { Logger } from '../../core/logging/types.js';
import type { DecodeOptions } from '../../core/encoding/i2p-decoder.js';
import { decodeStream } from '../../usecases/transcode.js';
import { resolveIoSelection, openPorts, describeInput, type IoFlags, type IoPortFactory } from './io-selection.js';
import { transcodeFailure } from './transcode-failure.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface DecodeCommandDeps extends IoPortFactory {
  readonly logger?: Logger;
}

export interface DecodeCommandOptions extends IoFlags {
  /** Unset falls back to `defaults`. */
  readonly ignoreWhitespace?: boolean;
  readonly allowUnpadded?: boolean;
  /** Modes from the environment. */
  readonly defaults?: DecodeOptions;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeDecodeCommand(
  options: DecodeCommandOptions,
  deps: DecodeCommandDeps
): Promise<CliResult> {
  const selection = resolveIoSelection(options);
  if (selection.isErr()) {
    return misuse(selection.error, ['Run "i2p-base64 decode --help" for usage']);
  }
  const { input, output } = selection.value;

  const decodeOptions = resolveDecodeOptions(options);

  return openPorts(selection.value, deps)
    .andThen((ports) => decodeStream({ ...ports, logger: deps.logger }, decodeOptions))
    .match(
      (summary): CliResult => {
        if (output.kind === 'stdout') return quietSuccess();
        return success({
          message: `Decoded ${describeInput(input)} to ${output.path}`,
          details: [`${summary.bytesIn} characters read`, `${summary.bytesOut} bytes written`],
        });
      },
      (error) => transcodeFailure(error, { direction: 'decode', output })
    );
}

/**
 * Explicit flags win over the environment defaults, in both directions.
 */
export function resolveDecodeOptions(options: DecodeCommandOptions): DecodeOptions {
  const defaults = options.defaults ?? {};
  return {
    whitespace:
      options.ignoreWhitespace === undefined
        ? defaults.whitespace
        : options.ignoreWhitespace
          ? 'ignore'
          : 'reject',
    padding:
      options.allowUnpadded === undefined
        ? defaults.padding
        : options.allowUnpadded
          ? 'optional'
          : 'required',
  };
}

/**
 * Encode Command
 *
 * Encodes a file, an inline string or stdin to I2P base64.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, quietSuccess, misuse } from '../types/cli-result.js';
import type { Logger } from '../../core/logging/types.js';
import { encodeStream } from '../../usecases/transcode.js';
import { resolveIoSelection, openPorts, describeInput, type IoFlags, type IoPortFactory } from './io-selection.js';
import { transcodeFailure } from './transcode-failure.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface EncodeCommandDeps extends IoPortFactory {
  readonly logger?: Logger;
}

export interface EncodeCommandOptions extends IoFlags {
  /** Wrap output lines at this many characters; 0 disables wrapping. */
  readonly wrap: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeEncodeCommand(
  options: EncodeCommandOptions,
  deps: EncodeCommandDeps
): Promise<CliResult> {
  if (!Number.isInteger(options.wrap) || options.wrap < 0) {
    return misuse(`--wrap must be a non-negative integer, got ${options.wrap}`);
  }

  const selection = resolveIoSelection(options);
  if (selection.isErr()) {
    return misuse(selection.error, ['Run "i2p-base64 encode --help" for usage']);
  }
  const { input, output } = selection.value;

  return openPorts(selection.value, deps)
    .andThen((ports) => encodeStream({ ...ports, logger: deps.logger }, { lineWidth: options.wrap }))
    .match(
      (summary): CliResult => {
        // stdout carries the data.
        if (output.kind === 'stdout') return quietSuccess();
        return success({
          message: `Encoded ${describeInput(input)} to ${output.path}`,
          details: [`${summary.bytesIn} bytes read`, `${summary.bytesOut} characters written`],
        });
      },
      (error) => transcodeFailure(error, { direction: 'encode', output })
    );
}

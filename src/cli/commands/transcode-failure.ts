/**
 * Maps codec and I/O errors to CLI failures with hints.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure } from '../types/cli-result.js';
import type { TranscodeError } from '../../usecases/transcode.js';
import type { OutputSelection } from './io-selection.js';
import { assertNever } from '../../runtime/assert-never.js';

const WHITESPACE_SYMBOLS = new Set([' ', '\t', '\n', '\r', '\v', '\f']);

export interface FailureContext {
  readonly direction: 'encode' | 'decode';
  readonly output: OutputSelection;
}

export function transcodeFailure(error: TranscodeError, context: FailureContext): CliResult {
  const warnings =
    context.output.kind === 'file'
      ? [`Partial output may have been written to ${context.output.path}`]
      : undefined;

  switch (error.code) {
    case 'BASE64_INVALID_SYMBOL':
      return failure(`Cannot ${context.direction}: ${error.message}`, {
        exitCode: { kind: 'data_error' },
        details: [`Position: ${error.position}`],
        warnings,
        suggestions: symbolSuggestions(error.symbol),
      });

    case 'BASE64_INVALID_LENGTH':
      return failure(`Cannot ${context.direction}: ${error.message}`, {
        exitCode: { kind: 'data_error' },
        details: [`Significant characters: ${error.length}`],
        warnings,
        suggestions: ['Use --allow-unpadded if the input omits trailing "=" padding'],
      });

    case 'BASE64_INVALID_PADDING':
      return failure(`Cannot ${context.direction}: ${error.message}`, {
        exitCode: { kind: 'data_error' },
        details: [`Position: ${error.position}`],
        warnings,
        suggestions: ['"=" may only end the last group, as "xx==" or "xxx="'],
      });

    case 'IO_NOT_FOUND':
      return failure(`File not found: ${error.target}`, {
        exitCode: { kind: 'io_error' },
        suggestions: ['Check the file path and try again'],
      });

    case 'IO_PERMISSION_DENIED':
      return failure(`Permission denied: ${error.target}`, {
        exitCode: { kind: 'io_error' },
        suggestions: ['Check file permissions and try again'],
      });

    case 'IO_ERROR':
      return failure(`Cannot ${context.direction}: ${error.operation} failed on ${error.target}`, {
        exitCode: { kind: 'io_error' },
        details: [error.message],
        warnings,
      });

    default:
      return assertNever(error);
  }
}

function symbolSuggestions(symbol: string): readonly string[] | undefined {
  if (symbol === '+' || symbol === '/') {
    return ['Standard base64 "+" and "/" are written "-" and "~" in the I2P alphabet'];
  }
  if (WHITESPACE_SYMBOLS.has(symbol)) {
    return ['Use --ignore-whitespace for line-wrapped input'];
  }
  return undefined;
}

/**
 * Input/Output Selection
 *
 * Resolves CLI flags into exactly one input mode and one output mode, and opens
 * the matching ports. Commands never touch fs or process streams directly.
 */

import type { Result, ResultAsync } from 'neverthrow';
import { ok, err, errAsync, okAsync } from 'neverthrow';
import type { ByteSourcePort, ByteSinkPort, IoError } from '../../ports/byte-stream.port.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type InputSelection =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'inline'; readonly text: string }
  | { readonly kind: 'stdin' };

export type OutputSelection =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'stdout' };

export interface IoFlags {
  /** Read from this path (inputIsFile). */
  readonly file?: string;
  /** Use this literal text as input (inputIsInlineString). */
  readonly string?: string;
  /** Write to this path instead of stdout (outputPath). */
  readonly output?: string;
}

export interface IoSelection {
  readonly input: InputSelection;
  readonly output: OutputSelection;
}

export interface IoPortFactory {
  readonly openSource: (input: InputSelection) => ResultAsync<ByteSourcePort, IoError>;
  readonly openSink: (output: OutputSelection) => ResultAsync<ByteSinkPort, IoError>;
}

export interface OpenedPorts {
  readonly source: ByteSourcePort;
  readonly sink: ByteSinkPort;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Resolve flags into one input and one output.
 *
 * @returns the selection, or a usage message when the flags conflict
 */
export function resolveIoSelection(flags: IoFlags): Result<IoSelection, string> {
  if (flags.file !== undefined && flags.string !== undefined) {
    return err('Choose one input: --file and --string cannot be combined');
  }
  if (flags.file === '') return err('--file needs a path');
  if (flags.output === '') return err('--output needs a path');

  const input: InputSelection =
    flags.file !== undefined
      ? { kind: 'file', path: flags.file }
      : flags.string !== undefined
        ? { kind: 'inline', text: flags.string }
        : { kind: 'stdin' };

  const output: OutputSelection =
    flags.output !== undefined ? { kind: 'file', path: flags.output } : { kind: 'stdout' };

  if (input.kind === 'file' && output.kind === 'file' && input.path === output.path) {
    return err(`Input and output are the same file: ${input.path}`);
  }

  return ok({ input, output });
}

/**
 * Open source then sink. If the sink cannot be opened the source is closed again.
 */
export function openPorts(selection: IoSelection, factory: IoPortFactory): ResultAsync<OpenedPorts, IoError> {
  return factory.openSource(selection.input).andThen((source) =>
    factory
      .openSink(selection.output)
      .map((sink): OpenedPorts => ({ source, sink }))
      .orElse((openFailure) =>
        source
          .close()
          .orElse(() => okAsync(undefined))
          .andThen(() => errAsync(openFailure))
      )
  );
}

export function describeInput(input: InputSelection): string {
  switch (input.kind) {
    case 'file':
      return input.path;
    case 'inline':
      return 'inline string';
    case 'stdin':
      return 'stdin';
  }
}

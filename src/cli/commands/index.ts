/**
 * CLI Commands - Public API
 */

export { executeEncodeCommand, type EncodeCommandDeps, type EncodeCommandOptions } from './encode.js';
export { executeDecodeCommand, resolveDecodeOptions, type DecodeCommandDeps, type DecodeCommandOptions } from './decode.js';
export { executeAlphabetCommand } from './alphabet.js';
export {
  resolveIoSelection,
  openPorts,
  describeInput,
  type InputSelection,
  type OutputSelection,
  type IoFlags,
  type IoSelection,
  type IoPortFactory,
  type OpenedPorts,
} from './io-selection.js';
export { transcodeFailure, type FailureContext } from './transcode-failure.js';

/**
 * Node wiring for CLI input/output selections.
 */

import type { Readable, Writable } from 'stream';
import { okAsync } from 'neverthrow';
import type { IoPortFactory } from './commands/io-selection.js';
import type { ByteSourcePort, ByteSinkPort, IoError } from '../ports/byte-stream.port.js';
import { FileByteSource, FileByteSink } from '../infra/local/file/index.js';
import { NodeStreamByteSource, NodeStreamByteSink } from '../infra/local/node-stream/index.js';
import { InMemoryByteSource } from '../infra/local/in-memory/index.js';
import { assertNever } from '../runtime/assert-never.js';

export interface NodeIoOptions {
  readonly chunkSize: number;
  readonly stdin: Readable;
  readonly stdout: Writable;
}

export function createNodeIoPortFactory(options: NodeIoOptions): IoPortFactory {
  return {
    openSource: (input) => {
      switch (input.kind) {
        case 'file':
          return FileByteSource.open(input.path, { chunkSize: options.chunkSize });
        case 'inline':
          return okAsync<ByteSourcePort, IoError>(
            new InMemoryByteSource(input.text, { chunkSize: options.chunkSize, description: 'inline string' })
          );
        case 'stdin':
          return okAsync<ByteSourcePort, IoError>(new NodeStreamByteSource(options.stdin, { description: 'stdin' }));
        default:
          return assertNever(input);
      }
    },

    openSink: (output) => {
      switch (output.kind) {
        case 'file':
          return FileByteSink.open(output.path);
        case 'stdout':
          // stdout belongs to the process; never end it.
          return okAsync<ByteSinkPort, IoError>(new NodeStreamByteSink(options.stdout, { description: 'stdout', endOnClose: false }));
        default:
          return assertNever(output);
      }
    },
  };
}

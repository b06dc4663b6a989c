#!/usr/bin/env node
/**
 * i2p-base64 CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Loads configuration and the logger
 * 2. Wires Node I/O into each command
 * 3. Interprets CliResult into process termination
 *
 * All command logic lives in src/cli/commands/*.ts
 */

import { Command, InvalidArgumentError } from 'commander';

import { loadConfig } from './config/app-config.js';
import { Err, describeAppError } from './errors/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from './core/logging/index.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { printResult } from './cli/output-formatter.js';
import { createNodeIoPortFactory } from './cli/node-io.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeEncodeCommand,
  executeDecodeCommand,
  executeAlphabetCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const terminator: ProcessTerminator = new NodeProcessTerminator();
const bootstrapLogger = createBootstrapLogger('cli');

const configResult = loadConfig({ env: process.env });
if (configResult.isErr()) {
  bootstrapLogger.error({ issues: configResult.error.issues }, 'Configuration invalid');
  const { message, details } = describeAppError(configResult.error);
  printResult(failure(message, { details, suggestions: ['Unset a variable to fall back to its default'] }));
  terminator.terminate(1);
}
const config = configResult.value;

const loggers = new PinoLoggerFactory({ level: config.logging.level });
const io = createNodeIoPortFactory({
  chunkSize: config.io.chunkSize,
  stdin: process.stdin,
  stdout: process.stdout,
});

function parseColumns(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('i2p-base64')
  .description('Encode and decode data with the I2P base64 alphabet (A-Z a-z 0-9 - ~)')
  .version('1.0.0');

program
  .command('encode')
  .description('Encode bytes to I2P base64')
  .option('-f, --file <path>', 'read input from a file instead of stdin')
  .option('-s, --string <text>', 'encode this literal string (UTF-8)')
  .option('-o, --output <path>', 'write output to a file instead of stdout')
  .option('-w, --wrap <columns>', 'wrap output lines at this width, 0 for none', parseColumns)
  .action(async (options: { file?: string; string?: string; output?: string; wrap?: number }) => {
    const result = await executeEncodeCommand(
      { ...options, wrap: options.wrap ?? config.encode.lineWidth },
      { ...io, logger: loggers.create('encode') }
    );

    interpretCliResult(result, terminator);
  });

program
  .command('decode')
  .description('Decode I2P base64 to bytes')
  .option('-f, --file <path>', 'read input from a file instead of stdin')
  .option('-s, --string <text>', 'decode this literal string')
  .option('-o, --output <path>', 'write output to a file instead of stdout')
  .option('--ignore-whitespace', 'skip spaces, tabs and line breaks in the input')
  .option('--no-ignore-whitespace', 'reject whitespace even if I2P_BASE64_IGNORE_WHITESPACE=1')
  .option('--allow-unpadded', 'accept a final group without "=" padding')
  .option('--no-allow-unpadded', 'require padding even if I2P_BASE64_ALLOW_UNPADDED=1')
  .action(
    async (options: {
      file?: string;
      string?: string;
      output?: string;
      ignoreWhitespace?: boolean;
      allowUnpadded?: boolean;
    }) => {
      const result = await executeDecodeCommand(
        {
          file: options.file,
          string: options.string,
          output: options.output,
          ignoreWhitespace: options.ignoreWhitespace,
          allowUnpadded: options.allowUnpadded,
          defaults: config.decode,
        },
        { ...io, logger: loggers.create('decode') }
      );

      interpretCliResult(result, terminator);
    }
  );

program
  .command('alphabet')
  .description('Print the I2P base64 alphabet')
  .action(() => {
    interpretCliResult(executeAlphabetCommand(), terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync(process.argv).catch((e: unknown) => {
  const error = Err.unexpected('Command crashed', e);
  loggers.root.fatal({ err: e }, error.message);
  const { message, details } = describeAppError(error);
  interpretCliResult(failure(message, { details }), terminator);
});

/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import { I2P_BASE64_ALPHABET, I2P_BASE64_PADDING } from '../core/encoding/i2p-alphabet.js';

/**
 * Destination for formatted output. Status and errors go to `err` when stdout carries data.
 */
export interface OutputWriter {
  out(text: string): void;
  err(text: string): void;
}

const consoleWriter: OutputWriter = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(`✅ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/** Empty for a quiet success. */
export function formatResult(result: CliResult): string {
  if (result.output === null) return '';
  return formatOutput(result.output, result.kind === 'failure');
}

/**
 * Print a CliResult: failures to the error stream, successes to the output stream.
 */
export function printResult(result: CliResult, writer: OutputWriter = consoleWriter): void {
  const formatted = formatResult(result);
  if (!formatted) return;

  if (result.kind === 'failure') {
    writer.err(formatted);
  } else {
    writer.out(formatted);
  }
}

/**
 * Alphabet table rows: 16 symbols per row, prefixed with the index range.
 */
export function formatAlphabetRows(): readonly string[] {
  const rows: string[] = [];
  for (let start = 0; start < I2P_BASE64_ALPHABET.length; start += 16) {
    const end = start + 15;
    const range = `${String(start).padStart(2, '0')}-${String(end).padStart(2, '0')}`;
    rows.push(`${chalk.cyan(range)}  ${I2P_BASE64_ALPHABET.slice(start, end + 1)}`);
  }
  rows.push(`${chalk.cyan('pad')}    ${I2P_BASE64_PADDING}`);
  return rows;
}

/**
 * Alphabet Command
 *
 * Prints the I2P base64 symbol table.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { formatAlphabetRows } from '../output-formatter.js';

export function executeAlphabetCommand(): CliResult {
  return success({
    message: 'I2P base64 alphabet (index: symbol)',
    details: formatAlphabetRows(),
    suggestions: ['Index 62 is "-" and index 63 is "~" where standard base64 uses "+" and "/"'],
  });
}

import { describe, it, expect } from 'vitest';
import { Err, describeAppError } from '../../../src/errors/index.js';

describe('describeAppError', () => {
  it('lists each rejected variable', () => {
    const error = Err.configInvalid([
      { variable: 'I2P_BASE64_WRAP', message: 'I2P_BASE64_WRAP cannot be negative' },
      { variable: 'I2P_BASE64_LOG_LEVEL', message: 'Invalid enum value' },
    ]);

    expect(describeAppError(error)).toEqual({
      message: 'Invalid environment configuration',
      details: ['I2P_BASE64_WRAP: I2P_BASE64_WRAP cannot be negative', 'I2P_BASE64_LOG_LEVEL: Invalid enum value'],
    });
  });

  it('renders the cause of unexpected errors', () => {
    expect(describeAppError(Err.unexpected('Command crashed', new TypeError('x is undefined')))).toEqual({
      message: 'Command crashed',
      details: ['Cause: TypeError: x is undefined'],
    });
    expect(describeAppError(Err.unexpected('Command crashed', { code: 7 })).details).toEqual(['Cause: {"code":7}']);
    expect(describeAppError(Err.unexpected('Command crashed', 'plain')).details).toEqual(['Cause: plain']);
  });

  it('falls back to String() for causes JSON cannot render', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    expect(describeAppError(Err.unexpected('Command crashed', cyclic)).details).toEqual(['Cause: [object Object]']);
    expect(describeAppError(Err.unexpected('Command crashed', undefined)).details).toEqual(['Cause: undefined']);
  });
});

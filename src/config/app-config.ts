/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import type { WhitespaceMode, PaddingMode } from '../core/encoding/i2p-decoder.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

/** Read size in bytes; a multiple of 12 so chunks align with both 3-byte and 4-symbol groups. */
export type ChunkSize = Brand<number, 'ChunkSize'>;
export type LineWidth = Brand<number, 'LineWidth'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly io: { readonly chunkSize: ChunkSize };
  readonly encode: { readonly lineWidth: LineWidth };
  readonly decode: {
    readonly whitespace: WhitespaceMode;
    readonly padding: PaddingMode;
  };
}

/** Only {@link loadConfig} produces one. */
export type ValidatedConfig = Brand<AppConfig, 'ValidatedConfig'>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const GROUP_ALIGNMENT = 12;
export const DEFAULT_CHUNK_SIZE = 4 * 1024 * GROUP_ALIGNMENT;
const MAX_CHUNK_SIZE = 16 * 1024 * 1024;

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const EnvSchema = z.object({
  I2P_BASE64_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),

  I2P_BASE64_CHUNK_SIZE: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('I2P_BASE64_CHUNK_SIZE must be an integer')
        .min(GROUP_ALIGNMENT, `I2P_BASE64_CHUNK_SIZE must be >= ${GROUP_ALIGNMENT}`)
        .max(MAX_CHUNK_SIZE, `I2P_BASE64_CHUNK_SIZE cannot exceed ${MAX_CHUNK_SIZE} bytes`)
        .refine((n) => n % GROUP_ALIGNMENT === 0, `I2P_BASE64_CHUNK_SIZE must be a multiple of ${GROUP_ALIGNMENT}`)
        .default(DEFAULT_CHUNK_SIZE)
    ),

  I2P_BASE64_WRAP: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('I2P_BASE64_WRAP must be an integer')
        .min(0, 'I2P_BASE64_WRAP cannot be negative')
        .max(1_000_000, 'I2P_BASE64_WRAP cannot exceed 1000000')
        .default(0)
    ),

  I2P_BASE64_IGNORE_WHITESPACE: z.enum(['0', '1']).default('0'),
  I2P_BASE64_ALLOW_UNPADDED: z.enum(['0', '1']).default('0'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.I2P_BASE64_LOG_LEVEL },
    io: { chunkSize: env.I2P_BASE64_CHUNK_SIZE as ChunkSize },
    encode: { lineWidth: env.I2P_BASE64_WRAP as LineWidth },
    decode: {
      whitespace: env.I2P_BASE64_IGNORE_WHITESPACE === '1' ? 'ignore' : 'reject',
      padding: env.I2P_BASE64_ALLOW_UNPADDED === '1' ? 'optional' : 'required',
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    variable: issue.path.length ? issue.path.join('.') : '(environment)',
    message: issue.message,
  }));
}

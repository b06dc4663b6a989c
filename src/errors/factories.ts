import type { AppError, ConfigIssue, ConfigInvalidError, UnexpectedError } from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    message: 'Invalid environment configuration',
    issues,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

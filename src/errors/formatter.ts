import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Headline plus detail lines for an application error, ready for CLI output.
 */
export function describeAppError(error: AppError): { readonly message: string; readonly details: readonly string[] } {
  switch (error._tag) {
    case 'ConfigInvalid':
      return {
        message: error.message,
        details: error.issues.map((issue) => `${issue.variable}: ${issue.message}`),
      };

    case 'Unexpected':
      return { message: error.message, details: [`Cause: ${describeCause(error.cause)}`] };

    default:
      return assertNever(error);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}

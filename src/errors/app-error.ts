/**
 * Failures outside the codec: the environment could not be parsed, or
 * something threw that nothing expected. Codec and I/O errors live beside the
 * code that produces them.
 */

/** One rejected environment variable. */
export type ConfigIssue = Readonly<{
  variable: string;
  message: string;
}>;

export type ConfigInvalidError = Readonly<{
  _tag: 'ConfigInvalid';
  message: string;
  issues: readonly ConfigIssue[];
}>;

export type UnexpectedError = Readonly<{
  _tag: 'Unexpected';
  message: string;
  cause: unknown;
}>;

export type AppError = ConfigInvalidError | UnexpectedError;

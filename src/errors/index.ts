export type { AppError, ConfigIssue, ConfigInvalidError, UnexpectedError } from './app-error.js';
export { Err } from './factories.js';
export { describeAppError } from './formatter.js';

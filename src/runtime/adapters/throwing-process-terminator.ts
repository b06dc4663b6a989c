import type { ExitStatus, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: records the requested status and throws instead of exiting,
 * so control never returns to the caller (same as a real exit).
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly requested: ExitStatus[] = [];

  terminate(status: ExitStatus): never {
    this.requested.push(status);
    throw new Error(`[ProcessTerminator] terminate(${status})`);
  }
}

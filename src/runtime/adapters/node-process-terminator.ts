import type { ExitStatus, ProcessTerminator } from '../ports/process-terminator.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(status: ExitStatus): never {
    process.exit(status);
  }
}

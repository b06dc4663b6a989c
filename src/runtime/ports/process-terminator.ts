/**
 * Port: end the process with an exit status.
 * Only the composition root (cli.ts) and the result interpreter hold one.
 */
export type ExitStatus = 0 | 1 | 2 | 65 | 74;

export interface ProcessTerminator {
  terminate(status: ExitStatus): never;
}

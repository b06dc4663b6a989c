import type { IoError, IoOperation } from '../../ports/byte-stream.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

/**
 * Classify a Node I/O failure. Only open failures distinguish missing files and
 * permissions; everything else is a generic IO_ERROR tagged with the operation.
 */
export function mapNodeIoError(e: unknown, target: string, operation: IoOperation): IoError {
  const code = nodeErrorCode(e);
  const detail = e instanceof Error ? e.message : String(e);

  if (operation === 'open') {
    if (code === 'ENOENT') return { code: 'IO_NOT_FOUND', message: `Not found: ${target}`, target };
    if (code === 'EACCES' || code === 'EPERM') {
      return { code: 'IO_PERMISSION_DENIED', message: `Permission denied: ${target}`, target };
    }
  }

  return {
    code: 'IO_ERROR',
    message: `I/O error during ${operation} on ${target}: ${detail}`,
    operation,
    target,
  };
}

export function ioError(operation: IoOperation, target: string, message: string): IoError {
  return { code: 'IO_ERROR', message, operation, target };
}

/**
 * Filesystem error helpers.
 */

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** True for ENOENT: the path does not exist (any more) */
export function isFileNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

// Container error types

import { LoadFileError } from '@loadfile/protocol';

/**
 * Error when native bytes cannot be read or the container cannot be written.
 * When this is thrown the destination is left as it was.
 */
export class PackagingIOError extends LoadFileError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('PACKAGING_IO_ERROR', `Packaging failed for ${path}: ${reason}`, { cause });
    this.name = 'PackagingIOError';
    this.path = path;
  }
}

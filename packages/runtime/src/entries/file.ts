// File entry
// An item backed by bytes on disk.

import { createHash } from 'node:crypto';
import { createReadStream, type Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import { lookup } from 'mime-types';
import {
  FILE_FIELDS,
  STANDARD_FIELDS,
  ValidationError,
  type NativeSource,
} from '@loadfile/protocol';
import { PackagingIOError } from '@loadfile/container';
import { Entry, type EntryPlacement } from './entry.js';
import { generateField } from '../fields/factory.js';
import type { EntryField } from '../fields/field.js';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

export type FileEntryOptions = EntryPlacement & {
  /** Looked up from the file extension when omitted */
  mimeType?: string;
};

/**
 * Details read from disk by `load()`
 */
export type FileDetails = {
  stats: Stats;
  sha1: string;
};

/**
 * Guess a MIME type from a file name
 */
export function mimeTypeFor(filePath: string): string {
  return lookup(filePath) || DEFAULT_MIME_TYPE;
}

/**
 * SHA-1 of a file's bytes, as 40 hex characters
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha1');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export class FileEntry extends Entry {
  readonly kind = 'file' as const;
  readonly filePath: string;
  private details: FileDetails | undefined;

  constructor(filePath: string, options: FileEntryOptions = {}) {
    super(options.mimeType ?? mimeTypeFor(filePath), options);
    this.filePath = path.resolve(filePath);
  }

  /**
   * Stat and hash the file. Runs once; later calls reuse the result.
   *
   * @throws PackagingIOError when the file cannot be read
   */
  async load(): Promise<void> {
    if (this.details) return;

    let stats: Stats;
    try {
      stats = await stat(this.filePath);
    } catch (error) {
      throw new PackagingIOError(this.filePath, 'cannot stat native file', error);
    }
    if (!stats.isFile()) {
      throw new PackagingIOError(this.filePath, 'native is not a regular file');
    }

    try {
      this.details = { stats, sha1: await hashFile(this.filePath) };
    } catch (error) {
      throw new PackagingIOError(this.filePath, 'cannot read native file', error);
    }
  }

  get isLoaded(): boolean {
    return this.details !== undefined;
  }

  /**
   * Stat and hash results
   *
   * @throws ValidationError when `load()` has not run yet
   */
  get fileDetails(): FileDetails {
    if (!this.details) {
      throw new ValidationError(
        `File entry ${this.filePath} has not been loaded; add it with addEntry() or call load() first`
      );
    }
    return this.details;
  }

  getName(): string {
    return path.basename(this.filePath);
  }

  /**
   * Files are keyed by their absolute path
   */
  get identifierField(): string | undefined {
    return FILE_FIELDS.PATH_NAME;
  }

  /**
   * Creation time, falling back to the inode change time where the file
   * system records no birth time
   */
  itemDate(): Date | undefined {
    const { stats } = this.fileDetails;
    return stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
  }

  digest(): string {
    return this.fileDetails.sha1;
  }

  native(): NativeSource | undefined {
    return { type: 'file', path: this.filePath };
  }

  /**
   * Last modification time of the native
   */
  get modifiedAt(): Date {
    return this.fileDetails.stats.mtime;
  }

  protected standardFields(): EntryField[] {
    const { stats } = this.fileDetails;
    return [
      generateField(STANDARD_FIELDS.MIME_TYPE, 'Text', this.mimeType),
      generateField(STANDARD_FIELDS.ITEM_DATE, 'DateTime', this.itemDate() ?? null),
      generateField(FILE_FIELDS.PATH_NAME, 'Text', this.filePath),
      generateField(FILE_FIELDS.ACCESSED, 'DateTime', stats.atime),
      generateField(FILE_FIELDS.CREATED, 'DateTime', this.itemDate() ?? null),
      generateField(FILE_FIELDS.MODIFIED, 'DateTime', stats.mtime),
      generateField(FILE_FIELDS.OWNER, 'Text', String(stats.uid)),
      generateField(STANDARD_FIELDS.NAME, 'Text', this.displayName || this.name),
      generateField(STANDARD_FIELDS.DIGEST, 'Text', this.digest()),
      generateField(FILE_FIELDS.SIZE, 'LongInteger', stats.size),
    ];
  }
}

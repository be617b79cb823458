// Container packaging
//
// Writes a staging plan, the manifest and the container properties into one
// ZIP archive. The archive is built in a temporary sibling of the destination
// and renamed into place only once it is complete, so a failed call leaves the
// destination exactly as it was.

import { createHash, randomBytes } from 'node:crypto';
import { constants, createReadStream } from 'node:fs';
import { access, open, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { Zip, ZipDeflate, ZipPassThrough, strToU8, type ZipInputFile } from 'fflate';
import { metadataPath, silentLogger, type StagingPlan } from '@loadfile/protocol';
import { PackagingIOError } from './errors.js';
import type { PackInput, PackOptions, PackSummary } from './types.js';

/**
 * Most members a container can hold: the archive format records the member
 * count in 16 bits
 */
export const MAX_CONTAINER_MEMBERS = 0xffff;

/**
 * Most bytes of natives a container can hold: member sizes and offsets are
 * recorded in 32 bits
 */
export const MAX_CONTAINER_BYTES = 0xffffffff;

const METADATA_MEMBERS = ['MANIFEST', 'PROPERTIES', 'MANIFEST_HASH'] as const;

/**
 * Package a container at `destination`.
 *
 * @throws PackagingIOError when a native cannot be read, the plan does not fit
 *   in one archive or the archive cannot be written
 */
export async function packContainer(
  plan: StagingPlan,
  input: PackInput,
  destination: string,
  options: PackOptions = {}
): Promise<PackSummary> {
  const logger = options.logger ?? silentLogger;
  const packedAt = options.packedAt ?? new Date();
  const target = path.resolve(destination);
  const tempPath = temporarySibling(target);

  logger.info('Packaging container', { destination: target, members: plan.members.length });

  let handle: FileHandle | undefined;
  let currentPath = target;
  let directoryCount = 0;
  let nativeCount = 0;

  try {
    assertPlanFits(plan, target);
    const nativeBytes = await assertSourcesReadable(plan);
    if (nativeBytes > MAX_CONTAINER_BYTES) {
      throw new PackagingIOError(
        target,
        `natives total ${nativeBytes} bytes; a container holds at most ${MAX_CONTAINER_BYTES}`
      );
    }

    handle = await open(tempPath, 'wx');
    const archive = new ArchiveStream(handle);

    for (const member of plan.members) {
      if (member.kind === 'directory') {
        await archive.addDirectory(member.archivePath, packedAt);
        directoryCount++;
        continue;
      }

      const mtime = member.modifiedAt ?? packedAt;
      if (member.source.type === 'file') {
        currentPath = member.source.path;
        await archive.addFile(member.archivePath, member.source.path, mtime);
        currentPath = target;
      } else {
        await archive.addBytes(member.archivePath, strToU8(member.source.content), mtime);
      }
      nativeCount++;
    }

    const manifestDigest = createHash('sha1').update(input.manifestXml, 'utf8').digest();
    await archive.addBytes(metadataPath('MANIFEST'), strToU8(input.manifestXml), packedAt);
    await archive.addBytes(metadataPath('PROPERTIES'), strToU8(input.propertiesXml), packedAt);
    await archive.addBytes(metadataPath('MANIFEST_HASH'), new Uint8Array(manifestDigest), packedAt);

    await archive.finish();
    await handle.close();
    handle = undefined;
    await rename(tempPath, target);

    const summary: PackSummary = {
      destination: target,
      directoryCount,
      nativeCount,
      entryCount: archive.entryCount,
      bytesWritten: archive.bytesWritten,
      manifestHash: manifestDigest.toString('hex'),
      packedAt: packedAt.toISOString(),
    };
    logger.info('Container written', { ...summary });
    return summary;
  } catch (error) {
    if (handle) {
      await handle.close().catch((closeError: unknown) => {
        logger.warn('Could not close partial archive', { reason: describe(closeError) });
      });
    }
    await rm(tempPath, { force: true });

    const failure =
      error instanceof PackagingIOError
        ? error
        : new PackagingIOError(currentPath, describe(error), error);
    logger.error('Packaging failed', { path: failure.path, reason: describe(error) });
    throw failure;
  }
}

/**
 * ZIP output streamed into an open file. fflate emits compressed chunks
 * synchronously as data is pushed; each add drains them to disk before
 * reading more input.
 */
class ArchiveStream {
  private readonly zip: Zip;
  private readonly pending: Uint8Array[] = [];
  private failure: Error | undefined;
  entryCount = 0;
  bytesWritten = 0;

  constructor(private readonly handle: FileHandle) {
    this.zip = new Zip((error, chunk) => {
      if (error) {
        this.failure = error;
        return;
      }
      this.pending.push(chunk);
    });
  }

  async addDirectory(name: string, mtime: Date): Promise<void> {
    const entry = this.open(new ZipPassThrough(`${name}/`), mtime);
    entry.push(new Uint8Array(0), true);
    await this.drain();
  }

  async addBytes(name: string, data: Uint8Array, mtime: Date): Promise<void> {
    const entry = this.open(new ZipDeflate(name, { level: 6 }), mtime);
    entry.push(data, true);
    await this.drain();
  }

  async addFile(name: string, filePath: string, mtime: Date): Promise<void> {
    const entry = this.open(new ZipDeflate(name, { level: 6 }), mtime);
    for await (const chunk of createReadStream(filePath)) {
      const bytes: Uint8Array = chunk;
      entry.push(bytes);
      await this.drain();
    }
    entry.push(new Uint8Array(0), true);
    await this.drain();
  }

  async finish(): Promise<void> {
    this.zip.end();
    await this.drain();
  }

  private open<T extends ZipInputFile>(entry: T, mtime: Date): T {
    entry.mtime = zipTimestamp(mtime);
    this.zip.add(entry);
    this.entryCount++;
    return entry;
  }

  private async drain(): Promise<void> {
    if (this.failure) throw this.failure;
    for (let index = 0; index < this.pending.length; index++) {
      const chunk = this.pending[index];
      let offset = 0;
      while (offset < chunk.length) {
        const { bytesWritten } = await this.handle.write(chunk, offset, chunk.length - offset);
        offset += bytesWritten;
      }
      this.bytesWritten += chunk.length;
    }
    this.pending.length = 0;
  }
}

/**
 * Reject plans that cannot become one archive before anything is written
 */
function assertPlanFits(plan: StagingPlan, target: string): void {
  const memberCount = plan.members.length + METADATA_MEMBERS.length;
  if (memberCount > MAX_CONTAINER_MEMBERS) {
    throw new PackagingIOError(
      target,
      `container would hold ${memberCount} members; at most ${MAX_CONTAINER_MEMBERS} fit`
    );
  }

  const names = new Set<string>(METADATA_MEMBERS.map((file) => metadataPath(file)));
  for (const member of plan.members) {
    const name = member.kind === 'directory' ? `${member.archivePath}/` : member.archivePath;
    if (names.has(name)) {
      throw new PackagingIOError(target, `duplicate archive path "${name}"`);
    }
    names.add(name);
  }
}

/**
 * Check that every native read from disk is readable before anything is
 * written. Returns the total size of the natives.
 */
async function assertSourcesReadable(plan: StagingPlan): Promise<number> {
  let total = 0;
  for (const member of plan.members) {
    if (member.kind !== 'native') continue;
    if (member.source.type === 'text') {
      total += Buffer.byteLength(member.source.content, 'utf8');
      continue;
    }
    try {
      await access(member.source.path, constants.R_OK);
      total += (await stat(member.source.path)).size;
    } catch (error) {
      throw new PackagingIOError(member.source.path, 'native source is not readable', error);
    }
  }
  return total;
}

/**
 * Member times must fall in the range an archive can record (1980 to 2099)
 */
function zipTimestamp(date: Date): Date {
  const year = date.getFullYear();
  if (year < 1980) return new Date(1980, 0, 1);
  if (year > 2099) return new Date(2099, 11, 31, 23, 59, 58);
  return date;
}

function temporarySibling(target: string): string {
  const suffix = randomBytes(6).toString('hex');
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.partial`);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

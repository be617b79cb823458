// Entry types shared between the runtime and the container packager

import type { Id } from './common.js';

/**
 * Tag used to dispatch on the three base entry variants.
 *
 * - `file`: backed by bytes on disk (plain files, CSV and JSON sources)
 * - `directory`: a pure container level with no bytes of its own
 * - `mapping`: a key/value record whose generated text becomes its native
 */
export type EntryKind = 'file' | 'directory' | 'mapping';

/**
 * Where the bytes of an entry's native come from when it is packaged
 */
export type NativeSource =
  | { type: 'file'; path: string }
  | { type: 'text'; content: string };

/**
 * One member of the container's native tree, computed before anything is written
 */
export type StagedMember =
  | {
      kind: 'directory';
      entryId: Id;
      archivePath: string;
    }
  | {
      kind: 'native';
      entryId: Id;
      archivePath: string;
      source: NativeSource;
      modifiedAt?: Date;
    };

/**
 * The full staging plan for a container: members in manifest order
 */
export type StagingPlan = {
  members: StagedMember[];
};

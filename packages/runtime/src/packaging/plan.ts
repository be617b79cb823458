// Container layout
//
// Decides where every entry lands inside the container before anything is
// written. An entry's archive path is its sanitized name wrapped, nearest
// first, by each ancestor's addAsParentPath contribution.

import {
  joinArchivePath,
  type Id,
  type StagedMember,
  type StagingPlan,
} from '@loadfile/protocol';
import { FileEntry } from '../entries/file.js';
import { ancestors, depthFirst, type EntryTree } from '../builder/tree.js';

export type ContainerLayout = {
  plan: StagingPlan;
  /** Archive path of every entry that has a member in the container */
  paths: ReadonlyMap<Id, string>;
};

/**
 * Compute the staging plan for a resolved tree.
 *
 * Directory entries become directory members; entries with native bytes
 * become file members. A native whose path is already taken, or is needed
 * as a directory by another member, gets `~` and the first 8 characters of
 * its id appended. Same-named directories share one member.
 */
export function planContainer(tree: EntryTree): ContainerLayout {
  const candidates: Array<{ id: Id; path: string }> = [];
  const directoryPaths = new Set<string>();

  for (const id of depthFirst(tree)) {
    const entry = tree.entries.get(id);
    if (!entry) continue;
    if (entry.kind !== 'directory' && !entry.native()) continue;

    const path = archivePathOf(tree, id);
    candidates.push({ id, path });
    if (entry.kind === 'directory') {
      directoryPaths.add(path);
    }
    for (const prefix of parentDirectories(path)) {
      directoryPaths.add(prefix);
    }
  }

  const members: StagedMember[] = [];
  const paths = new Map<Id, string>();
  const taken = new Set<string>();

  for (const { id, path } of candidates) {
    const entry = tree.entries.get(id);
    if (!entry) continue;

    if (entry.kind === 'directory') {
      paths.set(id, path);
      if (!taken.has(path)) {
        taken.add(path);
        members.push({ kind: 'directory', entryId: id, archivePath: path });
      }
      continue;
    }

    const source = entry.native();
    if (!source) continue;

    const finalPath =
      taken.has(path) || directoryPaths.has(path) ? `${path}~${id.slice(0, 8)}` : path;
    taken.add(finalPath);
    paths.set(id, finalPath);
    members.push({
      kind: 'native',
      entryId: id,
      archivePath: finalPath,
      source,
      modifiedAt: entry instanceof FileEntry ? entry.modifiedAt : undefined,
    });
  }

  return { plan: { members }, paths };
}

/**
 * Path of an entry relative to the container root, before collision handling
 */
export function archivePathOf(tree: EntryTree, id: Id): string {
  const entry = tree.entries.get(id);
  if (!entry) return '';

  let path = entry.name;
  for (const ancestorId of ancestors(tree, id)) {
    const ancestor = tree.entries.get(ancestorId);
    if (ancestor) {
      path = ancestor.addAsParentPath(path);
    }
  }
  return joinArchivePath(path);
}

function parentDirectories(path: string): string[] {
  const segments = path.split('/');
  const prefixes: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    prefixes.push(segments.slice(0, i).join('/'));
  }
  return prefixes;
}

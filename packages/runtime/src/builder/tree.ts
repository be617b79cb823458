// Tree assembly
//
// Resolves parent ids and parent keys of registered entries into one forest
// and checks it: every parent must exist and no entry may be its own ancestor.

import type { Id } from '@loadfile/protocol';
import type { Entry } from '../entries/entry.js';
import { CyclicParentReferenceError, DanglingParentReferenceError } from '../errors.js';

export type EntryTree = {
  /** Every entry by id, in registration order */
  entries: ReadonlyMap<Id, Entry>;
  /** Ids of entries without a parent, in registration order */
  roots: Id[];
  /** Resolved parent of every non-root entry */
  parents: ReadonlyMap<Id, Id>;
  /** Children of every entry that has any, in registration order */
  children: ReadonlyMap<Id, Id[]>;
};

/**
 * Index entries by the value of their identifier field. The first entry
 * registered with a key wins.
 */
export function buildKeyIndex(entries: ReadonlyMap<Id, Entry>): Map<string, Id> {
  const index = new Map<string, Id>();
  for (const [id, entry] of entries) {
    const keyField = entry.identifierField;
    if (keyField === undefined) continue;
    const field = entry.getField(keyField);
    if (!field || field.isEmpty) continue;
    const key = field.render();
    if (!index.has(key)) {
      index.set(key, id);
    }
  }
  return index;
}

/**
 * Parent of an entry, or undefined when it is a root or the reference does not resolve
 */
export function lookupParent(
  entry: Entry,
  entries: ReadonlyMap<Id, Entry>,
  keyIndex: ReadonlyMap<string, Id>
): Id | undefined {
  if (entry.parentId !== undefined) {
    return entries.has(entry.parentId) ? entry.parentId : undefined;
  }
  if (entry.parentKey !== undefined) {
    return keyIndex.get(entry.parentKey);
  }
  return undefined;
}

/**
 * Resolve and validate the parent links of all entries.
 *
 * @throws DanglingParentReferenceError when a parent id or key does not resolve
 * @throws CyclicParentReferenceError when an entry is its own ancestor
 */
export function resolveTree(entries: ReadonlyMap<Id, Entry>): EntryTree {
  const keyIndex = buildKeyIndex(entries);
  const roots: Id[] = [];
  const parents = new Map<Id, Id>();
  const children = new Map<Id, Id[]>();

  for (const [id, entry] of entries) {
    if (entry.parentId === undefined && entry.parentKey === undefined) {
      roots.push(id);
      continue;
    }

    const parentId = lookupParent(entry, entries, keyIndex);
    if (parentId === undefined) {
      const reference =
        entry.parentId !== undefined ? entry.parentId : `with key "${entry.parentKey ?? ''}"`;
      throw new DanglingParentReferenceError(id, reference);
    }
    if (parentId === id) {
      throw new CyclicParentReferenceError(id, [id, id]);
    }

    parents.set(id, parentId);
    const siblings = children.get(parentId);
    if (siblings) {
      siblings.push(id);
    } else {
      children.set(parentId, [id]);
    }
  }

  assertAcyclic(entries, parents);
  return { entries, roots, parents, children };
}

/**
 * Entries in manifest order: roots in registration order, each followed
 * depth-first by its descendants
 */
export function depthFirst(tree: EntryTree): Id[] {
  const order: Id[] = [];
  const stack = [...tree.roots].reverse();

  for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
    order.push(id);
    const children = tree.children.get(id) ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return order;
}

/**
 * Ancestors of an entry, nearest first
 */
export function ancestors(tree: EntryTree, id: Id): Id[] {
  const chain: Id[] = [];
  for (let parent = tree.parents.get(id); parent !== undefined; parent = tree.parents.get(parent)) {
    chain.push(parent);
  }
  return chain;
}

function assertAcyclic(entries: ReadonlyMap<Id, Entry>, parents: ReadonlyMap<Id, Id>): void {
  const settled = new Set<Id>();

  for (const start of entries.keys()) {
    const path: Id[] = [];
    const onPath = new Set<Id>();

    for (let id: Id | undefined = start; id !== undefined && !settled.has(id); id = parents.get(id)) {
      if (onPath.has(id)) {
        const cycle = [...path.slice(path.indexOf(id)), id];
        throw new CyclicParentReferenceError(id, cycle);
      }
      onPath.add(id);
      path.push(id);
    }

    for (const id of path) {
      settled.add(id);
    }
  }
}

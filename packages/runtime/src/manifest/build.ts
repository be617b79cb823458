// Manifest builder
//
// Walks a resolved tree depth-first and produces the manifest document model:
// one record per entry, field definitions keyed per manifest, container
// relationships and the folder structure.

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  encodeArchiveUri,
  formatTimestamp,
  splitArchivePath,
  type Id,
  type LoadFileConfig,
  type ManifestDocument,
  type ManifestFieldDefinition,
  type ManifestFolder,
  type ManifestNativeFile,
  type ManifestRecord,
  type ManifestRelationship,
  type ManifestTarget,
} from '@loadfile/protocol';
import type { Entry } from '../entries/entry.js';
import { depthFirst, type EntryTree } from '../builder/tree.js';
import type { ContainerLayout } from '../packaging/plan.js';

export type ManifestBuildOptions = {
  target: ManifestTarget;
  config: LoadFileConfig;
  /** Required for the container target */
  layout?: ContainerLayout;
};

/**
 * Build the manifest model for a resolved tree
 */
export function buildManifestDocument(
  tree: EntryTree,
  options: ManifestBuildOptions
): ManifestDocument {
  const { target, config, layout } = options;
  const definitions = new Map<string, ManifestFieldDefinition>();
  const records: ManifestRecord[] = [];
  const relationships: ManifestRelationship[] = [];

  for (const id of depthFirst(tree)) {
    const entry = tree.entries.get(id);
    if (!entry) continue;

    const fields = entry.fields().map((field) => {
      let definition = definitions.get(field.name);
      if (!definition) {
        definition = { name: field.name, dataType: field.dataType, key: `field_${definitions.size}` };
        definitions.set(field.name, definition);
      }
      return { name: field.name, key: definition.key, value: field.render() };
    });

    const parentId = tree.parents.get(id);
    const itemDate = entry.itemDate();
    const record: ManifestRecord = {
      id,
      parentId,
      name: entry.name,
      text: entry.text(),
      itemDate: itemDate ? formatTimestamp(itemDate) : undefined,
      digest: entry.digest(),
      mimeType: entry.mimeType,
      fields,
      ...locate(entry, id, target, layout),
    };
    records.push(record);

    if (parentId !== undefined) {
      relationships.push({ parentId, childId: id });
    }
  }

  return {
    target,
    header: {
      majorVersion: '1',
      minorVersion: '2',
      description: config.description,
      locale: config.locale,
      dataInterchangeType: 'Update',
    },
    custodian: config.custodian,
    fieldDefinitions: Array.from(definitions.values()),
    records,
    relationships,
    folders: buildFolders(tree),
  };
}

/**
 * Native file reference and location URI of one entry
 */
function locate(
  entry: Entry,
  id: Id,
  target: ManifestTarget,
  layout: ContainerLayout | undefined
): Pick<ManifestRecord, 'native' | 'locationUri'> {
  if (target === 'container') {
    const archivePath = layout?.paths.get(id);
    if (archivePath === undefined) return {};

    const source = entry.native();
    let native: ManifestNativeFile | undefined;
    if (source && entry.kind !== 'directory') {
      const { dir, base } = splitArchivePath(archivePath);
      native = { filePath: dir, fileName: base, hash: entry.digest(), hashType: 'SHA1' };
    }
    return { native, locationUri: encodeArchiveUri(archivePath) };
  }

  const source = entry.native();
  if (!source || source.type !== 'file') return {};
  return {
    native: {
      filePath: path.dirname(source.path),
      fileName: path.basename(source.path),
      hash: entry.digest(),
      hashType: 'SHA1',
    },
    locationUri: pathToFileURL(source.path).href,
  };
}

/**
 * One folder per root that has children, each listing its children and
 * nesting a folder for every child that has children of its own
 */
function buildFolders(tree: EntryTree): ManifestFolder[] {
  const folders: ManifestFolder[] = [];
  const pending: Array<{ id: Id; folder: ManifestFolder }> = [];

  for (const root of tree.roots) {
    if (!tree.children.has(root)) continue;
    const folder: ManifestFolder = { name: root, members: [] };
    folders.push(folder);
    pending.push({ id: root, folder });
  }

  for (let next = pending.pop(); next; next = pending.pop()) {
    for (const childId of tree.children.get(next.id) ?? []) {
      if (tree.children.has(childId)) {
        const folder: ManifestFolder = { name: childId, members: [] };
        next.folder.members.push({ documentId: childId, folder });
        pending.push({ id: childId, folder });
      } else {
        next.folder.members.push({ documentId: childId });
      }
    }
  }

  return folders;
}

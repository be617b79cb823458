// Load file builder
//
// Collects entries, assigns their ids and turns the finished session into an
// EDRM manifest, a standalone load file or a packaged container.

import { createHash } from 'node:crypto';
import * as path from 'node:path';
import {
  consoleLogger,
  resolveConfig,
  type BuildLogger,
  type FieldPairs,
  type FieldRecord,
  type Id,
  type LoadFileConfig,
  type LoadFileConfigInput,
  type ManifestDocument,
  type ManifestTarget,
} from '@loadfile/protocol';
import {
  createFilesystemWriter,
  packContainer,
  type ContainerWriter,
  type PackSummary,
} from '@loadfile/container';
import type { Entry, EntryRegistrar } from '../entries/entry.js';
import { FileEntry } from '../entries/file.js';
import { DirectoryEntry } from '../entries/directory.js';
import { MappingEntry } from '../entries/mapping.js';
import { buildKeyIndex, lookupParent, resolveTree, type EntryTree } from './tree.js';
import { planContainer, type ContainerLayout } from '../packaging/plan.js';
import { buildManifestDocument } from '../manifest/build.js';
import { renderManifest } from '../manifest/render.js';
import { renderContainerProperties } from '../manifest/properties.js';

export type LoadFileBuilderOptions = {
  config?: LoadFileConfigInput;
  logger?: BuildLogger;
  /** Destination for standalone load files (defaults to the local filesystem) */
  writer?: ContainerWriter;
  /** Clock used for container properties */
  now?: () => Date;
};

/**
 * Builds one load file or container from the entries added to it.
 *
 * A session is write-once: entries are never removed and each entry object
 * registers exactly once. Registration assigns ids from a running sequence,
 * so one builder must not be fed from several async flows at the same time
 * without sequencing them; await each add before starting the next.
 */
export class LoadFileBuilder implements EntryRegistrar {
  readonly config: LoadFileConfig;
  readonly logger: BuildLogger;
  private readonly writer: ContainerWriter;
  private readonly now: () => Date;
  private readonly registry = new Map<Id, Entry>();
  private sequence = 0;

  constructor(options: LoadFileBuilderOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? consoleLogger;
    this.writer = options.writer ?? createFilesystemWriter();
    this.now = options.now ?? (() => new Date());
  }

  // --- Registration ---

  /**
   * Register one entry without expanding it.
   * The id is the SHA-1 of the registration sequence number, the parent id
   * and the sanitized name.
   *
   * @throws EntryAlreadyRegisteredError when the entry already has an id
   */
  register(entry: Entry): Id {
    const sequence = this.sequence++;
    const id = createHash('sha1')
      .update(`${sequence}\u0000${entry.parentId ?? ''}\u0000${entry.sanitizedName}`, 'utf8')
      .digest('hex');

    entry.bind(id, { config: this.config, logger: this.logger });
    this.registry.set(id, entry);

    this.logger.debug('Registered entry', {
      id,
      kind: entry.kind,
      name: entry.name,
      parentId: entry.parentId,
    });
    return id;
  }

  /**
   * Register any entry; composites expand into their children
   */
  async addEntry(entry: Entry): Promise<Id> {
    return entry.addToBuilder(this);
  }

  /**
   * Add a file from disk. The MIME type is guessed from the extension when omitted.
   */
  async addFile(filePath: string, mimeType?: string, parentId?: Id): Promise<Id> {
    return this.addEntry(new FileEntry(filePath, { mimeType, parentId }));
  }

  /**
   * Add a directory level, named directly or by a record whose `Name`
   * (or first) value is the label
   */
  async addDirectory(
    nameOrFields: string | FieldRecord | FieldPairs,
    parentId?: Id
  ): Promise<Id> {
    return this.addEntry(new DirectoryEntry(nameOrFields, { parentId }));
  }

  /**
   * Add a key/value record. Pass pairs to keep integer-like keys where the
   * source put them.
   */
  async addMapping(fields: FieldRecord | FieldPairs, mimeType: string, parentId?: Id): Promise<Id> {
    return this.addEntry(new MappingEntry(fields, { mimeType, parentId }));
  }

  // --- Queries ---

  get(id: Id): Entry | undefined {
    return this.registry.get(id);
  }

  /**
   * All entries in registration order
   */
  entries(): Entry[] {
    return Array.from(this.registry.values());
  }

  get size(): number {
    return this.registry.size;
  }

  /**
   * Children of an entry in registration order. References that do not
   * resolve yet are skipped.
   */
  children(id: Id): Entry[] {
    const keyIndex = buildKeyIndex(this.registry);
    return this.entries().filter((entry) => lookupParent(entry, this.registry, keyIndex) === id);
  }

  /**
   * Entry whose identifier field holds `key`
   */
  findByKey(key: string): Entry | undefined {
    const id = buildKeyIndex(this.registry).get(key);
    return id === undefined ? undefined : this.registry.get(id);
  }

  // --- Finalize ---

  /**
   * Refresh standard fields, then resolve and validate the tree.
   *
   * @throws DanglingParentReferenceError
   * @throws CyclicParentReferenceError
   */
  buildTree(): EntryTree {
    for (const entry of this.registry.values()) {
      entry.refreshStandardFields();
    }
    return resolveTree(this.registry);
  }

  /**
   * Build the manifest model for a target
   */
  buildManifest(target: ManifestTarget): ManifestDocument {
    const tree = this.buildTree();
    const layout = target === 'container' ? planContainer(tree) : undefined;
    return this.manifestFor(tree, target, layout);
  }

  /**
   * Build and serialize the manifest for a target
   */
  renderManifest(target: ManifestTarget): string {
    return renderManifest(this.buildManifest(target));
  }

  /**
   * Write a standalone EDRM load file that points at the natives where they
   * are on disk. Returns the absolute output path.
   */
  async saveLoadFile(outputPath: string): Promise<string> {
    const target = path.resolve(outputPath);
    const xml = this.renderManifest('standalone');
    await this.writer.writeFile(target, xml);
    this.logger.info('Load file written', { path: target, entries: this.registry.size });
    return target;
  }

  /**
   * Package every entry into a container at `destinationPath`. Either a
   * complete container is written or the call fails and the destination is
   * left as it was.
   *
   * @throws DanglingParentReferenceError
   * @throws CyclicParentReferenceError
   * @throws PackagingIOError
   */
  async save(destinationPath: string): Promise<PackSummary> {
    const tree = this.buildTree();
    const layout = planContainer(tree);
    const manifestXml = renderManifest(this.manifestFor(tree, 'container', layout));
    const propertiesXml = renderContainerProperties(this.config, this.now());

    return packContainer(layout.plan, { manifestXml, propertiesXml }, destinationPath, {
      logger: this.logger,
    });
  }

  private manifestFor(
    tree: EntryTree,
    target: ManifestTarget,
    layout: ContainerLayout | undefined
  ): ManifestDocument {
    const document = buildManifestDocument(tree, { target, config: this.config, layout });
    this.logger.info('Manifest built', {
      target,
      documents: document.records.length,
      fields: document.fieldDefinitions.length,
      relationships: document.relationships.length,
    });
    return document;
  }
}

/**
 * Create a builder for one load file session
 */
export function createLoadFileBuilder(options: LoadFileBuilderOptions = {}): LoadFileBuilder {
  return new LoadFileBuilder(options);
}

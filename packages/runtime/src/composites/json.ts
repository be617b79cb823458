// JSON composite
//
// A JSON file registers itself and then expands its document breadth-first
// through a work queue: every object and array becomes a mapping entry whose
// scalar members are fields and whose nested objects and arrays become child
// entries. A scalar document becomes a single value entry. Members keep the
// order they have in the file, integer-like keys included.

import { readFile } from 'node:fs/promises';
import {
  getNodeValue,
  parseTree,
  printParseErrorCode,
  type Node as SyntaxNode,
  type ParseError,
} from 'jsonc-parser';
import { prefixPath, type FieldPairs, type FieldInput, type Id } from '@loadfile/protocol';
import { PackagingIOError } from '@loadfile/container';
import { FileEntry, type FileEntryOptions } from '../entries/file.js';
import { MappingEntry, type MappingEntryOptions } from '../entries/mapping.js';
import type { Entry, EntryRegistrar } from '../entries/entry.js';
import { MalformedSourceDocumentError } from '../errors.js';

export const JSON_MIME_TYPE = 'application/json';
export const JSON_VALUE_MIME_TYPE = 'application/x-json-value';
export const JSON_ARRAY_MIME_TYPE = 'application/x-json-array';
export const JSON_OBJECT_MIME_TYPE = 'application/x-json-object';

export const JSON_ROOT_NAMES = {
  OBJECT: 'JSON Object',
  ARRAY: 'JSON Array',
  VALUE: 'JSON Value',
} as const;

/** Field name used by value entries */
export const JSON_VALUE_FIELD = 'Value';

export type JsonScalar = string | number | boolean | null;

/**
 * A parsed JSON document with object members in file order. A key repeated
 * within one object keeps its first position and its last value.
 */
export type JsonNode =
  | { type: 'scalar'; value: JsonScalar }
  | { type: 'array'; items: JsonNode[] }
  | { type: 'object'; members: Array<[string, JsonNode]> };

// --- Structural entries ---

type StructuralOptions = Omit<MappingEntryOptions, 'name'>;

/**
 * A scalar JSON document: one field holding the scalar
 */
export class JsonValueEntry extends MappingEntry {
  readonly scalar: JsonScalar;

  constructor(name: string, key: string, value: JsonScalar, options: StructuralOptions = {}) {
    super(
      { [key]: value },
      { ...options, name, mimeType: options.mimeType ?? JSON_VALUE_MIME_TYPE }
    );
    this.scalar = value;
  }

  text(): string {
    if (this.overrides.text) return this.overrides.text(this);
    return scalarText(this.scalar);
  }
}

/**
 * A JSON array: scalar elements are fields named by index
 */
export class JsonArrayEntry extends MappingEntry {
  private readonly scalars: FieldInput[];

  constructor(name: string, scalars: FieldPairs, options: StructuralOptions = {}) {
    super(scalars, { ...options, name, mimeType: options.mimeType ?? JSON_ARRAY_MIME_TYPE });
    this.scalars = scalars.map(([, value]) => value);
  }

  /**
   * Scalar elements joined with ", ", nested values left out
   */
  text(): string {
    if (this.overrides.text) return this.overrides.text(this);
    return this.scalars
      .map((value) => (value === undefined ? '' : scalarText(value)))
      .join(', ');
  }

  addAsParentPath(existingPath: string): string {
    if (this.overrides.addAsParentPath) return this.overrides.addAsParentPath(this, existingPath);
    return prefixPath(this.name, existingPath);
  }
}

/**
 * A JSON object: scalar members are fields named by key
 */
export class JsonObjectEntry extends MappingEntry {
  constructor(name: string, scalars: FieldPairs, options: StructuralOptions = {}) {
    super(scalars, { ...options, name, mimeType: options.mimeType ?? JSON_OBJECT_MIME_TYPE });
  }

  addAsParentPath(existingPath: string): string {
    if (this.overrides.addAsParentPath) return this.overrides.addAsParentPath(this, existingPath);
    return prefixPath(this.name, existingPath);
  }
}

/**
 * Constructors for the structural entries; replace any of them to customize
 * how JSON nodes become entries
 */
export type JsonEntryFactories = {
  value: (name: string, key: string, value: JsonScalar, parentId: Id) => Entry;
  array: (name: string, scalars: FieldPairs, parentId: Id) => Entry;
  object: (name: string, scalars: FieldPairs, parentId: Id) => Entry;
};

export const defaultJsonEntryFactories: JsonEntryFactories = {
  value: (name, key, value, parentId) => new JsonValueEntry(name, key, value, { parentId }),
  array: (name, scalars, parentId) => new JsonArrayEntry(name, scalars, { parentId }),
  object: (name, scalars, parentId) => new JsonObjectEntry(name, scalars, { parentId }),
};

// --- File entry ---

export type JsonFileEntryOptions = FileEntryOptions & {
  factories?: Partial<JsonEntryFactories>;
};

type ContainerNode = Exclude<JsonNode, { type: 'scalar' }>;

type PendingNode = {
  name: string;
  node: ContainerNode;
  parentId: Id;
};

export class JsonFileEntry extends FileEntry {
  private readonly factories: JsonEntryFactories;
  private parsed: { tree: JsonNode; document: unknown } | undefined;

  constructor(filePath: string, options: JsonFileEntryOptions = {}) {
    super(filePath, { ...options, mimeType: options.mimeType ?? JSON_MIME_TYPE });
    this.factories = { ...defaultJsonEntryFactories, ...options.factories };
  }

  /**
   * Stat, hash and parse the file.
   *
   * @throws MalformedSourceDocumentError when the file is not valid JSON
   */
  async load(): Promise<void> {
    await super.load();
    if (this.parsed) return;

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new PackagingIOError(this.filePath, 'cannot read JSON file', error);
    }

    const errors: ParseError[] = [];
    const root = parseTree(stripBom(content), errors, {
      disallowComments: true,
      allowTrailingComma: false,
      allowEmptyContent: false,
    });
    const [first] = errors;
    if (first || !root) {
      const reason = first
        ? `${printParseErrorCode(first.error)} at offset ${first.offset}`
        : 'empty document';
      throw new MalformedSourceDocumentError(this.filePath, 'json', new SyntaxError(reason));
    }
    this.parsed = { tree: toJsonNode(root), document: getNodeValue(root) };
  }

  /**
   * The document as plain values
   */
  get document(): unknown {
    return this.parsed?.document;
  }

  /**
   * The document with member order kept
   */
  get tree(): JsonNode | undefined {
    return this.parsed?.tree;
  }

  addAsParentPath(existingPath: string): string {
    return prefixPath(this.name, existingPath);
  }

  /**
   * Register the file, then every structural node of its document. A parent
   * is always registered before its children; siblings keep document order.
   */
  async addToBuilder(builder: EntryRegistrar): Promise<Id> {
    await this.load();
    const id = builder.register(this);
    const tree = this.tree;

    if (!tree || tree.type === 'scalar') {
      const value = tree ? tree.value : null;
      await builder.addEntry(
        this.factories.value(JSON_ROOT_NAMES.VALUE, JSON_VALUE_FIELD, value, id)
      );
      builder.logger.info('Expanded JSON document', { id, path: this.filePath, entries: 1 });
      return id;
    }

    const queue: PendingNode[] = [
      {
        name: tree.type === 'array' ? JSON_ROOT_NAMES.ARRAY : JSON_ROOT_NAMES.OBJECT,
        node: tree,
        parentId: id,
      },
    ];
    let expanded = 0;

    for (let head = 0; head < queue.length; head++) {
      const next = queue[head];
      const members: Array<[string, JsonNode]> =
        next.node.type === 'array'
          ? next.node.items.map((item, index): [string, JsonNode] => [String(index), item])
          : next.node.members;

      const scalars: Array<[string, JsonScalar]> = [];
      const nested: Array<[string, ContainerNode]> = [];
      for (const [key, member] of members) {
        if (member.type === 'scalar') {
          scalars.push([key, member.value]);
        } else {
          nested.push([key, member]);
        }
      }

      const entry =
        next.node.type === 'array'
          ? this.factories.array(next.name, scalars, next.parentId)
          : this.factories.object(next.name, scalars, next.parentId);
      const entryId = await builder.addEntry(entry);
      expanded++;

      for (const [key, value] of nested) {
        queue.push({ name: key, node: value, parentId: entryId });
      }
    }

    builder.logger.info('Expanded JSON document', { id, path: this.filePath, entries: expanded });
    return id;
  }
}

function toJsonNode(node: SyntaxNode): JsonNode {
  switch (node.type) {
    case 'array':
      return { type: 'array', items: (node.children ?? []).map(toJsonNode) };
    case 'object': {
      const members = new Map<string, JsonNode>();
      for (const property of node.children ?? []) {
        const [key, value] = property.children ?? [];
        if (key && value) members.set(String(key.value), toJsonNode(value));
      }
      return { type: 'object', members: [...members] };
    }
    default:
      return { type: 'scalar', value: toScalar(node.value) };
  }
}

function toScalar(value: unknown): JsonScalar {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Text form of a scalar; null is written out as `null`
 */
export function scalarText(value: JsonScalar | Date): string {
  if (value === null) return 'null';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

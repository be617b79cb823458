// Directory entry
// One nesting level of the case tree; has no bytes of its own.

import { createHash } from 'node:crypto';
import {
  isFieldPairs,
  prefixPath,
  STANDARD_FIELDS,
  type FieldInput,
  type FieldPairs,
  type FieldRecord,
} from '@loadfile/protocol';
import { Entry, type EntryPlacement } from './entry.js';
import { inferDataType, inferField } from '../fields/factory.js';
import { renderFieldValue } from '../fields/coerce.js';

export const DIRECTORY_MIME_TYPE = 'filesystem/directory';

export type DirectoryEntryOptions = EntryPlacement & {
  identifierField?: string;
};

export class DirectoryEntry extends Entry {
  readonly kind = 'directory' as const;
  private readonly label: string;
  private readonly keyField: string | undefined;

  /**
   * @param nameOrFields - The directory label, or a record whose `Name` (or
   *   first) value is the label and whose other pairs become fields
   */
  constructor(
    nameOrFields: string | FieldRecord | FieldPairs,
    options: DirectoryEntryOptions = {}
  ) {
    super(DIRECTORY_MIME_TYPE, options);
    this.keyField = options.identifierField;

    if (typeof nameOrFields === 'string') {
      this.label = nameOrFields;
      return;
    }

    const entries = new Map<string, FieldInput>(
      isFieldPairs(nameOrFields) ? nameOrFields : Object.entries(nameOrFields)
    );
    const firstKey: string | undefined = [...entries.keys()][0];
    const labelKey = entries.has(STANDARD_FIELDS.NAME) ? STANDARD_FIELDS.NAME : firstKey;
    this.label = labelKey === undefined ? '' : labelText(entries.get(labelKey));

    for (const [key, value] of entries) {
      if (key === labelKey) continue;
      this.storeField(inferField(key, value));
    }
  }

  getName(): string {
    return this.label;
  }

  get identifierField(): string | undefined {
    return this.keyField;
  }

  /**
   * Digest of the label: directories have no content
   */
  digest(): string {
    return createHash('sha1').update(this.getName(), 'utf8').digest('hex');
  }

  addAsParentPath(existingPath: string): string {
    return prefixPath(this.name, existingPath);
  }
}

function labelText(value: FieldInput): string {
  if (value === undefined) return '';
  return renderFieldValue(inferDataType(value), value);
}

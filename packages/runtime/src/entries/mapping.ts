// Mapping entry
//
// A key/value record (a database row, a CSV row, a JSON object). Its native
// is the generated text listing of its fields.

import { createHash } from 'node:crypto';
import { isValid, parse } from 'date-fns';
import {
  isFieldPairs,
  type FieldInput,
  type FieldPairs,
  type FieldRecord,
  type NativeSource,
} from '@loadfile/protocol';
import { Entry, type EntryPlacement } from './entry.js';
import { inferDataType, inferField } from '../fields/factory.js';
import { renderFieldValue } from '../fields/coerce.js';
import { DateParseError } from '../errors.js';

export const DEFAULT_MAPPING_MIME_TYPE = 'application/x-mapping';

/**
 * Capability overrides for mapping-derived entries. Each one replaces the
 * default behaviour of the matching method.
 */
export type EntryOverrides<T extends MappingEntry = MappingEntry> = {
  getName?: (entry: T) => string;
  text?: (entry: T) => string;
  itemDate?: (entry: T) => Date | undefined;
  addAsParentPath?: (entry: T, existingPath: string) => string;
};

export type MappingEntryOptions = EntryPlacement & {
  mimeType?: string;
  /** Fixed raw name; otherwise derived from the fields */
  name?: string;
  /** Field holding the record's natural key */
  identifierField?: string;
  /** Field holding the item date */
  timeField?: string;
  /** date-fns format of `timeField` when it holds text (defaults to the configured itemDateFormat) */
  timeFormat?: string;
  overrides?: EntryOverrides;
};

const FALLBACK_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss.SSS';

export class MappingEntry extends Entry {
  readonly kind = 'mapping' as const;
  protected readonly options: MappingEntryOptions;
  protected readonly overrides: EntryOverrides;
  private readonly source: Map<string, FieldInput>;

  /**
   * Pairs keep their order; a record lists its keys in object order, which
   * puts integer-like keys first.
   */
  constructor(fields: FieldRecord | FieldPairs, options: MappingEntryOptions = {}) {
    super(options.mimeType ?? DEFAULT_MAPPING_MIME_TYPE, options);
    this.options = options;
    this.overrides = options.overrides ?? {};
    this.source = new Map<string, FieldInput>(isFieldPairs(fields) ? fields : Object.entries(fields));

    for (const [key, value] of this.source) {
      this.storeField(inferField(key, value));
    }
  }

  /**
   * The record as supplied
   */
  get data(): Readonly<FieldRecord> {
    return Object.fromEntries(this.source);
  }

  /**
   * The record as supplied, in source order
   */
  get pairs(): FieldPairs {
    return [...this.source];
  }

  getName(): string {
    if (this.overrides.getName) return this.overrides.getName(this);
    if (this.options.name !== undefined) return this.options.name;

    const key = this.identifierField;
    if (key !== undefined) {
      const field = this.getField(key);
      if (field && !field.isEmpty) return field.render();
    }
    return this.defaultName();
  }

  /**
   * Name used when nothing more specific is configured: the first field
   * whose name mentions "name", else the first value.
   */
  protected defaultName(): string {
    const keys = [...this.source.keys()];
    const nameKey = keys.find((key) => key.toLowerCase().includes('name')) ?? keys[0];
    return nameKey === undefined ? '' : describe(this.source.get(nameKey));
  }

  get identifierField(): string | undefined {
    return this.options.identifierField;
  }

  /**
   * Default listing: one `key: value` line per data field, in insertion order
   */
  text(): string {
    if (this.overrides.text) return this.overrides.text(this);
    return this.dataFields()
      .map((field) => `${field.name}: ${field.render()}`)
      .join('\n');
  }

  /**
   * Date read from `timeField`, if one is configured.
   *
   * Text without a zone in its format is read as UTC wall-clock time.
   *
   * @throws DateParseError when the field is missing or does not match the format
   */
  itemDate(): Date | undefined {
    if (this.overrides.itemDate) return this.overrides.itemDate(this);

    const timeField = this.options.timeField;
    if (timeField === undefined) return undefined;

    const format = this.options.timeFormat ?? this.config?.itemDateFormat ?? FALLBACK_TIME_FORMAT;
    const field = this.getField(timeField);
    const value = field?.value;

    if (value instanceof Date) return value;
    if (typeof value === 'number') return new Date(value);
    if (typeof value !== 'string') {
      throw new DateParseError(value ?? null, format, timeField);
    }

    const parsed = parse(value, format, new Date(0));
    if (!isValid(parsed)) {
      throw new DateParseError(value, format, timeField);
    }
    return /[Xx]/.test(format) ? parsed : asUtcWallClock(parsed);
  }

  digest(): string {
    return createHash('sha1').update(this.text(), 'utf8').digest('hex');
  }

  /**
   * The generated text, when there is any
   */
  native(): NativeSource | undefined {
    const content = this.text();
    return content.length > 0 ? { type: 'text', content } : undefined;
  }

  addAsParentPath(existingPath: string): string {
    if (this.overrides.addAsParentPath) return this.overrides.addAsParentPath(this, existingPath);
    return super.addAsParentPath(existingPath);
  }
}

function describe(value: FieldInput): string {
  if (value === undefined) return '';
  return renderFieldValue(inferDataType(value), value);
}

function asUtcWallClock(local: Date): Date {
  return new Date(
    Date.UTC(
      local.getFullYear(),
      local.getMonth(),
      local.getDate(),
      local.getHours(),
      local.getMinutes(),
      local.getSeconds(),
      local.getMilliseconds()
    )
  );
}

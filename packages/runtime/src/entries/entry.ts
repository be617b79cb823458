// Entry base class
//
// An entry is one item of the case hierarchy. Variants differ in where their
// name, text, item date and native bytes come from; everything else (fields,
// standard field bookkeeping, naming) lives here.

import {
  effectiveName,
  isStandardFieldName,
  sanitizeName,
  silentLogger,
  DEFAULT_MAX_NAME_LENGTH,
  STANDARD_FIELDS,
  ValidationError,
  type BuildLogger,
  type EntryKind,
  type FieldDataType,
  type FieldInput,
  type Id,
  type LoadFileConfig,
  type NativeSource,
} from '@loadfile/protocol';
import { EntryField } from '../fields/field.js';
import { generateField, inferField } from '../fields/factory.js';
import { DuplicateFieldError, EntryAlreadyRegisteredError } from '../errors.js';

/**
 * What an entry sees of the builder while it registers itself (and its children)
 */
export interface EntryRegistrar {
  readonly config: LoadFileConfig;
  readonly logger: BuildLogger;

  /** Register one entry without expansion; returns the assigned id */
  register(entry: Entry): Id;

  /** Register an entry through its own `addToBuilder` hook */
  addEntry(entry: Entry): Promise<Id>;
}

/**
 * Settings an entry receives when it is registered
 */
export type EntryContext = {
  config: LoadFileConfig;
  logger: BuildLogger;
};

/**
 * Where an entry sits in the tree before registration
 */
export type EntryPlacement = {
  /** Id of an already registered parent */
  parentId?: Id;
  /** Natural key of the parent (its identifier field value), resolved when the tree is built */
  parentKey?: string;
};

export type SetFieldOptions = {
  /** Allow overwriting an existing or standard field */
  replace?: boolean;
};

export abstract class Entry {
  abstract readonly kind: EntryKind;
  readonly mimeType: string;
  readonly parentKey: string | undefined;

  private assignedId: Id | undefined;
  private assignedParent: Id | undefined;
  private context: EntryContext | undefined;
  private readonly fieldMap = new Map<string, EntryField>();
  private readonly replacedStandard = new Set<string>();
  private readonly writtenStandard = new Set<string>();

  protected constructor(mimeType: string, placement: EntryPlacement = {}) {
    this.mimeType = mimeType;
    this.assignedParent = placement.parentId;
    this.parentKey = placement.parentKey;
  }

  // --- Identity ---

  /**
   * Id assigned at registration; undefined before that
   */
  get id(): Id | undefined {
    return this.assignedId;
  }

  get isRegistered(): boolean {
    return this.assignedId !== undefined;
  }

  get parentId(): Id | undefined {
    return this.assignedParent;
  }

  /**
   * Re-parent the entry. Only possible until it is registered.
   *
   * @throws EntryAlreadyRegisteredError once the entry has an id
   */
  set parentId(parentId: Id | undefined) {
    if (this.assignedId !== undefined) {
      throw new EntryAlreadyRegisteredError(this.assignedId);
    }
    this.assignedParent = parentId;
  }

  /**
   * Attach the id and settings handed out by the builder and fill in the
   * standard fields. Called once by the builder.
   *
   * @throws EntryAlreadyRegisteredError when the entry already has an id
   */
  bind(id: Id, context: EntryContext): void {
    if (this.assignedId !== undefined) {
      throw new EntryAlreadyRegisteredError(this.assignedId);
    }
    this.assignedId = id;
    this.context = context;
    try {
      this.refreshStandardFields();
    } catch (error) {
      this.assignedId = undefined;
      this.context = undefined;
      throw error;
    }
  }

  protected get config(): LoadFileConfig | undefined {
    return this.context?.config;
  }

  protected get logger(): BuildLogger {
    return this.context?.logger ?? silentLogger;
  }

  // --- Capabilities ---

  /**
   * Raw name before sanitation
   */
  abstract getName(): string;

  /**
   * Name as supplied, used for display and the Name field
   */
  get displayName(): string {
    return this.getName();
  }

  /**
   * Sanitized name, safe as a path segment. Falls back to the id when
   * nothing usable is left of the raw name.
   */
  get name(): string {
    const maxLength = this.config?.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH;
    return effectiveName(this.getName(), this.assignedId ?? 'entry', maxLength);
  }

  /**
   * Name sanitized without any fallback (may be empty)
   */
  get sanitizedName(): string {
    return sanitizeName(this.getName(), this.config?.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH);
  }

  /**
   * Field whose value is this entry's natural key, if it has one
   */
  get identifierField(): string | undefined {
    return undefined;
  }

  /**
   * Full text to index for this entry
   */
  text(): string {
    return '';
  }

  /**
   * Timeline date of this entry, if it has one
   */
  itemDate(): Date | undefined {
    return undefined;
  }

  /**
   * Content digest written to the SHA-1 field (40 hex characters)
   */
  abstract digest(): string;

  /**
   * Bytes staged into the container for this entry, if any
   */
  native(): NativeSource | undefined {
    return undefined;
  }

  /**
   * Contribution of this entry to the archive path of a descendant
   */
  addAsParentPath(existingPath: string): string {
    return existingPath;
  }

  /**
   * Read whatever the entry needs from disk before registration
   */
  async load(): Promise<void> {}

  /**
   * Register this entry (and, for composites, its children)
   */
  async addToBuilder(builder: EntryRegistrar): Promise<Id> {
    await this.load();
    return builder.register(this);
  }

  // --- Fields ---

  /**
   * Store a copy of `field`.
   *
   * @throws DuplicateFieldError when the name exists or is reserved and `replace` is not set
   */
  setField(field: EntryField, options: SetFieldOptions = {}): void {
    const reserved = isStandardFieldName(field.name);
    if ((reserved || this.fieldMap.has(field.name)) && !options.replace) {
      throw new DuplicateFieldError(field.name, reserved);
    }
    if (reserved) {
      this.replacedStandard.add(field.name);
    }
    this.fieldMap.set(field.name, field.clone());
  }

  /**
   * Add a new field from a plain value, typed after the value unless a type is given
   */
  addField(name: string, value: FieldInput, dataType?: FieldDataType): void {
    this.setField(dataType ? generateField(name, dataType, value) : inferField(name, value));
  }

  /**
   * Assign a new value to an existing field
   *
   * @throws ValidationError when there is no such field
   * @throws InvalidFieldTypeError when the value does not fit
   */
  setFieldValue(name: string, value: FieldInput): void {
    const field = this.fieldMap.get(name);
    if (!field) {
      throw new ValidationError(`Entry has no field "${name}"`, { field: name });
    }
    field.value = value;
  }

  getField(name: string): EntryField | undefined {
    return this.fieldMap.get(name);
  }

  hasField(name: string): boolean {
    return this.fieldMap.has(name);
  }

  /**
   * All fields in insertion order
   */
  fields(): EntryField[] {
    return Array.from(this.fieldMap.values());
  }

  /**
   * Fields that were not filled in automatically, in insertion order
   */
  dataFields(): EntryField[] {
    return this.fields().filter((field) => !isStandardFieldName(field.name));
  }

  /**
   * Store a field owned by this entry without the duplicate check
   */
  protected storeField(field: EntryField): void {
    this.fieldMap.set(field.name, field);
  }

  // --- Standard fields ---

  /**
   * Fresh values of the standard fields for this variant, in output order
   */
  protected standardFields(): EntryField[] {
    const fields = [
      generateField(STANDARD_FIELDS.MIME_TYPE, 'Text', this.mimeType),
      generateField(STANDARD_FIELDS.DIGEST, 'Text', this.digest()),
      generateField(STANDARD_FIELDS.NAME, 'Text', this.displayName || this.name),
    ];
    const itemDate = this.itemDate();
    if (itemDate) {
      fields.push(generateField(STANDARD_FIELDS.ITEM_DATE, 'DateTime', itemDate));
    }
    return fields;
  }

  /**
   * Recompute the standard fields. Fields the caller replaced are left alone;
   * entry data stored under a standard name is superseded.
   */
  refreshStandardFields(): void {
    for (const field of this.standardFields()) {
      if (this.replacedStandard.has(field.name)) continue;

      if (this.fieldMap.has(field.name) && !this.writtenStandard.has(field.name)) {
        this.logger.warn('Standard field supersedes entry data', {
          entryId: this.assignedId,
          field: field.name,
        });
      }
      this.fieldMap.set(field.name, field);
      this.writtenStandard.add(field.name);
    }
  }
}

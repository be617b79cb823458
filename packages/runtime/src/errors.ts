// Runtime error types
// Every error extends LoadFileError so callers can switch on `code`.

import { LoadFileError, ValidationError } from '@loadfile/protocol';
import type { FieldDataType, Id } from '@loadfile/protocol';

export { LoadFileError, ValidationError };

/**
 * Error when a value cannot be coerced to a field's declared type.
 */
export class InvalidFieldTypeError extends LoadFileError {
  readonly fieldName: string;
  readonly dataType: FieldDataType;
  readonly value: unknown;

  constructor(fieldName: string, dataType: FieldDataType, value: unknown, reason: string) {
    super(
      'INVALID_FIELD_TYPE',
      `Field "${fieldName}" (${dataType}) cannot hold ${JSON.stringify(value) ?? String(value)}: ${reason}`
    );
    this.name = 'InvalidFieldTypeError';
    this.fieldName = fieldName;
    this.dataType = dataType;
    this.value = value;
  }
}

/**
 * Error when a field would overwrite an existing or reserved field without
 * explicit replacement.
 */
export class DuplicateFieldError extends LoadFileError {
  readonly fieldName: string;
  readonly reserved: boolean;

  constructor(fieldName: string, reserved: boolean) {
    super(
      'DUPLICATE_FIELD',
      reserved
        ? `Field "${fieldName}" is filled in automatically; pass { replace: true } to override it`
        : `Field "${fieldName}" already exists; pass { replace: true } to replace it`
    );
    this.name = 'DuplicateFieldError';
    this.fieldName = fieldName;
    this.reserved = reserved;
  }
}

/**
 * Error when an item date cannot be read with the given format.
 */
export class DateParseError extends LoadFileError {
  readonly value: unknown;
  readonly format: string;
  readonly fieldName?: string;

  constructor(value: unknown, format: string, fieldName?: string) {
    const source = fieldName ? ` in field "${fieldName}"` : '';
    super(
      'DATE_PARSE_ERROR',
      `Cannot parse ${JSON.stringify(value) ?? String(value)}${source} with format "${format}"`
    );
    this.name = 'DateParseError';
    this.value = value;
    this.format = format;
    this.fieldName = fieldName;
  }
}

/**
 * Error when a parent id or parent key does not resolve to a registered entry.
 */
export class DanglingParentReferenceError extends LoadFileError {
  readonly entryId: Id;
  readonly reference: string;

  constructor(entryId: Id, reference: string) {
    super('DANGLING_PARENT_REFERENCE', `Entry ${entryId} references missing parent ${reference}`);
    this.name = 'DanglingParentReferenceError';
    this.entryId = entryId;
    this.reference = reference;
  }
}

/**
 * Error when an entry is its own parent or its own ancestor.
 */
export class CyclicParentReferenceError extends LoadFileError {
  readonly entryId: Id;
  readonly cycle: Id[];

  constructor(entryId: Id, cycle: Id[]) {
    super('CYCLIC_PARENT_REFERENCE', `Entry ${entryId} is its own ancestor: ${cycle.join(' -> ')}`);
    this.name = 'CyclicParentReferenceError';
    this.entryId = entryId;
    this.cycle = cycle;
  }
}

/**
 * Error when the same entry object is registered twice.
 */
export class EntryAlreadyRegisteredError extends LoadFileError {
  readonly entryId: Id;

  constructor(entryId: Id) {
    super('ENTRY_ALREADY_REGISTERED', `Entry is already registered as ${entryId}`);
    this.name = 'EntryAlreadyRegisteredError';
    this.entryId = entryId;
  }
}

/**
 * Error when a CSV or JSON source cannot be read by its parser.
 * The parser's own error is kept as `cause`.
 */
export class MalformedSourceDocumentError extends LoadFileError {
  readonly path: string;
  readonly format: 'csv' | 'json';

  constructor(path: string, format: 'csv' | 'json', cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('MALFORMED_SOURCE_DOCUMENT', `Cannot parse ${format.toUpperCase()} document ${path}: ${reason}`, {
      cause,
    });
    this.name = 'MalformedSourceDocumentError';
    this.path = path;
    this.format = format;
  }
}

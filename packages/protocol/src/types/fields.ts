// Field types
// A field is one named, typed value attached to an entry.

/**
 * Data types understood by EDRM XML v1.2 field definitions
 */
export const FIELD_DATA_TYPES = [
  'Text',
  'LongText',
  'DateTime',
  'LongInteger',
  'Decimal',
  'Boolean',
] as const;

export type FieldDataType = (typeof FIELD_DATA_TYPES)[number];

/**
 * A stored field value. `null` is an empty value and is valid for every type.
 */
export type FieldValue = string | number | boolean | Date | null;

/**
 * Input accepted when assigning a field value (coerced to the declared type)
 */
export type FieldInput = FieldValue | undefined;

/**
 * A plain key/value record as supplied by callers (mappings, rows, JSON objects)
 */
export type FieldRecord = Record<string, FieldInput>;

/**
 * Key/value pairs in the order the source gave them. Plain objects list
 * integer-like keys first, so sources whose column or member order matters
 * pass pairs instead of a record.
 */
export type FieldPairs = ReadonlyArray<readonly [string, FieldInput]>;

export function isFieldPairs(fields: FieldRecord | FieldPairs): fields is FieldPairs {
  return Array.isArray(fields);
}

/**
 * Names of fields filled in automatically for every entry
 */
export const STANDARD_FIELDS = {
  NAME: 'Name',
  ITEM_DATE: 'Item Date',
  DIGEST: 'SHA-1',
  MIME_TYPE: 'MIME Type',
} as const;

/**
 * Names of fields filled in automatically for entries backed by a file on disk
 */
export const FILE_FIELDS = {
  PATH_NAME: 'Path Name',
  ACCESSED: 'File Accessed',
  CREATED: 'File Created',
  MODIFIED: 'File Modified',
  OWNER: 'File Owner',
  SIZE: 'File Size',
} as const;

const RESERVED = new Set<string>([
  ...Object.values(STANDARD_FIELDS),
  ...Object.values(FILE_FIELDS),
]);

/**
 * Check whether a field name is reserved for automatically populated values
 */
export function isStandardFieldName(name: string): boolean {
  return RESERVED.has(name);
}

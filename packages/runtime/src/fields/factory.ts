// Field factory

import type { FieldDataType, FieldInput } from '@loadfile/protocol';
import { EntryField } from './field.js';

/**
 * Create a field whose later assignments are checked against `dataType`.
 *
 * @throws InvalidFieldTypeError when the initial value does not fit
 */
export function generateField(
  name: string,
  dataType: FieldDataType,
  initialValue: FieldInput = null
): EntryField {
  return new EntryField(name, dataType, initialValue);
}

/**
 * Pick a data type from the shape of a value
 */
export function inferDataType(value: FieldInput): FieldDataType {
  if (typeof value === 'boolean') return 'Boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'LongInteger' : 'Decimal';
  if (value instanceof Date) return 'DateTime';
  return 'Text';
}

/**
 * Create a field typed after its value. Anything without a more specific
 * type is stored as text.
 */
export function inferField(name: string, value: FieldInput): EntryField {
  return new EntryField(name, inferDataType(value), value);
}

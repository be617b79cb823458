// Entry field
// A named, typed value attached to an entry.

import type { FieldDataType, FieldInput, FieldValue } from '@loadfile/protocol';
import { coerceFieldValue, renderFieldValue } from './coerce.js';

export class EntryField {
  readonly name: string;
  readonly dataType: FieldDataType;
  private current: FieldValue;

  constructor(name: string, dataType: FieldDataType, initialValue: FieldInput = null) {
    this.name = name;
    this.dataType = dataType;
    this.current = coerceFieldValue(name, dataType, initialValue);
  }

  get value(): FieldValue {
    return this.current instanceof Date ? new Date(this.current.getTime()) : this.current;
  }

  /**
   * Assign a new value, coerced to the declared type.
   *
   * @throws InvalidFieldTypeError
   */
  set value(input: FieldInput) {
    this.current = coerceFieldValue(this.name, this.dataType, input);
  }

  get isEmpty(): boolean {
    return this.current === null;
  }

  /**
   * Independent copy: assigning to the copy never changes this field
   */
  clone(): EntryField {
    return new EntryField(this.name, this.dataType, this.current);
  }

  /**
   * Manifest text of the value (empty for null)
   */
  render(): string {
    return renderFieldValue(this.dataType, this.current);
  }
}

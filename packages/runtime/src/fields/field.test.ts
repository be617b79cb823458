// Tests for fields: coercion, rendering and copy independence.

import { describe, it, expect } from 'vitest';
import { EntryField } from './field.js';
import { generateField, inferField, inferDataType } from './factory.js';
import { InvalidFieldTypeError } from '../errors.js';

describe('EntryField', () => {
  it('coerces assignments to the declared type', () => {
    const size = generateField('Size', 'LongInteger', '42');
    expect(size.value).toBe(42);

    size.value = 7;
    expect(size.value).toBe(7);

    const flag = generateField('Flag', 'Boolean', 'TRUE');
    expect(flag.value).toBe(true);

    const amount = generateField('Amount', 'Decimal', ' 3.25 ');
    expect(amount.value).toBe(3.25);
  });

  it('rejects values that do not fit the declared type', () => {
    const date = generateField('When', 'DateTime');

    expect(() => {
      date.value = 'not a date';
    }).toThrow(InvalidFieldTypeError);
    expect(date.value).toBeNull();

    expect(() => generateField('Count', 'LongInteger', '1.5')).toThrow(InvalidFieldTypeError);
    expect(() => generateField('Flag', 'Boolean', 'yes')).toThrow(InvalidFieldTypeError);
    expect(() => generateField('Amount', 'Decimal', 'abc')).toThrow(InvalidFieldTypeError);
  });

  it('carries the field name and type on coercion errors', () => {
    try {
      generateField('Count', 'LongInteger', 'many');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidFieldTypeError);
      expect(error).toMatchObject({ code: 'INVALID_FIELD_TYPE', fieldName: 'Count', dataType: 'LongInteger' });
    }
  });

  it('accepts null for every type', () => {
    for (const type of ['Text', 'LongText', 'DateTime', 'LongInteger', 'Decimal', 'Boolean'] as const) {
      const field = generateField('Empty', type, null);
      expect(field.isEmpty).toBe(true);
      expect(field.render()).toBe('');
    }
  });

  it('renders values for the manifest', () => {
    expect(generateField('When', 'DateTime', new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6))).render()).toBe(
      '2024-01-02T03:04:05.006+00:00'
    );
    expect(generateField('Amount', 'Decimal', 1.234567).render()).toBe('1.2346');
    expect(generateField('Flag', 'Boolean', false).render()).toBe('false');
    expect(generateField('Note', 'Text', 12).render()).toBe('12');
  });

  it('keeps copies independent', () => {
    const original = new EntryField('Status', 'Text', 'open');
    const first = original.clone();
    const second = original.clone();

    first.value = 'closed';

    expect(second.value).toBe('open');
    expect(original.value).toBe('open');
  });

  it('does not expose its stored date for mutation', () => {
    const field = generateField('When', 'DateTime', new Date(Date.UTC(2024, 0, 1)));
    const read = field.value;
    if (read instanceof Date) {
      read.setUTCFullYear(1999);
    }

    expect(field.render()).toBe('2024-01-01T00:00:00.000+00:00');
  });
});

describe('inferField', () => {
  it('chooses a type from the value', () => {
    expect(inferDataType(true)).toBe('Boolean');
    expect(inferDataType(3)).toBe('LongInteger');
    expect(inferDataType(3.5)).toBe('Decimal');
    expect(inferDataType(new Date())).toBe('DateTime');
    expect(inferDataType('x')).toBe('Text');
    expect(inferDataType(null)).toBe('Text');
  });

  it('creates a field holding the value', () => {
    const field = inferField('Count', 3);

    expect(field.dataType).toBe('LongInteger');
    expect(field.render()).toBe('3');
  });
});

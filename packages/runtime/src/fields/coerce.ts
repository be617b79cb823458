// Field value coercion
// One zod schema per EDRM data type; every assignment goes through these.

import { z } from 'zod';
import { formatTimestamp, type FieldDataType, type FieldInput, type FieldValue } from '@loadfile/protocol';
import { InvalidFieldTypeError } from '../errors.js';

const textSchema = z
  .union([z.string(), z.number(), z.boolean(), z.date()])
  .transform((value) => (value instanceof Date ? formatTimestamp(value) : String(value)));

const dateTimeSchema = z
  .union([z.date(), z.string().trim().min(1), z.number()])
  .pipe(z.coerce.date());

const longIntegerSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, 'Expected an integer')
    .transform((value) => Number(value)),
]);

const decimalSchema = z.union([
  z.number().finite(),
  z.string().trim().min(1).pipe(z.coerce.number().finite()),
]);

const booleanSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false']))
    .transform((value) => value === 'true'),
]);

const FIELD_SCHEMAS: Record<FieldDataType, z.ZodType<FieldValue, z.ZodTypeDef, unknown>> = {
  Text: textSchema,
  LongText: textSchema,
  DateTime: dateTimeSchema,
  LongInteger: longIntegerSchema,
  Decimal: decimalSchema,
  Boolean: booleanSchema,
};

/**
 * Coerce a value to a field's declared type.
 * `null` and `undefined` both become the empty value.
 *
 * @throws InvalidFieldTypeError when the value cannot be coerced
 */
export function coerceFieldValue(
  fieldName: string,
  dataType: FieldDataType,
  input: FieldInput
): FieldValue {
  if (input === null || input === undefined) {
    return null;
  }

  const result = FIELD_SCHEMAS[dataType].safeParse(input);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidFieldTypeError(fieldName, dataType, input, reason);
  }
  return result.data;
}

/**
 * Render a stored value the way it is written into a manifest
 */
export function renderFieldValue(dataType: FieldDataType, value: FieldValue): string {
  if (value === null) return '';
  if (value instanceof Date) return formatTimestamp(value);
  if (typeof value === 'number' && dataType === 'Decimal') {
    return String(Math.round(value * 10_000) / 10_000);
  }
  return String(value);
}

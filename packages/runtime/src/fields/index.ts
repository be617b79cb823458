export { EntryField } from './field.js';
export { generateField, inferField, inferDataType } from './factory.js';
export { coerceFieldValue, renderFieldValue } from './coerce.js';

export {
  CsvEntry,
  CsvRowEntry,
  CSV_MIME_TYPE,
  CSV_ROW_MIME_TYPE,
  type RowGenerator,
  type CsvEntryOptions,
  type CsvRowEntryOptions,
} from './csv.js';
export {
  JsonFileEntry,
  JsonValueEntry,
  JsonArrayEntry,
  JsonObjectEntry,
  defaultJsonEntryFactories,
  scalarText,
  JSON_MIME_TYPE,
  JSON_VALUE_MIME_TYPE,
  JSON_ARRAY_MIME_TYPE,
  JSON_OBJECT_MIME_TYPE,
  JSON_ROOT_NAMES,
  JSON_VALUE_FIELD,
  type JsonScalar,
  type JsonNode,
  type JsonEntryFactories,
  type JsonFileEntryOptions,
} from './json.js';

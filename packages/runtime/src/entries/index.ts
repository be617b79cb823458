export {
  Entry,
  type EntryRegistrar,
  type EntryContext,
  type EntryPlacement,
  type SetFieldOptions,
} from './entry.js';
export {
  FileEntry,
  DEFAULT_MIME_TYPE,
  mimeTypeFor,
  hashFile,
  type FileEntryOptions,
  type FileDetails,
} from './file.js';
export { DirectoryEntry, DIRECTORY_MIME_TYPE, type DirectoryEntryOptions } from './directory.js';
export {
  MappingEntry,
  DEFAULT_MAPPING_MIME_TYPE,
  type MappingEntryOptions,
  type EntryOverrides,
} from './mapping.js';

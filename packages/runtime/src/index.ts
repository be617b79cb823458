// @loadfile/runtime
// Entry model, CSV/JSON decomposition, tree assembly and EDRM manifest generation

// Builder (the orchestrator: registration, ids, finalize)
export {
  LoadFileBuilder,
  createLoadFileBuilder,
  resolveTree,
  buildKeyIndex,
  lookupParent,
  depthFirst,
  ancestors,
  type LoadFileBuilderOptions,
  type EntryTree,
} from './builder/index.js';

// Fields
export {
  EntryField,
  generateField,
  inferField,
  inferDataType,
  coerceFieldValue,
  renderFieldValue,
} from './fields/index.js';

// Entries
export {
  Entry,
  FileEntry,
  DirectoryEntry,
  MappingEntry,
  DEFAULT_MIME_TYPE,
  DEFAULT_MAPPING_MIME_TYPE,
  DIRECTORY_MIME_TYPE,
  mimeTypeFor,
  hashFile,
  type EntryRegistrar,
  type EntryContext,
  type EntryPlacement,
  type SetFieldOptions,
  type FileEntryOptions,
  type FileDetails,
  type DirectoryEntryOptions,
  type MappingEntryOptions,
  type EntryOverrides,
} from './entries/index.js';

// Composites
export * from './composites/index.js';

// Manifest
export {
  buildManifestDocument,
  renderManifest,
  renderContainerProperties,
  formatCreationTime,
  type ManifestBuildOptions,
  type RenderOptions,
} from './manifest/index.js';

// Container layout
export { planContainer, archivePathOf, type ContainerLayout } from './packaging/plan.js';

// Error types
export {
  LoadFileError,
  ValidationError,
  InvalidFieldTypeError,
  DuplicateFieldError,
  DateParseError,
  DanglingParentReferenceError,
  CyclicParentReferenceError,
  EntryAlreadyRegisteredError,
  MalformedSourceDocumentError,
} from './errors.js';
export { PackagingIOError } from '@loadfile/container';

// Container path constants
// Defines the canonical folder/file structure of a packaged evidence container

/**
 * Root-level directories in a container
 */
export const CONTAINER_DIRS = {
  METADATA: '._metadata',
} as const;

/**
 * Files in the metadata directory
 */
export const METADATA_FILES = {
  MANIFEST: 'image_contents.xml',
  MANIFEST_HASH: 'image_contents.sha1_hash',
  PROPERTIES: 'image_metadata.xml',
} as const;

/**
 * Build a path to a file in the metadata directory
 */
export function metadataPath(file: keyof typeof METADATA_FILES): string {
  return `${CONTAINER_DIRS.METADATA}/${METADATA_FILES[file]}`;
}

/**
 * Join archive path segments with forward slashes, dropping empty segments
 */
export function joinArchivePath(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split('/'))
    .filter((segment) => segment.length > 0)
    .join('/');
}

/**
 * Prefix an existing descendant path with a container's own name
 */
export function prefixPath(name: string, existingPath: string): string {
  return joinArchivePath(name, existingPath);
}

/**
 * Split an archive path into its directory part and its final segment
 */
export function splitArchivePath(archivePath: string): { dir: string; base: string } {
  const index = archivePath.lastIndexOf('/');
  if (index < 0) {
    return { dir: '', base: archivePath };
  }
  return { dir: archivePath.slice(0, index), base: archivePath.slice(index + 1) };
}

/**
 * URI-encode every segment of an archive path, keeping the separators
 */
export function encodeArchiveUri(archivePath: string): string {
  return archivePath
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Entry identifier: a 40 character hex digest unique within one build session
 */
export type Id = string;

/**
 * Where a manifest is meant to be read from.
 *
 * - `container`: paths are relative to the root of the packaged archive
 * - `standalone`: paths point at the natives where they live on disk
 */
export type ManifestTarget = 'container' | 'standalone';

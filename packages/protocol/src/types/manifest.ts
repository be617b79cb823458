// Manifest document model
// The in-memory shape of an EDRM load file before it is serialized to XML.

import type { Id, ManifestTarget } from './common.js';
import type { FieldDataType } from './fields.js';

/**
 * Field definition listed once per distinct field name at the top of the manifest
 */
export type ManifestFieldDefinition = {
  name: string;
  dataType: FieldDataType;
  key: string;
};

/**
 * A field value as written for one document
 */
export type ManifestFieldValue = {
  name: string;
  key: string;
  value: string;
};

/**
 * Reference to the native bytes of a document
 */
export type ManifestNativeFile = {
  filePath: string;
  fileName: string;
  hash: string;
  hashType: 'SHA1';
};

/**
 * One document record, emitted per entry in depth-first registration order
 */
export type ManifestRecord = {
  id: Id;
  parentId?: Id;
  name: string;
  text: string;
  itemDate?: string;
  digest: string;
  mimeType: string;
  fields: ManifestFieldValue[];
  native?: ManifestNativeFile;
  locationUri?: string;
};

/**
 * Container relationship between a parent document and one child
 */
export type ManifestRelationship = {
  parentId: Id;
  childId: Id;
};

/**
 * Folder node: a document with children nests them inside a folder named after its id
 */
export type ManifestFolder = {
  name: Id;
  members: ManifestFolderMember[];
};

/**
 * One child listed in a folder, followed by its own folder when it has children
 */
export type ManifestFolderMember = {
  documentId: Id;
  folder?: ManifestFolder;
};

/**
 * Attributes of the manifest root element
 */
export type ManifestHeader = {
  majorVersion: '1';
  minorVersion: '2';
  description: string;
  locale: string;
  dataInterchangeType: 'Update';
};

/**
 * A complete manifest, ready to be serialized
 */
export type ManifestDocument = {
  target: ManifestTarget;
  header: ManifestHeader;
  custodian: string;
  fieldDefinitions: ManifestFieldDefinition[];
  records: ManifestRecord[];
  relationships: ManifestRelationship[];
  folders: ManifestFolder[];
};

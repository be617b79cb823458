// Manifest serialization
// Writes the manifest model as EDRM XML v1.2 with xmlbuilder2.

import { create } from 'xmlbuilder2';
import type {
  ManifestDocument,
  ManifestFolder,
  ManifestFolderMember,
  ManifestRecord,
} from '@loadfile/protocol';

type XMLBuilder = ReturnType<typeof create>;

export type RenderOptions = {
  /** Indent nested elements (default true) */
  prettyPrint?: boolean;
};

const LOCATION_DESCRIPTIONS = {
  container: 'Location within container',
  standalone: 'Location on disk',
} as const;

/**
 * Serialize a manifest document to an XML string
 */
export function renderManifest(document: ManifestDocument, options: RenderOptions = {}): string {
  const doc = create({
    version: '1.0',
    encoding: 'UTF-8',
    standalone: true,
    invalidCharReplacement: '',
  });

  const root = doc.ele('Root', {
    MajorVersion: document.header.majorVersion,
    MinorVersion: document.header.minorVersion,
    Description: document.header.description,
    Locale: document.header.locale,
    DataInterchangeType: document.header.dataInterchangeType,
  });

  const fields = root.ele('Fields');
  for (const definition of document.fieldDefinitions) {
    fields.ele('Field', {
      Name: definition.name,
      DataType: definition.dataType,
      Key: definition.key,
    });
  }

  const batch = root.ele('Batch');
  const documents = batch.ele('Documents');
  for (const record of document.records) {
    renderRecord(documents, record, document);
  }

  const relationships = batch.ele('Relationships');
  for (const relationship of document.relationships) {
    relationships.ele('Relationship', {
      Type: 'Container',
      ParentDocId: relationship.parentId,
      ChildDocId: relationship.childId,
    });
  }

  const folders = batch.ele('Folders');
  for (const folder of document.folders) {
    renderFolder(folders, folder);
  }

  return doc.end({ prettyPrint: options.prettyPrint ?? true });
}

function renderRecord(parent: XMLBuilder, record: ManifestRecord, document: ManifestDocument): void {
  const element = parent.ele('Document', {
    DocID: record.id,
    DocType: 'File',
    MimeType: record.mimeType,
  });

  const values = element.ele('FieldValues');
  for (const field of record.fields) {
    appendText(values.ele(field.key), field.value);
  }

  if (record.native || record.text.length > 0) {
    const files = element.ele('Files');
    if (record.native) {
      files.ele('File', { FileType: 'Native' }).ele('ExternalFile', {
        FilePath: record.native.filePath,
        FileName: record.native.fileName,
        Hash: record.native.hash,
        HashType: record.native.hashType,
      });
    }
    if (record.text.length > 0) {
      appendText(files.ele('File', { FileType: 'Text' }).ele('InlineContent'), record.text);
    }
  }

  const location = element.ele('Locations').ele('Location');
  appendText(location.ele('Custodian'), document.custodian);
  appendText(location.ele('Description'), LOCATION_DESCRIPTIONS[document.target]);
  if (record.locationUri !== undefined) {
    appendText(location.ele('LocationURI'), record.locationUri);
  }
}

function renderFolder(parent: XMLBuilder, folder: ManifestFolder): void {
  type Frame = { element: XMLBuilder; members: ManifestFolderMember[]; index: number };
  const stack: Frame[] = [
    { element: parent.ele('Folder', { FolderName: folder.name }), members: folder.members, index: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.index >= frame.members.length) {
      stack.pop();
      continue;
    }

    const member = frame.members[frame.index];
    frame.index++;
    frame.element.ele('Document', { DocId: member.documentId });
    if (member.folder) {
      stack.push({
        element: frame.element.ele('Folder', { FolderName: member.folder.name }),
        members: member.folder.members,
        index: 0,
      });
    }
  }
}

function appendText(element: XMLBuilder, text: string): void {
  if (text.length > 0) {
    element.txt(text);
  }
}

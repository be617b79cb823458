import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { silentLogger, resolveConfig } from '@loadfile/protocol';
import { createLoadFileBuilder } from '../builder/builder.js';
import { MappingEntry } from '../entries/mapping.js';
import { formatCreationTime, renderContainerProperties } from './properties.js';

const sha1 = (text: string) => createHash('sha1').update(text, 'utf8').digest('hex');

async function evidenceTree() {
  const builder = createLoadFileBuilder({ logger: silentLogger });
  const folder = await builder.addDirectory('Evidence');
  const first = await builder.addMapping({ a: '1' }, 'text/plain', folder);
  const second = await builder.addMapping({ b: '2' }, 'text/plain', folder);
  const loose = await builder.addMapping({ c: '3' }, 'text/plain');
  return { builder, folder, first, second, loose };
}

describe('buildManifest', () => {
  it('keys fields per manifest in order of first appearance', async () => {
    const { builder } = await evidenceTree();

    const manifest = builder.buildManifest('container');

    expect(manifest.fieldDefinitions).toEqual([
      { name: 'MIME Type', dataType: 'Text', key: 'field_0' },
      { name: 'SHA-1', dataType: 'Text', key: 'field_1' },
      { name: 'Name', dataType: 'Text', key: 'field_2' },
      { name: 'a', dataType: 'Text', key: 'field_3' },
      { name: 'b', dataType: 'Text', key: 'field_4' },
      { name: 'c', dataType: 'Text', key: 'field_5' },
    ]);
  });

  it('orders records depth-first and records container relationships', async () => {
    const { builder, folder, first, second, loose } = await evidenceTree();

    const manifest = builder.buildManifest('container');

    expect(manifest.records.map((record) => record.id)).toEqual([folder, first, second, loose]);
    expect(manifest.relationships).toEqual([
      { parentId: folder, childId: first },
      { parentId: folder, childId: second },
    ]);
    expect(manifest.folders).toEqual([
      { name: folder, members: [{ documentId: first }, { documentId: second }] },
    ]);
  });

  it('locates natives inside the container', async () => {
    const { builder, folder, first, loose } = await evidenceTree();

    const records = new Map(builder.buildManifest('container').records.map((r) => [r.id, r]));

    expect(records.get(folder)).toMatchObject({ locationUri: 'Evidence', native: undefined });
    expect(records.get(first)).toMatchObject({
      text: 'a: 1',
      locationUri: 'Evidence/1',
      native: { filePath: 'Evidence', fileName: '1', hash: sha1('a: 1'), hashType: 'SHA1' },
    });
    expect(records.get(loose)).toMatchObject({
      locationUri: '3',
      native: { filePath: '', fileName: '3' },
    });
  });

  it('references no generated natives in a standalone manifest', async () => {
    const { builder, first } = await evidenceTree();

    const record = builder.buildManifest('standalone').records.find((r) => r.id === first);

    expect(record?.native).toBeUndefined();
    expect(record?.locationUri).toBeUndefined();
    expect(record?.text).toBe('a: 1');
  });

  it('writes the item date in UTC', () => {
    const builder = createLoadFileBuilder({ logger: silentLogger });
    const id = builder.register(
      new MappingEntry({ when: '2024-03-05 06:07:08.009' }, { timeField: 'when' })
    );

    const record = builder.buildManifest('container').records.find((r) => r.id === id);

    expect(record?.itemDate).toBe('2024-03-05T06:07:08.009+00:00');
    expect(record?.fields.find((field) => field.name === 'Item Date')?.value).toBe(
      '2024-03-05T06:07:08.009+00:00'
    );
  });

  it('nests a folder for every child that has children', async () => {
    const builder = createLoadFileBuilder({ logger: silentLogger });
    const outer = await builder.addDirectory('Outer');
    const loose = await builder.addMapping({ n: 1 }, 'text/plain', outer);
    const inner = await builder.addDirectory('Inner', outer);
    const deep = await builder.addMapping({ n: 2 }, 'text/plain', inner);

    const manifest = builder.buildManifest('container');
    const xml = builder.renderManifest('container');

    expect(manifest.folders).toEqual([
      {
        name: outer,
        members: [
          { documentId: loose },
          { documentId: inner, folder: { name: inner, members: [{ documentId: deep }] } },
        ],
      },
    ]);

    const folders = xml.slice(xml.indexOf('<Folders>'));
    const positions = [
      `FolderName="${outer}"`,
      `DocId="${loose}"`,
      `DocId="${inner}"`,
      `FolderName="${inner}"`,
      `DocId="${deep}"`,
    ].map((marker) => folders.indexOf(marker));
    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((x, y) => x - y)).toEqual(positions);
  });
});

describe('renderManifest', () => {
  it('writes the EDRM root, field definitions and field values', async () => {
    const { builder, folder, first } = await evidenceTree();

    const xml = builder.renderManifest('container');

    expect(xml.startsWith('<?xml')).toBe(true);
    expect(xml).toContain(
      '<Root MajorVersion="1" MinorVersion="2" Description="EDRM XML Load File" Locale="US" DataInterchangeType="Update">'
    );
    expect(xml).toContain('<Field Name="a" DataType="Text" Key="field_3"/>');
    expect(xml).toContain('<field_3>1</field_3>');
    expect(xml).toContain('<InlineContent>a: 1</InlineContent>');
    expect(xml).toContain('<Custodian>Unknown</Custodian>');
    expect(xml).toMatch(
      new RegExp(`<Relationship Type="Container" ParentDocId="${folder}" ChildDocId="${first}"\\s*/>`)
    );
  });

  it('writes no files for a directory', async () => {
    const { builder, folder } = await evidenceTree();

    const xml = builder.renderManifest('container');
    const document = xml.match(new RegExp(`<Document DocID="${folder}"[\\s\\S]*?</Document>`));

    expect(document?.[0]).toContain('<LocationURI>Evidence</LocationURI>');
    expect(document?.[0]).not.toContain('<Files>');
  });

  it('escapes markup in values and text', async () => {
    const builder = createLoadFileBuilder({ logger: silentLogger });
    await builder.addMapping({ note: 'a < b & c' }, 'text/plain');

    const xml = builder.renderManifest('container');

    expect(xml).toContain('<field_0>a &lt; b &amp; c</field_0>');
    expect(xml).toContain('<InlineContent>note: a &lt; b &amp; c</InlineContent>');
  });

  it('uses the configured custodian and description', async () => {
    const builder = createLoadFileBuilder({
      logger: silentLogger,
      config: { custodian: 'Jane Roe', description: 'Matter 12' },
    });
    await builder.addMapping({ a: 1 }, 'text/plain');

    const xml = builder.renderManifest('standalone');

    expect(xml).toContain('Description="Matter 12"');
    expect(xml).toContain('<Custodian>Jane Roe</Custodian>');
    expect(xml).toContain('<Description>Location on disk</Description>');
  });
});

describe('container properties', () => {
  const createdAt = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

  it('formats the creation time in UTC', () => {
    expect(formatCreationTime(createdAt)).toBe('2024/01/02 03:04:05.006 UTC');
  });

  it('lists the case properties', () => {
    const xml = renderContainerProperties(resolveConfig({ caseNumber: 'C-7' }), createdAt);

    expect(xml).toContain('<image-metadata>');
    expect(xml).toContain('<property key="case-number" value="C-7"/>');
    expect(xml).toContain('<property key="evidence-number" value="01"/>');
    expect(xml).toContain('<property key="creation-datetime" value="2024/01/02 03:04:05.006 UTC"/>');
  });
});

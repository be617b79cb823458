import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { unzipSync } from 'fflate';
import { silentLogger } from '@loadfile/protocol';
import { createInMemoryWriter, PackagingIOError } from '@loadfile/container';
import { createLoadFileBuilder } from './builder.js';
import { MappingEntry } from '../entries/mapping.js';
import {
  CyclicParentReferenceError,
  DanglingParentReferenceError,
  EntryAlreadyRegisteredError,
  ValidationError,
} from '../errors.js';

describe('LoadFileBuilder', () => {
  describe('registration', () => {
    it('assigns distinct ids to identical entries', async () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });

      const ids = [
        await builder.addMapping({ a: 1 }, 'text/plain'),
        await builder.addMapping({ a: 1 }, 'text/plain'),
        await builder.addMapping({ a: 1 }, 'text/plain'),
      ];

      expect(new Set(ids).size).toBe(3);
      for (const id of ids) {
        expect(id).toMatch(/^[0-9a-f]{40}$/);
      }
    });

    it('refuses to register the same entry twice', () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      const entry = new MappingEntry({ a: 1 });
      builder.register(entry);

      expect(() => builder.register(entry)).toThrow(EntryAlreadyRegisteredError);
      expect(builder.size).toBe(1);
    });

    it('rejects an invalid configuration', () => {
      expect(() => createLoadFileBuilder({ config: { maxNameLength: 3 } })).toThrow(ValidationError);
    });

    it('applies the configured name length', () => {
      const builder = createLoadFileBuilder({ logger: silentLogger, config: { maxNameLength: 16 } });
      const entry = new MappingEntry({ a: 1 }, { name: 'x'.repeat(40) });

      builder.register(entry);

      expect(entry.name).toBe('x'.repeat(16));
    });

    it('locates a mapping whose name ends on an emoji at the length cap', async () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      const title = 'a'.repeat(199) + '\u{1F600}';
      const id = await builder.addMapping({ title }, 'text/plain');

      const [record] = builder.buildManifest('container').records;

      expect(builder.get(id)?.name).toBe(title);
      expect(record.locationUri).toBe(encodeURIComponent(title));
    });
  });

  describe('tree', () => {
    it('resolves parents by key, whatever the registration order', () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      const child = new MappingEntry({ x: 1 }, { parentKey: 'P1' });
      const parent = new MappingEntry({ code: 'P1' }, { identifierField: 'code' });
      const childId = builder.register(child);
      const parentId = builder.register(parent);

      const tree = builder.buildTree();

      expect(tree.parents.get(childId)).toBe(parentId);
      expect(tree.roots).toEqual([parentId]);
      expect(builder.children(parentId)).toEqual([child]);
      expect(builder.findByKey('P1')).toBe(parent);
      expect(builder.findByKey('P2')).toBeUndefined();
    });

    it('lists children by parent id in registration order', async () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      const folder = await builder.addDirectory('Folder');
      const first = await builder.addMapping({ n: 1 }, 'text/plain', folder);
      const second = await builder.addMapping({ n: 2 }, 'text/plain', folder);

      expect(builder.children(folder).map((entry) => entry.id)).toEqual([first, second]);
      expect(builder.children(first)).toEqual([]);
    });

    it('fails on a parent id that was never registered', async () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      const missing = 'f'.repeat(40);
      const id = await builder.addMapping({ a: 1 }, 'text/plain', missing);

      expect(() => builder.buildTree()).toThrow(DanglingParentReferenceError);
      expect(() => builder.buildTree()).toThrow(`Entry ${id} references missing parent ${missing}`);
    });

    it('fails on a parent key nothing carries', () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      builder.register(new MappingEntry({ a: 1 }, { parentKey: 'nope' }));

      expect(() => builder.buildTree()).toThrow(/missing parent with key "nope"/);
    });

    it('fails on an entry that is its own parent', () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      builder.register(new MappingEntry({ code: 'S' }, { identifierField: 'code', parentKey: 'S' }));

      expect(() => builder.buildTree()).toThrow(CyclicParentReferenceError);
    });

    it('fails on a longer cycle', () => {
      const builder = createLoadFileBuilder({ logger: silentLogger });
      const a = builder.register(
        new MappingEntry({ code: 'A' }, { identifierField: 'code', parentKey: 'B' })
      );
      const b = builder.register(
        new MappingEntry({ code: 'B' }, { identifierField: 'code', parentKey: 'A' })
      );

      let failure: unknown;
      try {
        builder.buildTree();
      } catch (error) {
        failure = error;
      }

      expect(failure).toBeInstanceOf(CyclicParentReferenceError);
      expect(failure).toMatchObject({ cycle: [a, b, a] });
    });
  });

  describe('output', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'loadfile-builder-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes a standalone load file that points at files on disk', async () => {
      const file = path.join(dir, 'memo.txt');
      await writeFile(file, 'memo');
      const { writer, files } = createInMemoryWriter();
      const builder = createLoadFileBuilder({ logger: silentLogger, writer });
      await builder.addFile(file);
      await builder.addMapping({ a: 1 }, 'text/plain');

      const written = await builder.saveLoadFile(path.join(dir, 'out', 'load.xml'));

      expect(written).toBe(path.join(dir, 'out', 'load.xml'));
      const xml = String(files.get(written));
      expect(xml).toContain(`<LocationURI>${pathToFileURL(file).href}</LocationURI>`);
      expect(xml).toContain('<Description>Location on disk</Description>');
      expect(xml).toContain(`FilePath="${dir}" FileName="memo.txt"`);
      expect(xml.match(/<ExternalFile /g)).toHaveLength(1);
    });

    it('packages natives, manifest and properties into one container', async () => {
      const report = path.join(dir, 'report.txt');
      await writeFile(report, 'quarterly');
      const destination = path.join(dir, 'case.zip');
      const builder = createLoadFileBuilder({
        logger: silentLogger,
        config: { caseNumber: 'C-7', examiner: 'Examiner One' },
        now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6)),
      });
      const evidence = await builder.addDirectory('Evidence');
      await builder.addFile(report, undefined, evidence);
      await builder.addMapping({ a: '1', b: '2' }, 'text/plain', evidence);

      const summary = await builder.save(destination);
      const members = unzipSync(await readFile(destination));

      expect(Object.keys(members)).toEqual([
        'Evidence/',
        'Evidence/report.txt',
        'Evidence/1',
        '._metadata/image_contents.xml',
        '._metadata/image_metadata.xml',
        '._metadata/image_contents.sha1_hash',
      ]);
      expect(summary).toMatchObject({ directoryCount: 1, nativeCount: 2, entryCount: 6 });

      const byName = new Map(
        Object.entries(members).map(([name, data]) => [name, Buffer.from(data)])
      );
      expect(byName.get('Evidence/report.txt')?.toString('utf8')).toBe('quarterly');
      expect(byName.get('Evidence/1')?.toString('utf8')).toBe('a: 1\nb: 2');

      const manifest = byName.get('._metadata/image_contents.xml');
      const manifestText = manifest?.toString('utf8') ?? '';
      expect(manifestText).toContain('<LocationURI>Evidence/report.txt</LocationURI>');
      expect(manifestText).toContain('<Description>Location within container</Description>');
      expect(byName.get('._metadata/image_contents.sha1_hash')?.toString('hex')).toBe(
        createHash('sha1').update(manifestText, 'utf8').digest('hex')
      );

      const properties = byName.get('._metadata/image_metadata.xml')?.toString('utf8') ?? '';
      expect(properties).toContain('<property key="case-number" value="C-7"/>');
      expect(properties).toContain('<property key="examiner-name" value="Examiner One"/>');
      expect(properties).toContain(
        '<property key="creation-datetime" value="2024/01/02 03:04:05.006 UTC"/>'
      );
    });

    it('leaves no container behind when a native disappears before saving', async () => {
      const source = path.join(dir, 'source');
      const output = path.join(dir, 'output');
      await mkdir(source);
      await mkdir(output);
      const native = path.join(source, 'gone.txt');
      await writeFile(native, 'soon gone');
      const builder = createLoadFileBuilder({ logger: silentLogger });
      await builder.addFile(native);
      await rm(native);

      const destination = path.join(output, 'case.zip');
      const failure = await builder.save(destination).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(PackagingIOError);
      expect(failure).toMatchObject({ path: native });
      expect(await readdir(output)).toEqual([]);
    });

    it('leaves an earlier container untouched when saving fails', async () => {
      const destination = path.join(dir, 'case.zip');
      await writeFile(destination, 'previous container');
      const builder = createLoadFileBuilder({ logger: silentLogger });
      await builder.addMapping({ a: 1 }, 'text/plain', 'f'.repeat(40));

      await expect(builder.save(destination)).rejects.toBeInstanceOf(DanglingParentReferenceError);
      expect(await readFile(destination, 'utf8')).toBe('previous container');
      expect((await stat(destination)).isFile()).toBe(true);
    });
  });
});

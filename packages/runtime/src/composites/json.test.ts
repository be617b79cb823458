import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { isStandardFieldName, silentLogger } from '@loadfile/protocol';
import {
  JsonArrayEntry,
  JsonFileEntry,
  JsonObjectEntry,
  JsonValueEntry,
  JSON_OBJECT_MIME_TYPE,
  scalarText,
} from './json.js';
import { createLoadFileBuilder, type LoadFileBuilder } from '../builder/builder.js';
import { MalformedSourceDocumentError } from '../errors.js';

describe('JsonFileEntry', () => {
  let dir: string;
  let builder: LoadFileBuilder;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'loadfile-json-'));
    builder = createLoadFileBuilder({ logger: silentLogger });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function jsonFile(content: string, name = 'doc.json'): Promise<string> {
    const file = path.join(dir, name);
    await writeFile(file, content);
    return file;
  }

  it('turns an array into an entry with indexed fields and nested children', async () => {
    const file = await jsonFile('[1,"x",[2,3]]');

    const fileId = await builder.addEntry(new JsonFileEntry(file));

    const [array] = builder.children(fileId);
    expect(array).toBeInstanceOf(JsonArrayEntry);
    expect(array.name).toBe('JSON Array');
    expect(array.dataFields().map((field) => [field.name, field.render()])).toEqual([
      ['0', '1'],
      ['1', 'x'],
    ]);
    expect(array.text()).toBe('1, x');

    const nested = array.id === undefined ? [] : builder.children(array.id);
    expect(nested).toHaveLength(1);
    expect(nested[0]).toBeInstanceOf(JsonArrayEntry);
    expect(nested[0].name).toBe('2');
    expect(nested[0].text()).toBe('2, 3');
  });

  it('registers nodes breadth-first', async () => {
    const file = await jsonFile('{"a":{"b":{"c":1}},"d":[1]}');

    await builder.addEntry(new JsonFileEntry(file));

    expect(builder.entries().map((entry) => entry.name)).toEqual([
      'doc.json',
      'JSON Object',
      'a',
      'd',
      'b',
    ]);
  });

  it('keeps member order when keys look like integers', async () => {
    const file = await jsonFile('{"b":"1","10":"2","a":"3","2":"4"}');
    const entry = new JsonFileEntry(file);

    const fileId = await builder.addEntry(entry);

    const [object] = builder.children(fileId);
    expect(object.dataFields().map((field) => field.name)).toEqual(['b', '10', 'a', '2']);
    expect(object.text()).toBe('b: 1\n10: 2\na: 3\n2: 4');
    expect(entry.document).toEqual({ b: '1', 10: '2', a: '3', 2: '4' });
  });

  it('keeps the first position and last value of a repeated key', async () => {
    const file = await jsonFile('{"k":"1","j":"2","k":"3"}');

    const fileId = await builder.addEntry(new JsonFileEntry(file));

    const [object] = builder.children(fileId);
    expect(object.dataFields().map((field) => [field.name, field.render()])).toEqual([
      ['k', '3'],
      ['j', '2'],
    ]);
  });

  it('names nested children by key in file order', async () => {
    const file = await jsonFile('{"9":{"x":1},"1":{"y":2}}');

    await builder.addEntry(new JsonFileEntry(file));

    expect(builder.entries().map((entry) => entry.name)).toEqual([
      'doc.json',
      'JSON Object',
      '9',
      '1',
    ]);
  });

  it('keeps the scalar members of an object in the manifest', async () => {
    const file = await jsonFile(
      '{"city":"Oslo","2024":"yes","zip":"0150","active":true,"7":3,"ratio":0.25}'
    );
    const fileId = await builder.addEntry(new JsonFileEntry(file));
    const [object] = builder.children(fileId);
    const expected = [
      ['city', 'Oslo'],
      ['2024', 'yes'],
      ['zip', '0150'],
      ['active', 'true'],
      ['7', '3'],
      ['ratio', '0.25'],
    ];

    const manifest = builder.buildManifest('container');
    const record = manifest.records.find((candidate) => candidate.id === object.id);
    const pairs = record?.fields
      .filter((field) => !isStandardFieldName(field.name))
      .map((field) => [field.name, field.value]);

    expect(object.mimeType).toBe(JSON_OBJECT_MIME_TYPE);
    expect(pairs).toEqual(expected);

    const xml = builder.renderManifest('container');
    for (const [name, value] of expected) {
      const key = manifest.fieldDefinitions.find((definition) => definition.name === name)?.key;
      expect(xml).toContain(`<${key}>${value}</${key}>`);
    }
  });

  it('turns a scalar document into a value entry', async () => {
    const file = await jsonFile('"hello"');

    const fileId = await builder.addEntry(new JsonFileEntry(file));

    const [value] = builder.children(fileId);
    expect(value).toBeInstanceOf(JsonValueEntry);
    expect(value.name).toBe('JSON Value');
    expect(value.getField('Value')?.value).toBe('hello');
    expect(value.text()).toBe('hello');
  });

  it('writes null as text but leaves its field empty', async () => {
    const file = await jsonFile('null');

    const fileId = await builder.addEntry(new JsonFileEntry(file));

    const [value] = builder.children(fileId);
    expect(value.text()).toBe('null');
    expect(value.getField('Value')?.render()).toBe('');
  });

  it('reads a document with a byte order mark', async () => {
    const file = await jsonFile('\ufeff{"k":"v"}');
    const entry = new JsonFileEntry(file);

    await builder.addEntry(entry);

    expect(entry.document).toEqual({ k: 'v' });
  });

  it('uses replacement factories', async () => {
    const file = await jsonFile('{"k":"v"}');
    const entry = new JsonFileEntry(file, {
      factories: {
        object: (name, scalars, parentId) =>
          new JsonObjectEntry(name, scalars, { parentId, mimeType: 'application/x-custom' }),
      },
    });

    const fileId = await builder.addEntry(entry);

    expect(builder.children(fileId).map((child) => child.mimeType)).toEqual([
      'application/x-custom',
    ]);
  });

  it('rejects malformed JSON and keeps the parser error', async () => {
    const file = await jsonFile('{"a":');

    const failure = await builder.addEntry(new JsonFileEntry(file)).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(MalformedSourceDocumentError);
    expect(failure).toMatchObject({ format: 'json', path: file });
    const cause = failure instanceof Error ? failure.cause : undefined;
    expect(cause).toBeInstanceOf(SyntaxError);
    expect(cause instanceof Error ? cause.message : '').toMatch(/^ValueExpected at offset \d+$/);
    expect(builder.size).toBe(0);
  });

  it('rejects comments', async () => {
    const file = await jsonFile('{"a":1 // note\n}');

    await expect(builder.addEntry(new JsonFileEntry(file))).rejects.toBeInstanceOf(
      MalformedSourceDocumentError
    );
  });

  it('rejects an empty file', async () => {
    const file = await jsonFile('');

    await expect(builder.addEntry(new JsonFileEntry(file))).rejects.toBeInstanceOf(
      MalformedSourceDocumentError
    );
  });
});

describe('scalarText', () => {
  it('writes scalars as text', () => {
    expect(scalarText(null)).toBe('null');
    expect(scalarText(false)).toBe('false');
    expect(scalarText(2.5)).toBe('2.5');
    expect(scalarText('x')).toBe('x');
  });
});

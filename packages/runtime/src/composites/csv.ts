// CSV composite
//
// A CSV file registers itself and then one row entry per data row. Rows land
// under a directory named after the CSV in the container.

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import {
  prefixPath,
  ValidationError,
  type FieldPairs,
  type FieldRecord,
  type Id,
} from '@loadfile/protocol';
import { PackagingIOError } from '@loadfile/container';
import { FileEntry, type FileEntryOptions } from '../entries/file.js';
import { MappingEntry, type MappingEntryOptions } from '../entries/mapping.js';
import type { Entry, EntryRegistrar } from '../entries/entry.js';
import { MalformedSourceDocumentError } from '../errors.js';

export const CSV_MIME_TYPE = 'text/csv';
export const CSV_ROW_MIME_TYPE = 'application/x-database-table-row';

/**
 * Builds the entry for row `index` of `csv`. The CSV entry is already
 * registered when this runs, so `csv.id` is set.
 */
export type RowGenerator = (csv: CsvEntry, index: number) => Entry;

export type CsvEntryOptions = Omit<FileEntryOptions, 'mimeType'> & {
  rowGenerator?: RowGenerator;
  /** Cell delimiter (default `,`) */
  delimiter?: string;
};

export class CsvEntry extends FileEntry {
  private readonly rowGenerator: RowGenerator;
  private readonly delimiter: string;
  private table: { header: string[]; rows: string[][] } | undefined;

  constructor(filePath: string, options: CsvEntryOptions = {}) {
    super(filePath, { ...options, mimeType: CSV_MIME_TYPE });
    this.rowGenerator = options.rowGenerator ?? ((csv, index) => new CsvRowEntry(csv, index));
    this.delimiter = options.delimiter ?? ',';
  }

  /**
   * Stat, hash and parse the file.
   *
   * @throws MalformedSourceDocumentError when the file is not valid CSV
   */
  async load(): Promise<void> {
    await super.load();
    if (this.table) return;

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new PackagingIOError(this.filePath, 'cannot read CSV file', error);
    }

    let records: string[][];
    try {
      records = parse(content, {
        bom: true,
        delimiter: this.delimiter,
        skip_empty_lines: true,
      });
    } catch (error) {
      throw new MalformedSourceDocumentError(this.filePath, 'csv', error);
    }

    const [header = [], ...rows] = records;
    this.table = { header, rows };
  }

  get header(): string[] {
    return [...this.loaded().header];
  }

  get rowCount(): number {
    return this.loaded().rows.length;
  }

  /**
   * Row `index` as (column, cell) pairs in column order
   */
  rowFields(index: number): FieldPairs {
    const { header, rows } = this.loaded();
    const cells = rows[index];
    if (!cells) {
      throw new RangeError(`CSV ${this.filePath} has no row ${index}`);
    }
    return header.map((column, columnIndex): [string, string] => [
      column,
      cells[columnIndex] ?? '',
    ]);
  }

  /**
   * Row `index` as a record keyed by the header
   */
  row(index: number): FieldRecord {
    return Object.fromEntries(this.rowFields(index));
  }

  addAsParentPath(existingPath: string): string {
    return prefixPath(this.name, existingPath);
  }

  /**
   * Register the CSV file, then one entry per row in row order
   */
  async addToBuilder(builder: EntryRegistrar): Promise<Id> {
    await this.load();
    const id = builder.register(this);

    for (let index = 0; index < this.rowCount; index++) {
      await builder.addEntry(this.rowGenerator(this, index));
    }

    builder.logger.info('Expanded CSV rows', { id, path: this.filePath, rows: this.rowCount });
    return id;
  }

  private loaded(): { header: string[]; rows: string[][] } {
    if (!this.table) {
      throw new ValidationError(`CSV ${this.filePath} has not been loaded`);
    }
    return this.table;
  }
}

export type CsvRowEntryOptions = Omit<MappingEntryOptions, 'mimeType'> & {
  mimeType?: string;
};

/**
 * One CSV row: a mapping whose fields are the row's cells as text, named
 * by the header. Named after the row index unless configured otherwise.
 */
export class CsvRowEntry extends MappingEntry {
  readonly rowIndex: number;

  constructor(csv: CsvEntry, rowIndex: number, options: CsvRowEntryOptions = {}) {
    super(csv.rowFields(rowIndex), {
      ...options,
      mimeType: options.mimeType ?? CSV_ROW_MIME_TYPE,
      parentId: options.parentId ?? csv.id,
    });
    this.rowIndex = rowIndex;
  }

  protected defaultName(): string {
    return String(this.rowIndex);
  }
}

// Filesystem and in-memory implementations of ContainerWriter.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ContainerWriter } from './types.js';

/**
 * Create a ContainerWriter that writes to the local filesystem.
 */
export function createFilesystemWriter(): ContainerWriter {
  return {
    async writeFile(filePath: string, content: string | Uint8Array): Promise<void> {
      await fs.mkdir(path.dirname(filePath), { recursive: true });

      if (typeof content === 'string') {
        await fs.writeFile(filePath, content, 'utf-8');
      } else {
        await fs.writeFile(filePath, content);
      }
    },
  };
}

/**
 * Create an in-memory ContainerWriter for testing.
 * Returns the writer and the files written through it, keyed by path.
 */
export function createInMemoryWriter(): {
  writer: ContainerWriter;
  files: Map<string, string | Uint8Array>;
} {
  const files = new Map<string, string | Uint8Array>();

  const writer: ContainerWriter = {
    async writeFile(filePath: string, content: string | Uint8Array): Promise<void> {
      files.set(filePath, typeof content === 'string' ? content : content.slice());
    },
  };

  return { writer, files };
}

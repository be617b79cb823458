// Container storage abstractions
// Lets the standalone load file and tests write without touching a real disk.

import type { BuildLogger } from '@loadfile/protocol';

/**
 * Abstraction for writing container and load-file outputs.
 * Implementations can write to the local filesystem or to memory.
 */
export interface ContainerWriter {
  /**
   * Write a file with the given content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string | Uint8Array): Promise<void>;
}

/**
 * Everything that goes into one container besides the natives themselves
 */
export type PackInput = {
  manifestXml: string;
  propertiesXml: string;
};

/**
 * Options for packaging.
 */
export type PackOptions = {
  logger?: BuildLogger;

  /**
   * Modification time recorded for generated members (metadata files,
   * directories and mapping text).
   * @default now
   */
  packedAt?: Date;
};

/**
 * Summary of a packaging operation.
 */
export type PackSummary = {
  destination: string;
  directoryCount: number;
  nativeCount: number;
  entryCount: number;
  bytesWritten: number;
  manifestHash: string;
  packedAt: string;
};

// Hash table barrel export and factory function.

import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Logger } from 'pino';

import { digestAlgorithm } from '../cas/address.js';
import type { StorageConfig } from '../config/schema.js';
import { StorageIoError, errorMessage } from '../errors/index.js';

import { FileTable } from './file-table.js';
import { MemTable } from './mem-table.js';
import type { HashTable } from './types.js';

export type { CorruptMetaPolicy, HashTable } from './types.js';
export type { FileTableOptions, Table } from './file-table.js';
export type { MemTableOptions } from './mem-table.js';
export { FileTable } from './file-table.js';
export { MemTable } from './mem-table.js';

/**
 * Create a hash table from the storage config section.
 * A relative `rootDir` resolves against the working directory.
 */
export async function createHashTable(config: StorageConfig, logger?: Logger): Promise<HashTable> {
  const digest = digestAlgorithm(config.digest);

  switch (config.backend) {
    case 'memory':
      return new MemTable({ digest, logger });
    case 'file':
    default: {
      const rootDir = resolve(config.rootDir);
      if (config.createRootDir) {
        try {
          await mkdir(rootDir, { recursive: true });
        } catch (error) {
          throw new StorageIoError(rootDir, errorMessage(error));
        }
      }
      const table = await FileTable.open(rootDir, {
        digest,
        onCorruptMeta: config.onCorruptMeta,
        logger,
      });
      logger?.info(
        { backend: config.backend, path: table.path, digest: digest.name },
        'Hash table opened'
      );
      return table;
    }
  }
}

import { existsSync } from 'node:fs';
import { mkdtemp, realpath, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { SHA2_512 } from '@/cas/address.js';
import { StorageConfigSchema } from '@/config/schema.js';
import { FileTable, MemTable, createHashTable } from '@/hash-table/index.js';

import { testEntry } from '../../helpers/fixtures.js';

describe('createHashTable()', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'hash-table-factory-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should create a MemTable for the memory backend', async () => {
    const table = await createHashTable(StorageConfigSchema.parse({ backend: 'memory' }));

    expect(table).toBeInstanceOf(MemTable);
  });

  it('should open a FileTable at the configured root', async () => {
    const table = await createHashTable(StorageConfigSchema.parse({ rootDir: testDir }));

    expect(table).toBeInstanceOf(FileTable);
    expect(table).toMatchObject({ path: await realpath(testDir) });
  });

  it('should create the root directory when asked to', async () => {
    const rootDir = join(testDir, 'nested', 'root');
    const table = await createHashTable(
      StorageConfigSchema.parse({ rootDir, createRootDir: true })
    );

    expect(existsSync(rootDir)).toBe(true);
    await table.putEntry(testEntry());
    expect(await table.entry(testEntry().address())).toEqual(testEntry());
  });

  it('should throw TablePathError for a missing root directory', async () => {
    const rootDir = join(testDir, 'missing');

    await expect(createHashTable(StorageConfigSchema.parse({ rootDir }))).rejects.toMatchObject({
      code: 'TABLE_PATH_INVALID',
    });
  });

  it('should pass the configured digest to the table', async () => {
    const table = await createHashTable(
      StorageConfigSchema.parse({ backend: 'memory', digest: 'sha2-512' })
    );
    const entry = testEntry();
    await table.putEntry(entry);

    expect(await table.entry(entry.address())).toBeNull();
    expect(await table.entry(entry.address(SHA2_512))).toEqual(entry);
  });
});

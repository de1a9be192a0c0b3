import { describe, it, expect } from 'vitest';

import { SHA2_512 } from '@/cas/address.js';
import { EntryMeta } from '@/entry/entry-meta.js';
import { MemTable } from '@/hash-table/mem-table.js';

import { testEntry, testEntryB, testMeta } from '../../helpers/fixtures.js';
import { standardSuite } from '../../helpers/standard-suite.js';

describe('MemTable', () => {
  describe('standard suite', () => {
    standardSuite(async () => ({ table: new MemTable() }));
  });

  it('should hand out fresh copies rather than stored instances', async () => {
    const table = new MemTable();
    const entry = testEntry();
    await table.putEntry(entry);

    const first = await table.entry(entry.address());
    const second = await table.entry(entry.address());

    expect(first).toEqual(entry);
    expect(first).not.toBe(entry);
    expect(first).not.toBe(second);
  });

  it('should keep tables independent', async () => {
    const a = new MemTable();
    const b = new MemTable();
    await a.assertMeta(testMeta());

    expect(await a.metasFromEntry(testEntry())).toEqual([testMeta()]);
    expect(await b.metasFromEntry(testEntry())).toEqual([]);
  });

  it('should use the configured digest for addresses', async () => {
    const table = new MemTable({ digest: SHA2_512 });
    const entry = testEntryB();
    const meta = new EntryMeta('agentA', entry.address(SHA2_512), 'color', 'red');

    await table.putEntry(entry);
    await table.assertMeta(meta);

    expect(await table.entry(entry.address(SHA2_512))).toEqual(entry);
    expect(await table.entry(entry.address())).toBeNull();
    expect(await table.getMeta(meta.address(SHA2_512))).toEqual(meta);
    expect(await table.metasFromEntry(entry)).toEqual([meta]);
  });
});

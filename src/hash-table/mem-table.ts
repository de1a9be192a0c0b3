// In-memory hash table.
//
// Holds content strings rather than live objects, so every read decodes a
// fresh value just like the file backend. A secondary index from entry
// address to meta addresses answers metasFromEntry without a scan.

import type { Logger } from 'pino';

import {
  DEFAULT_DIGEST,
  type Address,
  type Content,
  type DigestAlgorithm,
} from '../cas/address.js';
import { Entry } from '../entry/entry.js';
import { EntryMeta, compareEntryMeta } from '../entry/entry-meta.js';
import { silentLogger } from '../logger.js';

import type { HashTable } from './types.js';

export interface MemTableOptions {
  /** Digest used to derive addresses (default: sha2-256) */
  digest?: DigestAlgorithm;
  logger?: Logger;
}

export class MemTable implements HashTable {
  private readonly entries = new Map<Address, Content>();
  private readonly metas = new Map<Address, Content>();
  private readonly metaIndex = new Map<Address, Set<Address>>();
  private readonly digest: DigestAlgorithm;
  private readonly log: Logger;

  constructor(options: MemTableOptions = {}) {
    this.digest = options.digest ?? DEFAULT_DIGEST;
    this.log = options.logger ?? silentLogger();
  }

  async putEntry(entry: Entry): Promise<void> {
    const address = entry.address(this.digest);
    this.entries.set(address, entry.content());
    this.log.debug({ table: 'entries', address }, 'Content stored');
  }

  async entry(address: Address): Promise<Entry | null> {
    const content = this.entries.get(address);
    return content === undefined ? null : Entry.fromContent(content);
  }

  async assertMeta(meta: EntryMeta): Promise<void> {
    const address = meta.address(this.digest);
    this.metas.set(address, meta.content());

    // The meta address covers the entry address, so an overwrite never
    // moves a meta to a different entry
    let addresses = this.metaIndex.get(meta.entryAddress());
    if (!addresses) {
      addresses = new Set();
      this.metaIndex.set(meta.entryAddress(), addresses);
    }
    addresses.add(address);
    this.log.debug({ table: 'metas', address }, 'Content stored');
  }

  async getMeta(address: Address): Promise<EntryMeta | null> {
    const content = this.metas.get(address);
    return content === undefined ? null : EntryMeta.fromContent(content);
  }

  async metasFromEntry(entry: Entry): Promise<EntryMeta[]> {
    const addresses = this.metaIndex.get(entry.address(this.digest)) ?? new Set<Address>();
    const metas: EntryMeta[] = [];
    for (const address of addresses) {
      const meta = await this.getMeta(address);
      if (meta) {
        metas.push(meta);
      }
    }
    return metas.sort(compareEntryMeta);
  }
}

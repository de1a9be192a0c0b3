// Abstract hash table interface.
//
// Entries are stored under their own content address; metadata is stored
// under the address of its (entry, attribute) pair. Backends are
// interchangeable: file, in-memory, or anything else that keeps these
// semantics.

import type { Address } from '../cas/address.js';
import type { Entry } from '../entry/entry.js';
import type { EntryMeta } from '../entry/entry-meta.js';

/**
 * Storage for entries and the metadata asserted about them.
 *
 * Lookups resolve to `null` when nothing is stored at an address. Every
 * other failure rejects with a typed error (STORAGE_IO_ERROR,
 * CONTENT_DECODE_ERROR, CONTENT_ADDRESS_MISMATCH). Writers in one process
 * must not overlap; implementations do no locking.
 */
export interface HashTable {
  /** Store an entry under its own address. Rewriting the same entry is a no-op. */
  putEntry(entry: Entry): Promise<void>;

  /** Entry stored at `address`, or null */
  entry(address: Address): Promise<Entry | null>;

  /** Store metadata, replacing whatever was asserted for the same entry and attribute */
  assertMeta(meta: EntryMeta): Promise<void>;

  /** Metadata stored at the meta's own address, or null */
  getMeta(address: Address): Promise<EntryMeta | null>;

  /** All metadata about `entry`, sorted by entry address, attribute, value */
  metasFromEntry(entry: Entry): Promise<EntryMeta[]>;
}

/**
 * What a metadata query does with a stored file that cannot be decoded:
 * `fail` rejects the whole query, `skip` logs it and leaves it out.
 */
export type CorruptMetaPolicy = 'fail' | 'skip';

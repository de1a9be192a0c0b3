// Filesystem hash table.
//
// Layout under the table root:
//   entries/<address>.json
//   metas/<address>.json
// Each file holds the raw content of one item. Subdirectories are created
// on first use.

import { constants } from 'node:fs';
import { access, mkdir, readdir, readFile, realpath, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import type { Logger } from 'pino';

import {
  DEFAULT_DIGEST,
  isAddress,
  type Address,
  type Content,
  type DigestAlgorithm,
} from '../cas/address.js';
import type { AddressableContent, ContentDecoder } from '../cas/types.js';
import { Entry } from '../entry/entry.js';
import { EntryMeta, compareEntryMeta } from '../entry/entry-meta.js';
import {
  ContentAddressMismatchError,
  ContentDecodeError,
  StorageIoError,
  TablePathError,
  errorMessage,
  isDecodeError,
  isNotFoundError,
} from '../errors/index.js';
import { silentLogger } from '../logger.js';

import type { CorruptMetaPolicy, HashTable } from './types.js';

export type Table = 'entries' | 'metas';

const CONTENT_EXTENSION = '.json';

export interface FileTableOptions {
  /** Digest used to derive addresses (default: sha2-256) */
  digest?: DigestAlgorithm;
  /** Handling of undecodable files during a metadata scan (default: fail) */
  onCorruptMeta?: CorruptMetaPolicy;
  logger?: Logger;
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const dirent of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      files.push(...(await listFiles(path)));
    } else if (dirent.isFile()) {
      files.push(path);
    }
  }
  return files;
}

export class FileTable implements HashTable {
  /** Canonical absolute path of the table root */
  readonly path: string;
  private readonly digest: DigestAlgorithm;
  private readonly onCorruptMeta: CorruptMetaPolicy;
  private readonly log: Logger;

  private constructor(path: string, options: FileTableOptions) {
    this.path = path;
    this.digest = options.digest ?? DEFAULT_DIGEST;
    this.onCorruptMeta = options.onCorruptMeta ?? 'fail';
    this.log = options.logger ?? silentLogger();
  }

  /**
   * Open a table rooted at an existing directory. The path is canonicalized
   * once here and not checked again afterwards.
   * @throws {TablePathError} if the path is missing, not a directory, or not readable and writable
   */
  static async open(path: string, options: FileTableOptions = {}): Promise<FileTable> {
    let canonical: string;
    try {
      canonical = await realpath(path);
    } catch (error) {
      throw new TablePathError(path, errorMessage(error));
    }

    let isDirectory: boolean;
    try {
      isDirectory = (await stat(canonical)).isDirectory();
    } catch (error) {
      throw new TablePathError(path, errorMessage(error));
    }
    if (!isDirectory) {
      throw new TablePathError(path, 'not a directory');
    }

    try {
      await access(canonical, constants.R_OK | constants.W_OK);
    } catch (error) {
      throw new TablePathError(path, errorMessage(error));
    }

    return new FileTable(canonical, options);
  }

  /** Directory of `table`, created if missing. */
  async dir(table: Table): Promise<string> {
    const dir = join(this.path, table);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new StorageIoError(dir, errorMessage(error));
    }
    return dir;
  }

  /** File path holding the content stored at `address` in `table`. */
  async contentPath(table: Table, address: Address): Promise<string> {
    return join(await this.dir(table), `${address}${CONTENT_EXTENSION}`);
  }

  /** Write the content of `item` under its address, replacing any existing file. */
  async upsert(table: Table, item: AddressableContent): Promise<void> {
    const address = item.address(this.digest);
    const path = await this.contentPath(table, address);
    try {
      await writeFile(path, item.content(), 'utf-8');
    } catch (error) {
      throw new StorageIoError(path, errorMessage(error));
    }
    this.log.debug({ table, address }, 'Content stored');
  }

  /** Raw content stored at `address` in `table`, or null if there is none. */
  async lookup(table: Table, address: Address): Promise<Content | null> {
    // Anything outside the address alphabet could point outside the table
    if (!isAddress(address)) {
      return null;
    }
    return this.readContent(await this.contentPath(table, address));
  }

  async putEntry(entry: Entry): Promise<void> {
    await this.upsert('entries', entry);
  }

  async entry(address: Address): Promise<Entry | null> {
    return this.load('entries', Entry, address);
  }

  async assertMeta(meta: EntryMeta): Promise<void> {
    await this.upsert('metas', meta);
  }

  async getMeta(address: Address): Promise<EntryMeta | null> {
    return this.load('metas', EntryMeta, address);
  }

  /**
   * Scans every file under the metas directory and keeps the metadata about
   * `entry`. Cost grows with the total amount of stored metadata; there is no
   * index from entry to metadata on disk.
   */
  async metasFromEntry(entry: Entry): Promise<EntryMeta[]> {
    const entryAddress = entry.address(this.digest);
    const dir = await this.dir('metas');

    let files: string[];
    try {
      files = await listFiles(dir);
    } catch (error) {
      throw new StorageIoError(dir, errorMessage(error));
    }

    const metas: EntryMeta[] = [];
    for (const file of files) {
      // Only <address>.json files belong to the table
      if (extname(file) !== CONTENT_EXTENSION) {
        continue;
      }

      let meta: EntryMeta | null;
      try {
        meta = await this.loadMetaFile(file);
      } catch (error) {
        if (this.onCorruptMeta === 'skip' && isDecodeError(error)) {
          this.log.warn({ file, err: error }, 'Skipping undecodable metadata file');
          continue;
        }
        throw error;
      }

      if (meta && meta.entryAddress() === entryAddress) {
        metas.push(meta);
      }
    }

    metas.sort(compareEntryMeta);
    this.log.debug(
      { entryAddress, scanned: files.length, matched: metas.length },
      'Metadata scan complete'
    );
    return metas;
  }

  private async loadMetaFile(file: string): Promise<EntryMeta | null> {
    const stem = basename(file, CONTENT_EXTENSION);
    if (!isAddress(stem)) {
      throw new ContentDecodeError(
        EntryMeta.contentName,
        `file name ${basename(file)} is not an address`
      );
    }

    const content = await this.readContent(file);
    if (content === null) {
      return null;
    }
    return this.verify(EntryMeta, stem, content);
  }

  private async load<T extends AddressableContent>(
    table: Table,
    decoder: ContentDecoder<T>,
    address: Address
  ): Promise<T | null> {
    const content = await this.lookup(table, address);
    if (content === null) {
      this.log.debug({ table, address }, 'Content not found');
      return null;
    }
    return this.verify(decoder, address, content);
  }

  /** Decode `content` and check that it hashes back to `address`. */
  private verify<T extends AddressableContent>(
    decoder: ContentDecoder<T>,
    address: Address,
    content: Content
  ): T {
    const item = decoder.fromContent(content);
    const actual = item.address(this.digest);
    if (actual !== address) {
      throw new ContentAddressMismatchError(address, actual);
    }
    return item;
  }

  private async readContent(path: string): Promise<Content | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw new StorageIoError(path, errorMessage(error));
    }
  }
}

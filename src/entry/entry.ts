import { z } from 'zod';

import {
  addressFromContent,
  DEFAULT_DIGEST,
  type Address,
  type Content,
  type DigestAlgorithm,
} from '../cas/address.js';
import { parseJsonContent } from '../cas/decode.js';
import type { AddressableContent } from '../cas/types.js';

const EntryContentSchema = z.object({
  entry_type: z.string(),
  value: z.string(),
});

/**
 * An immutable unit of application data. It has no identity beyond its
 * content: the address is the digest of `content()`.
 */
export class Entry implements AddressableContent {
  static readonly contentName = 'Entry';

  readonly entryType: string;
  readonly value: string;

  constructor(entryType: string, value: string) {
    this.entryType = entryType;
    this.value = value;
  }

  static fromContent(content: Content): Entry {
    const parsed = parseJsonContent(EntryContentSchema, content, Entry.contentName);
    return new Entry(parsed.entry_type, parsed.value);
  }

  address(algorithm: DigestAlgorithm = DEFAULT_DIGEST): Address {
    return addressFromContent(this.content(), algorithm);
  }

  content(): Content {
    return JSON.stringify({ entry_type: this.entryType, value: this.value });
  }

  equals(other: Entry): boolean {
    return this.content() === other.content();
  }
}


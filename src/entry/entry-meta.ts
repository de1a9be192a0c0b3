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

const EntryMetaContentSchema = z.object({
  entry_address: z.string(),
  attribute: z.string(),
  value: z.string(),
  source: z.string(),
});

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * An entity-attribute-value assertion about a stored entry.
 *
 * - entry address: the entity, i.e. the address of the entry described
 * - attribute: name of the asserted attribute
 * - value: value of the asserted attribute
 * - source: the agent making the assertion
 *
 * The address covers only entry address and attribute, so one slot holds the
 * latest value asserted for a given (entry, attribute) pair.
 */
export class EntryMeta implements AddressableContent {
  static readonly contentName = 'EntryMeta';

  private readonly entryAddressValue: Address;
  private readonly attributeValue: string;
  private readonly valueValue: string;
  private readonly sourceValue: string;

  constructor(source: string, entryAddress: Address, attribute: string, value: string) {
    this.sourceValue = source;
    this.entryAddressValue = entryAddress;
    this.attributeValue = attribute;
    this.valueValue = value;
  }

  static fromContent(content: Content): EntryMeta {
    const parsed = parseJsonContent(EntryMetaContentSchema, content, EntryMeta.contentName);
    return new EntryMeta(parsed.source, parsed.entry_address, parsed.attribute, parsed.value);
  }

  /** Address of the meta slot for `attribute` on the entry at `entryAddress`. */
  static makeAddress(
    entryAddress: Address,
    attribute: string,
    algorithm: DigestAlgorithm = DEFAULT_DIGEST
  ): Address {
    return addressFromContent(entryAddress + attribute, algorithm);
  }

  entryAddress(): Address {
    return this.entryAddressValue;
  }

  attribute(): string {
    return this.attributeValue;
  }

  value(): string {
    return this.valueValue;
  }

  source(): string {
    return this.sourceValue;
  }

  address(algorithm: DigestAlgorithm = DEFAULT_DIGEST): Address {
    return EntryMeta.makeAddress(this.entryAddressValue, this.attributeValue, algorithm);
  }

  content(): Content {
    // Key order is part of the stored format
    return JSON.stringify({
      entry_address: this.entryAddressValue,
      attribute: this.attributeValue,
      value: this.valueValue,
      source: this.sourceValue,
    });
  }

  /** Sort order: entry address, then attribute, then value. Source is ignored. */
  compare(other: EntryMeta): number {
    return compareEntryMeta(this, other);
  }

  equals(other: EntryMeta): boolean {
    return this.content() === other.content();
  }
}


/** Comparator for `Array.prototype.sort`. */
export function compareEntryMeta(a: EntryMeta, b: EntryMeta): number {
  return (
    compareStrings(a.entryAddress(), b.entryAddress()) ||
    compareStrings(a.attribute(), b.attribute()) ||
    compareStrings(a.value(), b.value())
  );
}

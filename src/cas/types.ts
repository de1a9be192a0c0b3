import type { Address, Content, DigestAlgorithm } from './address.js';

/**
 * Capability of anything that can be stored by content address.
 *
 * `address()` must be deterministic: identical content always yields the
 * identical address for a given algorithm.
 */
export interface AddressableContent {
  /** Address derived from `content()` (or a part of it) with `algorithm`. */
  address(algorithm?: DigestAlgorithm): Address;

  /** Canonical serialized form. */
  content(): Content;
}

/**
 * Reconstructs a value from its stored content. Implementations satisfy
 * `fromContent(x.content())` equal to `x`, and throw ContentDecodeError on
 * anything else rather than returning a partial value.
 */
export interface ContentDecoder<T extends AddressableContent> {
  /** Name used in decode error messages */
  readonly contentName: string;

  fromContent(content: Content): T;
}

// Content addresses.
//
// An address is the multihash of a content string, rendered base58btc
// (the familiar `Qm...` form for SHA2-256). The digest algorithm is always
// passed in by the caller so it can change without touching entity types.

import { createHash } from 'node:crypto';

import { base58btc } from 'multiformats/bases/base58';
import { create as createMultihash } from 'multiformats/hashes/digest';

import { UnknownDigestError } from '../errors/index.js';

/** Deterministic, content-derived storage key. */
export type Address = string;

/** Canonical serialized form of a stored value. */
export type Content = string;

/**
 * A named hash function. `code` is the multihash code of the algorithm and
 * is written into every address it produces.
 */
export interface DigestAlgorithm {
  readonly name: string;
  readonly code: number;
  digest(bytes: Uint8Array): Uint8Array;
}

function nodeDigest(name: string, code: number, nodeAlgorithm: string): DigestAlgorithm {
  return {
    name,
    code,
    digest: (bytes) => createHash(nodeAlgorithm).update(bytes).digest(),
  };
}

export const SHA2_256 = nodeDigest('sha2-256', 0x12, 'sha256');
export const SHA2_512 = nodeDigest('sha2-512', 0x13, 'sha512');

/** Algorithm used wherever a caller does not choose one. */
export const DEFAULT_DIGEST: DigestAlgorithm = SHA2_256;

const DIGESTS = new Map<string, DigestAlgorithm>([
  [SHA2_256.name, SHA2_256],
  [SHA2_512.name, SHA2_512],
]);

export const DIGEST_NAMES = ['sha2-256', 'sha2-512'] as const;
export type DigestName = (typeof DIGEST_NAMES)[number];

/**
 * Look up a built-in digest algorithm by its multihash name.
 * @throws {UnknownDigestError}
 */
export function digestAlgorithm(name: string): DigestAlgorithm {
  const algorithm = DIGESTS.get(name);
  if (!algorithm) {
    throw new UnknownDigestError(name);
  }
  return algorithm;
}

const encoder = new TextEncoder();

/** Hash `content` with `algorithm` and render the multihash base58btc. */
export function addressFromContent(content: Content, algorithm: DigestAlgorithm): Address {
  const multihash = createMultihash(algorithm.code, algorithm.digest(encoder.encode(content)));
  return base58btc.baseEncode(multihash.bytes);
}

const BASE58_PATTERN = /^[1-9A-HJ-NP-Za-km-z]+$/;

/**
 * True when `value` can be an address. Only the base58btc alphabet is
 * allowed, so an address can never contain a path separator or `..`.
 */
export function isAddress(value: string): boolean {
  return BASE58_PATTERN.test(value);
}

// Content-addressing primitives barrel export.

export type { Address, Content, DigestAlgorithm, DigestName } from './address.js';
export {
  addressFromContent,
  digestAlgorithm,
  isAddress,
  DEFAULT_DIGEST,
  DIGEST_NAMES,
  SHA2_256,
  SHA2_512,
} from './address.js';
export type { AddressableContent, ContentDecoder } from './types.js';
export { parseJsonContent } from './decode.js';

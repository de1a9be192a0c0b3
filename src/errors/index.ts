import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Table errors (TABLE_*, STORAGE_*)

/** Table root does not resolve to an accessible directory */
export const TablePathError = createError<[string, string]>(
  'TABLE_PATH_INVALID',
  'Cannot open table at %s: %s',
  500
);

/** Filesystem read, write or directory failure */
export const StorageIoError = createError<[string, string]>(
  'STORAGE_IO_ERROR',
  'Storage I/O failed for %s: %s',
  500
);

// Content errors (CONTENT_*, DIGEST_*)

/** Stored content does not parse into the expected type */
export const ContentDecodeError = createError<[string, string]>(
  'CONTENT_DECODE_ERROR',
  'Could not decode %s content: %s',
  500
);

/** Stored content hashes to a different address than the one it was stored under */
export const ContentAddressMismatchError = createError<[string, string]>(
  'CONTENT_ADDRESS_MISMATCH',
  'Content stored at %s hashes to %s',
  500
);

export const UnknownDigestError = createError<[string]>(
  'DIGEST_UNKNOWN',
  'Unknown digest algorithm: %s',
  500
);

const DECODE_ERROR_CODES = new Set(['CONTENT_DECODE_ERROR', 'CONTENT_ADDRESS_MISMATCH']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * True for errors that mean stored data is corrupt or foreign, as opposed
 * to the filesystem failing.
 */
export function isDecodeError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && DECODE_ERROR_CODES.has(code);
}

/** True for a Node.js ENOENT error. */
export function isNotFoundError(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

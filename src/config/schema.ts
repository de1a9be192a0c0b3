import { z } from 'zod';

import { DIGEST_NAMES } from '../cas/address.js';

export const StorageConfigSchema = z.object({
  /** Storage backend type */
  backend: z.enum(['file', 'memory']).default('file'),
  /** Table root directory for the file backend (default: ./data/hash-table) */
  rootDir: z.string().min(1).default('./data/hash-table'),
  /** Create the root directory if it does not exist yet */
  createRootDir: z.boolean().default(false),
  /** Digest algorithm used to derive addresses */
  digest: z.enum(DIGEST_NAMES).default('sha2-256'),
  /** What a metadata scan does with a file that cannot be decoded */
  onCorruptMeta: z.enum(['fail', 'skip']).default('fail'),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default(() => ({
    backend: 'file' as const,
    rootDir: './data/hash-table',
    createRootDir: false,
    digest: 'sha2-256' as const,
    onCorruptMeta: 'fail' as const,
  })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

import type { z } from 'zod';

import { ContentDecodeError, errorMessage } from '../errors/index.js';

import type { Content } from './address.js';

/**
 * Parse JSON content and validate it against `schema`.
 * @throws {ContentDecodeError} on invalid JSON or a schema mismatch
 */
export function parseJsonContent<S extends z.ZodType>(
  schema: S,
  content: Content,
  contentName: string
): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ContentDecodeError(contentName, errorMessage(error));
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ContentDecodeError(contentName, issues);
  }

  return result.data;
}

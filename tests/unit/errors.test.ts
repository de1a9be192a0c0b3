import { describe, it, expect } from 'vitest';

import {
  ContentAddressMismatchError,
  ContentDecodeError,
  StorageIoError,
  TablePathError,
  errorMessage,
  isDecodeError,
  isNotFoundError,
} from '@/errors/index.js';

describe('errors', () => {
  it('should format messages with their arguments', () => {
    const error = new StorageIoError('/data/entries', 'EACCES: permission denied');

    expect(error.code).toBe('STORAGE_IO_ERROR');
    expect(error.message).toBe('Storage I/O failed for /data/entries: EACCES: permission denied');
  });

  it('should tell decode errors apart from other failures', () => {
    expect(isDecodeError(new ContentDecodeError('Entry', 'bad'))).toBe(true);
    expect(isDecodeError(new ContentAddressMismatchError('QmA', 'QmB'))).toBe(true);
    expect(isDecodeError(new StorageIoError('/x', 'bad'))).toBe(false);
    expect(isDecodeError(new TablePathError('/x', 'bad'))).toBe(false);
    expect(isDecodeError('CONTENT_DECODE_ERROR')).toBe(false);
  });

  it('should recognise ENOENT errors', () => {
    const missing = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    const denied = Object.assign(new Error('denied'), { code: 'EACCES' });

    expect(isNotFoundError(missing)).toBe(true);
    expect(isNotFoundError(denied)).toBe(false);
    expect(isNotFoundError(null)).toBe(false);
  });

  it('should extract messages from unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

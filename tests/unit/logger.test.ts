import { describe, it, expect } from 'vitest';

import { createLogger, silentLogger } from '@/logger.js';

describe('createLogger()', () => {
  it('should use the configured level', () => {
    expect(createLogger({ level: 'debug', pretty: false }).level).toBe('debug');
    expect(createLogger({ level: 'error', pretty: false }).level).toBe('error');
  });
});

describe('silentLogger()', () => {
  it('should log nothing', () => {
    const logger = silentLogger();

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});

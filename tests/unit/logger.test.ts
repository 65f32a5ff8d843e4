import { describe, it, expect } from 'vitest';

import { createLogger } from '@/logger.js';

describe('createLogger()', () => {
  it('should use the configured level', () => {
    const logger = createLogger({ level: 'warn', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('should allow silencing every message', () => {
    const logger = createLogger({ level: 'silent', pretty: false });
    expect(logger.isLevelEnabled('fatal')).toBe(false);
  });
});

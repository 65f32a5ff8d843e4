import { writeFileSync, unlinkSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { defaultConfig, loadConfig } from '@/config/index.js';

const TEST_CONFIG_DIR = join(process.cwd(), 'tests', 'fixtures');
const TEST_CONFIG_PATH = join(TEST_CONFIG_DIR, 'test-config.json');

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
      return error.code;
    }
    throw error;
  }
  return expect.fail('Expected error to be thrown');
}

describe('Config Loading', () => {
  beforeEach(() => {
    if (!existsSync(TEST_CONFIG_DIR)) {
      mkdirSync(TEST_CONFIG_DIR, { recursive: true });
    }
  });

  afterEach(() => {
    if (existsSync(TEST_CONFIG_PATH)) {
      unlinkSync(TEST_CONFIG_PATH);
    }
  });

  it('should load an empty config with defaults', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({}));
    const config = loadConfig(TEST_CONFIG_PATH);

    expect(config.logging.level).toBe('info');
    expect(config.logging.pretty).toBe(false);
    expect(config.store.s3).toEqual({ readAttempts: 1, bufferedRead: false });
    expect(config.store.azure).toEqual({});
  });

  it('should match the defaults used without a file', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({}));
    expect(loadConfig(TEST_CONFIG_PATH)).toEqual(defaultConfig());
  });

  it('should override defaults with provided values', () => {
    const customConfig = {
      logging: { level: 'debug', pretty: true },
      store: { s3: { readAttempts: 3, bufferedRead: true }, azure: { accountKey: 'test-secret' } },
    };
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify(customConfig));
    const config = loadConfig(TEST_CONFIG_PATH);

    expect(config.logging).toEqual({ level: 'debug', pretty: true });
    expect(config.store.s3).toEqual({ readAttempts: 3, bufferedRead: true });
    expect(config.store.azure.accountKey).toBe('test-secret');
  });

  it('should fill in omitted backend fields', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ store: { s3: { readAttempts: 2 } } }));
    const config = loadConfig(TEST_CONFIG_PATH);

    expect(config.store.s3).toEqual({ readAttempts: 2, bufferedRead: false });
    expect(config.store.azure).toEqual({});
  });

  it('should throw ConfigMissingError for non-existent file', () => {
    expect(codeOf(() => loadConfig('/nonexistent/path/config.json'))).toBe('CONFIG_MISSING');
  });

  it('should throw ConfigParseError for invalid JSON', () => {
    writeFileSync(TEST_CONFIG_PATH, 'not valid json');
    expect(codeOf(() => loadConfig(TEST_CONFIG_PATH))).toBe('CONFIG_PARSE_ERROR');
  });

  it('should throw ConfigInvalidError for invalid schema', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ store: { s3: { bufferedRead: 'yes' } } }));
    expect(codeOf(() => loadConfig(TEST_CONFIG_PATH))).toBe('CONFIG_INVALID');
  });

  it('should validate the read attempts range', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ store: { s3: { readAttempts: 0 } } }));
    expect(codeOf(() => loadConfig(TEST_CONFIG_PATH))).toBe('CONFIG_INVALID');
  });

  it('should validate logging level enum', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ logging: { level: 'verbose' } }));
    expect(codeOf(() => loadConfig(TEST_CONFIG_PATH))).toBe('CONFIG_INVALID');
  });

  it('should name the offending field in the message', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ store: { azure: { accountKey: '' } } }));
    expect(() => loadConfig(TEST_CONFIG_PATH)).toThrow(/store\.azure\.accountKey/);
  });
});

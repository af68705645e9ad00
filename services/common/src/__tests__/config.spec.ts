import { afterEach, describe, expect, it } from 'vitest';

import { getConfig, parseBoolean, parseNumber, parsePositiveNumber, resetConfigForTesting } from '../config';

const ORIGINAL_ENV = { ...process.env };

afterEach(() => {
  process.env = { ...ORIGINAL_ENV };
  resetConfigForTesting();
});

describe('parse helpers', () => {
  it('fall back on missing or malformed numbers', () => {
    expect(parseNumber(undefined, 5)).toBe(5);
    expect(parseNumber('  ', 5)).toBe(5);
    expect(parseNumber('abc', 5)).toBe(5);
    expect(parseNumber('12.5', 5)).toBe(12.5);
    expect(parsePositiveNumber('0', 20)).toBe(20);
    expect(parsePositiveNumber('-3', 20)).toBe(20);
    expect(parsePositiveNumber('8', 20)).toBe(8);
  });

  it('understands common boolean spellings', () => {
    expect(parseBoolean('YES', false)).toBe(true);
    expect(parseBoolean('off', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });
});

describe('getConfig', () => {
  it('reads the service name and log level once', () => {
    process.env.SERVICE_NAME = 'jm-test';
    process.env.LOG_LEVEL = 'DEBUG';

    const config = getConfig();
    expect(config.runtime).toEqual({ serviceName: 'jm-test', logLevel: 'debug' });

    process.env.SERVICE_NAME = 'changed';
    expect(getConfig().runtime.serviceName).toBe('jm-test');
  });

  it('ignores unknown log levels', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(getConfig().runtime.logLevel).toBe('info');
  });
});

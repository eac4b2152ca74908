import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      sample: 'sample2',
      searchKeys: ['20'],
      logLevel: 'info',
      prettyLogs: false
    });
    expect(config.samplesFile.endsWith('samples.json')).toBe(true);
  });

  it('should read every setting from the environment', () => {
    const config = loadConfig({
      SAMPLE: 'decimals',
      SEARCH_KEYS: '1000, 0.3,',
      SAMPLES_FILE: '/tmp/custom-samples.json',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'development'
    });

    expect(config).toEqual({
      sample: 'decimals',
      searchKeys: ['1000', '0.3'],
      samplesFile: '/tmp/custom-samples.json',
      logLevel: 'debug',
      prettyLogs: true
    });
  });

  it('should allow an empty search list', () => {
    expect(loadConfig({ SEARCH_KEYS: '' }).searchKeys).toEqual([]);
  });

  it('should quiet logs when HIDE_LOGS is set', () => {
    const config = loadConfig({ HIDE_LOGS: '1', LOG_LEVEL: 'debug', NODE_ENV: 'development' });

    expect(config.logLevel).toBe('warn');
    expect(config.prettyLogs).toBe(false);
  });

  it('should reject search keys that are not numbers', () => {
    expect(() => loadConfig({ SEARCH_KEYS: '20,ten' })).toThrow(ConfigError);
    expect(() => loadConfig({ SEARCH_KEYS: '20,ten' })).toThrow('SEARCH_KEYS: must be comma-separated numbers, got "20,ten"');
  });

  it('should reject unknown log levels', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(
      "LOG_LEVEL: Invalid enum value. Expected 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent', received 'loud'"
    );
  });
});

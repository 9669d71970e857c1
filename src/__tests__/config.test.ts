import { describe, it, expect } from 'vitest';
import { loadScanConfig } from '../config.js';
import { ConfigError } from '../utils/errors.js';

describe('loadScanConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadScanConfig({}, {})).toEqual({
      timeout: 1000,
      concurrency: 100,
      identifyThreshold: 100,
      showClosed: false,
      logLevel: 'info',
    });
  });

  it('reads the environment', () => {
    const config = loadScanConfig({}, {
      SCAN_TIMEOUT: '2500',
      SCAN_CONCURRENCY: '20',
      SCAN_IDENTIFY_THRESHOLD: '1024',
      SCAN_SHOW_CLOSED: '1',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      timeout: 2500,
      concurrency: 20,
      identifyThreshold: 1024,
      showClosed: true,
      logLevel: 'debug',
    });
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadScanConfig(
      { timeout: 300, showClosed: false },
      { SCAN_TIMEOUT: '2500', SCAN_SHOW_CLOSED: 'true' }
    );

    expect(config.timeout).toBe(300);
    expect(config.showClosed).toBe(false);
  });

  it('rejects malformed environment values', () => {
    expect(() => loadScanConfig({}, { SCAN_CONCURRENCY: 'many' })).toThrow(
      'Invalid environment: SCAN_CONCURRENCY: Expected a whole number'
    );
  });

  it('rejects concurrency above the ceiling', () => {
    expect(() => loadScanConfig({ concurrency: 150 }, {})).toThrow(ConfigError);
    expect(() => loadScanConfig({ concurrency: 150 }, {})).toThrow(
      'Invalid configuration: concurrency: Number must be less than or equal to 100'
    );
  });

  it('rejects a zero timeout', () => {
    expect(() => loadScanConfig({ timeout: 0 }, {})).toThrow(ConfigError);
  });
});

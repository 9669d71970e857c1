import { describe, it, expect } from 'vitest';
import { PortSchema, PortRangeSchema, ScanConfigSchema, ScanEnvSchema } from '../config.js';

describe('PortSchema', () => {
  it('accepts the ends of the port space', () => {
    expect(PortSchema.safeParse(1).success).toBe(true);
    expect(PortSchema.safeParse(65535).success).toBe(true);
  });

  it('rejects ports outside 1-65535', () => {
    const result = PortSchema.safeParse(0);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Port must be between 1 and 65535');
    }
  });

  it('rejects fractional ports', () => {
    const result = PortSchema.safeParse(1.5);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Port must be an integer');
    }
  });
});

describe('PortRangeSchema', () => {
  it('accepts a single-port range', () => {
    expect(PortRangeSchema.parse({ minPort: 22, maxPort: 22 })).toEqual({ minPort: 22, maxPort: 22 });
  });

  it('rejects a reversed range on minPort', () => {
    const result = PortRangeSchema.safeParse({ minPort: 90, maxPort: 80 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.path).toEqual(['minPort']);
      expect(result.error.issues[0]?.message).toBe('Minimum port must not be greater than maximum port');
    }
  });
});

describe('ScanConfigSchema', () => {
  it('fills in defaults', () => {
    expect(ScanConfigSchema.parse({})).toEqual({
      timeout: 1000,
      concurrency: 100,
      identifyThreshold: 100,
      showClosed: false,
      logLevel: 'info',
    });
  });

  it('caps concurrency at 100', () => {
    expect(ScanConfigSchema.safeParse({ concurrency: 101 }).success).toBe(false);
    expect(ScanConfigSchema.safeParse({ concurrency: 0 }).success).toBe(false);
  });
});

describe('ScanEnvSchema', () => {
  it('converts numeric and boolean strings', () => {
    expect(ScanEnvSchema.parse({ SCAN_TIMEOUT: ' 250 ', SCAN_SHOW_CLOSED: 'true' })).toEqual({
      SCAN_TIMEOUT: 250,
      SCAN_SHOW_CLOSED: true,
    });
  });

  it('rejects values that are not whole numbers or booleans', () => {
    expect(ScanEnvSchema.safeParse({ SCAN_CONCURRENCY: '-5' }).success).toBe(false);
    expect(ScanEnvSchema.safeParse({ SCAN_SHOW_CLOSED: 'yes' }).success).toBe(false);
  });
});

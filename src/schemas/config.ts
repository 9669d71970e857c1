import { z } from 'zod';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

// Hard ceiling on concurrent in-flight connection attempts
export const MAX_CONCURRENCY = 100;

export const PortSchema = z
  .number()
  .int('Port must be an integer')
  .min(MIN_PORT, `Port must be between ${MIN_PORT} and ${MAX_PORT}`)
  .max(MAX_PORT, `Port must be between ${MIN_PORT} and ${MAX_PORT}`);

export const PortRangeSchema = z
  .object({
    minPort: PortSchema,
    maxPort: PortSchema,
  })
  .refine((range) => range.minPort <= range.maxPort, {
    message: 'Minimum port must not be greater than maximum port',
    path: ['minPort'],
  });

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const ScanConfigSchema = z.object({
  timeout: z.number().int().positive().default(1000),
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(MAX_CONCURRENCY),
  identifyThreshold: z.number().int().min(0).max(MAX_PORT).default(100),
  showClosed: z.boolean().default(false),
  logLevel: LogLevelSchema.default('info'),
});

// Environment values arrive as strings
const EnvNumberSchema = z.string().trim().regex(/^\d+$/, 'Expected a whole number').transform(Number);
const EnvBooleanSchema = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

export const ScanEnvSchema = z.object({
  SCAN_TIMEOUT: EnvNumberSchema.optional(),
  SCAN_CONCURRENCY: EnvNumberSchema.optional(),
  SCAN_IDENTIFY_THRESHOLD: EnvNumberSchema.optional(),
  SCAN_SHOW_CLOSED: EnvBooleanSchema.optional(),
  LOG_LEVEL: LogLevelSchema.optional(),
});

export type PortRange = z.infer<typeof PortRangeSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type ScanConfigInput = z.input<typeof ScanConfigSchema>;
export type ScanEnv = z.infer<typeof ScanEnvSchema>;

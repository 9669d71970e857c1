import { ScanConfigSchema, ScanEnvSchema, type ScanConfig, type ScanConfigInput } from './schemas/index.js';
import { ConfigError } from './utils/errors.js';
import type { ZodError } from 'zod';

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Builds the scan configuration. Explicit overrides (CLI flags) win over
 * environment variables, which win over the schema defaults.
 */
export function loadScanConfig(
  overrides: ScanConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ScanConfig {
  const envResult = ScanEnvSchema.safeParse(env);
  if (!envResult.success) {
    const issues = formatIssues(envResult.error);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }
  const fromEnv = envResult.data;

  const result = ScanConfigSchema.safeParse({
    timeout: overrides.timeout ?? fromEnv.SCAN_TIMEOUT,
    concurrency: overrides.concurrency ?? fromEnv.SCAN_CONCURRENCY,
    identifyThreshold: overrides.identifyThreshold ?? fromEnv.SCAN_IDENTIFY_THRESHOLD,
    showClosed: overrides.showClosed ?? fromEnv.SCAN_SHOW_CLOSED,
    logLevel: overrides.logLevel ?? fromEnv.LOG_LEVEL,
  });
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

// Config schemas
export {
  MIN_PORT,
  MAX_PORT,
  MAX_CONCURRENCY,
  PortSchema,
  PortRangeSchema,
  LogLevelSchema,
  ScanConfigSchema,
  ScanEnvSchema,
  type PortRange,
  type LogLevel,
  type ScanConfig,
  type ScanConfigInput,
  type ScanEnv,
} from './config.js';

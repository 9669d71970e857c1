/**
 * Base class for scanner errors that end a run
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  override toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

/**
 * The target host could not be resolved to an address
 */
export class ResolutionError extends AppError {
  constructor(
    public readonly host: string,
    cause?: string,
  ) {
    super(`Unable to resolve ${host}`, 'RESOLUTION_ERROR', { host, cause });
  }
}

/**
 * The requested port range is empty or outside 1-65535
 */
export class InvalidRangeError extends AppError {
  constructor(
    message: string,
    public readonly minPort: number,
    public readonly maxPort: number,
  ) {
    super(message, 'INVALID_RANGE', { minPort, maxPort });
  }
}

/**
 * The scan was aborted before every port was checked
 */
export class ScanCancelledError extends AppError {
  constructor(
    public readonly scanned: number,
    public readonly total: number,
  ) {
    super(`Scan cancelled after ${scanned} of ${total} ports`, 'SCAN_CANCELLED', { scanned, total });
  }
}

/**
 * Configuration from flags or environment failed validation
 */
export class ConfigError extends AppError {
  constructor(message: string, issues: string[]) {
    super(message, 'INVALID_CONFIG', { issues });
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

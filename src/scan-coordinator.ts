import type { Logger } from 'winston';
import { PortChecker } from './scanner/port-checker.js';
import { WorkQueue } from './scanner/work-queue.js';
import { PortScanWorker } from './scanner/worker.js';
import { PortRangeSchema, MAX_CONCURRENCY } from './schemas/index.js';
import { createLogger } from './utils/logger.js';
import { InvalidRangeError, ScanCancelledError } from './utils/errors.js';
import type {
  PortCheckFn,
  ScanCoordinatorOptions,
  ScanResult,
  ScanResultHandler,
  ScanRunOptions,
  ScanStats,
} from './types/scanner.js';

/** Ports at or below this number get an identification probe. */
export const IDENTIFY_THRESHOLD = 100;

/**
 * Throws InvalidRangeError unless 1 <= minPort <= maxPort <= 65535.
 */
export function validatePortRange(minPort: number, maxPort: number): void {
  const range = PortRangeSchema.safeParse({ minPort, maxPort });
  if (!range.success) {
    const message = range.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidRangeError(`Invalid port range ${minPort}-${maxPort}: ${message}`, minPort, maxPort);
  }
}

function emptyStats(): ScanStats {
  return { workerCount: 0, scanned: 0, open: 0, errors: 0, cancelled: false, durationMs: 0 };
}

export class ScanCoordinator {
  private readonly maxConcurrency: number;
  private readonly identifyThreshold: number;
  private readonly checkPort: PortCheckFn;
  private readonly onResult: ScanResultHandler;
  private readonly logger: Logger;
  private workers: PortScanWorker[];
  private isRunning: boolean;
  private lastStats: ScanStats;
  private checkerErrors: number;

  constructor(options: ScanCoordinatorOptions = {}) {
    const requested = options.maxConcurrency ?? MAX_CONCURRENCY;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${requested}`);
    }

    this.maxConcurrency = Math.min(requested, MAX_CONCURRENCY);
    this.identifyThreshold = options.identifyThreshold ?? IDENTIFY_THRESHOLD;
    this.onResult = options.onResult ?? (() => undefined);
    this.logger = options.logger ?? createLogger({ name: 'scan-coordinator' });
    this.workers = [];
    this.isRunning = false;
    this.lastStats = emptyStats();
    this.checkerErrors = 0;

    if (options.checkPort) {
      this.checkPort = options.checkPort;
    } else {
      const checkerOptions = options.checker;
      // The checker recovers from unexpected errors itself; count them here
      const checker = new PortChecker({
        logger: this.logger,
        ...checkerOptions,
        onError: (port, error) => {
          this.checkerErrors++;
          checkerOptions?.onError?.(port, error);
        },
      });
      this.checkPort = (address, port, identify) => checker.checkPort(address, port, identify);
    }
  }

  /**
   * Scans every port in [minPort, maxPort] once and resolves when all of
   * them have been checked. Results are streamed to `onResult`.
   */
  async scan(address: string, minPort: number, maxPort: number, options: ScanRunOptions = {}): Promise<void> {
    validatePortRange(minPort, maxPort);

    if (this.isRunning) {
      throw new Error('A scan is already running on this coordinator');
    }
    this.isRunning = true;
    this.checkerErrors = 0;

    const totalPorts = maxPort - minPort + 1;
    const workerCount = Math.min(this.maxConcurrency, totalPorts);
    const startTime = Date.now();
    const stats: ScanStats = { ...emptyStats(), workerCount };
    this.lastStats = stats;

    const queue = new WorkQueue<number>();
    const controller = new AbortController();
    const onAbort = (): void => {
      controller.abort();
      const dropped = queue.close();
      this.logger.warn(`Scan aborted, ${dropped} queued ports skipped`);
    };
    const externalSignal = options.signal;
    externalSignal?.addEventListener('abort', onAbort, { once: true });

    const report = (result: ScanResult): void => {
      if (result.open) stats.open++;
      this.onResult(result);
    };

    this.logger.debug(`Scanning ${address} ports ${minPort}-${maxPort} with ${workerCount} workers`);

    try {
      this.workers = [];
      for (let i = 1; i <= workerCount; i++) {
        this.workers.push(
          new PortScanWorker(`scan-worker-${i}`, queue, {
            address,
            identifyThreshold: this.identifyThreshold,
            checkPort: this.checkPort,
            onResult: report,
            signal: controller.signal,
            logger: this.logger,
          })
        );
      }
      const running = this.workers.map((worker) => worker.start());

      if (externalSignal?.aborted) {
        onAbort();
      } else {
        for (let port = minPort; port <= maxPort; port++) {
          queue.put(port);
        }
      }

      await queue.join();
      // Wakes the idle workers so they exit
      queue.close();
      await Promise.all(running);
    } finally {
      externalSignal?.removeEventListener('abort', onAbort);
      const workerStats = this.workers.map((worker) => worker.getStats());
      stats.scanned = workerStats.reduce((sum, w) => sum + w.checked, 0);
      stats.errors = workerStats.reduce((sum, w) => sum + w.failures, 0) + this.checkerErrors;
      stats.cancelled = controller.signal.aborted;
      stats.durationMs = Date.now() - startTime;
      this.isRunning = false;
    }

    if (stats.cancelled) {
      throw new ScanCancelledError(stats.scanned, totalPorts);
    }

    this.logger.debug(`Scan of ${address} finished: ${stats.open} open of ${totalPorts}`);
  }

  getStats(): ScanStats & { isRunning: boolean } {
    return { ...this.lastStats, isRunning: this.isRunning };
  }
}

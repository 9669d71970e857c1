import type { Logger } from 'winston';
import type { WorkQueue } from './work-queue.js';
import { createScannerWorkerLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type {
  PortCheckFn,
  ScanResultHandler,
  ScanWorkerOptions,
  ScanWorkerStats,
} from '../types/scanner.js';

export class PortScanWorker {
  private readonly workerId: string;
  private readonly queue: WorkQueue<number>;
  private readonly address: string;
  private readonly identifyThreshold: number;
  private readonly checkPort: PortCheckFn;
  private readonly onResult: ScanResultHandler;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private isRunning: boolean;
  private startTime: number | null;
  private checked: number;
  private failures: number;

  constructor(workerId: string, queue: WorkQueue<number>, options: ScanWorkerOptions) {
    this.workerId = workerId;
    this.queue = queue;
    this.address = options.address;
    this.identifyThreshold = options.identifyThreshold;
    this.checkPort = options.checkPort;
    this.onResult = options.onResult;
    this.signal = options.signal;
    this.isRunning = false;
    this.startTime = null;
    this.checked = 0;
    this.failures = 0;

    this.logger = createScannerWorkerLogger(workerId, options.logger);
  }

  /**
   * Drains the queue until it is closed or the signal fires. Resolves once
   * the worker has exited; it never rejects.
   */
  async start(): Promise<void> {
    if (this.isRunning) return;

    this.isRunning = true;
    this.startTime = Date.now();
    this.logger.debug('Scan worker started');

    while (!this.signal.aborted) {
      const port = await this.queue.take();
      if (port === undefined) break;

      try {
        await this.processPort(port);
      } finally {
        this.queue.taskDone();
      }
    }

    this.isRunning = false;
    this.logger.debug('Scan worker stopped', { checked: this.checked });
  }

  private async processPort(port: number): Promise<void> {
    const identify = port <= this.identifyThreshold;
    this.checked++;

    try {
      const result = await this.checkPort(this.address, port, identify);
      if (result) {
        this.onResult(result);
      }
    } catch (error) {
      // Only this port is lost; the worker moves on to the next one
      this.failures++;
      this.logger.error(`Error scanning port ${port}: ${getErrorMessage(error)}`, { port });
    }
  }

  getStats(): ScanWorkerStats {
    return {
      workerId: this.workerId,
      isRunning: this.isRunning,
      checked: this.checked,
      failures: this.failures,
      uptime: this.startTime ? Date.now() - this.startTime : 0,
    };
  }
}

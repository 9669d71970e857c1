// Port scanner types
import type { Duplex } from 'stream';
import type { Logger } from 'winston';

export type ServiceName = string;

export interface OpenPortResult {
  port: number;
  open: true;
  service: ServiceName;
}

export interface ClosedPortResult {
  port: number;
  open: false;
  service: null;
}

export type ScanResult = OpenPortResult | ClosedPortResult;

/** Anything a probe can be written to and read from; a `net.Socket` in production. */
export type Connection = Duplex;

export type SocketConnector = (address: string, port: number, timeoutMs: number) => Promise<Connection>;

export type PortCheckFn = (address: string, port: number, identify: boolean) => Promise<ScanResult | null>;

export type ScanResultHandler = (result: ScanResult) => void;

export interface PortProberOptions {
  readTimeout?: number | undefined;
  maxResponseBytes?: number | undefined;
  logger?: Logger | undefined;
}

export interface PortCheckerOptions {
  timeout?: number | undefined;
  reportClosed?: boolean | undefined;
  connector?: SocketConnector | undefined;
  prober?: PortProberOptions | undefined;
  logger?: Logger | undefined;
  /** Called after an unexpected per-port error has been logged. */
  onError?: ((port: number, error: unknown) => void) | undefined;
}

export interface ScanCoordinatorOptions {
  maxConcurrency?: number | undefined;
  identifyThreshold?: number | undefined;
  checkPort?: PortCheckFn | undefined;
  checker?: PortCheckerOptions | undefined;
  onResult?: ScanResultHandler | undefined;
  logger?: Logger | undefined;
}

export interface ScanRunOptions {
  signal?: AbortSignal | undefined;
}

export interface ScanWorkerOptions {
  address: string;
  identifyThreshold: number;
  checkPort: PortCheckFn;
  onResult: ScanResultHandler;
  signal: AbortSignal;
  logger: Logger;
}

export interface ScanWorkerStats {
  workerId: string;
  isRunning: boolean;
  checked: number;
  failures: number;
  uptime: number;
}

export interface ScanStats {
  workerCount: number;
  scanned: number;
  open: number;
  errors: number;
  cancelled: boolean;
  durationMs: number;
}

import net from 'net';
import type { Logger } from 'winston';
import { PortProber } from './port-prober.js';
import { UNKNOWN_SERVICE } from './service-catalog.js';
import { createLogger } from '../utils/logger.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';
import type { Connection, PortCheckerOptions, ScanResult, SocketConnector } from '../types/scanner.js';

const DEFAULT_CONNECT_TIMEOUT = 1000;

// Error codes that just mean "nothing is listening there"
const CONNECTION_FAILURE_CODES = new Set([
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EHOSTDOWN',
  'ENETDOWN',
  'ECONNABORTED',
]);

/**
 * Opens a TCP connection, rejecting with an ETIMEDOUT error when the
 * handshake does not finish within `timeoutMs`.
 */
export function connectTcp(address: string, port: number, timeoutMs: number): Promise<Connection> {
  return new Promise((resolve, reject) => {
    const socket = new net.Socket();

    const cleanup = (): void => {
      socket.off('connect', onConnect);
      socket.off('timeout', onTimeout);
      socket.off('error', onError);
    };

    const onConnect = (): void => {
      cleanup();
      // From here on reads are bounded by the prober, not the socket
      socket.setTimeout(0);
      resolve(socket);
    };

    const onTimeout = (): void => {
      cleanup();
      socket.destroy();
      const error: NodeJS.ErrnoException = new Error(`Connection to ${address}:${port} timed out after ${timeoutMs}ms`);
      error.code = 'ETIMEDOUT';
      reject(error);
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(error);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', onConnect);
    socket.once('timeout', onTimeout);
    socket.once('error', onError);
    socket.connect(port, address);
  });
}

export function isConnectionFailure(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && CONNECTION_FAILURE_CODES.has(code);
}

export class PortChecker {
  private readonly timeout: number;
  private readonly reportClosed: boolean;
  private readonly connector: SocketConnector;
  private readonly prober: PortProber;
  private readonly logger: Logger;
  private readonly onError: ((port: number, error: unknown) => void) | undefined;

  constructor(options: PortCheckerOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.reportClosed = options.reportClosed ?? false;
    this.connector = options.connector ?? connectTcp;
    this.logger = options.logger ?? createLogger({ name: 'port-checker' });
    this.onError = options.onError;
    this.prober = new PortProber({
      readTimeout: this.timeout,
      logger: this.logger,
      ...options.prober,
    });
  }

  /**
   * Connects to `address:port` and, when `identify` is set, probes the
   * service. Resolves to null for ports that did not accept a connection
   * (unless closed ports are reported) and for unexpected per-port errors,
   * which are logged and passed to `onError`. Never rejects.
   */
  async checkPort(address: string, port: number, identify: boolean): Promise<ScanResult | null> {
    let connection: Connection;

    try {
      connection = await this.connector(address, port, this.timeout);
    } catch (error) {
      if (isConnectionFailure(error)) {
        return this.reportClosed ? { port, open: false, service: null } : null;
      }
      this.logger.error(`Error scanning port ${port}: ${getErrorMessage(error)}`);
      this.onError?.(port, error);
      return null;
    }

    // Late socket errors surface through the prober's reads and writes
    connection.on('error', (error: Error) => {
      this.logger.debug(`Socket error on port ${port}: ${error.message}`);
    });

    try {
      const service = identify
        ? await this.prober.identifyService(connection, port)
        : UNKNOWN_SERVICE;
      return { port, open: true, service };
    } finally {
      connection.destroy();
    }
  }
}

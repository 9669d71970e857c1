import type { Logger } from 'winston';
import { probeFor, classify, UNKNOWN_SERVICE } from './service-catalog.js';
import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Connection, PortProberOptions, ServiceName } from '../types/scanner.js';

const DEFAULT_READ_TIMEOUT = 1000;
const MAX_RESPONSE_BYTES = 1024;

function writeAll(connection: Connection, payload: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.write(payload, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

// A single bounded read: the first chunk that arrives, cut to maxBytes.
// The peer closing without a reply counts as an empty read.
function readOnce(connection: Connection, maxBytes: number, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    if (connection.destroyed) {
      reject(new Error('Connection closed before a response arrived'));
      return;
    }

    const cleanup = (): void => {
      clearTimeout(timer);
      connection.off('data', onData);
      connection.off('end', onEnd);
      connection.off('close', onEnd);
      connection.off('error', onError);
    };

    const onData = (chunk: Buffer | string): void => {
      cleanup();
      connection.pause();
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk;
      resolve(bytes.subarray(0, maxBytes));
    };

    const onEnd = (): void => {
      cleanup();
      resolve(Buffer.alloc(0));
    };

    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };

    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`No response within ${timeoutMs}ms`));
    }, timeoutMs);

    connection.on('data', onData);
    connection.once('end', onEnd);
    connection.once('close', onEnd);
    connection.once('error', onError);
  });
}

export class PortProber {
  private readonly readTimeout: number;
  private readonly maxResponseBytes: number;
  private readonly logger: Logger;

  constructor(options: PortProberOptions = {}) {
    this.readTimeout = options.readTimeout ?? DEFAULT_READ_TIMEOUT;
    this.maxResponseBytes = options.maxResponseBytes ?? MAX_RESPONSE_BYTES;
    this.logger = options.logger ?? createLogger({ name: 'port-prober' });
  }

  /**
   * Sends the catalog probe for `port` over an established connection and
   * names the service from the reply. Never throws: a failed probe and an
   * unrecognised reply both come back as "Unknown".
   */
  async identifyService(connection: Connection, port: number): Promise<ServiceName> {
    const service = await this.tryIdentify(connection, port);
    return service ?? UNKNOWN_SERVICE;
  }

  private async tryIdentify(connection: Connection, port: number): Promise<ServiceName | null> {
    const probe = probeFor(port);
    if (!probe) {
      return null;
    }

    // Errors here are already reported through the write and read below
    const onError = (error: Error): void => {
      this.logger.debug(`Connection error while probing port ${port}: ${error.message}`);
    };
    connection.on('error', onError);

    try {
      await writeAll(connection, probe);
      const response = await readOnce(connection, this.maxResponseBytes, this.readTimeout);
      // Invalid UTF-8 (TLS records, DNS answers) decodes to U+FFFD instead of throwing
      const text = response.toString('utf8');
      return classify(text);
    } catch (error) {
      this.logger.debug(`Probe on port ${port} failed: ${getErrorMessage(error)}`);
      return null;
    } finally {
      connection.off('error', onError);
    }
  }
}

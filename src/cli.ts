import yargs from 'yargs';
import { ScanCoordinator, validatePortRange } from './scan-coordinator.js';
import { loadScanConfig } from './config.js';
import { resolveHost, type HostLookup } from './network/resolver.js';
import { ScanReporter, type LineWriter } from './output/reporter.js';
import { LogLevelSchema, type LogLevel, type ScanConfig } from './schemas/index.js';
import { createLogger } from './utils/logger.js';
import {
  AppError,
  ResolutionError,
  ScanCancelledError,
  getErrorMessage,
} from './utils/errors.js';
import type { PortCheckFn } from './types/scanner.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface CliOptions {
  target: string;
  minPort: number;
  maxPort: number;
  timeout?: number | undefined;
  concurrency?: number | undefined;
  showClosed?: boolean | undefined;
  logLevel?: LogLevel | undefined;
  logFile?: string | undefined;
}

export interface CliDependencies {
  lookup?: HostLookup | undefined;
  checkPort?: PortCheckFn | undefined;
  write?: LineWriter | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  signal?: AbortSignal | undefined;
}

class CliUsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}

/**
 * Parses command-line arguments. Returns null when help was requested and
 * has already been printed.
 */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const args = yargs(argv)
    .scriptName('portsweep')
    .usage('$0 <target> -p [--min <port>] [--max <port>]')
    .example('$0 192.168.1.1 -p --min 20 --max 80', 'Scan ports 20-80')
    .example('$0 example.com -p', 'Scan all ports')
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('p', {
      type: 'boolean',
      demandOption: true,
      describe: 'Scan ports; combine with --min and --max to limit the range',
    })
    .option('min', { type: 'number', default: 1, describe: 'Lowest port to scan' })
    .option('max', { type: 'number', default: 65535, describe: 'Highest port to scan' })
    .option('timeout', { type: 'number', describe: 'Connect timeout per port in milliseconds (default 1000)' })
    .option('concurrency', { type: 'number', describe: 'Concurrent connections, at most 100 (default 100)' })
    .option('show-closed', { type: 'boolean', describe: 'Also print ports that did not accept a connection' })
    .option('log-level', { type: 'string', choices: LogLevelSchema.options, describe: 'Diagnostic log level' })
    .option('log-file', { type: 'string', describe: 'Also write diagnostics to this file' })
    .demandCommand(1, 'A target IP or hostname is required')
    .strictOptions()
    .exitProcess(false)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw error ?? new CliUsageError(message ?? 'Invalid arguments');
    })
    .help()
    .alias('h', 'help')
    .parseSync();

  if (args['help'] === true) {
    return null;
  }

  const logLevel = args['log-level'] === undefined ? undefined : LogLevelSchema.parse(args['log-level']);

  return {
    target: String(args._[0]),
    minPort: args.min,
    maxPort: args.max,
    timeout: args.timeout,
    concurrency: args.concurrency,
    showClosed: args['show-closed'],
    logLevel,
    logFile: args['log-file'],
  };
}

/**
 * Runs one scan from command-line arguments and returns the exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const reporter = new ScanReporter(deps.write);

  let options: CliOptions;
  let config: ScanConfig;
  try {
    const parsed = parseCliArgs(argv);
    if (!parsed) {
      return EXIT_OK;
    }
    options = parsed;
    validatePortRange(options.minPort, options.maxPort);
    config = loadScanConfig(
      {
        timeout: options.timeout,
        concurrency: options.concurrency,
        showClosed: options.showClosed,
        logLevel: options.logLevel,
      },
      deps.env ?? process.env
    );
  } catch (error) {
    reporter.error(getErrorMessage(error));
    return EXIT_FAILURE;
  }

  const logger = createLogger({ name: 'portsweep', level: config.logLevel, logFile: options.logFile });

  let address: string;
  try {
    address = await resolveHost(options.target, deps.lookup);
  } catch (error) {
    if (error instanceof ResolutionError) {
      logger.debug('Resolution failed', error.toJSON());
      reporter.resolutionFailed(options.target);
      return EXIT_OK;
    }
    throw error;
  }
  reporter.resolved(options.target, address);

  const coordinator = new ScanCoordinator({
    maxConcurrency: config.concurrency,
    identifyThreshold: config.identifyThreshold,
    checkPort: deps.checkPort,
    checker: { timeout: config.timeout, reportClosed: config.showClosed },
    onResult: (result) => reporter.result(result),
    logger,
  });

  reporter.scanStarted(address, options.minPort, options.maxPort);
  try {
    await coordinator.scan(address, options.minPort, options.maxPort, { signal: deps.signal });
  } catch (error) {
    if (error instanceof ScanCancelledError) {
      reporter.cancelled(error.scanned, error.total);
      return EXIT_CANCELLED;
    }
    throw error;
  }

  reporter.finished(coordinator.getStats());
  return EXIT_OK;
}

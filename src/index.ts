#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { hideBin } from 'yargs/helpers';
import { runCli, EXIT_FAILURE } from './cli.js';
import { getErrorMessage } from './utils/errors.js';

async function main(): Promise<void> {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals): void => {
    console.log(`\nReceived ${signal}, stopping scan...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const exitCode = await runCli(hideBin(process.argv), { signal: controller.signal });
  process.exit(exitCode);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main().catch((error) => {
    console.error('Fatal error:', getErrorMessage(error));
    process.exit(EXIT_FAILURE);
  });
}

export { ScanCoordinator, IDENTIFY_THRESHOLD, validatePortRange } from './scan-coordinator.js';
export { PortChecker, connectTcp, isConnectionFailure } from './scanner/port-checker.js';
export { PortProber } from './scanner/port-prober.js';
export { WorkQueue } from './scanner/work-queue.js';
export { PortScanWorker } from './scanner/worker.js';
export { probeFor, classify, PROBE_TABLE, KEYWORD_TABLE, UNKNOWN_SERVICE } from './scanner/service-catalog.js';
export { resolveHost, lookupIPv4, type HostLookup } from './network/resolver.js';
export { ScanReporter, formatScanResult, type LineWriter } from './output/reporter.js';
export { loadScanConfig } from './config.js';
export { runCli, parseCliArgs, type CliOptions, type CliDependencies } from './cli.js';
export * from './utils/errors.js';
export type * from './types/index.js';

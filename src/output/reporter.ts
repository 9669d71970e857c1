import type { ScanResult, ScanStats } from '../types/scanner.js';

export type LineWriter = (line: string) => void;

export function formatScanResult(result: ScanResult): string {
  if (result.open) {
    return `Port ${result.port} is open (Service: ${result.service})`;
  }
  return `Port ${result.port} is closed`;
}

/**
 * Console output of a scan run. Diagnostics go through the logger; these
 * are the lines the user reads.
 */
export class ScanReporter {
  private readonly write: LineWriter;

  constructor(write: LineWriter = (line) => console.log(line)) {
    this.write = write;
  }

  resolved(host: string, address: string): void {
    this.write(`Resolved IP for ${host}: ${address}`);
  }

  resolutionFailed(host: string): void {
    this.write(`Error: Unable to resolve ${host}`);
  }

  scanStarted(address: string, minPort: number, maxPort: number): void {
    this.write(`Scanning IP: ${address} from port ${minPort} to ${maxPort}...\n`);
  }

  result(result: ScanResult): void {
    this.write(formatScanResult(result));
  }

  finished(stats: ScanStats): void {
    const seconds = (stats.durationMs / 1000).toFixed(1);
    const noun = stats.open === 1 ? 'port' : 'ports';
    this.write(`\nScan complete: ${stats.open} open ${noun} out of ${stats.scanned} scanned in ${seconds}s`);
  }

  cancelled(scanned: number, total: number): void {
    this.write(`\nScan cancelled after ${scanned} of ${total} ports`);
  }

  error(message: string): void {
    this.write(`Error: ${message}`);
  }
}

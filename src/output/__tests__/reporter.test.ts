import { describe, it, expect } from 'vitest';
import { ScanReporter, formatScanResult } from '../reporter.js';

describe('formatScanResult', () => {
  it('formats an open port with its service', () => {
    expect(formatScanResult({ port: 21, open: true, service: 'FTP' })).toBe('Port 21 is open (Service: FTP)');
  });

  it('formats a closed port', () => {
    expect(formatScanResult({ port: 81, open: false, service: null })).toBe('Port 81 is closed');
  });
});

describe('ScanReporter', () => {
  it('writes the run through the given writer', () => {
    const lines: string[] = [];
    const reporter = new ScanReporter((line) => lines.push(line));

    reporter.resolved('example.test', '192.0.2.1');
    reporter.scanStarted('192.0.2.1', 20, 25);
    reporter.result({ port: 22, open: true, service: 'SSH' });
    reporter.finished({ workerCount: 6, scanned: 6, open: 1, errors: 0, cancelled: false, durationMs: 1234 });

    expect(lines).toEqual([
      'Resolved IP for example.test: 192.0.2.1',
      'Scanning IP: 192.0.2.1 from port 20 to 25...\n',
      'Port 22 is open (Service: SSH)',
      '\nScan complete: 1 open port out of 6 scanned in 1.2s',
    ]);
  });

  it('pluralises the summary and reports failures', () => {
    const lines: string[] = [];
    const reporter = new ScanReporter((line) => lines.push(line));

    reporter.finished({ workerCount: 100, scanned: 1000, open: 3, errors: 0, cancelled: false, durationMs: 12000 });
    reporter.resolutionFailed('nowhere.invalid');
    reporter.cancelled(40, 1000);

    expect(lines).toEqual([
      '\nScan complete: 3 open ports out of 1000 scanned in 12.0s',
      'Error: Unable to resolve nowhere.invalid',
      '\nScan cancelled after 40 of 1000 ports',
    ]);
  });
});

import type { ServiceName } from '../types/scanner.js';

export const UNKNOWN_SERVICE: ServiceName = 'Unknown';

// Probes sent right after connecting to elicit an identifying reply
const PROBE_PAYLOADS: Array<[number, string]> = [
  // FTP data
  [20, 'NOOP\r\n'],
  // FTP control, usually greets with a 220 banner
  [21, 'HELLO\r\n'],
  // SSH announces its version
  [22, '\n'],
  // Telnet login prompt
  [23, '\r\n'],
  // SMTP
  [25, 'EHLO example.com\r\n'],
  // DNS: A query for example.com
  [53, '\x00\x00\x01\x00\x00\x01\x00\x00\x00\x00\x00\x00\x07example\x03com\x00\x00\x01\x00\x01'],
  // HTTP
  [80, 'HEAD / HTTP/1.0\r\n\r\n'],
  // POP3
  [110, 'USER test\r\n'],
  // IMAP
  [143, 'TAG LOGIN test test\r\n'],
  // HTTPS: TLS handshake record header
  [443, '\x16\x03\x01\x00\x01\x01'],
  // SMTP submission
  [587, 'EHLO example.com\r\n'],
  // MySQL sends its version on connect
  [3306, '\x00'],
  // RDP negotiation request
  [3389, '\x03\x00\x00\x13\x0e\xe0\x00\x00\x00\x00\x00\x01\x00\x08\x03\x00\x00\x00'],
  // VNC protocol version
  [5900, 'RFB 003.003\n'],
  // HTTP alternate / proxies
  [8080, 'HEAD / HTTP/1.0\r\n\r\n'],
];

// Payloads are byte strings, so latin1 keeps every \xNN as a single byte
export const PROBE_TABLE: ReadonlyMap<number, Buffer> = new Map(
  PROBE_PAYLOADS.map(([port, payload]) => [port, Buffer.from(payload, 'latin1')])
);

// Checked in this order; the first keyword contained in the response wins.
// "HTTPS" sits behind "HTTP" and therefore never wins on its own.
export const KEYWORD_TABLE: ReadonlyArray<readonly [keyword: string, service: ServiceName]> = [
  ['HTTP', 'HTTP'],
  ['220', 'FTP'],
  ['FTP', 'FTP'],
  ['SSH', 'SSH'],
  ['Telnet', 'Telnet'],
  ['Login', 'Telnet'],
  ['POP3', 'POP3'],
  ['IMAP', 'IMAP'],
  ['SMTP', 'SMTP'],
  ['MySQL', 'MySQL'],
  ['RFB', 'VNC'],
  ['RDP', 'Remote Desktop'],
  ['HTTPS', 'HTTPS'],
];

export function probeFor(port: number): Buffer | undefined {
  return PROBE_TABLE.get(port);
}

/**
 * Names the service behind a response by case-sensitive keyword search.
 * Returns null when no keyword occurs in the text.
 */
export function classify(responseText: string): ServiceName | null {
  for (const [keyword, service] of KEYWORD_TABLE) {
    if (responseText.includes(keyword)) {
      return service;
    }
  }
  return null;
}


// Scanner types
export type {
  ServiceName,
  OpenPortResult,
  ClosedPortResult,
  ScanResult,
  Connection,
  SocketConnector,
  PortCheckFn,
  ScanResultHandler,
  PortProberOptions,
  PortCheckerOptions,
  ScanCoordinatorOptions,
  ScanRunOptions,
  ScanWorkerOptions,
  ScanWorkerStats,
  ScanStats,
} from './scanner.js';

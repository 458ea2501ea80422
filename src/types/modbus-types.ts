// src/types/modbus-types.ts

// !=============================================================================
// ! Function code responses
// !=============================================================================

export type ReadHoldingRegistersResponse = number[];

/** Response to a write multiple registers request */
export interface WriteMultipleRegistersResponse {
  startAddress: number;
  quantity: number;
}

// !=============================================================================
// ! Transports
// !=============================================================================

/** Byte-stream transport carrying framed Modbus packets */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  read(length: number, timeout?: number): Promise<Uint8Array>;
  flush?(): Promise<void>;
}

/**
 * Register-level transport consumed by the client core.
 *
 * Implementations signal a response timeout with `ModbusTimeoutError`, use while
 * closed with `ModbusNotConnectedError` and a dropped link with a `TransportError`.
 */
export interface RegisterTransport {
  connect(): Promise<void>;
  close(): Promise<void>;
  readHoldingRegisters(address: number, count: number): Promise<number[]>;
  writeRegisters(address: number, values: readonly number[]): Promise<void>;
}

export interface TcpTarget {
  host: string;
  port: number;
}

export type RegisterTransportFactory = (
  target: TcpTarget,
  options: ResolvedClientOptions
) => RegisterTransport;

// !=============================================================================
// ! Client
// !=============================================================================

export interface ModbusClientOptions {
  /**
   * Connect deadline and response timeout, in milliseconds (default 1000).
   * Pass `2000` for two seconds, not `2`.
   */
  timeout?: number;
  /** Unit identifier placed in the MBAP header (default 1) */
  unitId?: number;
  /** Port used when the address carries none (default 502) */
  port?: number;
  logLevel?: LogLevel;
  /** Builds the transport; defaults to a Modbus TCP socket transport */
  transport?: RegisterTransportFactory;
}

export interface ResolvedClientOptions {
  timeout: number;
  unitId: number;
  port: number;
  /** Per-client log level; when absent the shared logger's level applies */
  logLevel?: LogLevel;
}

export type ClientState = 'unconnected' | 'connecting' | 'connected' | 'failed' | 'closed';

export interface ReadHoldingRegistersRequest {
  method: 'readHoldingRegisters';
  address: number;
  count: number;
}

export interface WriteRegistersRequest {
  method: 'writeRegisters';
  address: number;
  values: readonly number[];
}

export type ModbusRequest = ReadHoldingRegistersRequest | WriteRegistersRequest;

/** Protocol-legal slice of a larger register read */
export interface RegisterChunk {
  address: number;
  count: number;
}

// !=============================================================================
// ! Emulator
// !=============================================================================

export interface SlaveEmulatorOptions {
  unitId?: number;
  /** Delay before a response becomes readable, in milliseconds */
  responseDelay?: number;
  /** Makes `connect()` reject with this error */
  connectError?: Error;
  loggerEnabled?: boolean;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Logging context */
export interface LogContext {
  target?: string;
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  address?: number;
  quantity?: number;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Named logger instance */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

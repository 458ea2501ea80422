// src/client.ts

import { Mutex } from 'async-mutex';
import { resolveClientOptions } from './config.js';
import { ConnectionManager } from './connection-manager.js';
import { RegisterChunker } from './register-chunker.js';
import { RequestSerializer } from './request-serializer.js';
import { createTcpRegisterTransport } from './transport/factory.js';
import { parseTcpAddress } from './utils/tcp-utils.js';
import { logger } from './logger.js';
import {
  ClientState,
  LoggerInstance,
  ModbusClientOptions,
  ResolvedClientOptions,
  TcpTarget,
} from './types/modbus-types.js';

/**
 * Asynchronous Modbus TCP client for one device.
 *
 * Construction starts the (single) connection attempt without blocking. Every
 * request waits for that attempt, then runs under a per-client lock, so at most
 * one request is on the wire at a time. Reads larger than 124 registers are split
 * into several requests.
 *
 * Only one client may talk to a given device: two clients for the same address
 * each hold their own lock and can overlap requests on the device.
 *
 * `options.timeout` is in milliseconds (default 1000, one second).
 *
 * @example
 * // two-second connect and response timeout
 * await withModbusClient('192.168.1.20', { timeout: 2000 }, async client => {
 *   const registers = await client.readRegisters(0, 300);
 *   await client.writeRegisters(10, [1, 2, 3]);
 * });
 */
export class ModbusClient {
  private static _instances = 0;

  private readonly _address: string;
  private readonly _target: TcpTarget;
  private readonly _options: ResolvedClientOptions;
  private readonly _logger: LoggerInstance;
  private readonly _mutex: Mutex = new Mutex();
  private readonly _connection: ConnectionManager;
  private readonly _connectTask: Promise<void>;
  private readonly _registers: RegisterChunker;

  /**
   * @param address - `host`, `host:port` or `[ipv6]:port`
   * @throws ModbusConfigError If the address or an option is invalid
   */
  constructor(address: string, options: ModbusClientOptions = {}) {
    this._options = resolveClientOptions(options);
    this._target = parseTcpAddress(address, this._options.port);
    this._address = address;

    // One category per instance so per-client levels do not collide
    this._logger = logger.createLogger(`ModbusClient(${address})#${++ModbusClient._instances}`);
    if (this._options.logLevel) this._logger.setLevel(this._options.logLevel);

    const createTransport = options.transport ?? createTcpRegisterTransport;
    this._connection = new ConnectionManager(
      createTransport(this._target, this._options),
      address,
      this._options.timeout,
      this._logger
    );

    // The handshake holds the same lock as requests
    this._connectTask = this._mutex.runExclusive(() => this._connection.connect());
    this._connectTask.catch((err: unknown) => {
      this._logger.debug(
        `Requests will be rejected: ${err instanceof Error ? err.message : String(err)}`
      );
    });

    const serializer = new RequestSerializer(
      this._connection,
      this._connectTask,
      this._mutex,
      this._logger
    );
    this._registers = new RegisterChunker(serializer);
  }

  public get address(): string {
    return this._address;
  }

  public get target(): TcpTarget {
    return { ...this._target };
  }

  public get state(): ClientState {
    return this._connection.state;
  }

  /**
   * Resolves once connected; rejects with the same `ConnectionError` requests get.
   */
  public ready(): Promise<void> {
    return this._connectTask;
  }

  /**
   * Reads holding registers (FC 0x03).
   *
   * The protocol caps a response at 250 bytes (125 registers), so larger reads are
   * issued as consecutive requests of up to 124 registers and concatenated.
   * @throws ConnectionError If the connection attempt failed
   * @throws RequestTimeoutError If a request timed out or the link is down
   */
  public readRegisters(address: number, count: number): Promise<number[]> {
    return this._registers.read(address, count);
  }

  /**
   * Writes holding registers (FC 0x10) in one request.
   *
   * Unlike reads, writes are not chunked: more than 123 values are rejected by the
   * request builder with a `RangeError`.
   * @throws ConnectionError If the connection attempt failed
   * @throws RequestTimeoutError If the request timed out or the link is down
   */
  public writeRegisters(address: number, values: readonly number[]): Promise<void> {
    return this._registers.write(address, values);
  }

  /**
   * Closes the connection. Safe to call any number of times, before or after connecting.
   * Drops the client's log level override once closed.
   */
  public async close(): Promise<void> {
    await this._connection.close();
    this._logger.resume();
  }

  /**
   * Runs `fn` with this client and closes it afterwards, whether `fn` resolves or throws.
   */
  public async use<T>(fn: (client: this) => Promise<T> | T): Promise<T> {
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }
}

/**
 * Creates a client for `address`, runs `fn` with it and closes it on every exit path.
 * @param options - Client options; `timeout` is in milliseconds (default 1000)
 */
export function withModbusClient<T>(
  address: string,
  options: ModbusClientOptions,
  fn: (client: ModbusClient) => Promise<T> | T
): Promise<T> {
  return new ModbusClient(address, options).use(fn);
}

export default ModbusClient;

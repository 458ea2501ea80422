// src/connection-manager.ts

import {
  ConnectionError,
  ModbusError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
} from './errors.js';
import { ClientState, LoggerInstance, RegisterTransport } from './types/modbus-types.js';
import { withDeadline } from './utils/utils.js';

/**
 * Owns the transport handle and its lifecycle:
 * `unconnected → connecting → connected | failed`, and `closed` from any of them.
 */
export class ConnectionManager {
  private _state: ClientState = 'unconnected';
  private _closing: Promise<void> | null = null;
  private _released: Promise<void> | null = null;

  constructor(
    private readonly _transport: RegisterTransport,
    private readonly _address: string,
    private readonly _timeout: number,
    private readonly _logger: LoggerInstance
  ) {}

  public get state(): ClientState {
    return this._state;
  }

  public get address(): string {
    return this._address;
  }

  /**
   * Single connection attempt, bounded by the configured timeout.
   * On failure the transport is released and a `ConnectionError` is thrown.
   * Does nothing once the manager has been closed.
   */
  public async connect(): Promise<void> {
    if (this._state === 'closed') return;
    if (this._state !== 'unconnected') {
      throw new ModbusError(`Connection to '${this._address}' was already attempted`);
    }
    this._state = 'connecting';
    const startTime = Date.now();

    try {
      await withDeadline(
        this._transport.connect(),
        this._timeout,
        () => new ModbusTimeoutError(`Connect timeout after ${this._timeout}ms`)
      );
    } catch (err: unknown) {
      if (this._state === 'connecting') this._state = 'failed';
      const reason = err instanceof Error ? err.message : String(err);
      this._logger.error(`Could not connect: ${reason}`, {
        target: this._address,
        responseTime: Date.now() - startTime,
      });
      await this._release();
      throw new ConnectionError(this._address, { cause: err });
    }

    // close() won the race; leave the client closed
    if (this._state !== 'connecting') return;

    this._state = 'connected';
    this._logger.info('Connected', {
      target: this._address,
      responseTime: Date.now() - startTime,
    });
  }

  /**
   * Returns the transport while connected.
   * @throws ModbusNotConnectedError In any other state
   */
  public requireTransport(): RegisterTransport {
    if (this._state !== 'connected') {
      throw new ModbusNotConnectedError(`Transport for '${this._address}' is ${this._state}`);
    }
    return this._transport;
  }

  /**
   * Releases the transport. Safe to call in any state and any number of times;
   * the transport itself is closed once.
   */
  public close(): Promise<void> {
    this._closing ??= this._close();
    return this._closing;
  }

  private async _close(): Promise<void> {
    this._state = 'closed';
    await this._release();
    this._logger.info('Closed', { target: this._address });
  }

  private _release(): Promise<void> {
    this._released ??= this._closeTransport();
    return this._released;
  }

  private async _closeTransport(): Promise<void> {
    try {
      await this._transport.close();
    } catch (err: unknown) {
      this._logger.warn(
        `Failed to close transport: ${err instanceof Error ? err.message : String(err)}`,
        { target: this._address }
      );
    }
  }
}

// src/request-serializer.ts

import { Mutex } from 'async-mutex';
import { ConnectionManager } from './connection-manager.js';
import { translateRequestError } from './error-translator.js';
import { ModbusFunctionCode } from './constants/constants.js';
import {
  LoggerInstance,
  ModbusRequest,
  ReadHoldingRegistersRequest,
  RegisterTransport,
  WriteRegistersRequest,
} from './types/modbus-types.js';

/**
 * Funnels every request through one lock so that at most one exchange is
 * outstanding on the link. Modbus devices drop a request that arrives while
 * another is being processed, so queuing above this layer is not enough.
 */
export class RequestSerializer {
  constructor(
    private readonly _connection: ConnectionManager,
    private readonly _connectTask: Promise<void>,
    private readonly _mutex: Mutex,
    private readonly _logger: LoggerInstance
  ) {}

  public get isBusy(): boolean {
    return this._mutex.isLocked();
  }

  /**
   * Waits for the connection attempt, then dispatches the request under the lock.
   * @throws ConnectionError If the connection attempt failed
   * @throws RequestTimeoutError If the exchange timed out or the link is down
   */
  public execute(request: ReadHoldingRegistersRequest): Promise<number[]>;
  public execute(request: WriteRegistersRequest): Promise<void>;
  public async execute(request: ModbusRequest): Promise<number[] | void> {
    await this._connectTask;

    return this._mutex.runExclusive(async () => {
      const startTime = Date.now();
      const context = {
        target: this._connection.address,
        funcCode: functionCodeOf(request),
        address: request.address,
        quantity:
          request.method === 'readHoldingRegisters' ? request.count : request.values.length,
      };

      try {
        const result = await this._dispatch(this._connection.requireTransport(), request);
        this._logger.debug('Response received', {
          ...context,
          responseTime: Date.now() - startTime,
        });
        return result;
      } catch (err: unknown) {
        this._logger.warn(`Request failed: ${err instanceof Error ? err.message : String(err)}`, {
          ...context,
          responseTime: Date.now() - startTime,
        });
        throw translateRequestError(err, this._connection.address);
      }
    });
  }

  private _dispatch(
    transport: RegisterTransport,
    request: ModbusRequest
  ): Promise<number[] | void> {
    switch (request.method) {
      case 'readHoldingRegisters':
        return transport.readHoldingRegisters(request.address, request.count);
      case 'writeRegisters':
        return transport.writeRegisters(request.address, request.values);
    }
  }
}

function functionCodeOf(request: ModbusRequest): ModbusFunctionCode {
  return request.method === 'readHoldingRegisters'
    ? ModbusFunctionCode.READ_HOLDING_REGISTERS
    : ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
}

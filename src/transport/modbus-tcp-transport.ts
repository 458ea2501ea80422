// src/transport/modbus-tcp-transport.ts

import { ModbusProtocol } from '../framers/modbus-protocol.js';
import { TcpFramer } from '../framers/tcp-framer.js';
import {
  buildReadHoldingRegistersRequest,
  parseReadHoldingRegistersResponse,
} from '../function-codes/read-holding-registers.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
} from '../function-codes/write-multiple-registers.js';
import { ModbusResponseError } from '../errors.js';
import { RegisterTransport, Transport } from '../types/modbus-types.js';

export interface ModbusTcpTransportOptions {
  unitId: number;
  /** Response timeout per exchange, in milliseconds */
  timeout: number;
}

/**
 * Register-level Modbus TCP transport: MBAP framing over a byte transport.
 */
export class ModbusTcpTransport implements RegisterTransport {
  private readonly _protocol: ModbusProtocol;
  private _closed = false;

  constructor(
    private readonly _transport: Transport,
    private readonly _options: ModbusTcpTransportOptions
  ) {
    this._protocol = new ModbusProtocol(_transport, new TcpFramer());
  }

  public async connect(): Promise<void> {
    await this._transport.connect();
  }

  /**
   * Closes the underlying byte transport; further calls are no-ops.
   */
  public async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    await this._transport.disconnect();
  }

  private _exchange(pdu: Uint8Array): Promise<Uint8Array> {
    return this._protocol.exchange(this._options.unitId, pdu, this._options.timeout);
  }

  public async readHoldingRegisters(address: number, count: number): Promise<number[]> {
    const pdu = buildReadHoldingRegistersRequest(address, count);
    const response = await this._exchange(pdu);
    const registers = parseReadHoldingRegistersResponse(response);
    if (registers.length !== count) {
      throw new ModbusResponseError(
        `Expected ${count} registers from address ${address}, got ${registers.length}`
      );
    }
    return registers;
  }

  public async writeRegisters(address: number, values: readonly number[]): Promise<void> {
    const pdu = buildWriteMultipleRegistersRequest(address, values);
    const response = await this._exchange(pdu);
    const { startAddress, quantity } = parseWriteMultipleRegistersResponse(response);
    if (startAddress !== address || quantity !== values.length) {
      throw new ModbusResponseError(
        `Write echo mismatch: sent ${address}+${values.length}, got ${startAddress}+${quantity}`
      );
    }
  }
}

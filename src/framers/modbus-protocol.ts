// src/framers/modbus-protocol.ts

import { Transport } from '../types/modbus-types.js';
import { ModbusFramer } from './modbus-framer.js';
import {
  ModbusTimeoutError,
  ModbusExceptionError,
  ModbusUnexpectedFunctionCodeError,
} from '../errors.js';
import { concatUint8Arrays } from '../utils/utils.js';

/**
 * Runs one request/response exchange over a byte transport
 */
export class ModbusProtocol {
  constructor(
    private readonly _transport: Transport,
    private readonly _framer: ModbusFramer
  ) {}

  private _timeLeft(startTime: number, timeout: number): number {
    const elapsed = Date.now() - startTime;
    if (elapsed >= timeout) {
      throw new ModbusTimeoutError(`Response timeout after ${elapsed}ms`);
    }
    return timeout - elapsed;
  }

  /**
   * Sends the request PDU and resolves with the response PDU.
   * @throws ModbusTimeoutError If the full response does not arrive within `timeout` ms
   * @throws ModbusExceptionError If the device answers with an exception response
   */
  public async exchange(
    unitId: number,
    pduRequest: Uint8Array,
    timeout: number
  ): Promise<Uint8Array> {
    const startTime = Date.now();
    const functionCode = pduRequest[0]!;

    if (this._transport.flush) {
      await this._transport.flush();
    }

    const aduRequest = this._framer.buildAdu(unitId, pduRequest);
    const context = this._framer.context;
    await this._transport.write(aduRequest);

    const header = await this._transport.read(
      this._framer.headerLength,
      this._timeLeft(startTime, timeout)
    );
    const aduLength = this._framer.getAduLength(header);
    const body = await this._transport.read(
      aduLength - header.length,
      this._timeLeft(startTime, timeout)
    );

    const { pdu } = this._framer.parseAdu(concatUint8Arrays([header, body]), context);
    const responseCode = pdu[0] ?? 0;

    if (responseCode === (functionCode | 0x80)) {
      throw new ModbusExceptionError(functionCode, pdu[1] ?? 0);
    }
    if (responseCode !== functionCode) {
      throw new ModbusUnexpectedFunctionCodeError(functionCode, responseCode);
    }

    return pdu;
  }
}

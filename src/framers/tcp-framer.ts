// src/framers/tcp-framer.ts

import { ModbusFramer, FramerContext } from './modbus-framer.js';
import { concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';
import { buildMbapHeader, parseMbapHeader, TransactionCounter } from '../utils/tcp-utils.js';
import { ModbusInvalidTransactionIdError, ModbusResponseError } from '../errors.js';

const MBAP_HEADER_SIZE = 7;
// unit id (1) + largest PDU (253)
const MAX_MBAP_LENGTH = 254;

export class TcpFramer implements ModbusFramer {
  public readonly headerLength = MBAP_HEADER_SIZE;
  private _transactions = new TransactionCounter();

  public buildAdu(unitId: number, pdu: Uint8Array): Uint8Array {
    const tid = this._transactions.next();
    return concatUint8Arrays([buildMbapHeader(tid, unitId, pdu.length), pdu]);
  }

  public parseAdu(packet: Uint8Array, context?: FramerContext) {
    if (packet.length < MBAP_HEADER_SIZE) {
      throw new ModbusResponseError('Invalid TCP packet: too short for MBAP');
    }

    const header = parseMbapHeader(packet);

    if (header.protocolId !== 0) {
      throw new ModbusResponseError(`Invalid Protocol ID: ${header.protocolId}`);
    }

    if (context?.transactionId !== undefined && header.transactionId !== context.transactionId) {
      throw new ModbusInvalidTransactionIdError(header.transactionId, context.transactionId);
    }

    const pdu = sliceUint8Array(packet, MBAP_HEADER_SIZE);
    if (pdu.length !== header.length - 1) {
      throw new ModbusResponseError(
        `Invalid TCP packet: MBAP length ${header.length}, PDU has ${pdu.length} bytes`
      );
    }

    return { unitId: header.unitId, pdu };
  }

  public getAduLength(header: Uint8Array): number {
    const { length } = parseMbapHeader(header);
    if (length < 2 || length > MAX_MBAP_LENGTH) {
      throw new ModbusResponseError(`Invalid MBAP length field: ${length}`);
    }
    return MBAP_HEADER_SIZE - 1 + length;
  }

  /**
   * Transaction id of the last built request
   */
  public get currentTransactionId(): number {
    return this._transactions.current;
  }

  public get context(): FramerContext {
    return { transactionId: this.currentTransactionId };
  }
}

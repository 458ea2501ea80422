// src/function-codes/read-holding-registers.ts

import { ModbusFunctionCode, MAX_REGISTER_ADDRESS } from '../constants/constants.js';
import { ReadHoldingRegistersResponse } from '../types/modbus-types.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_HOLDING_REGISTERS;
const MIN_QUANTITY = 1;
const MAX_QUANTITY = 125;
const REQUEST_SIZE = 5; // FC(1) + address(2) + quantity(2)
const RESPONSE_HEADER_SIZE = 2; // FC(1) + byte count(1)
const UINT16_SIZE = 2;

/**
 * Builds the request PDU for reading holding registers (FC 0x03)
 * @param startAddress - first register (0x0000-0xFFFF)
 * @param quantity - number of registers (1-125)
 */
export function buildReadHoldingRegistersRequest(
  startAddress: number,
  quantity: number
): Uint8Array {
  if (
    !Number.isInteger(startAddress) ||
    startAddress < 0 ||
    startAddress > MAX_REGISTER_ADDRESS
  ) {
    throw new RangeError(`Address must be 0-${MAX_REGISTER_ADDRESS}, got ${startAddress}`);
  }
  if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_QUANTITY) {
    throw new RangeError(`Quantity must be integer ${MIN_QUANTITY}-${MAX_QUANTITY}`);
  }

  const buffer = new Uint8Array(REQUEST_SIZE);
  buffer[0] = FUNCTION_CODE;
  buffer[1] = startAddress >>> 8;
  buffer[2] = startAddress & 0xff;
  buffer[3] = quantity >>> 8;
  buffer[4] = quantity & 0xff;

  return buffer;
}

/**
 * Parses the response PDU of a holding register read (FC 0x03)
 * @returns register values, big-endian decoded
 */
export function parseReadHoldingRegistersResponse(pdu: Uint8Array): ReadHoldingRegistersResponse {
  const pduLength = pdu.length;
  if (pduLength < RESPONSE_HEADER_SIZE) {
    throw new Error('PDU too short');
  }

  if (pdu[0] !== FUNCTION_CODE) {
    throw new Error(
      `Invalid function code: expected 0x03, got 0x${pdu[0]?.toString(16).padStart(2, '0')}`
    );
  }

  const byteCount = pdu[1]!;
  if (byteCount % UINT16_SIZE !== 0) {
    throw new Error(`Invalid byte count: must be multiple of ${UINT16_SIZE}`);
  }

  const expectedLength = RESPONSE_HEADER_SIZE + byteCount;
  if (pduLength !== expectedLength) {
    throw new Error(`Invalid PDU length: expected ${expectedLength}, got ${pduLength}`);
  }

  const registerCount = byteCount / UINT16_SIZE;
  const view = new DataView(pdu.buffer, pdu.byteOffset + RESPONSE_HEADER_SIZE, byteCount);
  const registers: number[] = new Array(registerCount);
  for (let i = 0; i < registerCount; i++) {
    registers[i] = view.getUint16(i * UINT16_SIZE, false);
  }
  return registers;
}

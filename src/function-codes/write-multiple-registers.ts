// src/function-codes/write-multiple-registers.ts

import {
  ModbusFunctionCode,
  MAX_REGISTER_ADDRESS,
  MAX_REGISTERS_PER_WRITE,
} from '../constants/constants.js';
import { WriteMultipleRegistersResponse } from '../types/modbus-types.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
const MIN_REGISTERS = 1;
const MAX_VALUE = 0xffff;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;
const UINT16_SIZE = 2;

function validateRegisterAddress(address: number): void {
  if (!Number.isInteger(address) || address < 0 || address > MAX_REGISTER_ADDRESS) {
    throw new RangeError(`Address must be 0-${MAX_REGISTER_ADDRESS}, got ${address}`);
  }
}

function validateRegisterValue(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
    throw new RangeError(`Value must be 0-${MAX_VALUE}, got ${value}`);
  }
}

/**
 * Builds the request PDU for writing multiple registers (FC 0x10)
 * @param startAddress - first register
 * @param values - register values, 1-123 of them
 * @throws RangeError If the count, the address or a value is out of range
 */
export function buildWriteMultipleRegistersRequest(
  startAddress: number,
  values: readonly number[]
): Uint8Array {
  validateRegisterAddress(startAddress);

  const quantity = values.length;
  if (quantity < MIN_REGISTERS || quantity > MAX_REGISTERS_PER_WRITE) {
    throw new RangeError(
      `Values count must be ${MIN_REGISTERS}-${MAX_REGISTERS_PER_WRITE}, got ${quantity}`
    );
  }
  if (startAddress + quantity - 1 > MAX_REGISTER_ADDRESS) {
    throw new RangeError(`Register range ${startAddress}+${quantity} exceeds address space`);
  }
  values.forEach(validateRegisterValue);

  const byteCount = quantity * UINT16_SIZE;
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + byteCount);
  const view = new DataView(pdu.buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  view.setUint8(5, byteCount);

  values.forEach((value, i) => {
    view.setUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, value, false);
  });

  return pdu;
}

/**
 * Parses the response PDU of a write multiple registers request
 * @throws Error If the PDU has the wrong length or function code
 */
export function parseWriteMultipleRegistersResponse(
  pdu: Uint8Array
): WriteMultipleRegistersResponse {
  if (pdu.length !== RESPONSE_SIZE) {
    throw new Error(`Invalid PDU length: expected ${RESPONSE_SIZE}, got ${pdu.length}`);
  }

  if (pdu[0] !== FUNCTION_CODE) {
    throw new Error(
      `Invalid function code: expected 0x${FUNCTION_CODE.toString(16)}, got 0x${pdu[0]?.toString(16)}`
    );
  }

  const view = new DataView(pdu.buffer, pdu.byteOffset, RESPONSE_SIZE);

  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}

// src/constants/constants.ts

/**
 * Modbus function codes used by the register client
 */
export enum ModbusFunctionCode {
  READ_HOLDING_REGISTERS = 0x03,
  WRITE_MULTIPLE_REGISTERS = 0x10,
}

/**
 * Modbus exception codes
 */
export enum ModbusExceptionCode {
  ILLEGAL_FUNCTION = 1,
  ILLEGAL_DATA_ADDRESS = 2,
  ILLEGAL_DATA_VALUE = 3,
  SLAVE_DEVICE_FAILURE = 4,
  ACKNOWLEDGE = 5,
  SLAVE_DEVICE_BUSY = 6,
  MEMORY_PARITY_ERROR = 8,
  GATEWAY_PATH_UNAVAILABLE = 10,
  GATEWAY_TARGET_DEVICE_FAILED = 11,
}

export const MODBUS_EXCEPTION_MESSAGES: Readonly<Record<number, string>> = {
  [ModbusExceptionCode.ILLEGAL_FUNCTION]: 'Illegal Function',
  [ModbusExceptionCode.ILLEGAL_DATA_ADDRESS]: 'Illegal Data Address',
  [ModbusExceptionCode.ILLEGAL_DATA_VALUE]: 'Illegal Data Value',
  [ModbusExceptionCode.SLAVE_DEVICE_FAILURE]: 'Slave Device Failure',
  [ModbusExceptionCode.ACKNOWLEDGE]: 'Acknowledge',
  [ModbusExceptionCode.SLAVE_DEVICE_BUSY]: 'Slave Device Busy',
  [ModbusExceptionCode.MEMORY_PARITY_ERROR]: 'Memory Parity Error',
  [ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE]: 'Gateway Path Unavailable',
  [ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED]: 'Gateway Target Device Failed to Respond',
};

export const FUNCTION_CODE_NAMES: ReadonlyMap<number, string> = new Map([
  [ModbusFunctionCode.READ_HOLDING_REGISTERS, 'READ_HOLDING_REGISTERS'],
  [ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS, 'WRITE_MULTIPLE_REGISTERS'],
]);

/**
 * Largest number of holding registers requested in one message.
 * The protocol allows 125 (250 bytes); one register is kept as headroom.
 */
export const MAX_REGISTERS_PER_READ = 124;

/** Largest number of registers a single FC 0x10 request may carry */
export const MAX_REGISTERS_PER_WRITE = 0x7b;

export const MAX_REGISTER_ADDRESS = 0xffff;

export const MODBUS_TCP_DEFAULT_PORT = 502;

export const DEFAULT_TIMEOUT_MS = 1000;

export const DEFAULT_UNIT_ID = 1;

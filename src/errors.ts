// src/errors.ts

import { MODBUS_EXCEPTION_MESSAGES, MAX_REGISTER_ADDRESS } from './constants/constants.js';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModbusError';
  }
}

// --- Public taxonomy ---

/**
 * The initial connection to the device could not be established.
 * Raised to every caller once the connect attempt has failed.
 */
export class ConnectionError extends ModbusError {
  readonly address: string;

  constructor(address: string, options?: { cause?: unknown }) {
    super(`Could not connect to '${address}'.`, options);
    this.name = 'ConnectionError';
    this.address = address;
  }
}

/**
 * A request did not complete: the exchange timed out or the link was not usable.
 */
export class RequestTimeoutError extends ModbusError {
  readonly address: string;

  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestTimeoutError';
    this.address = address;
  }
}

// --- Transport level ---

/**
 * Error class for Modbus timeout
 */
export class ModbusTimeoutError extends ModbusError {
  constructor(message: string = 'Modbus request timed out') {
    super(message);
    this.name = 'ModbusTimeoutError';
  }
}

/**
 * Error class for operations attempted while the transport is not connected
 */
export class ModbusNotConnectedError extends ModbusError {
  constructor(message: string = 'Modbus transport is not connected') {
    super(message);
    this.name = 'ModbusNotConnectedError';
  }
}

/**
 * Base class for connection-level failures reported by a transport
 */
export class TransportError extends ModbusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The socket was closed or reset while the transport was in use
 */
export class ModbusConnectionLostError extends TransportError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Connection lost: ${reason}`, options);
    this.name = 'ModbusConnectionLostError';
  }
}

// --- Protocol ---

/**
 * Error class for Modbus exception
 */
export class ModbusExceptionError extends ModbusError {
  functionCode: number;
  exceptionCode: number;

  constructor(functionCode: number, exceptionCode: number) {
    const exceptionMessage =
      MODBUS_EXCEPTION_MESSAGES[exceptionCode] ??
      `Unknown exception code: ${exceptionCode}`;
    super(
      `Modbus exception: function 0x${functionCode.toString(16)}, code 0x${exceptionCode.toString(16)} (${exceptionMessage})`
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
  }
}

/**
 * Error class for Modbus response errors
 */
export class ModbusResponseError extends ModbusError {
  constructor(message: string = 'Invalid Modbus response') {
    super(message);
    this.name = 'ModbusResponseError';
  }
}

/**
 * Error class for invalid Modbus transaction ID
 */
export class ModbusInvalidTransactionIdError extends ModbusResponseError {
  constructor(received: number, expected: number) {
    super(`Invalid transaction ID: received ${received}, expected ${expected}`);
    this.name = 'ModbusInvalidTransactionIdError';
  }
}

/**
 * Error class for unexpected function code in response
 */
export class ModbusUnexpectedFunctionCodeError extends ModbusResponseError {
  constructor(sent: number, received: number) {
    super(
      `Unexpected function code: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'ModbusUnexpectedFunctionCodeError';
  }
}

// --- Validation ---

/**
 * Error class for invalid unit (slave) address
 */
export class ModbusInvalidAddressError extends ModbusError {
  constructor(address: number) {
    super(`Invalid Modbus unit address: ${address}. Address must be between 0-255 for TCP.`);
    this.name = 'ModbusInvalidAddressError';
  }
}

/**
 * Error class for invalid quantity (register count)
 */
export class ModbusInvalidQuantityError extends ModbusError {
  constructor(quantity: number, min: number, max: number) {
    super(`Invalid quantity: ${quantity}. Must be between ${min}-${max}.`);
    this.name = 'ModbusInvalidQuantityError';
  }
}

/**
 * Error class for a register range falling outside the address space
 */
export class ModbusIllegalDataAddressError extends ModbusError {
  constructor(address: number, quantity: number) {
    super(
      `Illegal data address: start=${address}, quantity=${quantity} (range must stay within 0-${MAX_REGISTER_ADDRESS})`
    );
    this.name = 'ModbusIllegalDataAddressError';
  }
}

/**
 * Error class for invalid client configuration
 */
export class ModbusConfigError extends ModbusError {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusConfigError';
  }
}

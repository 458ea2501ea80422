// src/error-translator.ts

import {
  ModbusNotConnectedError,
  ModbusTimeoutError,
  RequestTimeoutError,
  TransportError,
} from './errors.js';

/**
 * True for failures the caller sees as "the request did not complete":
 * a response timeout, a transport that is not connected, or a dropped link.
 */
export function isRequestTimeoutCause(error: unknown): boolean {
  return (
    error instanceof ModbusTimeoutError ||
    error instanceof ModbusNotConnectedError ||
    error instanceof TransportError
  );
}

/**
 * Maps a transport failure onto the client's error taxonomy.
 * Errors outside the timeout/not-connected/connection classes are returned unchanged.
 *
 * @param address - Target address the request was sent to
 */
export function translateRequestError(error: unknown, address: string): unknown {
  if (error instanceof ModbusTimeoutError) {
    return new RequestTimeoutError(address, `Request to '${address}' timed out.`, {
      cause: error,
    });
  }
  if (isRequestTimeoutCause(error)) {
    return new RequestTimeoutError(address, `Not connected to '${address}'.`, { cause: error });
  }
  return error;
}

// src/utils/tcp-utils.ts

import { ModbusConfigError } from '../errors.js';
import { TcpTarget } from '../types/modbus-types.js';

const MBAP_HEADER_SIZE = 7;

/**
 * Transaction ID counter (1-65535, wraps back to 1)
 */
export class TransactionCounter {
  private _currentId: number = 0;

  next(): number {
    this._currentId = (this._currentId % 65535) + 1;
    return this._currentId;
  }

  get current(): number {
    return this._currentId;
  }
}

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  length: number;
  unitId: number;
}

/**
 * Builds the 7-byte MBAP header
 * @param pduLength - PDU length; the header's length field adds one byte for the unit id
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number
): Uint8Array {
  const header = new Uint8Array(MBAP_HEADER_SIZE);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false);
  view.setUint16(2, 0, false); // protocol id, always 0
  view.setUint16(4, pduLength + 1, false);
  view.setUint8(6, unitId);

  return header;
}

export function parseMbapHeader(data: Uint8Array): MbapHeader {
  if (data.length < MBAP_HEADER_SIZE) throw new Error('MBAP header too short');

  const view = new DataView(data.buffer, data.byteOffset, MBAP_HEADER_SIZE);
  return {
    transactionId: view.getUint16(0, false),
    protocolId: view.getUint16(2, false),
    length: view.getUint16(4, false),
    unitId: view.getUint8(6),
  };
}

function parsePort(raw: string, address: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
    throw new ModbusConfigError(`Invalid port in address '${address}'`);
  }
  return port;
}

/**
 * Splits `host`, `host:port` or `[ipv6]:port` into a TCP target.
 * @param defaultPort - Used when the address carries no port
 */
export function parseTcpAddress(address: string, defaultPort: number): TcpTarget {
  const trimmed = address.trim();
  if (!trimmed) throw new ModbusConfigError('Address must not be empty');

  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    if (end === -1) throw new ModbusConfigError(`Invalid address '${address}'`);
    const host = trimmed.slice(1, end);
    const rest = trimmed.slice(end + 1);
    if (!rest) return { host, port: defaultPort };
    if (!rest.startsWith(':')) throw new ModbusConfigError(`Invalid address '${address}'`);
    return { host, port: parsePort(rest.slice(1), address) };
  }

  const colon = trimmed.lastIndexOf(':');
  // A bare IPv6 address has several colons and no port
  if (colon === -1 || trimmed.indexOf(':') !== colon) {
    return { host: trimmed, port: defaultPort };
  }
  return { host: trimmed.slice(0, colon), port: parsePort(trimmed.slice(colon + 1), address) };
}

// src/register-chunker.ts

import { RequestSerializer } from './request-serializer.js';
import { MAX_REGISTER_ADDRESS, MAX_REGISTERS_PER_READ } from './constants/constants.js';
import { ModbusIllegalDataAddressError, ModbusInvalidQuantityError } from './errors.js';
import { RegisterChunk } from './types/modbus-types.js';

/**
 * Splits a register range into consecutive chunks of at most `limit` registers.
 * The last chunk takes the remainder.
 *
 * @example
 * planRegisterChunks(0, 300); // [{0,124}, {124,124}, {248,52}]
 */
export function planRegisterChunks(
  address: number,
  count: number,
  limit: number = MAX_REGISTERS_PER_READ
): RegisterChunk[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Chunk limit must be a positive integer, got ${limit}`);
  }
  if (!Number.isInteger(count) || count < 1) {
    throw new ModbusInvalidQuantityError(count, 1, MAX_REGISTER_ADDRESS + 1);
  }
  if (!Number.isInteger(address) || address < 0 || address + count - 1 > MAX_REGISTER_ADDRESS) {
    throw new ModbusIllegalDataAddressError(address, count);
  }

  const chunks: RegisterChunk[] = [];
  let next = address;
  let remaining = count;
  while (remaining > limit) {
    chunks.push({ address: next, count: limit });
    next += limit;
    remaining -= limit;
  }
  chunks.push({ address: next, count: remaining });
  return chunks;
}

/**
 * Register read/write paths on top of the serializer.
 */
export class RegisterChunker {
  constructor(
    private readonly _serializer: RequestSerializer,
    private readonly _limit: number = MAX_REGISTERS_PER_READ
  ) {}

  /**
   * Reads `count` holding registers, one chunk request at a time.
   * The result is indistinguishable from a single oversized read.
   */
  public async read(address: number, count: number): Promise<number[]> {
    const registers: number[] = [];
    for (const chunk of planRegisterChunks(address, count, this._limit)) {
      const values = await this._serializer.execute({
        method: 'readHoldingRegisters',
        address: chunk.address,
        count: chunk.count,
      });
      registers.push(...values);
    }
    return registers;
  }

  /**
   * Writes `values` in a single request. Writes are not chunked: the caller keeps
   * them within the per-message limit.
   */
  public write(address: number, values: readonly number[]): Promise<void> {
    return this._serializer.execute({ method: 'writeRegisters', address, values });
  }
}

// src/slave-emulator/slave-emulator.ts

import { logger as rootLogger } from '../logger.js';
import { ModbusExceptionCode, ModbusFunctionCode } from '../constants/constants.js';
import {
  ModbusExceptionError,
  ModbusIllegalDataAddressError,
  ModbusInvalidQuantityError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
} from '../errors.js';
import { LoggerInstance, SlaveEmulatorOptions, Transport } from '../types/modbus-types.js';
import { buildMbapHeader, parseMbapHeader } from '../utils/tcp-utils.js';
import { concatUint8Arrays, sliceUint8Array, toHex } from '../utils/utils.js';

const MBAP_HEADER_SIZE = 7;
const READ_POLL_INTERVAL = 1;

export interface EmulatorRequest {
  functionCode: number;
  address: number;
  quantity: number;
}

/**
 * In-process Modbus TCP device holding a bank of holding registers.
 *
 * It plugs in where a socket transport would (`Transport`), answers FC 0x03 and
 * FC 0x10, and behaves like a half-duplex device: a request written while the
 * previous one is still being processed is dropped and counted in `overlaps`.
 */
class SlaveEmulator implements Transport {
  public isOpen: boolean = false;
  /** Requests dropped because they arrived while another was being processed */
  public overlaps: number = 0;
  /** Requests that were processed, in arrival order */
  public readonly requests: EmulatorRequest[] = [];

  private readonly unitId: number;
  private readonly responseDelay: number;
  private readonly connectError: Error | undefined;
  private readonly holdingRegisters: Map<number, number> = new Map();
  private readonly exceptions: Map<string, number> = new Map();
  private readonly logger: LoggerInstance;
  private outgoing: Uint8Array = new Uint8Array(0);
  private processing: boolean = false;
  private pendingTimers: Set<ReturnType<typeof setTimeout>> = new Set();

  constructor(options: SlaveEmulatorOptions = {}) {
    this.unitId = options.unitId ?? 1;
    this.responseDelay = options.responseDelay ?? 0;
    this.connectError = options.connectError;
    this.logger = rootLogger.createLogger('SlaveEmulator');
    this.logger.setLevel(options.loggerEnabled ? 'info' : 'error');
  }

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
    this.isOpen = true;
    this.logger.info('Connected', { unitId: this.unitId });
  }

  async disconnect(): Promise<void> {
    this.isOpen = false;
    this.pendingTimers.forEach(timer => clearTimeout(timer));
    this.pendingTimers.clear();
    this.processing = false;
    this.logger.info('Disconnected', { unitId: this.unitId });
  }

  async flush(): Promise<void> {
    this.outgoing = new Uint8Array(0);
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this.isOpen) throw new ModbusNotConnectedError();

    if (this.processing) {
      this.overlaps++;
      this.logger.warn('Request dropped: device busy', { unitId: this.unitId });
      return;
    }

    const response = this.handleRequest(buffer);
    if (!response) return;

    if (this.responseDelay <= 0) {
      this.outgoing = concatUint8Arrays([this.outgoing, response]);
      return;
    }

    this.processing = true;
    const timer = setTimeout(() => {
      this.pendingTimers.delete(timer);
      this.processing = false;
      this.outgoing = concatUint8Arrays([this.outgoing, response]);
    }, this.responseDelay);
    this.pendingTimers.add(timer);
  }

  async read(length: number, timeout: number = 1000): Promise<Uint8Array> {
    const start = Date.now();
    return new Promise((resolve, reject) => {
      const check = () => {
        if (!this.isOpen) return reject(new ModbusNotConnectedError());
        if (this.outgoing.length >= length) {
          const data = sliceUint8Array(this.outgoing, 0, length);
          this.outgoing = sliceUint8Array(this.outgoing, length);
          return resolve(data);
        }
        if (Date.now() - start >= timeout) return reject(new ModbusTimeoutError());
        setTimeout(check, READ_POLL_INTERVAL);
      };
      check();
    });
  }

  setHoldingRegister(address: number, value: number): void {
    this.holdingRegisters.set(address, value & 0xffff);
  }

  setHoldingRegisters(startAddress: number, values: readonly number[]): void {
    values.forEach((value, i) => this.setHoldingRegister(startAddress + i, value));
  }

  getHoldingRegister(address: number): number {
    return this.holdingRegisters.get(address) ?? 0;
  }

  /**
   * Makes any request of `functionCode` touching `address` fail with `exceptionCode`.
   */
  setException(functionCode: number, address: number, exceptionCode: ModbusExceptionCode): void {
    this.exceptions.set(`${functionCode}_${address}`, exceptionCode);
  }

  clearExceptions(): void {
    this.exceptions.clear();
  }

  private _checkException(functionCode: number, address: number): void {
    const code = this.exceptions.get(`${functionCode}_${address}`);
    if (code !== undefined) throw new ModbusExceptionError(functionCode, code);
  }

  readHoldingRegisters(startAddress: number, quantity: number): number[] {
    if (quantity < 1 || quantity > 125) {
      throw new ModbusInvalidQuantityError(quantity, 1, 125);
    }
    if (startAddress + quantity > 0x10000) {
      throw new ModbusIllegalDataAddressError(startAddress, quantity);
    }
    const result: number[] = [];
    for (let addr = startAddress; addr < startAddress + quantity; addr++) {
      this._checkException(ModbusFunctionCode.READ_HOLDING_REGISTERS, addr);
      result.push(this.getHoldingRegister(addr));
    }
    return result;
  }

  writeMultipleRegisters(startAddress: number, values: readonly number[]): void {
    if (values.length < 1 || values.length > 123) {
      throw new ModbusInvalidQuantityError(values.length, 1, 123);
    }
    if (startAddress + values.length > 0x10000) {
      throw new ModbusIllegalDataAddressError(startAddress, values.length);
    }
    values.forEach((_, idx) => {
      this._checkException(ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS, startAddress + idx);
    });
    this.setHoldingRegisters(startAddress, values);
  }

  /**
   * Processes one MBAP-framed request.
   * @returns the response ADU, or null when the frame is not addressed to this unit
   */
  handleRequest(adu: Uint8Array): Uint8Array | null {
    if (adu.length < MBAP_HEADER_SIZE + 1) {
      this.logger.warn(`Frame too short: ${toHex(adu)}`);
      return null;
    }
    const header = parseMbapHeader(adu);
    if (header.unitId !== this.unitId) {
      this.logger.debug('Frame ignored - wrong unit id', { unitId: header.unitId });
      return null;
    }

    const pdu = sliceUint8Array(adu, MBAP_HEADER_SIZE);
    const functionCode = pdu[0]!;
    let responsePdu: Uint8Array;
    try {
      responsePdu = this._processFunctionCode(functionCode, pdu);
    } catch (err: unknown) {
      const exceptionCode = this._exceptionCodeFor(err);
      this.logger.warn('Exception response', { funcCode: functionCode, exceptionCode });
      responsePdu = Uint8Array.of(functionCode | 0x80, exceptionCode);
    }

    return concatUint8Arrays([
      buildMbapHeader(header.transactionId, header.unitId, responsePdu.length),
      responsePdu,
    ]);
  }

  private _exceptionCodeFor(err: unknown): number {
    if (err instanceof ModbusExceptionError) return err.exceptionCode;
    if (err instanceof ModbusIllegalDataAddressError) {
      return ModbusExceptionCode.ILLEGAL_DATA_ADDRESS;
    }
    if (err instanceof ModbusInvalidQuantityError) return ModbusExceptionCode.ILLEGAL_DATA_VALUE;
    return ModbusExceptionCode.SLAVE_DEVICE_FAILURE;
  }

  private _processFunctionCode(functionCode: number, pdu: Uint8Array): Uint8Array {
    const view = new DataView(pdu.buffer, pdu.byteOffset, pdu.length);

    switch (functionCode) {
      case ModbusFunctionCode.READ_HOLDING_REGISTERS: {
        if (pdu.length !== 5) throw new ModbusInvalidQuantityError(0, 1, 125);
        const address = view.getUint16(1, false);
        const quantity = view.getUint16(3, false);
        this.requests.push({ functionCode, address, quantity });
        const values = this.readHoldingRegisters(address, quantity);

        const response = new Uint8Array(2 + quantity * 2);
        const out = new DataView(response.buffer);
        out.setUint8(0, functionCode);
        out.setUint8(1, quantity * 2);
        values.forEach((value, i) => out.setUint16(2 + i * 2, value, false));
        return response;
      }
      case ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS: {
        if (pdu.length < 6) throw new ModbusInvalidQuantityError(0, 1, 123);
        const address = view.getUint16(1, false);
        const quantity = view.getUint16(3, false);
        const byteCount = view.getUint8(5);
        if (byteCount !== quantity * 2 || pdu.length !== 6 + byteCount) {
          throw new ModbusInvalidQuantityError(quantity, 1, 123);
        }
        this.requests.push({ functionCode, address, quantity });
        const values: number[] = [];
        for (let i = 0; i < quantity; i++) values.push(view.getUint16(6 + i * 2, false));
        this.writeMultipleRegisters(address, values);

        return pdu.slice(0, 5);
      }
      default:
        throw new ModbusExceptionError(functionCode, ModbusExceptionCode.ILLEGAL_FUNCTION);
    }
  }
}

export default SlaveEmulator;

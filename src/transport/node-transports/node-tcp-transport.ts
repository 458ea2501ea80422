// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'node:net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, toHex } from '../../utils/utils.js';
import { logger as rootLogger } from '../../logger.js';
import {
  ModbusConnectionLostError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
  TransportError,
} from '../../errors.js';
import { Transport } from '../../types/modbus-types.js';

export interface NodeTcpTransportOptions {
  /** Default read timeout, in milliseconds */
  readTimeout?: number;
  /** Bytes held for pending reads; data that would exceed it empties the buffer */
  maxBufferSize?: number;
}

const logger = rootLogger.createLogger('NodeTcpTransport');

const READ_POLL_INTERVAL = 10;

/**
 * Byte transport over a single `net.Socket`. One connection attempt per `connect()`;
 * a dropped socket stays down until the owner connects again.
 */
class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private lostReason: string | null = null;

  private _isConnecting: boolean = false;
  private _manualClose: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      readTimeout: options.readTimeout ?? 1000,
      maxBufferSize: options.maxBufferSize ?? 8192,
    };
  }

  public get endpoint(): string {
    return `${this.host}:${this.port}`;
  }

  public async connect(): Promise<void> {
    if (this.isOpen) return;
    if (this._isConnecting) throw new TransportError(`Already connecting to ${this.endpoint}`);
    this._isConnecting = true;
    this._manualClose = false;
    this.lostReason = null;

    return new Promise((resolve, reject) => {
      logger.info(`Connecting to ${this.endpoint}...`);

      const socket = net.connect({ host: this.host, port: this.port }, () => {
        this.isOpen = true;
        this._isConnecting = false;
        socket.setNoDelay(true);
        logger.info(`Connected to ${this.endpoint}`);
        resolve();
      });
      this.socket = socket;

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', err => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(new TransportError(`Failed to connect to ${this.endpoint}`, { cause: err }));
          return;
        }
        logger.error(`Socket error: ${err.message}`);
        this.lostReason = err.message;
      });

      socket.on('close', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(new TransportError(`Connection to ${this.endpoint} closed while connecting`));
        }
        this._onClose();
      });
    });
  }

  private _onData(data: Uint8Array): void {
    const chunk = new Uint8Array(data);
    logger.trace(`Received ${chunk.length} bytes: ${toHex(chunk)}`);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      logger.warn('Read buffer overflow, dropping buffered data');
      this.readBuffer = allocUint8Array(0);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  private _onClose(): void {
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.socket = null;
    if (wasOpen && !this._manualClose) {
      this.lostReason ??= 'socket closed';
      logger.warn(`Connection closed for ${this.endpoint}`);
    }
  }

  private _assertOpen(): net.Socket {
    if (this.lostReason !== null && !this.isOpen) {
      throw new ModbusConnectionLostError(this.lostReason);
    }
    if (!this.isOpen || !this.socket) throw new ModbusNotConnectedError();
    return this.socket;
  }

  public async write(buffer: Uint8Array): Promise<void> {
    const socket = this._assertOpen();
    const release = await this._operationMutex.acquire();
    try {
      logger.trace(`Sending ${buffer.length} bytes: ${toHex(buffer)}`);
      await new Promise<void>((resolve, reject) => {
        socket.write(buffer, err => {
          if (err) reject(new ModbusConnectionLostError(err.message, { cause: err }));
          else resolve();
        });
      });
    } finally {
      release();
    }
  }

  public async read(
    length: number,
    timeout: number = this.options.readTimeout
  ): Promise<Uint8Array> {
    this._assertOpen();
    const start = Date.now();
    const release = await this._operationMutex.acquire();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = () => {
          if (this.readBuffer.length >= length) {
            const data = sliceUint8Array(this.readBuffer, 0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            return resolve(data);
          }
          if (!this.isOpen) {
            return reject(new ModbusConnectionLostError(this.lostReason ?? 'socket closed'));
          }
          if (Date.now() - start >= timeout) return reject(new ModbusTimeoutError());
          setTimeout(check, READ_POLL_INTERVAL);
        };
        check();
      });
    } finally {
      release();
    }
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    if (this._isConnecting) {
      socket.destroy();
      return;
    }
    this._manualClose = true;
    await new Promise<void>(resolve => {
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }

  public async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }
}

export default NodeTcpTransport;
